import type { EpochScheduleInfo, NodeTipPort } from '@csp/monitor/domain/services/ports/node-tip.port';
import { type ClockPort, type LoggerPort, type LogLevel, Percentage, Slot } from '@csp/domain';
import { vi } from 'vitest';

type LogFn = (message: string, context?: Record<string, unknown>) => void;
type ErrorLogFn = (message: string, error?: Error, context?: Record<string, unknown>) => void;

export class FakeLogger implements LoggerPort {
  readonly trace = vi.fn<LogFn>();
  readonly debug = vi.fn<LogFn>();
  readonly info = vi.fn<LogFn>();
  readonly warn = vi.fn<LogFn>();
  readonly error = vi.fn<ErrorLogFn>();
  readonly fatal = vi.fn<ErrorLogFn>();

  child(): LoggerPort {
    return this;
  }

  setLevel(_level: LogLevel): void {}

  getLevel(): LogLevel {
    return 'trace';
  }
}

export function fixedClock(now: Date): ClockPort {
  return {
    now: () => now,
  };
}

export class FakeNode implements NodeTipPort {
  tip: number | Error = 0;
  schedule: EpochScheduleInfo | Error = {
    slotsPerEpoch: 432_000,
    warmup: false,
    firstNormalEpoch: 0,
    firstNormalSlot: 0,
  };
  scheduleCalls = 0;

  async getTipSlot(): Promise<Slot> {
    if (this.tip instanceof Error) {
      throw this.tip;
    }
    return Slot.create(this.tip);
  }

  async getEpochSchedule(): Promise<EpochScheduleInfo> {
    this.scheduleCalls += 1;
    if (this.schedule instanceof Error) {
      throw this.schedule;
    }
    return this.schedule;
  }
}

export function percentage(ratio: number): Percentage {
  const result = Percentage.create(ratio);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
