import { describe, expect, it, vi } from 'vitest';
import { PastHorizonError, UnexpectedPastHorizonError } from '../errors/past-horizon.error';
import { Summary } from '../history/era-summary';
import { SummaryInterpreter } from '../history/summary-interpreter';
import type { LoggerPort } from '../infrastructure/logger.port';
import type { ClockPort } from '../ports/clock.port';
import type { EraInterpreter } from '../ports/era-interpreter.port';
import { asyncEffect, liftToAsync, syncEffect } from '../types/effect';
import { Slot } from '../value-objects/slot.vo';
import { StartTime } from '../value-objects/start-time.vo';
import { slotToRelativeTime, timeBetweenSlots } from './query';
import {
  currentRelativeTime,
  hoistTimeInterpreter,
  mkTimeInterpreter,
  neverFails,
  TimeInterpreter,
} from './time-interpreter';
import { loggerTracer, type TimeInterpreterLog } from './time-interpreter-log';

const start = StartTime.fromIso('2020-01-01T00:00:00.000Z');
const bounded = Summary.fromEras([
  { epochSize: 10, slotLengthMs: 1_000, endEpoch: 2 },
  { epochSize: 5, slotLengthMs: 2_000, endEpoch: 4 },
]);

function syncInterpreter(summary: Summary = bounded) {
  const logs: TimeInterpreterLog[] = [];
  const interpreter = TimeInterpreter.fromSummary(
    summary,
    start,
    (message: TimeInterpreterLog) => {
      logs.push(message);
    },
    syncEffect,
  );
  return { interpreter, logs };
}

function createFakeLogger(): LoggerPort & { errors: string[]; debugs: string[] } {
  const errors: string[] = [];
  const debugs: string[] = [];
  const logger: LoggerPort & { errors: string[]; debugs: string[] } = {
    errors,
    debugs,
    trace: () => undefined,
    debug: (message) => {
      debugs.push(message);
    },
    info: () => undefined,
    warn: () => undefined,
    error: (message) => {
      errors.push(message);
    },
    fatal: () => undefined,
    child: () => logger,
    setLevel: () => undefined,
    getLevel: () => 'debug',
  };
  return logger;
}

describe('TimeInterpreter', () => {
  it('interprets queries with the bundled start time', () => {
    const { interpreter, logs } = syncInterpreter();

    const result = interpreter.interpret(slotToRelativeTime(Slot.create(25)));

    expect(result.ok && result.value.millis).toBe(30_000);
    expect(logs).toHaveLength(0);
  });

  it('returns horizon failures as values and traces them without a reason', () => {
    const { interpreter, logs } = syncInterpreter();

    const result = interpreter.interpret(slotToRelativeTime(Slot.create(30)));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PastHorizonError);
      expect(logs).toEqual([{ type: 'past-horizon', startTime: start, error: result.error }]);
    }
  });

  it('fetches the era interpreter once per query', () => {
    const inner: EraInterpreter = new SummaryInterpreter(bounded);
    const accessor = vi.fn(() => inner);
    const interpreter = TimeInterpreter.create({
      effect: syncEffect,
      interpreter: accessor,
      startTime: start,
      tracer: () => undefined,
    });

    const result = interpreter.interpret(timeBetweenSlots(Slot.create(5), Slot.create(25)));

    expect(result).toEqual({ ok: true, value: 25_000 });
    expect(accessor).toHaveBeenCalledTimes(1);
  });

  it('sees a refreshed era history on the next query', async () => {
    let current = new SummaryInterpreter(bounded);
    const interpreter = TimeInterpreter.create({
      effect: asyncEffect,
      interpreter: async (): Promise<EraInterpreter> => current,
      startTime: start,
      tracer: async () => undefined,
    });

    const before = await interpreter.interpret(slotToRelativeTime(Slot.create(35)));
    current = new SummaryInterpreter(
      Summary.fromEras([
        { epochSize: 10, slotLengthMs: 1_000, endEpoch: 2 },
        { epochSize: 5, slotLengthMs: 2_000 },
      ]),
    );
    const after = await interpreter.interpret(slotToRelativeTime(Slot.create(35)));

    expect(before.ok).toBe(false);
    expect(after.ok && after.value.millis).toBe(50_000);
  });
});

describe('neverFails', () => {
  it('passes successful results through', () => {
    const { interpreter } = syncInterpreter();

    const result = neverFails('no hard forks', interpreter).interpret(slotToRelativeTime(Slot.create(3)));

    expect(result.ok && result.value.millis).toBe(3_000);
  });

  it('traces the reason and raises instead of returning the failure', () => {
    const { interpreter, logs } = syncInterpreter();
    const strict = neverFails('no hard forks', interpreter);

    expect(() => strict.interpret(slotToRelativeTime(Slot.create(30)))).toThrow(UnexpectedPastHorizonError);
    expect(logs).toHaveLength(1);
    expect(logs[0]?.reason).toBe('no hard forks');
    expect(logs[0]?.error.query).toBe('slotToWallclock(30)');
  });

  it('annotates the raised error with the reason', () => {
    const { interpreter } = syncInterpreter();

    let caught: unknown;
    try {
      interpreter.neverFails('genesis config').interpret(slotToRelativeTime(Slot.create(99)));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnexpectedPastHorizonError);
    if (caught instanceof UnexpectedPastHorizonError) {
      expect(caught.reason).toBe('genesis config');
      expect(caught.code).toBe('UNEXPECTED_PAST_HORIZON');
      expect(caught.failure.query).toBe('slotToWallclock(99)');
    }
  });
});

describe('hoistTimeInterpreter', () => {
  it('lifts a synchronous interpreter into promises', async () => {
    const { interpreter } = syncInterpreter();
    const hoisted = hoistTimeInterpreter(liftToAsync, asyncEffect, interpreter);

    const result = hoisted.interpret(slotToRelativeTime(Slot.create(25)));

    expect(result).toBeInstanceOf(Promise);
    const resolved = await result;
    expect(resolved.ok && resolved.value.millis).toBe(30_000);
    expect(hoisted.startTime).toBe(start);
  });

  it('keeps the failure policy of the interpreter it lifts', async () => {
    const { interpreter, logs } = syncInterpreter();
    const hoisted = interpreter.neverFails('static history').hoist(liftToAsync, asyncEffect);

    await expect(hoisted.interpret(slotToRelativeTime(Slot.create(30)))).rejects.toBeInstanceOf(
      UnexpectedPastHorizonError,
    );
    expect(logs[0]?.reason).toBe('static history');
  });

  it('propagates failures as values when no policy was applied', async () => {
    const { interpreter } = syncInterpreter();
    const hoisted = interpreter.hoist(liftToAsync, asyncEffect);

    const result = await hoisted.interpret(slotToRelativeTime(Slot.create(30)));

    expect(result.ok).toBe(false);
  });
});

describe('mkTimeInterpreter', () => {
  it('never reaches a horizon', () => {
    const interpreter = mkTimeInterpreter(() => undefined, start, 21_600, 1_000, syncEffect);

    const result = interpreter.interpret(slotToRelativeTime(Slot.create(10_000_000)));

    expect(result.ok && result.value.millis).toBe(10_000_000_000);
  });
});

describe('loggerTracer', () => {
  it('logs impossible failures as errors and the rest at debug', () => {
    const logger = createFakeLogger();
    const interpreter = TimeInterpreter.fromSummary(bounded, start, loggerTracer(logger, syncEffect), syncEffect);

    interpreter.interpret(slotToRelativeTime(Slot.create(30)));
    expect(() => interpreter.neverFails('no hard forks').interpret(slotToRelativeTime(Slot.create(30)))).toThrow();

    expect(logger.debugs).toEqual(['Time query past horizon']);
    expect(logger.errors).toEqual(['Time query past horizon, which should be impossible: no hard forks']);
  });
});

describe('currentRelativeTime', () => {
  const clockAt = (iso: string): ClockPort => ({
    now: () => new Date(iso),
  });

  it('measures the clock against the start time', () => {
    expect(currentRelativeTime(clockAt('2020-01-01T00:16:40.000Z'), start).millis).toBe(1_000_000);
  });

  it('clamps clocks that read before the start time to zero', () => {
    expect(currentRelativeTime(clockAt('2019-06-01T00:00:00.000Z'), start).millis).toBe(0);
  });
});
