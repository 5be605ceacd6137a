import { withTimeout } from '@csp/monitor/application/orchestrator/sleep.utils';
import {
  type EpochScheduleInfo,
  MINIMUM_SLOTS_PER_EPOCH,
  type NodeTipPort,
} from '@csp/monitor/domain/services/ports/node-tip.port';
import {
  type EraInterpreter,
  type EraSpec,
  InvariantViolationError,
  type LoggerPort,
  Summary,
  SummaryInterpreter,
  toError,
} from '@csp/domain';

export interface EpochScheduleHistoryConfig {
  slotLengthMs: number;
  refreshIntervalMs: number;
  timeoutMs: number;
  now?: () => number;
}

interface CachedHistory {
  readonly interpreter: EraInterpreter;
  readonly fetchedAt: number;
}

/**
 * Each warm-up epoch has its own size, so each becomes an era of one epoch.
 * The normal schedule is the last, open-ended era.
 */
export function eraSpecsFromSchedule(schedule: EpochScheduleInfo, slotLengthMs: number): EraSpec[] {
  const specs: EraSpec[] = [];
  let warmupSlots = 0n;

  if (schedule.warmup) {
    for (let epoch = 0; epoch < schedule.firstNormalEpoch; epoch++) {
      const epochSize = BigInt(MINIMUM_SLOTS_PER_EPOCH) << BigInt(epoch);
      specs.push({ epochSize, slotLengthMs, endEpoch: epoch + 1 });
      warmupSlots += epochSize;
    }
  }

  if (warmupSlots !== BigInt(schedule.firstNormalSlot)) {
    throw new InvariantViolationError(
      'epochSchedule',
      `warm-up covers ${warmupSlots.toString()} slots but the first normal slot is ${schedule.firstNormalSlot}`,
    );
  }

  specs.push({ epochSize: schedule.slotsPerEpoch, slotLengthMs });
  return specs;
}

export function summaryFromSchedule(schedule: EpochScheduleInfo, slotLengthMs: number): Summary {
  return Summary.fromEras(eraSpecsFromSchedule(schedule, slotLengthMs));
}

/**
 * Era history derived from the node's epoch schedule, fetched lazily and
 * refreshed once `refreshIntervalMs` has passed.
 */
export class EpochScheduleHistoryAdapter {
  private cached: CachedHistory | null = null;
  private inFlight: Promise<EraInterpreter> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly node: NodeTipPort,
    private readonly config: EpochScheduleHistoryConfig,
    private readonly logger: LoggerPort,
  ) {
    this.now = config.now ?? Date.now;
  }

  getInterpreter(): Promise<EraInterpreter> {
    const cached = this.cached;
    if (cached && this.now() - cached.fetchedAt < this.config.refreshIntervalMs) {
      return Promise.resolve(cached.interpreter);
    }

    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Drops the cached history; the next read refetches the schedule. */
  invalidate(): void {
    this.cached = null;
  }

  private async refresh(): Promise<EraInterpreter> {
    let schedule: EpochScheduleInfo;
    try {
      schedule = await withTimeout(this.node.getEpochSchedule(), this.config.timeoutMs, 'getEpochSchedule');
    } catch (error) {
      if (this.cached) {
        this.logger.warn(`Epoch schedule refresh failed, keeping previous history: ${toError(error).message}`);
        return this.cached.interpreter;
      }
      throw error;
    }

    const summary = summaryFromSchedule(schedule, this.config.slotLengthMs);
    const interpreter = new SummaryInterpreter(summary);
    this.cached = { interpreter, fetchedAt: this.now() };

    this.logger.debug(`Era history loaded (${summary.eras.length} era(s))`, {
      slotsPerEpoch: schedule.slotsPerEpoch,
      firstNormalEpoch: schedule.firstNormalEpoch,
    });
    return interpreter;
  }
}
