import { withTimeout } from '@csp/monitor/application/orchestrator/sleep.utils';
import type { NodeTipPort } from '@csp/monitor/domain/services/ports/node-tip.port';
import {
  type ClockPort,
  currentRelativeTime,
  getSyncProgress,
  InvariantViolationError,
  type LoggerPort,
  type PastHorizonError,
  type Result,
  type Slot,
  SyncProgress,
  type SyncTolerance,
  syncProgress,
  type TimeInterpreter,
  toError,
  UnexpectedPastHorizonError,
} from '@csp/domain';

export type HistorySource = 'rpc' | 'static';

export interface SyncProgressReport {
  readonly tipSlot: Slot | null;
  readonly progress: SyncProgress;
}

/** A cached era history that can be dropped and refetched. */
export interface EraHistoryCache {
  invalidate(): void;
}

export interface ReportSyncProgressDeps {
  readonly node: NodeTipPort;
  readonly timeInterpreter: TimeInterpreter<'async'>;
  /**
   * `rpc`: the history comes from the node itself and must cover its tip.
   * `static`: the configured history may end before the tip.
   */
  readonly historySource: HistorySource;
  /** Dropped when the node's tip falls outside its own history. */
  readonly history?: EraHistoryCache | null;
  readonly tolerance: SyncTolerance;
  readonly clock: ClockPort;
  readonly rpcTimeoutMs: number;
  readonly logger: LoggerPort;
}

export class ReportSyncProgressUseCase {
  constructor(private readonly deps: ReportSyncProgressDeps) {}

  async execute(): Promise<SyncProgressReport> {
    const { node, rpcTimeoutMs, logger } = this.deps;

    let tipSlot: Slot;
    try {
      tipSlot = await withTimeout(node.getTipSlot(), rpcTimeoutMs, 'getTipSlot');
    } catch (error) {
      logger.warn(`Node tip unavailable: ${toError(error).message}`);
      return { tipSlot: null, progress: SyncProgress.notResponding() };
    }

    let result: Result<SyncProgress, PastHorizonError>;
    try {
      result = await this.estimate(tipSlot);
    } catch (error) {
      if (error instanceof UnexpectedPastHorizonError) {
        this.deps.history?.invalidate();
        throw error;
      }
      if (error instanceof InvariantViolationError) {
        throw error;
      }
      logger.warn(`Era history unavailable: ${toError(error).message}`, { tipSlot: tipSlot.toString() });
      return { tipSlot, progress: SyncProgress.notResponding() };
    }

    if (!result.ok) {
      logger.warn(`${tipSlot.toString()} is past the known era history`, { query: result.error.query });
      return { tipSlot, progress: SyncProgress.notResponding() };
    }

    logger.debug(`${tipSlot.toString()}: ${SyncProgress.format(result.value)}`);
    return { tipSlot, progress: result.value };
  }

  private estimate(tipSlot: Slot): Promise<Result<SyncProgress, PastHorizonError>> {
    const { historySource, timeInterpreter, tolerance, clock } = this.deps;

    if (historySource === 'rpc') {
      return getSyncProgress(tolerance, tipSlot, timeInterpreter, clock);
    }

    const now = currentRelativeTime(clock, timeInterpreter.startTime);
    return syncProgress(tolerance, timeInterpreter, tipSlot, now);
  }
}
