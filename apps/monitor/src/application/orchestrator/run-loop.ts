import type { SyncProgressReport } from '@csp/monitor/application/use-cases/report-sync-progress/report-sync-progress.usecase';
import type { SyncConfig } from '@csp/config';
import {
  type ClockPort,
  type LoggerPort,
  SyncProgress,
  type SyncProgressChangedEventData,
  syncProgressChangedEvent,
  toError,
} from '@csp/domain';
import { sleep } from './sleep.utils';

// Progress ratios come from float division; 0.6 - 0.5 is just below 0.1.
const STEP_EPSILON = 1e-9;

const ERROR_BACKOFF_MS = 1_000;

export interface SyncProgressReporter {
  execute(): Promise<SyncProgressReport>;
}

export type SyncProgressListener = (event: SyncProgressChangedEventData) => Promise<void>;

export type Wait = (ms: number, signal: AbortSignal) => Promise<void>;

export interface RunLoopDeps {
  readonly config: Pick<SyncConfig, 'pollIntervalMs' | 'notifyOnProgressStep'>;
  readonly reporter: SyncProgressReporter;
  readonly onChange: SyncProgressListener;
  readonly clock: ClockPort;
  readonly logger: LoggerPort;
  readonly wait?: Wait;
}

/**
 * Whether `current` differs enough from the last published progress to be published.
 */
export function isNotableChange(previous: SyncProgress | null, current: SyncProgress, step: number): boolean {
  if (previous === null || previous.status !== current.status) {
    return true;
  }
  if (previous.status === 'syncing' && current.status === 'syncing') {
    const delta = Math.abs(current.progress.value - previous.progress.value);
    return step === 0 ? delta > 0 : delta + STEP_EPSILON >= step;
  }
  return false;
}

export class RunLoop {
  private lastPublished: SyncProgress | null = null;
  private controller = new AbortController();
  private readonly wait: Wait;

  constructor(private readonly deps: RunLoopDeps) {
    this.wait = deps.wait ?? sleep;
  }

  async start(): Promise<void> {
    this.controller = new AbortController();
    const { signal } = this.controller;

    while (!signal.aborted) {
      let delayMs = this.deps.config.pollIntervalMs;
      try {
        await this.tick();
      } catch (error) {
        this.deps.logger.error('Sync progress iteration failed', toError(error));
        delayMs = Math.min(delayMs, ERROR_BACKOFF_MS);
      }
      await this.wait(delayMs, signal);
    }
  }

  stop(): void {
    this.controller.abort();
  }

  /**
   * One poll. Returns the published event, or `null` when nothing notable changed.
   */
  async tick(): Promise<SyncProgressChangedEventData | null> {
    const { reporter, onChange, clock, config, logger } = this.deps;
    const report = await reporter.execute();

    if (!isNotableChange(this.lastPublished, report.progress, config.notifyOnProgressStep)) {
      logger.trace(`Sync progress unchanged: ${SyncProgress.format(report.progress)}`);
      return null;
    }

    const event = syncProgressChangedEvent(report.tipSlot, this.lastPublished, report.progress, clock.now().getTime());
    this.lastPublished = report.progress;
    logger.info(`Sync progress: ${SyncProgress.format(report.progress)}`, {
      tipSlot: report.tipSlot?.value.toString() ?? null,
    });
    await onChange(event);
    return event;
  }
}
