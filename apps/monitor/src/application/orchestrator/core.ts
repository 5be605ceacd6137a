import { notifySyncProgressChange } from '@csp/monitor/application/use-cases/notification/notify';
import { createChildLogger } from '@csp/monitor/infrastructure/logging/pino-logger';
import { toError } from '@csp/domain';
import { RunLoop } from './run-loop';
import { type SyncMonitorOptions, SyncMonitor } from './sync-monitor';

const log = createChildLogger('core');

export class Core extends SyncMonitor {
  private isRunning = false;
  private runLoop: RunLoop | null = null;
  private loopPromise: Promise<void> | null = null;

  constructor(options: SyncMonitorOptions = {}) {
    super(options);
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      log.warn('Monitor already running');
      return;
    }

    log.info('Starting sync progress monitor...', {
      rpc: this.config.rpc.httpEndpoint,
      history: this.config.chain.history.source,
    });

    const notificationPort = this.getNotificationPort();
    this.runLoop = new RunLoop({
      config: this.config.sync,
      reporter: this.getReportSyncProgress(),
      onChange: (event) => notifySyncProgressChange(event, notificationPort, log),
      clock: this.getClock(),
      logger: createChildLogger('run-loop'),
    });

    this.loopPromise = this.runLoop.start().catch((error: unknown) => {
      log.fatal('Run loop crashed', toError(error));
    });

    await notificationPort.send({
      type: 'info',
      title: 'Sync Monitor Started',
      message: `Watching ${this.config.rpc.httpEndpoint}`,
    });

    this.isRunning = true;
    log.info('Sync progress monitor started');
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;

    log.info('Stopping sync progress monitor...');

    this.runLoop?.stop();
    if (this.loopPromise) {
      await this.loopPromise;
    }

    await this.getNotificationPort().send({
      type: 'info',
      title: 'Sync Monitor Stopped',
      message: 'Monitor has been stopped',
    });

    this.isRunning = false;
    log.info('Sync progress monitor stopped');
  }
}
