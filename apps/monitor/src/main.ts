import { createChildLogger } from '@csp/monitor/infrastructure/logging/pino-logger';
import { toError } from '@csp/domain';
import { Core } from './application/orchestrator/core';

const log = createChildLogger('main');

async function main(): Promise<void> {
  log.info('Chain sync monitor starting...');

  const core = new Core();

  const shutdown = async (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    await core.stop();
    log.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      log.fatal('Shutdown failed', toError(error));
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  try {
    await core.start();
    log.info('Monitor is running. Press Ctrl+C to stop.');
  } catch (error) {
    log.fatal('Fatal error starting monitor', toError(error));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  log.fatal('Unhandled error', toError(error));
  process.exit(1);
});
