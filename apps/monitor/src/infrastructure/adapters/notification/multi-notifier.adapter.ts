import type { LoggerPort, NotificationMessage, NotificationPort } from '@csp/domain';
import { createChildLogger } from '@csp/monitor/infrastructure/logging/pino-logger';

export class MultiNotifierAdapter implements NotificationPort {
  constructor(
    private readonly notifiers: NotificationPort[],
    private readonly logger: LoggerPort = createChildLogger('multi-notifier'),
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    if (this.notifiers.length === 0) {
      return;
    }

    const results = await Promise.allSettled(this.notifiers.map((notifier) => notifier.send(message)));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn(`Notifier failed: ${String(result.reason)}`);
      }
    }
  }
}
