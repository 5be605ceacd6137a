import { createChildLogger } from '@csp/monitor/infrastructure/logging/pino-logger';
import type { LoggerPort, NotificationMessage, NotificationPort } from '@csp/domain';

export class ConsoleNotifierAdapter implements NotificationPort {
  constructor(private readonly logger: LoggerPort = createChildLogger('console-notifier')) {}

  async send(message: NotificationMessage): Promise<void> {
    const text = `[${message.type.toUpperCase()}] ${message.title}: ${message.message}`;
    const context = message.data ? { ...message.data } : undefined;

    if (message.type === 'error') {
      this.logger.error(text, undefined, context);
    } else if (message.type === 'warning') {
      this.logger.warn(text, context);
    } else {
      this.logger.info(text, context);
    }
  }
}
