import type { LoggerPort, NotificationMessage, NotificationPort } from '@csp/domain';
import { createChildLogger } from '@csp/monitor/infrastructure/logging/pino-logger';
import { DiscordClient, type FetchLike } from './discord-client';
import { buildEmbed } from './discord-formatter';

export class DiscordNotifierAdapter implements NotificationPort {
  private readonly client: DiscordClient;

  constructor(webhookUrl: string, logger: LoggerPort = createChildLogger('discord'), fetchImpl?: FetchLike) {
    this.client = new DiscordClient(webhookUrl, logger, fetchImpl);
  }

  async send(message: NotificationMessage): Promise<void> {
    await this.client.sendEmbed(buildEmbed(message));
  }
}
