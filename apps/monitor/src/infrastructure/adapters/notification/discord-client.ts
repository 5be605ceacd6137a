import type { LoggerPort } from '@csp/domain';
import { toError } from '@csp/domain';

export interface DiscordField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title: string;
  description?: string;
  color?: number;
  fields?: DiscordField[];
  footer?: { text: string };
  timestamp?: string;
}

export type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
  ok: boolean;
  status: number;
}>;

export class DiscordClient {
  constructor(
    private readonly webhookUrl: string,
    private readonly logger: LoggerPort,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async sendEmbed(embed: DiscordEmbed): Promise<void> {
    try {
      const payload = {
        username: 'Chain Sync Monitor',
        embeds: [embed],
      };
      const response = await this.fetchImpl(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });
      if (!response.ok) {
        this.logger.warn(`Webhook responded with status ${response.status}`);
      }
    } catch (error) {
      this.logger.warn(`Failed to send notification: ${toError(error).message}`);
    }
  }
}
