import type { NotificationMessage } from '@csp/domain';
import type { DiscordEmbed, DiscordField } from './discord-client';

const COLORS: Record<NotificationMessage['type'], number> = {
  success: 0x2e_cc_71, // Green
  status: 0x34_98_db, // Blue
  warning: 0xf1_c4_0f, // Yellow
  error: 0xe7_4c_3c, // Red
  info: 0x00_ff_ff, // Cyan
};

export function getColorForType(type: NotificationMessage['type']): number {
  return COLORS[type];
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return JSON.stringify(value) ?? String(value);
}

export function buildFields(data: Record<string, unknown> | undefined): DiscordField[] {
  if (!data) {
    return [];
  }
  return Object.entries(data).map(([name, value]) => ({ name, value: formatValue(value), inline: true }));
}

export function buildEmbed(message: NotificationMessage, now: number = Date.now()): DiscordEmbed {
  return {
    title: message.title,
    description: message.message,
    color: getColorForType(message.type),
    timestamp: new Date(message.timestamp ?? now).toISOString(),
    fields: buildFields(message.data),
  };
}
