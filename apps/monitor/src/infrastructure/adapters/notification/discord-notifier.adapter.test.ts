import { FakeLogger } from '@csp/monitor/testing/fakes';
import type { NotificationMessage } from '@csp/domain';
import { describe, expect, it, vi } from 'vitest';
import type { FetchLike } from './discord-client';
import { DiscordNotifierAdapter } from './discord-notifier.adapter';
import { MultiNotifierAdapter } from './multi-notifier.adapter';

const MESSAGE: NotificationMessage = {
  type: 'success',
  title: 'Node ready',
  message: 'syncing (99.00%) -> ready',
  data: { tipSlot: '42' },
  timestamp: Date.parse('2024-05-01T12:00:00Z'),
};

describe('DiscordNotifierAdapter', () => {
  it('posts the message as an embed', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue({ ok: true, status: 204 });
    const notifier = new DiscordNotifierAdapter('https://discord.test/webhook', new FakeLogger(), fetchImpl);

    await notifier.send(MESSAGE);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://discord.test/webhook');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(init?.body ?? '{}')).toEqual({
      username: 'Chain Sync Monitor',
      embeds: [
        {
          title: 'Node ready',
          description: 'syncing (99.00%) -> ready',
          color: 0x2e_cc_71,
          timestamp: '2024-05-01T12:00:00.000Z',
          fields: [{ name: 'tipSlot', value: '42', inline: true }],
        },
      ],
    });
  });

  it('logs a rejected webhook call', async () => {
    const logger = new FakeLogger();
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue({ ok: false, status: 429 });
    const notifier = new DiscordNotifierAdapter('https://discord.test/webhook', logger, fetchImpl);

    await notifier.send(MESSAGE);

    expect(logger.warn).toHaveBeenCalledWith('Webhook responded with status 429');
  });
});

describe('MultiNotifierAdapter', () => {
  it('delivers to every notifier even when one fails', async () => {
    const logger = new FakeLogger();
    const failing = { send: vi.fn<(message: NotificationMessage) => Promise<void>>().mockRejectedValue(new Error('boom')) };
    const working = { send: vi.fn<(message: NotificationMessage) => Promise<void>>().mockResolvedValue(undefined) };

    await new MultiNotifierAdapter([failing, working], logger).send(MESSAGE);

    expect(working.send).toHaveBeenCalledWith(MESSAGE);
    expect(logger.warn).toHaveBeenCalledWith('Notifier failed: Error: boom');
  });
});
