import {
  type LoggerPort,
  type NotificationMessage,
  type NotificationPort,
  SyncProgress,
  type SyncProgressChangedEventData,
  toError,
} from '@csp/domain';

function notificationType(progress: SyncProgress): NotificationMessage['type'] {
  switch (progress.status) {
    case 'ready':
      return 'success';
    case 'syncing':
      return 'status';
    case 'not-responding':
      return 'warning';
  }
}

export function buildSyncProgressMessage(event: SyncProgressChangedEventData): NotificationMessage {
  const current = SyncProgress.format(event.current);
  const previous = event.previous ? SyncProgress.format(event.previous) : 'unknown';
  const tip = event.tipSlot ? event.tipSlot.value.toString() : 'unknown';

  const data: Record<string, unknown> = { tipSlot: tip, status: event.current.status };
  if (event.current.status === 'syncing') {
    data.progress = event.current.progress.toString();
  }

  return {
    type: notificationType(event.current),
    title: `Node ${current}`,
    message: `${previous} -> ${current}`,
    data,
    timestamp: event.timestamp,
  };
}

export async function notifySyncProgressChange(
  event: SyncProgressChangedEventData,
  notifier: NotificationPort,
  logger: LoggerPort,
): Promise<void> {
  try {
    await notifier.send(buildSyncProgressMessage(event));
  } catch (error) {
    logger.warn(`Sync progress notification failed: ${toError(error).message}`);
  }
}
