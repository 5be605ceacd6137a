import type { SyncProgress } from '../types/sync-progress';
import type { Slot } from '../value-objects/slot.vo';

export interface SyncProgressChangedEventData {
  readonly type: 'sync-progress-changed';
  readonly timestamp: number;
  readonly tipSlot: Slot | null;
  readonly previous: SyncProgress | null;
  readonly current: SyncProgress;
}

export function syncProgressChangedEvent(
  tipSlot: Slot | null,
  previous: SyncProgress | null,
  current: SyncProgress,
  timestamp: number = Date.now(),
): SyncProgressChangedEventData {
  return {
    type: 'sync-progress-changed',
    timestamp,
    tipSlot,
    previous,
    current,
  };
}
