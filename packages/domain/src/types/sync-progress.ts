import type { Percentage } from '../value-objects/percentage.vo';

export type SyncProgress =
  | { readonly status: 'ready' }
  | { readonly status: 'syncing'; readonly progress: Percentage }
  | { readonly status: 'not-responding' };

export type SyncStatus = SyncProgress['status'];

export const SyncProgress = {
  ready(): SyncProgress {
    return { status: 'ready' };
  },

  syncing(progress: Percentage): SyncProgress {
    return { status: 'syncing', progress };
  },

  notResponding(): SyncProgress {
    return { status: 'not-responding' };
  },

  equals(a: SyncProgress, b: SyncProgress): boolean {
    if (a.status === 'syncing' && b.status === 'syncing') {
      return a.progress.equals(b.progress);
    }
    return a.status === b.status;
  },

  format(progress: SyncProgress): string {
    switch (progress.status) {
      case 'ready':
        return 'ready';
      case 'syncing':
        return `syncing (${progress.progress.toString()})`;
      case 'not-responding':
        return 'not responding';
    }
  },
};
