import type { Slot } from '@csp/domain';

/**
 * Epoch layout reported by the node. Epochs before `firstNormalEpoch` double
 * in size starting from {@link MINIMUM_SLOTS_PER_EPOCH} when `warmup` is set.
 */
export interface EpochScheduleInfo {
  readonly slotsPerEpoch: number;
  readonly warmup: boolean;
  readonly firstNormalEpoch: number;
  readonly firstNormalSlot: number;
}

export const MINIMUM_SLOTS_PER_EPOCH = 32;

export interface NodeTipPort {
  /** Latest slot the node has processed. */
  getTipSlot(): Promise<Slot>;
  getEpochSchedule(): Promise<EpochScheduleInfo>;
}
