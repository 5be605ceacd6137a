import type { EpochScheduleInfo, NodeTipPort } from '@csp/monitor/domain/services/ports/node-tip.port';
import { Slot } from '@csp/domain';
import type { Commitment, Connection } from '@solana/web3.js';

export class SolanaNodeAdapter implements NodeTipPort {
  constructor(
    private readonly connection: Connection,
    private readonly commitment: Commitment,
  ) {}

  async getTipSlot(): Promise<Slot> {
    const slot = await this.connection.getSlot(this.commitment);
    return Slot.create(slot);
  }

  async getEpochSchedule(): Promise<EpochScheduleInfo> {
    const schedule = await this.connection.getEpochSchedule();
    return {
      slotsPerEpoch: schedule.slotsPerEpoch,
      warmup: schedule.warmup,
      firstNormalEpoch: schedule.firstNormalEpoch,
      firstNormalSlot: schedule.firstNormalSlot,
    };
  }
}
