import { RelativeTime } from '../value-objects/relative-time.vo';
import { Slot } from '../value-objects/slot.vo';
import type { EraSummary } from './era-summary';

export type EraLookup<T> = { readonly inEra: true; readonly value: T } | { readonly inEra: false };

export interface Wallclock {
  readonly time: RelativeTime;
  readonly slotLengthMs: number;
}

export interface SlotAtTime {
  readonly slot: Slot;
  readonly timeSpentMs: number;
  readonly timeLeftMs: number;
}

export interface EpochOfSlot {
  readonly epoch: bigint;
  readonly slotInEpoch: bigint;
  readonly slotsLeft: bigint;
}

export interface EpochStart {
  readonly slot: Slot;
  readonly epochSize: bigint;
}

const MISS: EraLookup<never> = { inEra: false };

function found<T>(value: T): EraLookup<T> {
  return { inEra: true, value };
}

function containsSlot(era: EraSummary, slot: bigint): boolean {
  return era.start.slot <= slot && (era.end === null || slot < era.end.slot);
}

function containsTime(era: EraSummary, time: RelativeTime): boolean {
  return !time.isBefore(era.start.time) && (era.end === null || time.isBefore(era.end.time));
}

function containsEpoch(era: EraSummary, epoch: bigint): boolean {
  return era.start.epoch <= epoch && (era.end === null || epoch < era.end.epoch);
}

/**
 * A query answerable inside a single era. Composing two of them with `chain`
 * still requires both halves to land in the same era.
 */
export class EraQuery<T> {
  private constructor(
    private readonly _description: string,
    private readonly evaluate: (era: EraSummary) => EraLookup<T>,
  ) {}

  get description(): string {
    return this._description;
  }

  static slotToWallclock(slot: Slot): EraQuery<Wallclock> {
    return new EraQuery<Wallclock>(`slotToWallclock(${slot.value.toString()})`, (era) => {
      if (!containsSlot(era, slot.value)) {
        return MISS;
      }
      const elapsedSlots = Number(slot.value - era.start.slot);
      return found({
        time: era.start.time.add(elapsedSlots * era.params.slotLengthMs),
        slotLengthMs: era.params.slotLengthMs,
      });
    });
  }

  static wallclockToSlot(time: RelativeTime): EraQuery<SlotAtTime> {
    return new EraQuery<SlotAtTime>(`wallclockToSlot(${time.toString()})`, (era) => {
      if (!containsTime(era, time)) {
        return MISS;
      }
      const { slotLengthMs } = era.params;
      const elapsedMs = time.diff(era.start.time);
      const elapsedSlots = Math.floor(elapsedMs / slotLengthMs);
      const timeSpentMs = elapsedMs - elapsedSlots * slotLengthMs;
      return found({
        slot: Slot.create(era.start.slot + BigInt(elapsedSlots)),
        timeSpentMs,
        timeLeftMs: slotLengthMs - timeSpentMs,
      });
    });
  }

  static slotToEpoch(slot: Slot): EraQuery<EpochOfSlot> {
    return new EraQuery<EpochOfSlot>(`slotToEpoch(${slot.value.toString()})`, (era) => {
      if (!containsSlot(era, slot.value)) {
        return MISS;
      }
      const { epochSize } = era.params;
      const elapsedSlots = slot.value - era.start.slot;
      const slotInEpoch = elapsedSlots % epochSize;
      return found({
        epoch: era.start.epoch + elapsedSlots / epochSize,
        slotInEpoch,
        slotsLeft: epochSize - slotInEpoch,
      });
    });
  }

  static epochToFirstSlot(epoch: bigint): EraQuery<EpochStart> {
    return new EraQuery<EpochStart>(`epochToFirstSlot(${epoch.toString()})`, (era) => {
      if (!containsEpoch(era, epoch)) {
        return MISS;
      }
      const { epochSize } = era.params;
      return found({
        slot: Slot.create(era.start.slot + (epoch - era.start.epoch) * epochSize),
        epochSize,
      });
    });
  }

  map<U>(f: (value: T) => U): EraQuery<U> {
    return new EraQuery<U>(this._description, (era) => {
      const lookup = this.evaluate(era);
      return lookup.inEra ? found(f(lookup.value)) : MISS;
    });
  }

  chain<U>(f: (value: T) => EraQuery<U>): EraQuery<U> {
    return new EraQuery<U>(`${this._description} >>= …`, (era) => {
      const lookup = this.evaluate(era);
      return lookup.inEra ? f(lookup.value).evaluate(era) : MISS;
    });
  }

  runInEra(era: EraSummary): EraLookup<T> {
    return this.evaluate(era);
  }
}
