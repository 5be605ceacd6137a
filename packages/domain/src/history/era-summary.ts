import type { EraBoundsDescription } from '../errors/past-horizon.error';
import { RelativeTime } from '../value-objects/relative-time.vo';

export interface Bound {
  readonly slot: bigint;
  readonly epoch: bigint;
  readonly time: RelativeTime;
}

export interface EraParams {
  readonly epochSize: bigint;
  readonly slotLengthMs: number;
}

/**
 * One era of the history. `end` is exclusive; `null` means the era never ends.
 */
export interface EraSummary {
  readonly start: Bound;
  readonly end: Bound | null;
  readonly params: EraParams;
}

export interface EraSpec {
  readonly epochSize: bigint | number;
  readonly slotLengthMs: number;
  /** First epoch that no longer belongs to this era. Omit for an open-ended era. */
  readonly endEpoch?: bigint | number;
}

export const GENESIS_BOUND: Bound = {
  slot: 0n,
  epoch: 0n,
  time: RelativeTime.ZERO,
};

export function mkUpperBound(params: EraParams, start: Bound, endEpoch: bigint): Bound {
  const epochs = endEpoch - start.epoch;
  const slots = epochs * params.epochSize;
  return {
    slot: start.slot + slots,
    epoch: endEpoch,
    time: start.time.add(Number(slots) * params.slotLengthMs),
  };
}

function toParams(spec: EraSpec): EraParams {
  const epochSize = BigInt(spec.epochSize);
  if (epochSize <= 0n) {
    throw new Error(`Era epoch size must be positive, got ${epochSize.toString()}`);
  }
  if (!(spec.slotLengthMs > 0)) {
    throw new Error(`Era slot length must be positive, got ${spec.slotLengthMs}`);
  }
  return { epochSize, slotLengthMs: spec.slotLengthMs };
}

export class Summary {
  private constructor(private readonly _eras: readonly EraSummary[]) {}

  get eras(): readonly EraSummary[] {
    return this._eras;
  }

  /** The end of the last era, or `null` when the history is open-ended. */
  get horizon(): Bound | null {
    const last = this._eras[this._eras.length - 1];
    return last?.end ?? null;
  }

  static neverForks(epochSize: bigint | number, slotLengthMs: number): Summary {
    return Summary.fromEras([{ epochSize, slotLengthMs }]);
  }

  static fromEras(specs: readonly EraSpec[]): Summary {
    if (specs.length === 0) {
      throw new Error('A summary needs at least one era');
    }

    const eras: EraSummary[] = [];
    let start = GENESIS_BOUND;

    specs.forEach((spec, index) => {
      const params = toParams(spec);
      const isLast = index === specs.length - 1;

      if (spec.endEpoch === undefined) {
        if (!isLast) {
          throw new Error(`Only the last era may be open-ended (era ${index})`);
        }
        eras.push({ start, end: null, params });
        return;
      }

      const endEpoch = BigInt(spec.endEpoch);
      if (endEpoch <= start.epoch) {
        throw new Error(`Era ${index} must end after epoch ${start.epoch.toString()}`);
      }
      const end = mkUpperBound(params, start, endEpoch);
      eras.push({ start, end, params });
      start = end;
    });

    return new Summary(eras);
  }

  describe(): EraBoundsDescription[] {
    return this._eras.map((era) => ({
      startSlot: era.start.slot,
      endSlot: era.end?.slot ?? null,
    }));
  }
}
