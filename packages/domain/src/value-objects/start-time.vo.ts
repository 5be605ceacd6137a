import { RelativeTime } from './relative-time.vo';

/**
 * Absolute instant of the chain's genesis.
 */
export class StartTime {
  private constructor(private readonly _epochMs: number) {}

  get epochMs(): number {
    return this._epochMs;
  }

  static create(date: Date): StartTime {
    const epochMs = date.getTime();
    if (Number.isNaN(epochMs)) {
      throw new Error('StartTime requires a valid date');
    }
    return new StartTime(epochMs);
  }

  static fromIso(iso: string): StartTime {
    return StartTime.create(new Date(iso));
  }

  toDate(): Date {
    return new Date(this._epochMs);
  }

  /** `null` when `at` precedes the start time. */
  toRelativeTime(at: Date): RelativeTime | null {
    const millis = at.getTime() - this._epochMs;
    if (millis < 0) {
      return null;
    }
    return RelativeTime.fromMillis(millis);
  }

  /** Only testnets launched in the future read a clock before genesis. */
  toRelativeTimeOrZero(at: Date): RelativeTime {
    return this.toRelativeTime(at) ?? RelativeTime.ZERO;
  }

  toAbsolute(time: RelativeTime): Date {
    return new Date(this._epochMs + time.millis);
  }

  equals(other: StartTime): boolean {
    return this._epochMs === other._epochMs;
  }

  toString(): string {
    return this.toDate().toISOString();
  }
}
