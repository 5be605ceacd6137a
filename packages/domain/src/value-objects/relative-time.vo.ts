/**
 * Duration since the chain start time, in milliseconds. May be fractional.
 */
export class RelativeTime {
  private constructor(private readonly _millis: number) {}

  static readonly ZERO = new RelativeTime(0);

  get millis(): number {
    return this._millis;
  }

  get seconds(): number {
    return this._millis / 1_000;
  }

  static fromMillis(millis: number): RelativeTime {
    if (!Number.isFinite(millis)) {
      throw new Error(`RelativeTime must be finite, got ${millis}`);
    }
    return new RelativeTime(millis);
  }

  static fromSeconds(seconds: number): RelativeTime {
    return RelativeTime.fromMillis(seconds * 1_000);
  }

  /** Whole milliseconds, used where fractional noise must not matter. */
  roundedMillis(): number {
    return Math.round(this._millis);
  }

  add(millis: number): RelativeTime {
    return RelativeTime.fromMillis(this._millis + millis);
  }

  /** `this - other`, in milliseconds. */
  diff(other: RelativeTime): number {
    return this._millis - other._millis;
  }

  compare(other: RelativeTime): number {
    return Math.sign(this._millis - other._millis);
  }

  isBefore(other: RelativeTime): boolean {
    return this._millis < other._millis;
  }

  equals(other: RelativeTime): boolean {
    return this._millis === other._millis;
  }

  toString(): string {
    return `${this.seconds}s`;
  }
}
