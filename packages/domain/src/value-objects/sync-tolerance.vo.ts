/**
 * Maximum lag between the tip and now that still counts as synced.
 */
export class SyncTolerance {
  private constructor(private readonly _millis: number) {}

  get millis(): number {
    return this._millis;
  }

  static fromMillis(millis: number): SyncTolerance {
    if (!Number.isFinite(millis) || millis < 0) {
      throw new Error('SyncTolerance must be a non-negative duration');
    }
    return new SyncTolerance(millis);
  }

  static fromSeconds(seconds: number): SyncTolerance {
    return SyncTolerance.fromMillis(seconds * 1_000);
  }

  toString(): string {
    return `${this._millis / 1_000}s`;
  }
}
