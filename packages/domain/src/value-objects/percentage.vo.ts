import { PercentageOutOfBoundsError } from '../errors/percentage.error';
import { Result } from '../types/result';

export class Percentage {
  private constructor(private readonly _ratio: number) {}

  get value(): number {
    return this._ratio;
  }

  /**
   * Takes a ratio in [0, 1].
   */
  static create(ratio: number): Result<Percentage, PercentageOutOfBoundsError> {
    if (!(ratio >= 0 && ratio <= 1)) {
      return Result.err(new PercentageOutOfBoundsError(ratio));
    }
    return Result.ok(new Percentage(ratio));
  }

  toPercent(): number {
    return this._ratio * 100;
  }

  compare(other: Percentage): number {
    return Math.sign(this._ratio - other._ratio);
  }

  equals(other: Percentage): boolean {
    return this._ratio === other._ratio;
  }

  toString(): string {
    return `${this.toPercent().toFixed(2)}%`;
  }
}
