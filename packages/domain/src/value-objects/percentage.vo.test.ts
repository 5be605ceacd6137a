import { describe, expect, it } from 'vitest';
import { PercentageOutOfBoundsError } from '../errors/percentage.error';
import { Percentage } from './percentage.vo';

describe('Percentage', () => {
  it.each([0, 0.25, 0.97, 1])('accepts ratio %s and keeps it', (ratio) => {
    const result = Percentage.create(ratio);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.value).toBe(ratio);
    }
  });

  it.each([-0.01, -1, 1.0001, 2, Number.NaN])('rejects ratio %s as out of bounds', (ratio) => {
    const result = Percentage.create(ratio);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PercentageOutOfBoundsError);
      expect(result.error.code).toBe('PERCENTAGE_OUT_OF_BOUNDS');
    }
  });

  it('orders and compares by ratio', () => {
    const low = Percentage.create(0.2);
    const high = Percentage.create(0.8);
    const again = Percentage.create(0.2);
    if (!low.ok || !high.ok || !again.ok) {
      throw new Error('expected valid percentages');
    }

    expect(low.value.compare(high.value)).toBe(-1);
    expect(high.value.compare(low.value)).toBe(1);
    expect(low.value.equals(again.value)).toBe(true);
  });

  it('renders as a percent string', () => {
    const half = Percentage.create(0.5);
    if (!half.ok) {
      throw new Error('expected a valid percentage');
    }

    expect(half.value.toPercent()).toBe(50);
    expect(half.value.toString()).toBe('50.00%');
  });
});
