import { describe, expect, it } from 'vitest';
import { RelativeTime } from './relative-time.vo';
import { StartTime } from './start-time.vo';

const start = StartTime.fromIso('2020-07-29T21:44:51.000Z');

describe('StartTime', () => {
  it('measures instants after genesis relative to it', () => {
    const relative = start.toRelativeTime(new Date('2020-07-29T21:45:01.500Z'));

    expect(relative?.millis).toBe(10_500);
  });

  it('returns null for instants before genesis', () => {
    expect(start.toRelativeTime(new Date('2020-07-29T21:44:50.000Z'))).toBeNull();
  });

  it('clamps instants before genesis to zero', () => {
    const relative = start.toRelativeTimeOrZero(new Date('2019-01-01T00:00:00.000Z'));

    expect(relative.equals(RelativeTime.ZERO)).toBe(true);
    expect(relative.millis).toBe(0);
  });

  it('converts relative times back to absolute dates', () => {
    expect(start.toAbsolute(RelativeTime.fromSeconds(9)).toISOString()).toBe('2020-07-29T21:45:00.000Z');
  });

  it('rejects invalid dates', () => {
    expect(() => StartTime.create(new Date('not a date'))).toThrow('StartTime requires a valid date');
  });
});

describe('RelativeTime', () => {
  it('rounds to whole milliseconds', () => {
    expect(RelativeTime.fromMillis(970_000.4).roundedMillis()).toBe(970_000);
    expect(RelativeTime.fromMillis(0.6).roundedMillis()).toBe(1);
  });

  it('subtracts to a duration in milliseconds', () => {
    const now = RelativeTime.fromSeconds(1_000);
    const covered = RelativeTime.fromSeconds(970);

    expect(now.diff(covered)).toBe(30_000);
    expect(covered.compare(now)).toBe(-1);
  });
});
