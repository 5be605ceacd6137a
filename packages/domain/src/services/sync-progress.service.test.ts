import { describe, expect, it } from 'vitest';
import { InvariantViolationError } from '../errors/invariant-violation.error';
import { PastHorizonError, UnexpectedPastHorizonError } from '../errors/past-horizon.error';
import { Summary } from '../history/era-summary';
import type { ClockPort } from '../ports/clock.port';
import { mkTimeInterpreter, TimeInterpreter } from '../time/time-interpreter';
import { asyncEffect, liftToAsync, syncEffect } from '../types/effect';
import type { SyncProgress } from '../types/sync-progress';
import { RelativeTime } from '../value-objects/relative-time.vo';
import { Slot } from '../value-objects/slot.vo';
import { StartTime } from '../value-objects/start-time.vo';
import { SyncTolerance } from '../value-objects/sync-tolerance.vo';
import { classifySyncProgress, getSyncProgress, syncProgress } from './sync-progress.service';

const start = StartTime.fromIso('2020-01-01T00:00:00.000Z');
const tolerance = SyncTolerance.fromSeconds(20);
// One slot per second, so slot n starts at n seconds.
const interpreter = mkTimeInterpreter(() => undefined, start, 100, 1_000, syncEffect);

function progressOf(result: SyncProgress): number | null {
  return result.status === 'syncing' ? result.progress.value : null;
}

describe('syncProgress', () => {
  it('is ready when the tip covers the current time', () => {
    const result = syncProgress(tolerance, interpreter, Slot.create(1_000), RelativeTime.fromSeconds(1_000));

    expect(result.ok && result.value.status).toBe('ready');
  });

  it('is ready when the lag equals the tolerance', () => {
    const result = syncProgress(tolerance, interpreter, Slot.create(980), RelativeTime.fromSeconds(1_000));

    expect(result.ok && result.value.status).toBe('ready');
  });

  it('reports the covered share of time when lagging beyond the tolerance', () => {
    const result = syncProgress(tolerance, interpreter, Slot.create(970), RelativeTime.fromSeconds(1_000));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.status).toBe('syncing');
      expect(progressOf(result.value)).toBe(0.97);
    }
  });

  it('is ready at the chain origin', () => {
    const result = syncProgress(tolerance, interpreter, Slot.create(0), RelativeTime.ZERO);

    expect(result.ok && result.value.status).toBe('ready');
  });

  it('propagates horizon failures', () => {
    const bounded = TimeInterpreter.fromSummary(
      Summary.fromEras([{ epochSize: 10, slotLengthMs: 1_000, endEpoch: 5 }]),
      start,
      () => undefined,
      syncEffect,
    );

    const result = syncProgress(tolerance, bounded, Slot.create(50), RelativeTime.fromSeconds(100));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PastHorizonError);
    }
  });

  it('runs in the interpreter effect', async () => {
    const hoisted = interpreter.hoist(liftToAsync, asyncEffect);

    const result = await syncProgress(tolerance, hoisted, Slot.create(500), RelativeTime.fromSeconds(1_000));

    expect(result.ok && progressOf(result.value)).toBe(0.5);
  });
});

describe('classifySyncProgress', () => {
  it('reports zero progress when no whole millisecond has passed', () => {
    const result = classifySyncProgress(SyncTolerance.fromMillis(0), RelativeTime.ZERO, RelativeTime.fromMillis(0.4));

    expect(progressOf(result)).toBe(0);
  });

  it('divides millisecond-rounded times', () => {
    const result = classifySyncProgress(
      SyncTolerance.fromMillis(0),
      RelativeTime.fromMillis(250.4),
      RelativeTime.fromMillis(1_000.2),
    );

    expect(progressOf(result)).toBe(0.25);
  });

  it('treats an out of range ratio as an invariant violation', () => {
    expect(() =>
      classifySyncProgress(tolerance, RelativeTime.fromSeconds(-5), RelativeTime.fromSeconds(100)),
    ).toThrow(InvariantViolationError);
  });
});

describe('getSyncProgress', () => {
  const clock: ClockPort = {
    now: () => new Date('2020-01-01T00:16:40.000Z'),
  };

  it('measures the tip against the clock', () => {
    const result = getSyncProgress(tolerance, Slot.create(970), interpreter, clock);

    expect(result.ok && progressOf(result.value)).toBe(0.97);
  });

  it('raises when the tip is past the horizon', () => {
    const bounded = TimeInterpreter.fromSummary(
      Summary.fromEras([{ epochSize: 10, slotLengthMs: 1_000, endEpoch: 5 }]),
      start,
      () => undefined,
      syncEffect,
    );

    expect(() => getSyncProgress(tolerance, Slot.create(60), bounded, clock)).toThrow(UnexpectedPastHorizonError);
  });
});
