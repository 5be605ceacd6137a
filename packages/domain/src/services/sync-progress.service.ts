import { InvariantViolationError } from '../errors/invariant-violation.error';
import type { PastHorizonError } from '../errors/past-horizon.error';
import type { ClockPort } from '../ports/clock.port';
import { slotToRelativeTime } from '../time/query';
import { currentRelativeTime, type TimeInterpreter } from '../time/time-interpreter';
import type { Effect, EffectKind } from '../types/effect';
import { Result } from '../types/result';
import { SyncProgress } from '../types/sync-progress';
import { Percentage } from '../value-objects/percentage.vo';
import type { RelativeTime } from '../value-objects/relative-time.vo';
import type { Slot } from '../value-objects/slot.vo';
import type { SyncTolerance } from '../value-objects/sync-tolerance.vo';

/**
 * Classifies a node whose tip covers chain time up to `timeCovered`.
 *
 * The local node cannot be trusted to know the real network height, so
 * progress is `h / (h + X)` with `h` the time covered by ingested blocks and
 * `X` the time left until `now`. Early on this assumes every remaining slot
 * holds a block and is pessimistic; as `h` grows `X` shrinks until `p = h / h`.
 */
export function classifySyncProgress(tolerance: SyncTolerance, timeCovered: RelativeTime, now: RelativeTime): SyncProgress {
  if (now.diff(timeCovered) <= tolerance.millis) {
    return SyncProgress.ready();
  }

  const nowMs = now.roundedMillis();
  const progress = nowMs === 0 ? 0 : timeCovered.roundedMillis() / nowMs;

  const percentage = Percentage.create(progress);
  if (!percentage.ok) {
    throw new InvariantViolationError('syncProgress', `${progress} is out of bounds`);
  }
  return SyncProgress.syncing(percentage.value);
}

/**
 * Estimates sync progress of a node whose local tip is at `tip`, at relative time `now`.
 */
export function syncProgress<K extends EffectKind>(
  tolerance: SyncTolerance,
  timeInterpreter: TimeInterpreter<K>,
  tip: Slot,
  now: RelativeTime,
): Effect<K, Result<SyncProgress, PastHorizonError>> {
  const { effect } = timeInterpreter;
  return effect.chain<Result<RelativeTime, PastHorizonError>, Result<SyncProgress, PastHorizonError>>(
    timeInterpreter.interpret(slotToRelativeTime(tip)),
    (timeCovered) =>
      effect.of(Result.map(timeCovered, (covered) => classifySyncProgress(tolerance, covered, now))),
  );
}

/**
 * Reads the clock and estimates progress with an interpreter that must not
 * hit the horizon for the node's own tip.
 */
export function getSyncProgress<K extends EffectKind>(
  tolerance: SyncTolerance,
  tip: Slot,
  timeInterpreter: TimeInterpreter<K>,
  clock: ClockPort,
): Effect<K, Result<SyncProgress, PastHorizonError>> {
  const now = currentRelativeTime(clock, timeInterpreter.startTime);
  return syncProgress(tolerance, timeInterpreter.neverFails('syncProgress'), tip, now);
}
