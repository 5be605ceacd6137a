import { EraQuery } from '../history/era-query';
import type { RelativeTime } from '../value-objects/relative-time.vo';
import type { Slot } from '../value-objects/slot.vo';
import type { StartTime } from '../value-objects/start-time.vo';

/**
 * A query for time, slot and epoch conversions, run with `runQuery` or a
 * `TimeInterpreter`.
 *
 * An {@link EraQuery} can only be answered inside a single era: asking for two
 * slots that live in different eras within one `EraQuery` fails. `Query.bind`
 * resolves each side against the era history separately, so composites that
 * straddle an era boundary still succeed.
 */
export type Query<T> = EraContainedQuery<T> | StartTimeQuery<T> | PureQuery<T> | BindQuery<T>;

export interface EraContainedQuery<T> {
  readonly kind: 'era';
  readonly query: EraQuery<T>;
}

export interface StartTimeQuery<T> {
  readonly kind: 'start-time';
  readonly select: (startTime: StartTime) => T;
}

export interface PureQuery<T> {
  readonly kind: 'pure';
  readonly value: T;
}

export interface BindQuery<T> {
  readonly kind: 'bind';
  /** Hands the hidden intermediate type to `use`. */
  unpack<R>(use: <A>(source: Query<A>, next: (value: A) => Query<T>) => R): R;
}

function era<T>(query: EraQuery<T>): Query<T> {
  return { kind: 'era', query };
}

function startTime(): Query<StartTime> {
  return { kind: 'start-time', select: (value) => value };
}

function pure<T>(value: T): Query<T> {
  return { kind: 'pure', value };
}

function bind<A, T>(source: Query<A>, next: (value: A) => Query<T>): Query<T> {
  return {
    kind: 'bind',
    unpack<R>(use: <B>(inner: Query<B>, continuation: (value: B) => Query<T>) => R): R {
      return use(source, next);
    },
  };
}

function map<A, T>(source: Query<A>, f: (value: A) => T): Query<T> {
  return bind(source, (value) => pure(f(value)));
}

export const Query = { era, startTime, pure, bind, map };

/** Relative time at which a slot starts. */
export function slotToRelativeTime(slot: Slot): Query<RelativeTime> {
  return era(EraQuery.slotToWallclock(slot).map((wallclock) => wallclock.time));
}

export function slotToUtcTime(slot: Slot): Query<Date> {
  return bind(startTime(), (start) => map(slotToRelativeTime(slot), (time) => start.toAbsolute(time)));
}

/** Slot ongoing at `at`; instants before genesis resolve to the first slot. */
export function utcTimeToSlot(at: Date): Query<Slot> {
  return bind(startTime(), (start) =>
    era(EraQuery.wallclockToSlot(start.toRelativeTimeOrZero(at)).map((result) => result.slot)),
  );
}

export function epochOf(slot: Slot): Query<bigint> {
  return era(EraQuery.slotToEpoch(slot).map((result) => result.epoch));
}

export function firstSlotInEpoch(epoch: bigint): Query<Slot> {
  return era(EraQuery.epochToFirstSlot(epoch).map((result) => result.slot));
}

/** Milliseconds from the start of `from` to the start of `to`. */
export function timeBetweenSlots(from: Slot, to: Slot): Query<number> {
  return bind(slotToRelativeTime(from), (fromTime) => map(slotToRelativeTime(to), (toTime) => toTime.diff(fromTime)));
}
