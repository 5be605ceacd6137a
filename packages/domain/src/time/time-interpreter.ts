import { type PastHorizonError, UnexpectedPastHorizonError } from '../errors/past-horizon.error';
import { Summary } from '../history/era-summary';
import { SummaryInterpreter } from '../history/summary-interpreter';
import type { ClockPort } from '../ports/clock.port';
import type { EraInterpreter } from '../ports/era-interpreter.port';
import type { Effect, EffectKind, EffectRuntime, EffectTransform } from '../types/effect';
import type { Result } from '../types/result';
import type { RelativeTime } from '../value-objects/relative-time.vo';
import type { StartTime } from '../value-objects/start-time.vo';
import type { Query } from './query';
import { runQuery } from './run-query';
import { pastHorizonLog, type TimeInterpreterLog, type Tracer } from './time-interpreter-log';

export type ResultHandler<K extends EffectKind> = <T>(
  result: Result<T, PastHorizonError>,
) => Effect<K, Result<T, PastHorizonError>>;

export interface TimeInterpreterProps<K extends EffectKind> {
  readonly effect: EffectRuntime<K>;
  /** Current era interpreter; may read state that is refreshed elsewhere. */
  readonly interpreter: () => Effect<K, EraInterpreter>;
  readonly startTime: StartTime;
  readonly tracer: Tracer<K, TimeInterpreterLog>;
  /** Defaults to returning horizon failures as values. */
  readonly handleResult?: ResultHandler<K>;
}

type ResolvedProps<K extends EffectKind> = Required<TimeInterpreterProps<K>>;

/**
 * Runs {@link Query} values with the chain start time as context.
 */
export class TimeInterpreter<K extends EffectKind> {
  private constructor(private readonly props: ResolvedProps<K>) {}

  static create<K extends EffectKind>(props: TimeInterpreterProps<K>): TimeInterpreter<K> {
    const { effect } = props;
    const propagate: ResultHandler<K> = <T>(result: Result<T, PastHorizonError>) => effect.of(result);
    return new TimeInterpreter({ ...props, handleResult: props.handleResult ?? propagate });
  }

  static fromSummary<K extends EffectKind>(
    summary: Summary,
    startTime: StartTime,
    tracer: Tracer<K, TimeInterpreterLog>,
    effect: EffectRuntime<K>,
  ): TimeInterpreter<K> {
    const interpreter: EraInterpreter = new SummaryInterpreter(summary);
    return TimeInterpreter.create({
      effect,
      interpreter: () => effect.of(interpreter),
      startTime,
      tracer,
    });
  }

  get startTime(): StartTime {
    return this.props.startTime;
  }

  get effect(): EffectRuntime<K> {
    return this.props.effect;
  }

  /**
   * The era interpreter is fetched once, so the whole query sees one snapshot.
   */
  interpret<T>(query: Query<T>): Effect<K, Result<T, PastHorizonError>> {
    const { effect, interpreter, startTime, tracer, handleResult } = this.props;

    return effect.chain<EraInterpreter, Result<T, PastHorizonError>>(interpreter(), (eraInterpreter) => {
      const result = runQuery(startTime, eraInterpreter, query);
      if (result.ok) {
        return handleResult<T>(result);
      }
      return effect.chain<void, Result<T, PastHorizonError>>(tracer(pastHorizonLog(startTime, result.error)), () =>
        handleResult<T>(result),
      );
    });
  }

  /**
   * Same interpreter, but horizon failures are traced with `reason` and raised
   * as {@link UnexpectedPastHorizonError} instead of being returned.
   */
  neverFails(reason: string): TimeInterpreter<K> {
    const { effect, tracer } = this.props;
    return new TimeInterpreter<K>({
      ...this.props,
      tracer: (message) => tracer({ ...message, reason }),
      handleResult: <T>(result: Result<T, PastHorizonError>) =>
        result.ok
          ? effect.of<Result<T, PastHorizonError>>(result)
          : effect.raise<Result<T, PastHorizonError>>(new UnexpectedPastHorizonError(reason, result.error)),
    });
  }

  /**
   * Moves every effectful part of the interpreter into another effect kind.
   */
  hoist<G extends EffectKind>(transform: EffectTransform<K, G>, target: EffectRuntime<G>): TimeInterpreter<G> {
    const { interpreter, startTime, tracer, handleResult } = this.props;
    return new TimeInterpreter<G>({
      effect: target,
      interpreter: () => transform(interpreter()),
      startTime,
      tracer: (message) => transform(tracer(message)),
      handleResult: <T>(result: Result<T, PastHorizonError>) => transform(handleResult<T>(result)),
    });
  }
}

export function interpretQuery<K extends EffectKind, T>(
  timeInterpreter: TimeInterpreter<K>,
  query: Query<T>,
): Effect<K, Result<T, PastHorizonError>> {
  return timeInterpreter.interpret(query);
}

export function neverFails<K extends EffectKind>(reason: string, timeInterpreter: TimeInterpreter<K>): TimeInterpreter<K> {
  return timeInterpreter.neverFails(reason);
}

export function hoistTimeInterpreter<F extends EffectKind, G extends EffectKind>(
  transform: EffectTransform<F, G>,
  target: EffectRuntime<G>,
  timeInterpreter: TimeInterpreter<F>,
): TimeInterpreter<G> {
  return timeInterpreter.hoist(transform, target);
}

/**
 * Interpreter over a history with a single era that never ends.
 */
export function mkTimeInterpreter<K extends EffectKind>(
  tracer: Tracer<K, TimeInterpreterLog>,
  startTime: StartTime,
  epochSize: bigint | number,
  slotLengthMs: number,
  effect: EffectRuntime<K>,
): TimeInterpreter<K> {
  return TimeInterpreter.fromSummary(Summary.neverForks(epochSize, slotLengthMs), startTime, tracer, effect);
}

/**
 * Current clock time relative to the chain start, never negative.
 */
export function currentRelativeTime(clock: ClockPort, startTime: StartTime): RelativeTime {
  return startTime.toRelativeTimeOrZero(clock.now());
}
