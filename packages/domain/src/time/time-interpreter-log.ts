import type { PastHorizonError } from '../errors/past-horizon.error';
import type { LoggerPort } from '../infrastructure/logger.port';
import type { Effect, EffectKind, EffectRuntime } from '../types/effect';
import type { StartTime } from '../value-objects/start-time.vo';

export interface PastHorizonLog {
  readonly type: 'past-horizon';
  /** Why the failure was supposed to be impossible. */
  readonly reason?: string;
  readonly startTime: StartTime;
  readonly error: PastHorizonError;
}

export type TimeInterpreterLog = PastHorizonLog;

export type Tracer<K extends EffectKind, M> = (message: M) => Effect<K, void>;

export function pastHorizonLog(startTime: StartTime, error: PastHorizonError): PastHorizonLog {
  return { type: 'past-horizon', startTime, error };
}

export function nullTracer<K extends EffectKind, M>(effect: EffectRuntime<K>): Tracer<K, M> {
  return () => effect.of<void>(undefined);
}

/**
 * Failures that were declared impossible are logged as errors, the rest at debug.
 */
export function loggerTracer<K extends EffectKind>(
  logger: LoggerPort,
  effect: EffectRuntime<K>,
): Tracer<K, TimeInterpreterLog> {
  return (message) => {
    const context = {
      query: message.error.query,
      eras: message.error.type.eras,
      startTime: message.startTime.toString(),
    };
    if (message.reason === undefined) {
      logger.debug('Time query past horizon', context);
    } else {
      logger.error(`Time query past horizon, which should be impossible: ${message.reason}`, message.error, context);
    }
    return effect.of<void>(undefined);
  };
}
