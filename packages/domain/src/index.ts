/** biome-ignore-all assist/source/organizeImports: grouped by layer */
// Errors
export { ChainTimeError, type ChainTimeErrorMetadata } from './errors/chain-time.error';
export { InvariantViolationError } from './errors/invariant-violation.error';
export { type EraBoundsDescription, PastHorizonError, UnexpectedPastHorizonError } from './errors/past-horizon.error';
export { PercentageOutOfBoundsError } from './errors/percentage.error';
export { toError } from './errors/to-error';

// Domain Events
export type { SyncProgressChangedEventData } from './events/sync-progress-changed.event';
export { syncProgressChangedEvent } from './events/sync-progress-changed.event';

// Era history
export type { EpochOfSlot, EpochStart, EraLookup, SlotAtTime, Wallclock } from './history/era-query';
export { EraQuery } from './history/era-query';
export type { Bound, EraParams, EraSpec, EraSummary } from './history/era-summary';
export { GENESIS_BOUND, mkUpperBound, Summary } from './history/era-summary';
export { SummaryInterpreter } from './history/summary-interpreter';

// Infrastructure
export type { LoggerPort, LogLevel } from './infrastructure/logger.port';
export { isLogLevel, LOG_LEVELS } from './infrastructure/logger.port';
export type { LoggerConfig } from './infrastructure/pino-logger';
export { createPinoLogger, PinoLogger } from './infrastructure/pino-logger';

// Ports (Interfaces)
export type { ClockPort } from './ports/clock.port';
export type { EraInterpreter } from './ports/era-interpreter.port';
export type { NotificationMessage, NotificationPort } from './ports/notification.port';

// Time queries
export {
  epochOf,
  firstSlotInEpoch,
  Query,
  slotToRelativeTime,
  slotToUtcTime,
  timeBetweenSlots,
  utcTimeToSlot,
} from './time/query';
export type { BindQuery, EraContainedQuery, PureQuery, StartTimeQuery } from './time/query';
export { runQuery } from './time/run-query';
export type { PastHorizonLog, TimeInterpreterLog, Tracer } from './time/time-interpreter-log';
export { loggerTracer, nullTracer, pastHorizonLog } from './time/time-interpreter-log';
export type { ResultHandler, TimeInterpreterProps } from './time/time-interpreter';
export {
  currentRelativeTime,
  hoistTimeInterpreter,
  interpretQuery,
  mkTimeInterpreter,
  neverFails,
  TimeInterpreter,
} from './time/time-interpreter';

// Types
export type { Effect, EffectKind, EffectRuntime, EffectTransform, EffectTypes } from './types/effect';
export { asyncEffect, liftToAsync, syncEffect } from './types/effect';
export type { Err, Ok } from './types/result';
export { Result } from './types/result';
export type { SyncStatus } from './types/sync-progress';
export { SyncProgress } from './types/sync-progress';

// Value Objects
export { Percentage } from './value-objects/percentage.vo';
export { RelativeTime } from './value-objects/relative-time.vo';
export { Slot } from './value-objects/slot.vo';
export { StartTime } from './value-objects/start-time.vo';
export { SyncTolerance } from './value-objects/sync-tolerance.vo';

// Services
export { createDefaultClock, DefaultClock } from './services/default-clock';
export { classifySyncProgress, getSyncProgress, syncProgress } from './services/sync-progress.service';
