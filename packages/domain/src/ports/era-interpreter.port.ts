import type { PastHorizonError } from '../errors/past-horizon.error';
import type { EraQuery } from '../history/era-query';
import type { Result } from '../types/result';

/**
 * Answers single-era queries against the era history it was built from.
 */
export interface EraInterpreter {
  interpretQuery<T>(query: EraQuery<T>): Result<T, PastHorizonError>;
}
