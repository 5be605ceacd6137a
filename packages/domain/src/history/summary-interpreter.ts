import { PastHorizonError } from '../errors/past-horizon.error';
import type { EraInterpreter } from '../ports/era-interpreter.port';
import { Result } from '../types/result';
import type { EraQuery } from './era-query';
import type { Summary } from './era-summary';

export class SummaryInterpreter implements EraInterpreter {
  constructor(private readonly summary: Summary) {}

  interpretQuery<T>(query: EraQuery<T>): Result<T, PastHorizonError> {
    for (const era of this.summary.eras) {
      const lookup = query.runInEra(era);
      if (lookup.inEra) {
        return Result.ok(lookup.value);
      }
    }
    return Result.err(new PastHorizonError(query.description, this.summary.describe()));
  }
}
