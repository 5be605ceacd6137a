import type { PastHorizonError } from '../errors/past-horizon.error';
import type { EraInterpreter } from '../ports/era-interpreter.port';
import { Result } from '../types/result';
import type { StartTime } from '../value-objects/start-time.vo';
import { type BindQuery, Query } from './query';

type Leaf<T> = Exclude<Query<T>, BindQuery<T>>;

type Step<T> =
  | { readonly done: true; readonly result: Result<T, PastHorizonError> }
  | { readonly done: false; readonly next: Query<T> };

/**
 * Evaluates a query against one snapshot of the era interpreter. The first
 * horizon failure aborts the whole query.
 *
 * Runs in constant stack depth: a bind whose source is itself a bind is
 * reassociated, `bind(bind(s, f), g)` into `bind(s, (x) => bind(f(x), g))`,
 * before anything is evaluated.
 */
export function runQuery<T>(
  startTime: StartTime,
  interpreter: EraInterpreter,
  query: Query<T>,
): Result<T, PastHorizonError> {
  const leaf = <U>(current: Leaf<U>): Result<U, PastHorizonError> => {
    switch (current.kind) {
      case 'era':
        return interpreter.interpretQuery(current.query);
      case 'pure':
        return Result.ok(current.value);
      case 'start-time':
        return Result.ok(current.select(startTime));
    }
  };

  const step = (current: Query<T>): Step<T> => {
    if (current.kind !== 'bind') {
      return { done: true, result: leaf(current) };
    }
    return current.unpack<Step<T>>(<A>(source: Query<A>, next: (value: A) => Query<T>): Step<T> => {
      if (source.kind === 'bind') {
        const rotated = source.unpack<Query<T>>(<B>(inner: Query<B>, innerNext: (value: B) => Query<A>) =>
          Query.bind(inner, (value: B) => Query.bind(innerNext(value), next)),
        );
        return { done: false, next: rotated };
      }
      const result = leaf(source);
      return result.ok ? { done: false, next: next(result.value) } : { done: true, result };
    });
  };

  let current = query;
  for (;;) {
    const outcome = step(current);
    if (outcome.done) {
      return outcome.result;
    }
    current = outcome.next;
  }
}
