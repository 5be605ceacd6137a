/**
 * Registry of the effect shapes a {@link TimeInterpreter} can run in.
 * `sync` is a plain value, `async` a promise.
 */
export interface EffectTypes<T> {
  sync: T;
  async: Promise<T>;
}

export type EffectKind = keyof EffectTypes<unknown>;

export type Effect<K extends EffectKind, T> = EffectTypes<T>[K];

export interface EffectRuntime<K extends EffectKind> {
  readonly kind: K;
  of<T>(value: T): Effect<K, T>;
  chain<A, B>(effect: Effect<K, A>, f: (value: A) => Effect<K, B>): Effect<K, B>;
  /** Abort the computation with an unrecoverable error. */
  raise<T>(error: Error): Effect<K, T>;
}

/**
 * Natural transformation between two effect kinds.
 */
export type EffectTransform<F extends EffectKind, G extends EffectKind> = <T>(effect: Effect<F, T>) => Effect<G, T>;

class SyncEffectRuntime implements EffectRuntime<'sync'> {
  readonly kind = 'sync';

  of<T>(value: T): T {
    return value;
  }

  chain<A, B>(effect: A, f: (value: A) => B): B {
    return f(effect);
  }

  raise<T>(error: Error): T {
    throw error;
  }
}

class AsyncEffectRuntime implements EffectRuntime<'async'> {
  readonly kind = 'async';

  of<T>(value: T): Promise<T> {
    return Promise.resolve(value);
  }

  chain<A, B>(effect: Promise<A>, f: (value: A) => Promise<B>): Promise<B> {
    return effect.then(f);
  }

  raise<T>(error: Error): Promise<T> {
    return Promise.reject(error);
  }
}

export const syncEffect: EffectRuntime<'sync'> = new SyncEffectRuntime();
export const asyncEffect: EffectRuntime<'async'> = new AsyncEffectRuntime();

export function liftToAsync<T>(effect: T): Promise<T> {
  return Promise.resolve(effect);
}
