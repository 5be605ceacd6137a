import { ChainTimeError } from './chain-time.error';

export interface EraBoundsDescription {
  readonly startSlot: bigint;
  readonly endSlot: bigint | null;
}

export type PastHorizonErrorType = {
  code: 'PAST_HORIZON';
  query: string;
  eras: string;
};

function describeEras(eras: readonly EraBoundsDescription[]): string {
  return eras
    .map((era) => `[${era.startSlot.toString()}, ${era.endSlot === null ? '∞' : era.endSlot.toString()})`)
    .join(' ');
}

/**
 * A query reached outside the era history currently known to the interpreter.
 */
export class PastHorizonError extends ChainTimeError<PastHorizonErrorType> {
  readonly eras: readonly EraBoundsDescription[];

  constructor(query: string, eras: readonly EraBoundsDescription[]) {
    const described = describeEras(eras);
    super({ code: 'PAST_HORIZON', query, eras: described }, `Query past horizon: ${query} (eras ${described})`);
    this.eras = eras;
  }

  get query(): string {
    return this.type.query;
  }
}

export type UnexpectedPastHorizonErrorType = {
  code: 'UNEXPECTED_PAST_HORIZON';
  reason: string;
  query: string;
};

/**
 * Raised by a never-failing time interpreter when a horizon failure happens anyway.
 */
export class UnexpectedPastHorizonError extends ChainTimeError<UnexpectedPastHorizonErrorType> {
  readonly failure: PastHorizonError;

  constructor(reason: string, failure: PastHorizonError) {
    super(
      { code: 'UNEXPECTED_PAST_HORIZON', reason, query: failure.query },
      `Unexpected past horizon failure (${reason}): ${failure.message}`,
    );
    this.failure = failure;
  }

  get reason(): string {
    return this.type.reason;
  }
}
