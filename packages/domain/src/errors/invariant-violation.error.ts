import { ChainTimeError } from './chain-time.error';

export type InvariantViolationErrorType = {
  code: 'INVARIANT_VIOLATION';
  context: string;
};

/**
 * Programming fault. Never caught and recovered from inside the domain.
 */
export class InvariantViolationError extends ChainTimeError<InvariantViolationErrorType> {
  constructor(context: string, message: string) {
    super({ code: 'INVARIANT_VIOLATION', context }, `${context}: ${message}`);
  }
}
