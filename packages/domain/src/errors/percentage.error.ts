import { ChainTimeError } from './chain-time.error';

export type PercentageOutOfBoundsErrorType = {
  code: 'PERCENTAGE_OUT_OF_BOUNDS';
  ratio: number;
};

export class PercentageOutOfBoundsError extends ChainTimeError<PercentageOutOfBoundsErrorType> {
  constructor(ratio: number) {
    super({ code: 'PERCENTAGE_OUT_OF_BOUNDS', ratio }, `Percentage ratio ${ratio} is outside [0, 1]`);
  }
}
