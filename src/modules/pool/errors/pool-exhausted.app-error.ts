import { AppError } from '@common/errors/app-error';

/**
 * Every unblocked proxy of the source is inside its cooldown, or none is
 * unblocked. Callers retry later or fall back.
 */
export class PoolExhaustedAppError extends AppError {
  public readonly code = 'ERR_POOL_EXHAUSTED';

  constructor(
    public readonly sourceId: number,
    public readonly candidatesTried: number,
  ) {
    super(`No proxy available for source ${sourceId}, retry later`);
  }

  // eslint-disable-next-line class-methods-use-this
  public retryable(): boolean {
    return true;
  }

  public payload(): object {
    return { sourceId: this.sourceId, candidatesTried: this.candidatesTried };
  }
}
