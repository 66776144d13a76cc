import { AppError } from './app-error';
import { singleLineMessage } from './single-line-message';

/**
 * The backing store could not be reached or timed out.
 * The enclosing request or reconciliation cycle fails, the next one is
 * unaffected.
 */
export class StoreUnavailableAppError extends AppError {
  public readonly code = 'ERR_STORE_UNAVAILABLE';

  constructor(
    public readonly operation: string,
    public readonly reason: Error,
  ) {
    super(`Store is unavailable, try again later`);
  }

  // eslint-disable-next-line class-methods-use-this
  public shouldBeLogged(): boolean {
    return true;
  }

  // eslint-disable-next-line class-methods-use-this
  public retryable(): boolean {
    return true;
  }

  public devMessage(): string {
    return `${this.operation} failed: ${singleLineMessage(this.reason)}`;
  }
}
