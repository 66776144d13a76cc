import { AppError } from '@common/errors/app-error';

/** Failed JSON-RPC response turned back into an error on the calling side */
export class JsonRpcError extends AppError {
  constructor(
    public readonly code: string,
    message: string,
    private readonly canRetry: boolean = false,
    private readonly details?: object,
  ) {
    super(message);
  }

  public retryable(): boolean {
    return this.canRetry;
  }

  public payload(): object | undefined {
    return this.details;
  }
}
