import { AppError } from '@common/errors/app-error';

export class UnknownStatusAppError extends AppError {
  public readonly code = 'ERR_UNKNOWN_STATUS';

  constructor(public readonly statusCode: number) {
    super(`Status code ${statusCode} is not in the catalog`);
  }

  public payload(): object {
    return { statusCode: this.statusCode };
  }
}
