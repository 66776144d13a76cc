import { AppError } from '@common/errors/app-error';

export class SourceNotFoundAppError extends AppError {
  public readonly code = 'ERR_SOURCE_NOT_FOUND';

  constructor(public readonly sourceId: number) {
    super(`Source ${sourceId} does not exist`);
  }

  public payload(): object {
    return { sourceId: this.sourceId };
  }
}
