import { ValidationError } from '@nestjs/common';
import { AppError } from './app-error';

function describe(errors: ValidationError[]): string {
  const fields = errors.map((e) => e.property).join(', ');
  return `Validation failed on fields ${fields}`;
}

export class ValidationFailedAppError extends AppError {
  constructor(private readonly errors: ValidationError[]) {
    super(describe(errors));
  }

  public readonly code = 'ERR_VALIDATION_FAILED';

  public payload(): object {
    return {
      fields: this.errors.map((e) => ({
        property: e.property,
        constraints: Object.values(e.constraints ?? {}),
      })),
    };
  }
}
