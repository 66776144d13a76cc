import { CallHandler, ExecutionContext, NestInterceptor } from '@nestjs/common';
import { catchError, Observable } from 'rxjs';
import { AppError } from './app-error';
import { registerError } from './registry';

export class RegisterErrorInterceptor implements NestInterceptor {
  // eslint-disable-next-line class-methods-use-this
  intercept<T>(ctx: ExecutionContext, next: CallHandler<T>): Observable<T> {
    return next.handle().pipe(
      catchError((thrown: unknown) => {
        if (thrown instanceof Error && !(thrown instanceof AppError))
          registerError(thrown);

        throw thrown;
      }),
    );
  }
}
