import { CallHandler, ExecutionContext, NestInterceptor } from '@nestjs/common';
import { map, Observable } from 'rxjs';
import { JsonRpc } from '@common/json-rpc/json-rpc';

/**
 * # Interceptor for JSON RPC Api
 *
 * Wraps whatever a handler returns into `{ status: 'ok', payload }`.
 * Failures are shaped by `JsonRpcExceptionFilter`.
 */
export class JsonRpcInterceptor implements NestInterceptor {
  // eslint-disable-next-line class-methods-use-this
  intercept<TPayload>(
    context: ExecutionContext,
    next: CallHandler<TPayload>,
  ): Observable<JsonRpc.SuccessfulResponse<TPayload>> {
    return next.handle().pipe(
      map(
        (payload): JsonRpc.SuccessfulResponse<TPayload> => ({
          status: 'ok',
          payload,
        }),
      ),
    );
  }
}
