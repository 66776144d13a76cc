import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { JsonRpc } from '@common/json-rpc/json-rpc';
import { AppError } from '@common/errors/app-error';
import { singleLineMessage } from '@common/errors/single-line-message';

function display(request: Request): string {
  const clientId = request.header('x-client-id');
  const client = clientId ? `#${clientId}` : 'anonymous';
  return `${request.method} ${request.path} called by ${client}`;
}

@Catch()
export class JsonRpcExceptionFilter implements ExceptionFilter {
  private readonly logger: Logger;

  constructor() {
    this.logger = new Logger('ExceptionFilter');
  }

  catch(thrown: unknown, context: ArgumentsHost): void {
    try {
      this.catchUnsafe(thrown, context);
    } catch (error) {
      this.onCatchFailed(error);
    }
  }

  private catchUnsafe(thrown: unknown, context: ArgumentsHost): void {
    this.display(thrown, context);
    this.respond(thrown, context);
  }

  private respond(thrown: unknown, ctx: ArgumentsHost): void {
    const jsonToSend = this.responseFor(thrown);
    ctx.switchToHttp().getResponse<Response>().status(200).json(jsonToSend);
  }

  // eslint-disable-next-line class-methods-use-this
  private responseFor(thrown: unknown): JsonRpc.FailedResponse {
    if (thrown instanceof AppError) {
      return {
        status: 'error',
        code: thrown.code,
        message: thrown.message,
        retryable: thrown.retryable(),
        payload: thrown.payload(),
      };
    }

    return {
      status: 'error',
      code: 'UNKNOWN_SERVER_ERROR',
      message: 'Something went wrong',
      retryable: false,
    };
  }

  private display(thrown: unknown, context: ArgumentsHost): void {
    if (thrown instanceof AppError) {
      if (thrown.shouldBeLogged()) this.displayException(thrown, context);
    } else if (thrown instanceof Error) {
      this.displayError(thrown, context);
    } else {
      throw new Error(`Thrown ${JSON.stringify(thrown)} is not an Error`);
    }
  }

  private displayException(exception: AppError, context: ArgumentsHost): void {
    const requestText = display(context.switchToHttp().getRequest<Request>());
    const reason = `${exception.code}: ${exception.devMessage()}`;
    this.logger.warn(`${requestText} failed with ${reason}`);
  }

  private displayError(error: Error, context: ArgumentsHost): void {
    const requestText = display(context.switchToHttp().getRequest<Request>());
    const message = singleLineMessage(error);
    this.logger.error(`Unexpected error on ${requestText}: ${message}`);
  }

  private onCatchFailed(reason: unknown): void {
    this.logger.error(`Failed to catch an error: ${singleLineMessage(reason)}`);
  }
}
