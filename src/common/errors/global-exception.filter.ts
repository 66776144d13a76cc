import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { registerError } from './registry';
import { singleLineMessage } from './single-line-message';

/**
 * Global exception filter for routes outside the JSON-RPC entries
 * (health checks, unknown paths). RPC entries install their own filter.
 */
@Catch()
@Injectable()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    // 404s are not logged
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      if (status !== HttpStatus.NOT_FOUND) {
        this.logger.error(`HTTP ${status}: ${exception.message}`);
      }
    } else if (exception instanceof Error) {
      const id = registerError(exception);
      this.logger.error(
        `Unhandled error #${id}: ${singleLineMessage(exception)}`,
      );
    } else {
      this.logger.error(`Unknown error: ${JSON.stringify(exception)}`);
    }

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const message =
      exception instanceof HttpException
        ? exception.message
        : 'Internal server error';

    response.status(status).json({
      statusCode: status,
      message,
      timestamp: new Date().toISOString(),
    });
  }
}
