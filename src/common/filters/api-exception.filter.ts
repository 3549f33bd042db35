import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';

export interface ApiErrorBody {
  success: false;
  message: string;
}

/**
 * Pull a readable message out of an HttpException response.
 * ValidationPipe reports a list of messages; those are joined.
 */
export function extractErrorMessage(body: string | object): string {
  if (typeof body === 'string') {
    return body;
  }
  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
  }
  return 'Request failed';
}

/**
 * Renders every error as `{ success: false, message }`.
 *
 * Anything that is not an HttpException is logged with its stack and
 * reported as a generic 500.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.render(exception);
    response.status(status).json(body);
  }

  render(exception: unknown): { status: number; body: ApiErrorBody } {
    if (exception instanceof HttpException) {
      return {
        status: exception.getStatus(),
        body: {
          success: false,
          message: extractErrorMessage(exception.getResponse()),
        },
      };
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { success: false, message: 'Internal server error' },
    };
  }
}
