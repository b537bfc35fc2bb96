import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ValidationErrors } from './validation';

export interface ErrorBody {
  statusCode: number;
  errorCode: string;
  message: string;
  errors?: ValidationErrors;
  path: string;
  timestamp: string;
}

/**
 * Global Exception Filter – Catches ALL unhandled exceptions and returns
 * a standardized JSON error response.
 *
 * - Known HttpExceptions keep their status code; anything else is a 500
 *   whose message is not exposed.
 * - Field-keyed violation sets (ValidationFailedException) are passed
 *   through as `errors`.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('ExceptionFilter');

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toErrorBody(exception, request?.url ?? '');

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR && exception instanceof Error) {
      this.logger.error(`Unhandled exception: ${exception.message}`, exception.stack);
    }

    this.logger.warn(
      JSON.stringify({
        statusCode: body.statusCode,
        path: body.path,
        method: request?.method,
        errorCode: body.errorCode,
        message: body.message,
      }),
    );

    response.status(body.statusCode).json(body);
  }

  toErrorBody(exception: unknown, path: string): ErrorBody {
    const body: ErrorBody = {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      errorCode: 'INTERNAL_ERROR',
      message: 'Internal server error',
      path,
      timestamp: new Date().toISOString(),
    };

    if (!(exception instanceof HttpException)) {
      return body;
    }

    body.statusCode = exception.getStatus();
    const exceptionResponse = exception.getResponse();

    if (typeof exceptionResponse === 'string') {
      body.message = exceptionResponse;
      body.errorCode = HttpStatus[body.statusCode] ?? body.errorCode;
    } else {
      const payload = new Map(Object.entries(exceptionResponse));
      const message = payload.get('message');
      const error = payload.get('error');
      const errors = payload.get('errors');
      if (Array.isArray(message)) {
        // ValidationPipe reports DTO violations as a message list
        body.message = message.join('; ');
      } else if (typeof message === 'string' && message) {
        body.message = message;
      }
      body.errorCode = typeof error === 'string' ? error : HttpStatus[body.statusCode] ?? body.errorCode;
      if (isValidationErrors(errors)) {
        body.errors = errors;
      }
    }

    return body;
  }
}

function isValidationErrors(value: unknown): value is ValidationErrors {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every(
      (messages) => Array.isArray(messages) && messages.every((message) => typeof message === 'string'),
    )
  );
}
