import type { ArgumentsHost } from '@nestjs/common';
import { Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string;
  errors?: unknown[];
  details?: unknown[];
  timestamp: string;
  path: string;
}

/** Errors raised by the JSON body parser before a controller runs. */
interface BodyParserError {
  type: string;
  status: number;
  message: string;
}

function isBodyParserError(exception: unknown): exception is BodyParserError {
  return (
    typeof exception === 'object' &&
    exception !== null &&
    'type' in exception &&
    'status' in exception &&
    typeof exception.type === 'string' &&
    typeof exception.status === 'number' &&
    exception.status >= 400 &&
    exception.status < 500
  );
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(String).join(', ');
  }
  return undefined;
}

function readArray(source: Record<string, unknown>, key: string): unknown[] | undefined {
  const value = source[key];
  return Array.isArray(value) ? value : undefined;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body: ErrorResponseBody = {
      ...this.describe(exception),
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    response.status(body.statusCode).json(body);
  }

  private describe(exception: unknown): Omit<ErrorResponseBody, 'timestamp' | 'path'> {
    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      // every 400 is a malformed request, including JSON syntax errors Nest maps itself
      const fallbackError = statusCode === HttpStatus.BAD_REQUEST ? 'BAD_REQUEST' : exception.name;

      if (typeof exceptionResponse === 'string') {
        return { statusCode, error: fallbackError, message: exceptionResponse };
      }

      const responseObj: Record<string, unknown> = { ...exceptionResponse };
      const errors = readArray(responseObj, 'errors');
      const details = readArray(responseObj, 'details');
      return {
        statusCode,
        error: statusCode === HttpStatus.BAD_REQUEST ? fallbackError : (readString(responseObj, 'error') ?? fallbackError),
        message: readString(responseObj, 'message') ?? exception.message,
        ...(errors ? { errors } : {}),
        ...(details ? { details } : {}),
      };
    }

    if (isBodyParserError(exception)) {
      return {
        statusCode: exception.status,
        error: 'BAD_REQUEST',
        message: exception.type === 'entity.parse.failed' ? 'Request body is not valid JSON' : exception.message,
      };
    }

    if (exception instanceof Error) {
      this.logger.error(`Unexpected error: ${exception.message}`, exception.stack);
    } else {
      this.logger.error(`Unexpected non-error exception: ${String(exception)}`);
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'InternalServerError',
      message: 'Internal server error',
    };
  }
}
