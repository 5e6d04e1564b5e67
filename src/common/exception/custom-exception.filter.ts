import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorKind, errorKindForStatus, isErrorKind, ERROR_KIND } from './error-kind';

interface ErrorBody {
  success: false;
  statusCode: number;
  error: ErrorKind;
  message: string;
  path: string;
  timestamp: string;
}

function readMessage(value: unknown, fallback: string): string {
  if (typeof value === 'string') {
    return value;
  }
  // ValidationPipe reports one message per failed constraint
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string').join(', ') || fallback;
  }
  return fallback;
}

/**
 * Renders every exception as `{ success: false, statusCode, error, message }`,
 * where `error` is one of the stable kinds in ERROR_KIND.
 */
@Catch()
export class CustomExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(CustomExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toBody(exception, request.url);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`${request.method} ${request.url} failed: ${body.message}`, stack);
    } else {
      this.logger.warn(`${request.method} ${request.url} -> ${body.statusCode} ${body.error}: ${body.message}`);
    }

    response.status(body.statusCode).json(body);
  }

  private toBody(exception: unknown, path: string): ErrorBody {
    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let error: ErrorKind = ERROR_KIND.INTERNAL_ERROR;
    let message = 'Internal server error';

    if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      error = errorKindForStatus(statusCode);
      const payload = exception.getResponse();

      if (typeof payload === 'string') {
        message = payload;
      } else if (typeof payload === 'object' && payload !== null) {
        if ('message' in payload) {
          message = readMessage(payload.message, exception.message);
        }
        if ('error' in payload && isErrorKind(payload.error)) {
          error = payload.error;
        }
      }
    }

    return {
      success: false,
      statusCode,
      error,
      message,
      path,
      timestamp: new Date().toISOString(),
    };
  }
}
