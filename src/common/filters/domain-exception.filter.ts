import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { DomainError, ValidationError } from '../errors/domain-errors';

export type ErrorResponseBody = {
  success: false;
  statusCode: number;
  error: {
    kind: string;
    message: string;
    details?: string[];
  };
};

function httpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;
  if ('message' in response) {
    const { message } = response;
    if (Array.isArray(message)) return message.map(String).join('; ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const body = this.toBody(exception);

    if (body.statusCode >= 500) {
      this.logger.error(
        `Request failed: ${body.error.message}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    host
      .switchToHttp()
      .getResponse<Response>()
      .status(body.statusCode)
      .json(body);
  }

  toBody(exception: unknown): ErrorResponseBody {
    if (exception instanceof ValidationError) {
      return {
        success: false,
        statusCode: HttpStatus.BAD_REQUEST,
        error: {
          kind: exception.kind,
          message: exception.message,
          details: exception.details,
        },
      };
    }

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      // A 400 from the framework is a malformed request, e.g. a body the
      // JSON parser rejected.
      const kind =
        statusCode === HttpStatus.BAD_REQUEST
          ? 'validation_error'
          : 'http_error';
      return {
        success: false,
        statusCode,
        error: { kind, message: httpExceptionMessage(exception) },
      };
    }

    const internal =
      exception instanceof DomainError && exception.kind === 'internal_error';
    return {
      success: false,
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: {
        kind: 'internal_error',
        message: internal
          ? 'Quotation could not be computed'
          : 'Internal server error',
      },
    };
  }
}
