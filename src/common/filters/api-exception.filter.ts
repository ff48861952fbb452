import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  CredentialsUnavailableError,
  EmptyTokenError,
  MissingFunctionNameError,
  OnboardingIncompleteError,
  TokenRefreshError,
  TransportError,
  UpstreamError,
} from '../errors';
import { errorMessage, isRecord } from '../utils/object.util';

export type ErrorType =
  | 'invalid_request_error'
  | 'authentication_error'
  | 'permission_error'
  | 'not_found_error'
  | 'rate_limit_error'
  | 'api_error';

export interface ErrorEnvelope {
  type: 'error';
  error: {
    type: ErrorType;
    message: string;
  };
}

export interface ResolvedError {
  status: number;
  body: ErrorEnvelope;
}

export function mapErrorType(status: number): ErrorType {
  switch (status) {
    case 400:
      return 'invalid_request_error';
    case 401:
      return 'authentication_error';
    case 403:
      return 'permission_error';
    case 404:
      return 'not_found_error';
    case 429:
      return 'rate_limit_error';
    default:
      return 'api_error';
  }
}

function httpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;
  if (isRecord(response)) {
    const { message } = response;
    if (Array.isArray(message)) {
      return message.filter((m) => typeof m === 'string').join('; ');
    }
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

function statusAndMessage(error: unknown): { status: number; message: string } {
  if (error instanceof HttpException) {
    return { status: error.getStatus(), message: httpExceptionMessage(error) };
  }
  if (error instanceof MissingFunctionNameError) {
    return { status: HttpStatus.BAD_REQUEST, message: error.message };
  }
  if (
    error instanceof EmptyTokenError ||
    error instanceof CredentialsUnavailableError
  ) {
    return { status: HttpStatus.SERVICE_UNAVAILABLE, message: error.message };
  }
  if (error instanceof TokenRefreshError) {
    return { status: HttpStatus.UNAUTHORIZED, message: error.message };
  }
  if (error instanceof UpstreamError) {
    return {
      status: error.statusCode,
      message: error.upstreamMessage ?? error.message,
    };
  }
  if (
    error instanceof TransportError ||
    error instanceof OnboardingIncompleteError
  ) {
    return { status: HttpStatus.BAD_GATEWAY, message: error.message };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    message: errorMessage(error),
  };
}

/**
 * Maps any thrown value to a status code and the `{type: "error"}` envelope.
 */
export function resolveError(error: unknown): ResolvedError {
  const { status, message } = statusAndMessage(error);
  return {
    status,
    body: { type: 'error', error: { type: mapErrorType(status), message } },
  };
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, body } = resolveError(exception);

    if (status >= 500) {
      this.logger.error(
        `Request failed (${status}): ${body.error.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`Request rejected (${status}): ${body.error.message}`);
    }

    if (!res.headersSent) {
      res.status(status).json(body);
    } else if (!res.writableEnded) {
      res.write(`data: ${JSON.stringify(body)}\n\n`);
      res.end();
    }
  }
}
