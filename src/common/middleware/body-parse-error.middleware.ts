import { Logger } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { ErrorEnvelope } from '../filters/api-exception.filter';
import { errorMessage, isRecord } from '../utils/object.util';

const logger = new Logger('BodyParser');

function isParseFailure(error: unknown): boolean {
  return isRecord(error) && error.type === 'entity.parse.failed';
}

/**
 * Express error handler placed right after the JSON body parser. Nest's
 * filters never see body-parser failures, so malformed JSON is answered here.
 */
export function bodyParseErrorHandler(
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (!isParseFailure(error)) {
    next(error);
    return;
  }

  logger.warn(`Malformed JSON body on ${req.method} ${req.path}`);

  const body: ErrorEnvelope = {
    type: 'error',
    error: {
      type: 'invalid_request_error',
      message: `Malformed JSON body: ${errorMessage(error)}`,
    },
  };
  res.status(400).json(body);
}
