import { HttpStatus, Logger } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { sendErrorEnvelope } from '../filters/gateway-exception.filter';

const logger = new Logger('HTTP');

interface BodyParserError {
  type: string;
  status?: number;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    err.type.startsWith('entity.')
  );
}

/**
 * Express error handler placed right after the JSON body parser. A body that
 * does not parse is a validation failure of the call; size and encoding
 * problems keep the parser's status.
 */
export function bodyParseErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (!isBodyParserError(err)) {
    next(err);
    return;
  }
  const status = err.type === 'entity.parse.failed' ? HttpStatus.OK : err.status ?? HttpStatus.BAD_REQUEST;
  const message = `Invalid request body, ${err.message}`;
  logger.error(`${req.method} ${req.originalUrl} failed: ${message}`);
  sendErrorEnvelope(res, status, message);
}
