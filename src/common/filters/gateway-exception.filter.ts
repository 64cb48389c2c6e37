import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorEnvelope } from '../interfaces';
import { GatewayError } from '../errors';
import { errorMessage } from '../utils';

export const NOT_FOUND_MESSAGE = 'The requested endpoint was not found.';

export function createErrorEnvelope(message: string): ErrorEnvelope {
  return {
    status: false,
    error: {
      message,
      type: 'invalid_request_error',
    },
  };
}

export function sendErrorEnvelope(res: Response, status: number, message: string): void {
  res.status(status).json(createErrorEnvelope(message));
}

/**
 * Call failures (validation, session, transport before the commit point)
 * are answered with 200 and the error envelope; 401 and 404 are kept for
 * routing, other HTTP exceptions keep their status.
 */
export function resolveException(exception: unknown): { status: number; message: string } {
  if (exception instanceof GatewayError) {
    return { status: HttpStatus.OK, message: exception.message };
  }
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    if (status === HttpStatus.NOT_FOUND) {
      return { status, message: NOT_FOUND_MESSAGE };
    }
    return { status, message: exception.message };
  }
  return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: errorMessage(exception) };
}

@Catch()
export class GatewayExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('HTTP');

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();
    const { status, message } = resolveException(exception);

    if (res.destroyed) {
      this.logger.warn(`${req.method} ${req.originalUrl} abandoned by the client: ${message}`);
      return;
    }
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR && exception instanceof Error) {
      this.logger.error(`${req.method} ${req.originalUrl} failed: ${message}`, exception.stack);
    } else {
      this.logger.error(`${req.method} ${req.originalUrl} failed: ${message}`);
    }

    if (res.headersSent) {
      // committed response, nothing left to report to the client
      if (!res.writableEnded) res.end();
      return;
    }
    sendErrorEnvelope(res, status, message);
  }
}
