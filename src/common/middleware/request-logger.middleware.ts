import { Logger } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';

const logger = new Logger('HTTP');

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  res.once('close', () => {
    const suffix = res.writableFinished ? '' : ' (client disconnected)';
    logger.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startTime}ms${suffix}`);
  });
  next();
}
