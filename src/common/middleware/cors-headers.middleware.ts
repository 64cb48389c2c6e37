import { NextFunction, Request, Response } from 'express';

export const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET,POST,PUT,PATCH,DELETE',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
};

/** Sets the permissive CORS headers on every response, errors included. */
export function corsHeaders(_req: Request, res: Response, next: NextFunction): void {
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    res.setHeader(name, value);
  }
  next();
}
