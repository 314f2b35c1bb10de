/**
 * Glue between Express and the pure handlers.
 */

import { Request, Response } from 'express';
import { HandlerResult } from '../domain/errors';

/** Write a handler result. res.json sets the JSON content type. */
export function sendResult<T>(res: Response, result: HandlerResult<T>): void {
  res.status(result.status).json(result.body);
}

/**
 * The raw request body. Bodies are parsed as text for every content type,
 * so anything other than a string means the request had no body.
 */
export function rawBody(req: Request): string {
  return typeof req.body === 'string' ? req.body : '';
}
