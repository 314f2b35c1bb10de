/**
 * Error envelope for the mock API.
 *
 * Every non-2xx response carries the same body shape as the real platform:
 * `{ "error": { "type": "api_error", "message": "..." } }`. Handlers return
 * envelopes as values instead of throwing.
 */

import { Response } from 'express';

export const API_ERROR_TYPE = 'api_error';

export const INVALID_JSON_MESSAGE = 'Invalid JSON payload';
export const DEPLOYMENT_NAME_REQUIRED_MESSAGE = 'Deployment name is required';
export const API_KEY_ID_REQUIRED_MESSAGE = 'API Key ID is required';
export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export interface ApiErrorBody {
  type: typeof API_ERROR_TYPE;
  message: string;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: ApiErrorBody;
}

/** Outcome of a handler: the HTTP status and the JSON body to send. */
export interface HandlerResult<T> {
  status: number;
  body: T | ApiErrorResponse;
}

/** Construct an API error response body. */
export function apiError(message: string): ApiErrorResponse {
  return { error: { type: API_ERROR_TYPE, message } };
}

export function ok<T>(body: T): HandlerResult<T> {
  return { status: 200, body };
}

export function errorResult<T = never>(status: number, message: string): HandlerResult<T> {
  return { status, body: apiError(message) };
}

export function badRequest<T = never>(message: string): HandlerResult<T> {
  return errorResult<T>(400, message);
}

/** Write an error envelope with the given status. res.json sets the JSON content type. */
export function sendApiError(res: Response, status: number, message: string): void {
  res.status(status).json(apiError(message));
}

/** Narrow an arbitrary JSON value to the error envelope. */
export function isApiErrorResponse(value: unknown): value is ApiErrorResponse {
  if (typeof value !== 'object' || value === null || !('error' in value)) return false;
  const { error } = value;
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === API_ERROR_TYPE &&
    'message' in error &&
    typeof error.message === 'string'
  );
}
