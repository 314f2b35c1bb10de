/**
 * API key routes.
 *
 * POST /users/auth/keys: Create a key; the response carries the secret once
 * GET /users/auth/keys/:keyId: Fetch a key (never includes the secret)
 * DELETE /users/auth/keys/:keyId: Invalidate a key
 */

import { Router } from 'express';
import {
  ApiKey,
  CreatedApiKey,
  DeleteApiKeyResponse,
  API_KEY_SECRET_PREFIX,
  DEFAULT_KEY_NAME,
  MOCK_USER_ID,
  mockApiKey,
} from '../domain/api-key';
import { HandlerResult, ok, badRequest, INVALID_JSON_MESSAGE, API_KEY_ID_REQUIRED_MESSAGE } from '../domain/errors';
import { generateId, generateSecret, nowIso } from '../domain/identifiers';
import { optionalString, parseJsonPayload } from '../domain/payload';
import { logger } from '../logger';
import { rawBody, sendResult } from './respond';

const log = logger.child({ routes: 'api-keys' });

/** The key exists for every id, the empty one included; there is no store to look it up in. */
export function getApiKey(keyId: string): HandlerResult<ApiKey> {
  return ok(mockApiKey(keyId));
}

/**
 * Create a key from `{ name?, description?, expiration_date? }`.
 * Fields that are missing or not strings fall back to their defaults.
 */
export function createApiKey(body: string): HandlerResult<CreatedApiKey> {
  const parsed = parseJsonPayload(body);
  if (!parsed.ok) {
    return badRequest(INVALID_JSON_MESSAGE);
  }

  const payload = parsed.value;
  const key: CreatedApiKey = {
    id: generateId('key'),
    name: optionalString(payload, 'name') ?? DEFAULT_KEY_NAME,
    description: optionalString(payload, 'description') ?? null,
    user_id: MOCK_USER_ID,
    creation_date: nowIso(),
    expiration_date: optionalString(payload, 'expiration_date') ?? null,
    api_key: generateSecret(API_KEY_SECRET_PREFIX),
  };
  log.info('API key created', { keyId: key.id });

  return ok(key);
}

export function deleteApiKey(keyId: string): HandlerResult<DeleteApiKeyResponse> {
  if (!keyId) {
    return badRequest(API_KEY_ID_REQUIRED_MESSAGE);
  }
  return ok({ found: true, invalidated: true });
}

export function createApiKeyRoutes(): Router {
  const router = Router();

  router.post('/', (req, res) => {
    sendResult(res, createApiKey(rawBody(req)));
  });

  router.get('/:keyId', (req, res) => {
    sendResult(res, getApiKey(req.params.keyId));
  });

  router.delete('/:keyId', (req, res) => {
    sendResult(res, deleteApiKey(req.params.keyId));
  });

  // No id segment at all: hand the handlers an empty id
  router.get('/', (_req, res) => {
    sendResult(res, getApiKey(''));
  });

  router.delete('/', (_req, res) => {
    sendResult(res, deleteApiKey(''));
  });

  return router;
}
