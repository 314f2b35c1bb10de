/**
 * API key domain model.
 *
 * The secret value (`api_key`) exists only on the response to key creation;
 * reads never return it.
 */

export interface ApiKey {
  id: string;
  name: string;
  description: string | null;
  user_id: string;
  creation_date: string;
  expiration_date: string | null;
}

export interface CreatedApiKey extends ApiKey {
  api_key: string;
}

export interface DeleteApiKeyResponse {
  found: boolean;
  invalidated: boolean;
}

export const MOCK_USER_ID = 'user_123';
export const DEFAULT_KEY_NAME = 'Unnamed Key';
/** Prefix of generated secret values. */
export const API_KEY_SECRET_PREFIX = 'mock_';

/** The key returned for any id on read. */
export function mockApiKey(id: string): ApiKey {
  return {
    id,
    name: 'Mock API Key',
    description: 'Mock API key for testing',
    user_id: MOCK_USER_ID,
    creation_date: '2024-01-01T00:00:00.000Z',
    expiration_date: '2025-01-01T00:00:00.000Z',
  };
}
