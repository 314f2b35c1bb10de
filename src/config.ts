/**
 * Process configuration, read from environment variables.
 *
 *   PORT           listen port (default 5000)
 *   HOST           listen address (default 0.0.0.0)
 *   LOG_LEVEL      debug | info | warn | error (default info)
 *   BODY_LIMIT     maximum request body size accepted by the parser (default 1mb)
 *   CLOUD_API_URL  a live upstream; when set, the mock stays off unless MOCK_API=true
 *   MOCK_API       "true" forces the mock on, "false" forces it off
 */

import { LogLevel, isLogLevel } from './logger';

export interface MockApiConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  bodyLimit: string;
  /** Whether the process should serve the mock at all. */
  mockEnabled: boolean;
  /** Live upstream the client is pointed at, if any. */
  upstreamUrl?: string;
}

export const DEFAULT_CONFIG: MockApiConfig = {
  port: 5000,
  host: '0.0.0.0',
  logLevel: LogLevel.Info,
  bodyLimit: '1mb',
  mockEnabled: true,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parsePort(raw: string | undefined): number {
  const value = nonEmpty(raw);
  if (value === undefined) return DEFAULT_CONFIG.port;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid PORT: "${value}" (expected an integer between 0 and 65535)`);
  }
  return port;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = nonEmpty(raw)?.toLowerCase();
  if (value === undefined) return DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(value)) {
    throw new ConfigError(`Invalid LOG_LEVEL: "${value}" (expected debug, info, warn or error)`);
  }
  return value;
}

function parseFlag(name: string, raw: string | undefined): boolean | undefined {
  const value = nonEmpty(raw)?.toLowerCase();
  if (value === undefined) return undefined;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ConfigError(`Invalid ${name}: "${value}" (expected true or false)`);
}

/**
 * Decide whether the mock should run. An explicit MOCK_API wins; otherwise
 * the mock runs unless a live upstream is configured.
 */
export function resolveMockEnabled(mockFlag: boolean | undefined, upstreamUrl: string | undefined): boolean {
  if (mockFlag !== undefined) return mockFlag;
  return upstreamUrl === undefined;
}

export function loadConfig(env: Env = process.env): MockApiConfig {
  const upstreamUrl = nonEmpty(env.CLOUD_API_URL);
  const mockFlag = parseFlag('MOCK_API', env.MOCK_API);

  return {
    port: parsePort(env.PORT),
    host: nonEmpty(env.HOST) ?? DEFAULT_CONFIG.host,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    bodyLimit: nonEmpty(env.BODY_LIMIT) ?? DEFAULT_CONFIG.bodyLimit,
    mockEnabled: resolveMockEnabled(mockFlag, upstreamUrl),
    upstreamUrl,
  };
}
