/**
 * Cloud platform mock API.
 *
 * Entry point for running the mock as a process. When a live upstream is
 * configured (and the mock is not forced on) nothing is started.
 */

import { loadConfig } from './config';
import { startServer } from './server';
import { logger, setLogLevel } from './logger';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (!config.mockEnabled) {
    logger.info('Mock API disabled; clients use the live upstream', { upstreamUrl: config.upstreamUrl });
    return;
  }

  await startServer(config);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Mock API failed to start', {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exitCode = 1;
  });
}

// Public exports for programmatic use
export { createApp, startServer, VERSION } from './server';
export { loadConfig, resolveMockEnabled, ConfigError, DEFAULT_CONFIG } from './config';
export type { MockApiConfig } from './config';
export * from './api';
export * from './domain';
export { logger, createLogger, setLogHandler, setLogLevel, LogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
