/**
 * Express server configuration.
 *
 * Assembles the mock API surface with body parsing, request logging, the
 * versioned routes and the error handlers. Binding a port is left to
 * startServer(), so tests can build the app without listening.
 */

import express from 'express';
import { Server } from 'http';
import { AddressInfo } from 'net';
import { DEFAULT_CONFIG, MockApiConfig } from './config';
import { createMockApiRouter } from './api/router';
import { errorHandler, notFoundHandler, requestLogger } from './api/middleware';
import { logger } from './logger';

export const VERSION = '0.1.0';

const startTime = Date.now();

export type AppOptions = Pick<MockApiConfig, 'bodyLimit'>;

/** Create and configure the Express application. */
export function createApp(options: Partial<AppOptions> = {}): express.Application {
  const bodyLimit = options.bodyLimit ?? DEFAULT_CONFIG.bodyLimit;
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger());

  // Bodies stay raw text whatever the content type; handlers decode JSON themselves
  app.use(express.text({ type: () => true, limit: bodyLimit }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      mode: 'mock',
      uptimeMs: Date.now() - startTime,
    });
  });

  app.use('/api/v1', createMockApiRouter());

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/** Build the app and listen on the configured host and port. */
export function startServer(config: MockApiConfig): Promise<Server> {
  const app = createApp(config);

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      const port = isAddressInfo(address) ? address.port : config.port;
      logger.info('Mock API listening', { host: config.host, port });
      resolve(server);
    });
  });
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
