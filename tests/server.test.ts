import express from 'express';
import { createApp, startServer, VERSION } from '../src/server';
import { DEFAULT_CONFIG } from '../src/config';
import { errorHandler, notFoundHandler, requestLogger } from '../src/api/middleware';
import { LogEntry, LogLevel, createLogger, setLogHandler, setLogLevel } from '../src/logger';
import { errorEnvelope, request } from './helpers/request';

describe('Mock API server', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    setLogHandler();
    setLogLevel(LogLevel.Info);
  });

  test('health check returns ok', async () => {
    const res = await request(createApp(), 'GET', '/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: VERSION, mode: 'mock' });
  });

  test('unknown routes answer with a 404 envelope', async () => {
    const res = await request(createApp(), 'GET', '/api/v1/clusters');

    expect(res.status).toBe(404);
    expect(res.contentType).toMatch(/^application\/json/);
    expect(res.body).toEqual(errorEnvelope('Route not found: GET /api/v1/clusters'));
  });

  test('a known path with the wrong method is not found', async () => {
    const res = await request(createApp(), 'PUT', '/api/v1/account');

    expect(res.status).toBe(404);
    expect(res.body).toEqual(errorEnvelope('Route not found: PUT /api/v1/account'));
  });

  test('bodies over the configured limit are rejected with 413', async () => {
    const app = createApp({ bodyLimit: '16b' });
    const res = await request(app, 'POST', '/api/v1/deployments', {
      json: { name: 'a-deployment-name-longer-than-the-limit' },
    });

    expect(res.status).toBe(413);
    expect(res.body).toEqual(errorEnvelope('request entity too large'));
  });

  test('bodies are read regardless of content type', async () => {
    const res = await request(createApp(), 'POST', '/api/v1/deployments', {
      raw: '{"name":"plain"}',
      headers: { 'Content-Type': 'text/plain' },
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ id: 'dep_plain_123' });
  });

  test('logs one line per request', async () => {
    await request(createApp(), 'GET', '/api/v1/organizations');

    const completed = entries.filter((e) => e.message === 'Request completed');
    expect(completed).toHaveLength(1);
    expect(completed[0].level).toBe(LogLevel.Info);
    expect(completed[0].context).toMatchObject({
      method: 'GET',
      path: '/api/v1/organizations',
      status: 200,
    });
  });

  test('health probes are logged at debug', async () => {
    setLogLevel(LogLevel.Debug);
    await request(createApp(), 'GET', '/health');

    const completed = entries.filter((e) => e.message === 'Request completed');
    expect(completed).toHaveLength(1);
    expect(completed[0].level).toBe(LogLevel.Debug);
  });

  test('startServer listens on the configured address', async () => {
    const server = await startServer({ ...DEFAULT_CONFIG, host: '127.0.0.1', port: 0 });
    try {
      const address = server.address();
      expect(address).toMatchObject({ address: '127.0.0.1' });
      expect(entries.some((e) => e.message === 'Mock API listening')).toBe(true);
    } finally {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  });

  describe('error handler', () => {
    function appWithRoute(handler: express.RequestHandler): express.Application {
      const app = express();
      app.use(requestLogger(createLogger({ component: 'test' })));
      app.get('/boom', handler);
      app.use(notFoundHandler);
      app.use(errorHandler);
      return app;
    }

    test('renders an exposed HTTP error with its status and message', async () => {
      const app = appWithRoute(() => {
        throw Object.assign(new Error('Deployment already exists'), { status: 409, expose: true });
      });
      const res = await request(app, 'GET', '/boom');

      expect(res.status).toBe(409);
      expect(res.body).toEqual(errorEnvelope('Deployment already exists'));
      expect(entries.some((e) => e.level === LogLevel.Warn && e.message === 'Request error')).toBe(true);
    });

    test('hides the message of unexpected errors', async () => {
      const app = appWithRoute(() => {
        throw new Error('database password is test-secret');
      });
      const res = await request(app, 'GET', '/boom');

      expect(res.status).toBe(500);
      expect(res.body).toEqual(errorEnvelope('Internal server error'));

      const logged = entries.find((e) => e.message === 'Unhandled request error');
      expect(logged?.level).toBe(LogLevel.Error);
      expect(logged?.context?.message).toBe('database password is test-secret');
    });

    test('keeps the status but hides the message of unexposed HTTP errors', async () => {
      const app = appWithRoute((_req, _res, next) => {
        next(Object.assign(new Error('upstream unreachable'), { statusCode: 503, expose: false }));
      });
      const res = await request(app, 'GET', '/boom');

      expect(res.status).toBe(503);
      expect(res.body).toEqual(errorEnvelope('Internal server error'));
    });

    test('hands the error to Express once headers are sent', () => {
      const req: express.Request = Object.create(express.request);
      const res: express.Response = Object.create(express.response, { headersSent: { value: true } });
      const status = jest.spyOn(res, 'status');
      const next = jest.fn();
      const err = new Error('stream interrupted');

      errorHandler(err, req, res, next);

      expect(next).toHaveBeenCalledWith(err);
      expect(status).not.toHaveBeenCalled();
      expect(entries.map((e) => e.message)).toEqual(['Request error after response started']);
    });
  });
});
