import express from 'express';
import { createApp } from '../../src/server';
import { listOrganizations } from '../../src/api/organizations';
import { setLogHandler } from '../../src/logger';
import { request } from '../helpers/request';

describe('Organization API', () => {
  let app: express.Application;

  beforeAll(() => {
    setLogHandler(() => undefined);
  });

  afterAll(() => {
    setLogHandler();
  });

  beforeEach(() => {
    app = createApp();
  });

  test('GET /api/v1/organizations returns two organizations and no next page', async () => {
    const res = await request(app, 'GET', '/api/v1/organizations');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      organizations: [
        {
          id: 'org_1',
          name: 'Mock Organization',
          type: 'standard',
          created_at: '2024-01-01T00:00:00.000Z',
          updated_at: '2024-01-01T00:00:00.000Z',
        },
        {
          id: 'org_2',
          name: 'Mock Enterprise',
          type: 'enterprise',
          created_at: '2024-02-01T00:00:00.000Z',
          updated_at: '2024-03-01T00:00:00.000Z',
        },
      ],
      next_page: null,
    });
  });

  test('repeated reads are identical', async () => {
    const first = await request(app, 'GET', '/api/v1/organizations');
    const second = await request(app, 'GET', '/api/v1/organizations');
    expect(JSON.stringify(second.body)).toBe(JSON.stringify(first.body));
  });

  test('next_page is serialized as null, not omitted', () => {
    const { body } = listOrganizations();
    expect(JSON.stringify(body)).toContain('"next_page":null');
  });
});
