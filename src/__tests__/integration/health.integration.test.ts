/**
 * Integration Tests — Health Endpoint
 *
 * Drives `GET /` through the full Express middleware chain with Supertest.
 * The DatabasePools registration is replaced with pools over FakeDbClients
 * before each app is created, so the check SQL runs against the fake and no
 * socket is opened.
 *
 * The app must be created AFTER the container override: createApp() resolves
 * DatabasePools once, when it builds the middleware chain.
 */
import { TOKENS } from '@core/types';
import { DatabasePools, type DatabasePoolsSettings } from '@infrastructure/database/connection';
import type { Express } from 'express';
import request from 'supertest';

import { createFakeClientFactory, type FakeClientFactory, tableHandler } from '../helpers/fakeDatabase';
import { silentLogger, testCredentials, testPoolSettings, USER_COLUMNS } from '../helpers/fixtures';

const sessionRecord = { session_user: 'test-user', current_database: 'test-db' };

describe('GET /', () => {
  let fake: FakeClientFactory;
  let pools: DatabasePools;

  async function appWith(targets: DatabasePoolsSettings['targets']): Promise<Express> {
    const { container } = await import('@core/container');
    fake = createFakeClientFactory(tableHandler(USER_COLUMNS, []));
    pools = new DatabasePools({ targets, pool: testPoolSettings }, fake.factory, silentLogger());
    container.register(TOKENS.DatabasePools, { useValue: pools });

    const { createApp } = await import('@interfaces/http/app');
    return createApp();
  }

  afterEach(async () => {
    await pools.destroy();
  });

  it('should report the primary session and a null secondary', async () => {
    const app = await appWith({ primary: testCredentials, secondary: null });

    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/application\/json/);
    expect(res.body).toEqual({
      status: 'ok',
      message: 'Service is up',
      data: { postgres: sessionRecord, oracle: null },
    });
  });

  it('should check the secondary database when configured', async () => {
    const app = await appWith({
      primary: testCredentials,
      secondary: { ...testCredentials, database: 'reporting' },
    });

    const res = await request(app).get('/');

    expect(res.body.data).toEqual({ postgres: sessionRecord, oracle: sessionRecord });
    expect(fake.factory).toHaveBeenCalledTimes(2);
  });

  it('should stay up but degraded when the primary is unreachable', async () => {
    const app = await appWith({ primary: testCredentials, secondary: null });
    fake.factory.mockRejectedValue(new Error('ECONNREFUSED'));

    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'degraded',
      message: 'Primary database is unavailable',
      data: { postgres: null, oracle: null },
    });
  });

  it('should echo the X-Request-ID header', async () => {
    const app = await appWith({ primary: testCredentials, secondary: null });

    const res = await request(app).get('/').set('X-Request-ID', 'test-request-1');

    expect(res.headers['x-request-id']).toBe('test-request-1');
  });

  it('should generate a request id when none is sent', async () => {
    const app = await appWith({ primary: testCredentials, secondary: null });

    const res = await request(app).get('/');

    expect(res.headers['x-request-id']).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });
});
