/**
 * Unit Tests — ConnectionPool
 *
 * Runs the real tarn pool over FakeDbClients. Every test gives back what it
 * borrowed before afterEach closes the pool: close() waits for borrowed
 * connections, so a leaked one would hang the suite.
 */
import type { PoolSettings } from '@core/config';
import type { Logger } from '@core/logger';
import type { DbClient } from '@domain/interfaces/IDbClient';
import { ConnectionPool } from '@infrastructure/database/ConnectionPool';
import { ConnectionError } from '@shared/errors/AppError';

import { silentLogger, testCredentials, testPoolSettings, USER_COLUMNS } from '../helpers/fixtures';
import { createFakeClientFactory, type FakeClientFactory, tableHandler } from '../helpers/fakeDatabase';

describe('ConnectionPool', () => {
  let fake: FakeClientFactory;
  let pool: ConnectionPool;
  let log: Logger;

  function createPool(overrides: Partial<PoolSettings> = {}): ConnectionPool {
    fake = createFakeClientFactory(tableHandler(USER_COLUMNS, []));
    log = silentLogger();
    pool = new ConnectionPool(
      {
        ...testPoolSettings,
        ...overrides,
        name: 'primary',
        credentials: testCredentials,
        createClient: fake.factory,
      },
      log,
    );
    return pool;
  }

  afterEach(async () => {
    await pool.close();
  });

  describe('warmUp()', () => {
    it('should open min connections and park them as free', async () => {
      createPool({ min: 3, max: 5 });

      await pool.warmUp();

      expect(fake.factory).toHaveBeenCalledTimes(3);
      expect(fake.factory).toHaveBeenCalledWith(testCredentials);
      expect(pool.stats()).toEqual({ used: 0, free: 3, pendingAcquires: 0, pendingCreates: 0 });
    });

    it('should fail when a connection cannot be opened', async () => {
      createPool({ min: 2, max: 4 });
      fake.factory.mockRejectedValueOnce(new Error('password authentication failed'));

      await expect(pool.warmUp()).rejects.toThrow(ConnectionError);
      expect(pool.stats().used).toBe(0);
    });
  });

  describe('acquire()', () => {
    it('should create connections lazily and reuse released ones', async () => {
      createPool();

      const first = await pool.acquire();
      pool.release(first);
      const second = await pool.acquire();
      pool.release(second);

      expect(second).toBe(first);
      expect(fake.factory).toHaveBeenCalledTimes(1);
    });

    it('should hand out at most max connections and time out the rest', async () => {
      createPool({ min: 5, max: 20, acquireTimeoutMillis: 50 });

      const attempts = await Promise.allSettled(Array.from({ length: 25 }, () => pool.acquire()));
      const acquired = attempts.flatMap((a) => (a.status === 'fulfilled' ? [a.value] : []));
      const failures = attempts.flatMap((a) => (a.status === 'rejected' ? [a.reason] : []));

      expect(acquired).toHaveLength(20);
      expect(new Set(acquired).size).toBe(20);
      expect(failures).toHaveLength(5);
      for (const failure of failures) {
        expect(failure).toBeInstanceOf(ConnectionError);
        expect(failure).toHaveProperty(
          'message',
          'Timed out after 50ms waiting for a primary database connection',
        );
      }
      expect(pool.stats().used).toBe(20);

      acquired.forEach((client) => pool.release(client));
    });

    it('should resume a waiting caller when a connection is released', async () => {
      createPool({ max: 1 });

      const held = await pool.acquire();
      const waiting = pool.acquire();
      expect(pool.stats().pendingAcquires).toBe(1);

      pool.release(held);
      const next = await waiting;
      pool.release(next);

      expect(next).toBe(held);
    });

    it('should surface handshake failures as ConnectionError and stay usable', async () => {
      createPool();
      fake.factory.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(pool.acquire()).rejects.toThrow('Could not connect to the primary database');

      const client = await pool.acquire();
      pool.release(client);
      expect(fake.factory).toHaveBeenCalledTimes(2);
    });
  });

  describe('release()', () => {
    it('should ignore a double release', async () => {
      createPool();
      const client = await pool.acquire();

      pool.release(client);
      expect(() => pool.release(client)).not.toThrow();

      expect(pool.stats()).toEqual({ used: 0, free: 1, pendingAcquires: 0, pendingCreates: 0 });
    });

    it('should not throw when the health check itself fails', async () => {
      createPool({ max: 1 });
      const client = await pool.acquire();
      jest.spyOn(client, 'isHealthy').mockImplementation(() => {
        throw new Error('socket state unavailable');
      });

      expect(() => pool.release(client)).not.toThrow();
      expect(pool.stats().used).toBe(0);

      const replacement = await pool.acquire();
      pool.release(replacement);
      expect(replacement).not.toBe(client);
    });
  });

  describe('discard()', () => {
    it('should replace a broken connection on the next acquire', async () => {
      createPool({ max: 1 });
      const broken = await pool.acquire();
      const warn = jest.spyOn(log, 'warn');

      pool.discard(broken);
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ pool: 'primary' }),
        'Returning broken connection; it will be destroyed on the next acquire',
      );
      const replacement: DbClient = await pool.acquire();
      pool.release(replacement);

      expect(replacement).not.toBe(broken);
      expect(broken.isHealthy()).toBe(false);
      expect(fake.factory).toHaveBeenCalledTimes(2);
    });
  });

  describe('close()', () => {
    it('should wait for borrowed connections and then end every client', async () => {
      createPool();
      const client = await pool.acquire();

      const closing = pool.close();
      pool.release(client);
      await closing;

      expect(fake.clients.map((c) => c.ended)).toEqual([true]);
    });
  });
});
