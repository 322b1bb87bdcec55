/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Shared rows and credentials so tests don't repeat them. Rows are positional
 * (as the driver returns them with rowMode 'array') in USER_COLUMNS order;
 * timestamps are fixed for determinism.
 */
import type { PoolSettings } from '@core/config';
import type { DatabaseCredentials } from '@shared/types';
import pino from 'pino';

export const silentLogger = () => pino({ level: 'silent' });

export const testCredentials: DatabaseCredentials = {
  user: 'test-user',
  password: 'test-secret',
  host: 'localhost',
  port: 5432,
  database: 'test-db',
};

export const testPoolSettings: PoolSettings = {
  min: 0,
  max: 4,
  acquireTimeoutMillis: 200,
  idleTimeoutMillis: 30_000,
};

export const USER_COLUMNS = ['id', 'username', 'email', 'created_at'];

/** `count` users with ids 1..count, created one day apart from 2024-01-01. */
export function sampleUserRows(count: number): unknown[][] {
  return Array.from({ length: count }, (_, i) => [
    i + 1,
    `user${i + 1}`,
    `user${i + 1}@example.com`,
    new Date(Date.UTC(2024, 0, 1 + i)),
  ]);
}

export const SESSION_ROW = ['test-user', 'test-db'];
