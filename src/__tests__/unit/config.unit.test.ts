/**
 * Unit Tests — Configuration parsing
 *
 * parseConfig() is pure, so each test hands it its own environment.
 */
import { ConfigError, parseConfig } from '@core/config';

const baseEnv: NodeJS.ProcessEnv = {
  POSTGRES_DB_USER: 'app',
  POSTGRES_DB_PASSWORD: 'test-secret',
  POSTGRES_DB_HOST: 'db.internal',
  POSTGRES_DB_PORT: '5433',
  POSTGRES_DB_NAME: 'users',
};

function configErrorFrom(env: NodeJS.ProcessEnv): ConfigError {
  try {
    parseConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected parseConfig to throw');
}

describe('parseConfig()', () => {
  it('should apply defaults and coerce numbers', () => {
    const config = parseConfig(baseEnv);

    expect(config.port).toBe(3000);
    expect(config.nodeEnv).toBe('development');
    expect(config.isDev).toBe(true);
    expect(config.log.level).toBe('info');
    expect(config.cluster.workers).toBe(0);
    expect(config.database.primary).toEqual({
      user: 'app',
      password: 'test-secret',
      host: 'db.internal',
      port: 5433,
      database: 'users',
    });
    expect(config.database.secondary).toBeNull();
    expect(config.database.pool).toEqual({
      min: 5,
      max: 20,
      acquireTimeoutMillis: 10_000,
      idleTimeoutMillis: 30_000,
    });
  });

  it('should require every primary database setting', () => {
    const { POSTGRES_DB_HOST: _host, ...env } = baseEnv;

    const error = configErrorFrom(env);

    expect(error.message).toBe('Invalid environment configuration');
    expect(error.issues).toEqual([expect.stringMatching(/^POSTGRES_DB_HOST: /)]);
  });

  it('should reject an unknown NODE_ENV', () => {
    const error = configErrorFrom({ ...baseEnv, NODE_ENV: 'staging' });

    expect(error.issues).toEqual([expect.stringMatching(/^NODE_ENV: /)]);
  });

  it('should read a complete secondary database', () => {
    const config = parseConfig({
      ...baseEnv,
      SECONDARY_DB_USER: 'reporter',
      SECONDARY_DB_PASSWORD: 'test-secret',
      SECONDARY_DB_HOST: 'reporting.internal',
      SECONDARY_DB_PORT: '5432',
      SECONDARY_DB_NAME: 'reporting',
    });

    expect(config.database.secondary).toEqual({
      user: 'reporter',
      password: 'test-secret',
      host: 'reporting.internal',
      port: 5432,
      database: 'reporting',
    });
  });

  it('should reject a partially configured secondary database', () => {
    const error = configErrorFrom({ ...baseEnv, SECONDARY_DB_HOST: 'reporting.internal' });

    expect(error.message).toBe('Secondary database is partially configured');
    expect(error.issues).toEqual([
      'SECONDARY_DB_USER: required when any SECONDARY_DB_* is set',
      'SECONDARY_DB_PASSWORD: required when any SECONDARY_DB_* is set',
      'SECONDARY_DB_PORT: required when any SECONDARY_DB_* is set',
      'SECONDARY_DB_NAME: required when any SECONDARY_DB_* is set',
    ]);
  });

  it('should reject a minimum pool size above the maximum', () => {
    const error = configErrorFrom({ ...baseEnv, DB_POOL_MIN: '10', DB_POOL_MAX: '4' });

    expect(error.message).toBe('Invalid pool bounds');
    expect(error.issues).toEqual(['DB_POOL_MIN (10) must not exceed DB_POOL_MAX (4)']);
  });
});
