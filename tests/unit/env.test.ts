import { loadConfig, parseEnv } from '../../src/config/env';
import { ConfigurationError } from '../../src/utils/errors';

describe('loadConfig', () => {
  it('should apply defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config.database).toEqual({
      host: 'localhost',
      port: 5432,
      database: 'honeypot',
      user: 'postgres',
      password: 'postgres',
      minConnections: 5,
      maxConnections: 20,
      timeoutMs: 60000,
    });
    expect(config.cache).toEqual({ host: 'localhost', port: 6379, db: 0 });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      POSTGRES_HOST: 'db.internal',
      POSTGRES_PORT: '6543',
      POSTGRES_PASSWORD: 'test-secret',
      PG_POOL_MAX: '8',
      REDIS_DB: '2',
    });

    expect(config.database.host).toBe('db.internal');
    expect(config.database.port).toBe(6543);
    expect(config.database.password).toBe('test-secret');
    expect(config.database.maxConnections).toBe(8);
    expect(config.cache.db).toBe(2);
  });
});

describe('parseEnv', () => {
  it('should reject a non-numeric port', () => {
    expect(() => parseEnv({ POSTGRES_PORT: 'abc' })).toThrow(ConfigurationError);
  });

  it('should reject a pool minimum above the maximum', () => {
    expect(() => parseEnv({ PG_POOL_MIN: '30', PG_POOL_MAX: '20' })).toThrow(
      'Invalid configuration: PG_POOL_MIN (must not exceed PG_POOL_MAX)'
    );
  });

  it('should treat blank optional values as unset', () => {
    const values = parseEnv({ API_KEYS: '   ', SENTRY_DSN: '' });
    expect(values.API_KEYS).toBeUndefined();
    expect(values.SENTRY_DSN).toBeUndefined();
  });
});
