import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, configFromEnv, resolveConfig } from '../src/common/Config';
import { MINUTE } from '../src/common/Duration';

describe('Config', () => {
  it('should default to an hour ttl and a five minute warning window', () => {
    const config = resolveConfig();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.defaultTtlMs).toBe(60 * MINUTE);
    expect(config.expiringSoonMs).toBe(5 * MINUTE);
  });

  it('should read overrides from the environment', () => {
    const overrides = configFromEnv({
      DISKCACHE_DIR: '/tmp/somewhere',
      DISKCACHE_TTL: '10m',
      DISKCACHE_VERBOSE: 'true',
    });

    expect(overrides).toEqual({ cacheDir: '/tmp/somewhere', defaultTtlMs: 10 * MINUTE, verbose: true });
  });

  it('should ignore empty environment values', () => {
    expect(configFromEnv({ DISKCACHE_DIR: '', DISKCACHE_TTL: '' })).toEqual({});
  });

  it('should let later overrides win', () => {
    const config = resolveConfig({ cacheDir: '/a', verbose: true }, { cacheDir: '/b' });

    expect(config.cacheDir).toBe('/b');
    expect(config.verbose).toBe(true);
  });

  it('should validate the resolved values', () => {
    expect(() => resolveConfig({ cacheDir: '' })).toThrow('cacheDir must not be empty');
    expect(() => resolveConfig({ expiringSoonMs: -1 })).toThrow('expiringSoonMs must be >= 0');
    expect(() => configFromEnv({ DISKCACHE_VERBOSE: 'maybe' })).toThrow(
      'Invalid boolean for DISKCACHE_VERBOSE: maybe'
    );
  });
});
