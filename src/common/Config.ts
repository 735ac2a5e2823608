import * as os from 'os';
import * as path from 'path';
import { HOUR, MINUTE, parseDuration } from './Duration';

export interface DiskCacheConfig {
  cacheDir: string;
  defaultTtlMs: number;
  /** Entries closer than this to expiry are listed as "expiring soon". */
  expiringSoonMs: number;
  syncWrites: boolean;
  verbose: boolean;
}

export const DEFAULT_CONFIG: DiskCacheConfig = {
  cacheDir: path.join(os.homedir(), '.cache', 'diskcache'),
  defaultTtlMs: HOUR,
  expiringSoonMs: 5 * MINUTE,
  syncWrites: true,
  verbose: false,
};

export const ENV_CACHE_DIR = 'DISKCACHE_DIR';
export const ENV_DEFAULT_TTL = 'DISKCACHE_TTL';
export const ENV_VERBOSE = 'DISKCACHE_VERBOSE';

function parseBoolean(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
    case '':
      return false;
    default:
      throw new Error(`Invalid boolean for ${name}: ${value}`);
  }
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<DiskCacheConfig> {
  const cacheDir = env[ENV_CACHE_DIR];
  const ttl = env[ENV_DEFAULT_TTL];
  const verbose = env[ENV_VERBOSE];

  return {
    ...(cacheDir !== undefined && cacheDir.length > 0 ? { cacheDir } : {}),
    ...(ttl !== undefined && ttl.length > 0 ? { defaultTtlMs: parseDuration(ttl) } : {}),
    ...(verbose !== undefined ? { verbose: parseBoolean(ENV_VERBOSE, verbose) } : {}),
  };
}

export function resolveConfig(...overrides: Partial<DiskCacheConfig>[]): DiskCacheConfig {
  const resolved = overrides.reduce<DiskCacheConfig>(
    (acc, override) => ({ ...acc, ...override }),
    { ...DEFAULT_CONFIG },
  );

  if (resolved.cacheDir.length === 0) {
    throw new Error('cacheDir must not be empty');
  }
  if (!Number.isFinite(resolved.defaultTtlMs)) {
    throw new Error('defaultTtlMs must be a finite number');
  }
  if (!Number.isFinite(resolved.expiringSoonMs) || resolved.expiringSoonMs < 0) {
    throw new Error('expiringSoonMs must be >= 0');
  }

  return resolved;
}
