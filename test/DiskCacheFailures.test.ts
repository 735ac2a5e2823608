import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DiskCache } from '../src/storage/DiskCache';
import { AggregateStorageError, StorageError } from '../src/common/Errors';
import { HOUR } from '../src/common/Duration';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    rm: vi.fn(actual.rm),
    rename: vi.fn(actual.rename),
  };
});

function errnoError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('DiskCache filesystem failures', () => {
  let actual: typeof import('fs/promises');
  let root: string;
  let errorLog: Array<[string, unknown]>;
  let cache: DiskCache;

  beforeEach(async () => {
    actual = await vi.importActual<typeof import('fs/promises')>('fs/promises');
    vi.mocked(fs.rm).mockImplementation(actual.rm);
    vi.mocked(fs.rename).mockImplementation(actual.rename);

    root = await actual.mkdtemp(path.join(os.tmpdir(), 'diskcache-fail-'));
    errorLog = [];
    cache = await DiskCache.open(root, {
      syncWrites: false,
      logger: {
        debug: () => undefined,
        error: (message, err) => {
          errorLog.push([message, err]);
        },
      },
    });
  });

  afterEach(async () => {
    await actual.rm(root, { recursive: true, force: true });
  });

  describe('flush()', () => {
    it('should keep deleting after failures and report every one', async () => {
      for (const key of ['alpha', 'bravo', 'charlie', 'delta']) {
        await cache.put(key, 'v', HOUR);
      }
      const failing = new Set([cache.filename('alpha'), cache.filename('bravo')]);
      vi.mocked(fs.rm).mockImplementation(async (target, options) => {
        if (failing.has(path.basename(String(target)))) {
          throw errnoError(`EACCES: permission denied, rm '${String(target)}'`, 'EACCES');
        }
        return actual.rm(target, options);
      });

      const error = await cache.flush().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AggregateStorageError);
      if (error instanceof AggregateStorageError) {
        expect(error.errors.map(e => e.message).sort()).toEqual(
          [...failing].map(name => `Failed to remove ${name}`).sort()
        );
      }
      expect((await actual.readdir(root)).sort()).toEqual([...failing].sort());
      expect(errorLog.map(([message]) => message)).toEqual(['Flush failed', 'Flush failed']);
      expect(errorLog.every(([, err]) => err instanceof StorageError)).toBe(true);
    });
  });

  describe('put()', () => {
    it('should surface the rename error when temp cleanup also fails', async () => {
      const renameError = errnoError('EXDEV: cross-device link not permitted', 'EXDEV');
      vi.mocked(fs.rename).mockRejectedValue(renameError);
      vi.mocked(fs.rm).mockRejectedValue(errnoError('EBUSY: resource busy', 'EBUSY'));

      const error = await cache.put('alpha', 'v', HOUR).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toHaveProperty('message', 'Failed to write alpha');
      expect(error).toHaveProperty('cause', renameError);
      expect(errorLog).toHaveLength(1);
      expect(errorLog[0]?.[0]).toMatch(/^Failed to remove temp file .*\.tmp$/);
    });
  });
});
