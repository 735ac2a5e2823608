/**
 * DiskCache - hash-addressed entry store
 *
 * Every key maps to `<dir>/<sha256(key)>.json`. The handle keeps only the
 * directory path, so any number of handles (or processes) may share a
 * directory. Writes go to a temp file that is renamed over the target:
 * concurrent puts to one key are last-writer-wins and never leave a torn file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Dirent } from 'fs';
import { randomBytes } from 'crypto';
import type { Clock, Entry, SortOption } from '../common/Types';
import type { Logger } from '../common/Logger';
import { silentLogger } from '../common/Logger';
import {
  AggregateStorageError,
  DirectoryError,
  ExpiredError,
  InvalidKeyError,
  NotFoundError,
  StorageError,
  collectRejections,
  errnoCode,
} from '../common/Errors';
import type { EntryValue, IDiskCache } from '../interfaces/Storage';
import { ENTRY_FILE_EXTENSION, EntrySerializer, TEMP_FILE_SUFFIX } from './entry';

export const ZERO_TIME = 0;

export interface DiskCacheOptions {
  /** fsync the temp file before renaming it into place. Defaults to true. */
  syncWrites?: boolean | undefined;
  clock?: Clock | undefined;
  logger?: Logger | undefined;
}

export class DiskCache implements IDiskCache {
  public readonly dir: string;
  private readonly syncWrites: boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private constructor(dir: string, options: DiskCacheOptions) {
    this.dir = dir;
    this.syncWrites = options.syncWrites ?? true;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Create the directory (and parents) if needed and return a handle to it.
   * Opening an existing directory has no side effects.
   */
  static async open(dir: string, options: DiskCacheOptions = {}): Promise<DiskCache> {
    if (dir.length === 0) {
      throw new DirectoryError(dir, 'Directory path is empty');
    }

    let isDirectory: boolean;
    try {
      await fs.mkdir(dir, { recursive: true });
      isDirectory = (await fs.stat(dir)).isDirectory();
    } catch (err) {
      throw new DirectoryError(dir, 'Cannot create cache directory', err);
    }

    if (!isDirectory) {
      throw new DirectoryError(dir, 'Cache path is not a directory');
    }

    const cache = new DiskCache(dir, options);
    cache.logger.debug(`Opened ${dir}`);
    return cache;
  }

  public filename(key: string): string {
    return EntrySerializer.filenameFor(key);
  }

  public filepath(key: string): string {
    return this.resolve(this.filename(key));
  }

  async put(key: string, value: EntryValue, ttlMs: number): Promise<void> {
    this.assertKey(key);
    if (!Number.isFinite(ttlMs)) {
      throw new StorageError(`Invalid TTL for ${key}: ${ttlMs}`);
    }

    const expiry = new Date(this.clock() + ttlMs);
    if (Number.isNaN(expiry.getTime())) {
      throw new StorageError(`Invalid TTL for ${key}: ${ttlMs}`);
    }

    const entry: Entry = {
      key,
      value: typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value),
      expiry,
    };

    await this.writeAtomically(key, this.filepath(key), EntrySerializer.serialize(entry));
  }

  async read(key: string): Promise<Entry> {
    this.assertKey(key);
    return this.readFile(this.filename(key), key);
  }

  async get(key: string): Promise<Buffer> {
    const entry = await this.read(key);
    if (this.clock() > entry.expiry.getTime()) {
      throw new ExpiredError(key, entry.expiry);
    }
    return entry.value;
  }

  async has(key: string): Promise<boolean> {
    try {
      await fs.access(this.filepath(key));
      return true;
    } catch {
      return false;
    }
  }

  async lookupExpiry(key: string): Promise<Date | undefined> {
    try {
      const entry = await this.read(key);
      return entry.expiry;
    } catch (err) {
      if (err instanceof StorageError) {
        return undefined;
      }
      throw err;
    }
  }

  async expiry(key: string): Promise<Date> {
    return (await this.lookupExpiry(key)) ?? new Date(ZERO_TIME);
  }

  async isExpired(key: string): Promise<boolean> {
    const expiry = await this.expiry(key);
    return this.clock() > expiry.getTime();
  }

  async remove(key: string): Promise<void> {
    this.assertKey(key);
    try {
      await fs.unlink(this.filepath(key));
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new NotFoundError(key);
      }
      throw new StorageError(`Failed to remove ${key}`, err);
    }
  }

  /**
   * Read every entry in the directory, then apply the sort options in order.
   * One unreadable entry fails the whole listing.
   */
  async list(...options: SortOption[]): Promise<Entry[]> {
    const filenames = (await this.readDirectory())
      .filter(dirent => dirent.isFile() && dirent.name.endsWith(ENTRY_FILE_EXTENSION))
      .map(dirent => dirent.name);

    const entries = await Promise.all(filenames.map(name => this.readFile(name, name)));

    for (const option of options) {
      option(entries);
    }
    return entries;
  }

  async flush(): Promise<number> {
    const names = (await this.readDirectory()).map(dirent => dirent.name);

    const results = await Promise.allSettled(names.map(async name => {
      try {
        await fs.rm(this.resolve(name), { recursive: true });
      } catch (err) {
        throw new StorageError(`Failed to remove ${name}`, err);
      }
    }));

    const errors = collectRejections(results);
    if (errors.length > 0) {
      this.logFailures('Flush', errors);
      throw new AggregateStorageError(`Flush failed for ${errors.length} of ${names.length} files`, errors);
    }

    this.logger.debug(`Flushed ${names.length} files from ${this.dir}`);
    return names.length;
  }

  /**
   * Delete expired entries. Deletions run concurrently; all of them settle
   * before this returns, and every failure is reported.
   */
  async clean(): Promise<number> {
    const entries = await this.list();
    const now = this.clock();
    const expired = entries.filter(entry => now >= entry.expiry.getTime());

    const results = await Promise.allSettled(expired.map(entry => this.remove(entry.key)));

    const errors = collectRejections(results);
    if (errors.length > 0) {
      this.logFailures('Clean', errors);
      throw new AggregateStorageError(`Clean failed for ${errors.length} of ${expired.length} expired entries`, errors);
    }

    this.logger.debug(`Cleaned ${expired.length} of ${entries.length} entries`);
    return expired.length;
  }

  async delete(): Promise<void> {
    try {
      await fs.rm(this.dir, { recursive: true, force: true });
    } catch (err) {
      throw new DirectoryError(this.dir, 'Cannot delete cache directory', err);
    }
    this.logger.debug(`Deleted ${this.dir}`);
  }

  private async readDirectory(): Promise<Dirent[]> {
    try {
      return await fs.readdir(this.dir, { withFileTypes: true });
    } catch (err) {
      throw new DirectoryError(this.dir, 'Cannot read cache directory', err);
    }
  }

  private async readFile(filename: string, label: string): Promise<Entry> {
    let content: string;
    try {
      content = await fs.readFile(this.resolve(filename), 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new NotFoundError(label);
      }
      throw new StorageError(`Failed to read ${label}`, err);
    }
    return EntrySerializer.deserialize(content, label);
  }

  private async writeAtomically(key: string, target: string, content: string): Promise<void> {
    const tempPath = `${target}.${process.pid}.${randomBytes(6).toString('hex')}${TEMP_FILE_SUFFIX}`;

    try {
      await this.writeTempFile(tempPath, content);
      await fs.rename(tempPath, target);
    } catch (err) {
      try {
        await fs.rm(tempPath, { force: true });
      } catch (cleanupErr) {
        this.logger.error(`Failed to remove temp file ${tempPath}`, cleanupErr);
      }
      if (errnoCode(err) === 'ENOENT') {
        throw new DirectoryError(this.dir, 'Cache directory does not exist', err);
      }
      throw new StorageError(`Failed to write ${key}`, err);
    }
  }

  /**
   * A failed write wins over a failed close; the close error is only
   * thrown when the write itself succeeded.
   */
  private async writeTempFile(tempPath: string, content: string): Promise<void> {
    const handle = await fs.open(tempPath, 'w', 0o644);
    try {
      await handle.writeFile(content, 'utf8');
      if (this.syncWrites) {
        await handle.sync();
      }
    } catch (err) {
      try {
        await handle.close();
      } catch (closeErr) {
        this.logger.error(`Failed to close ${tempPath}`, closeErr);
      }
      throw err;
    }
    await handle.close();
  }

  private logFailures(operation: string, errors: readonly Error[]): void {
    for (const err of errors) {
      this.logger.error(`${operation} failed`, err);
    }
  }

  private resolve(filename: string): string {
    return path.join(this.dir, filename);
  }

  private assertKey(key: string): void {
    if (key.length === 0) {
      throw new InvalidKeyError();
    }
  }
}
