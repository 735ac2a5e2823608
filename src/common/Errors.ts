/**
 * Custom error types for the disk cache.
 *
 * Typed errors let callers tell a missing entry from an expired or corrupt
 * one without string matching.
 */

export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'StorageError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class DirectoryError extends StorageError {
  public readonly dir: string;

  constructor(dir: string, reason: string, cause?: unknown) {
    super(dir.length > 0 ? `${reason}: ${dir}` : reason, cause);
    this.name = 'DirectoryError';
    this.dir = dir;
  }
}

export class InvalidKeyError extends StorageError {
  constructor() {
    super('Key cannot be empty');
    this.name = 'InvalidKeyError';
  }
}

export class NotFoundError extends StorageError {
  public readonly key: string;

  constructor(key: string) {
    super(`Key not found: ${key}`);
    this.name = 'NotFoundError';
    this.key = key;
  }
}

export class CorruptEntryError extends StorageError {
  public readonly source: string;

  constructor(source: string, reason: string, cause?: unknown) {
    super(`Corrupt entry ${source}: ${reason}`, cause);
    this.name = 'CorruptEntryError';
    this.source = source;
  }
}

export class ExpiredError extends StorageError {
  public readonly key: string;
  public readonly expiry: Date;

  constructor(key: string, expiry: Date) {
    super(`Cache expired: ${key}`);
    this.name = 'ExpiredError';
    this.key = key;
    this.expiry = expiry;
  }
}

/**
 * Every failure from a batch operation (flush, clean), in the order the
 * underlying tasks settled.
 */
export class AggregateStorageError extends StorageError {
  public readonly errors: readonly Error[];

  constructor(message: string, errors: readonly Error[]) {
    super(`${message}: ${errors.map(e => e.message).join('; ')}`);
    this.name = 'AggregateStorageError';
    this.errors = errors;
  }
}

export function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function collectRejections(results: readonly PromiseSettledResult<unknown>[]): Error[] {
  const errors: Error[] = [];
  for (const result of results) {
    if (result.status === 'rejected') {
      errors.push(toError(result.reason));
    }
  }
  return errors;
}
