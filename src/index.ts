export { DiskCache, ZERO_TIME } from './storage/DiskCache';
export type { DiskCacheOptions } from './storage/DiskCache';
export type { IDiskCache, EntryValue } from './interfaces/Storage';
export type { Entry, SortOption, Comparator, Clock } from './common/Types';
export {
  sortWith,
  sortByKey,
  sortByValue,
  sortByExpiry,
  compareByKey,
  compareByValue,
  compareByExpiry,
} from './storage/sort';
export { EntrySerializer, EntryRecordSchema, ENTRY_FILE_EXTENSION } from './storage/entry';
export type { EntryRecord } from './storage/entry';
export {
  StorageError,
  DirectoryError,
  InvalidKeyError,
  NotFoundError,
  CorruptEntryError,
  ExpiredError,
  AggregateStorageError,
} from './common/Errors';
export { DEFAULT_CONFIG, resolveConfig, configFromEnv } from './common/Config';
export type { DiskCacheConfig } from './common/Config';
export { createLogger, silentLogger } from './common/Logger';
export type { Logger } from './common/Logger';
export { parseDuration, formatDuration, SECOND, MINUTE, HOUR } from './common/Duration';
