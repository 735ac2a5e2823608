import pc from 'picocolors';
import type { Clock, Entry, SortOption } from '../common/Types';
import { formatDuration } from '../common/Duration';
import type { IDiskCache } from '../interfaces/Storage';
import { sortByExpiry, sortByKey, sortByValue } from '../storage/sort';
import { CommandName, ListSort } from './CLIParser';
import type { CLIOptions } from './CLIParser';

export type Colors = ReturnType<typeof pc.createColors>;

export interface CommandOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CommandContext {
  readonly cache: IDiskCache;
  readonly output: CommandOutput;
  readonly colors: Colors;
  readonly clock: Clock;
  readonly expiringSoonMs: number;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

const SORT_OPTIONS: Record<ListSort, SortOption[]> = {
  [ListSort.NONE]: [],
  [ListSort.KEY]: [sortByKey],
  [ListSort.VALUE]: [sortByValue],
  [ListSort.EXPIRY]: [sortByExpiry],
};

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function requireKey(options: CLIOptions): string {
  if (options.key === undefined) {
    throw new Error(`${options.command ?? 'command'} requires --key`);
  }
  return options.key;
}

function formatListLine(entry: Entry, ctx: CommandContext): string {
  const timestamp = formatTimestamp(entry.expiry);
  const remaining = entry.expiry.getTime() - ctx.clock();

  let styled: string;
  if (remaining < 0) {
    styled = ctx.colors.red(timestamp);
  } else if (remaining < ctx.expiringSoonMs) {
    styled = ctx.colors.yellow(timestamp);
  } else {
    styled = ctx.colors.green(timestamp);
  }
  return `${styled} ${entry.key}`;
}

async function execute(options: CLIOptions, ctx: CommandContext): Promise<void> {
  const { cache, output } = ctx;

  switch (options.command) {
    case CommandName.SET: {
      const key = requireKey(options);
      const value = options.value ?? '';
      await cache.put(key, value, options.durationMs);
      output.log(`Set ${key}=${value} for ${formatDuration(options.durationMs)}`);
      return;
    }
    case CommandName.GET: {
      const key = requireKey(options);
      const value = await cache.get(key);
      output.log(`${key}=${value.toString('utf8')}`);
      return;
    }
    case CommandName.LIST: {
      const entries = await cache.list(...SORT_OPTIONS[options.sort]);
      if (entries.length === 0) {
        output.log('No entries found');
        return;
      }
      for (const entry of entries) {
        output.log(formatListLine(entry, ctx));
      }
      return;
    }
    case CommandName.REMOVE: {
      const key = requireKey(options);
      await cache.remove(key);
      output.log(`Removed ${key}`);
      return;
    }
    case CommandName.FLUSH: {
      const count = await cache.flush();
      output.log(`Flushed ${count} entries`);
      return;
    }
    case CommandName.CLEAN: {
      const count = await cache.clean();
      output.log(`Removed ${count} expired entries`);
      return;
    }
    case undefined:
      throw new Error('No command given. Run with --help for usage');
  }
}

/**
 * Run one CLI command against an open cache.
 * @returns process exit code
 */
export async function runCommand(options: CLIOptions, ctx: CommandContext): Promise<number> {
  try {
    await execute(options, ctx);
    return EXIT_OK;
  } catch (err) {
    ctx.output.error(err instanceof Error ? err.message : String(err));
    return EXIT_FAILURE;
  }
}
