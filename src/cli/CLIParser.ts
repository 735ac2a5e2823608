import { configFromEnv, resolveConfig } from '../common/Config';
import type { DiskCacheConfig } from '../common/Config';
import { parseDuration } from '../common/Duration';

export enum CommandName {
  SET = 'set',
  GET = 'get',
  LIST = 'list',
  REMOVE = 'remove',
  FLUSH = 'flush',
  CLEAN = 'clean',
}

export enum ListSort {
  NONE = 'none',
  KEY = 'key',
  VALUE = 'value',
  EXPIRY = 'expiry',
}

export interface CLIOptions {
  readonly help: boolean;
  readonly command: CommandName | undefined;
  readonly key: string | undefined;
  readonly value: string | undefined;
  readonly durationMs: number;
  readonly sort: ListSort;
  readonly config: DiskCacheConfig;
}

// Flags that consume the following argument as their value.
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '--dir',
  '--key', '-k',
  '--val', '-v',
  '--duration', '-d',
  '--sort',
]);

const KEYED_COMMANDS: ReadonlySet<CommandName> = new Set([
  CommandName.SET,
  CommandName.GET,
  CommandName.REMOVE,
]);

export class CLIParser {
  private readonly args: string[];
  private readonly env: NodeJS.ProcessEnv;

  constructor(args: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env) {
    this.args = args;
    this.env = env;
  }

  public parse(): CLIOptions {
    const envConfig = configFromEnv(this.env);
    const cacheDir = this.getString('--dir');
    const config = resolveConfig(envConfig, {
      ...(cacheDir !== undefined ? { cacheDir } : {}),
      ...(this.hasFlag('--verbose') ? { verbose: true } : {}),
    });

    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return this.options(config, { help: true, command: undefined });
    }

    const commandArg = this.findCommand();
    if (commandArg === undefined) {
      return this.options(config, { help: false, command: undefined });
    }

    const command = this.parseCommand(commandArg);
    const key = this.getString('--key', '-k');
    const value = this.getString('--val', '-v');

    if (KEYED_COMMANDS.has(command) && key === undefined) {
      throw new Error(`${command} requires --key`);
    }
    if (command === CommandName.SET && value === undefined) {
      throw new Error('set requires --val');
    }

    const durationStr = this.getString('--duration', '-d');

    return {
      help: false,
      command,
      key,
      value,
      durationMs: durationStr === undefined ? config.defaultTtlMs : parseDuration(durationStr),
      sort: this.parseSort(),
      config,
    };
  }

  private options(
    config: DiskCacheConfig,
    base: Pick<CLIOptions, 'help' | 'command'>
  ): CLIOptions {
    return {
      ...base,
      key: undefined,
      value: undefined,
      durationMs: config.defaultTtlMs,
      sort: ListSort.NONE,
      config,
    };
  }

  private findCommand(): string | undefined {
    for (let i = 0; i < this.args.length; i++) {
      const arg = this.args[i];
      if (arg === undefined) break;

      if (arg.startsWith('-')) {
        if (VALUE_FLAGS.has(arg)) i++;
        continue;
      }
      return arg;
    }

    return undefined;
  }

  private parseCommand(value: string): CommandName {
    switch (value.toLowerCase()) {
      case 'set': return CommandName.SET;
      case 'get': return CommandName.GET;
      case 'list':
      case 'ls': return CommandName.LIST;
      case 'remove':
      case 'rm': return CommandName.REMOVE;
      case 'flush': return CommandName.FLUSH;
      case 'clean': return CommandName.CLEAN;
      default: throw new Error(`Unknown command: ${value}. Run with --help for usage`);
    }
  }

  private parseSort(): ListSort {
    const value = this.getString('--sort');
    if (value === undefined) return ListSort.NONE;

    switch (value.toLowerCase()) {
      case 'key': return ListSort.KEY;
      case 'value': return ListSort.VALUE;
      case 'expiry': return ListSort.EXPIRY;
      default: throw new Error(`Invalid sort: ${value}. Must be key, value, or expiry`);
    }
  }

  private getString(...flags: string[]): string | undefined {
    for (const flag of flags) {
      const inline = this.args.find(arg => arg.startsWith(`${flag}=`));
      if (inline !== undefined) {
        return inline.slice(flag.length + 1);
      }

      const flagIndex = this.args.indexOf(flag);
      if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
        return this.args[flagIndex + 1];
      }
    }

    return undefined;
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
dc - disk cache with per-entry expiry

Usage: dc <command> [options]

Commands:
  set                     Store a value
  get                     Print a live value
  list, ls                List entries with their expiry
  remove, rm              Delete one entry
  flush                   Delete every entry
  clean                   Delete expired entries

Options:
  --help, -h              Show this help message
  --dir=PATH              Cache directory (default: ~/.cache/diskcache, env DISKCACHE_DIR)
  --key, -k KEY           Entry key (set, get, remove)
  --val, -v VALUE         Value to store (set)
  --duration, -d DUR      Time to live, e.g. 90s, 1h30m (default: 1h, env DISKCACHE_TTL)
  --sort=FIELD            Sort listing by key, value, or expiry (list)
  --verbose               Log cache activity to stderr

Examples:
  dc set -k token -v abc123 -d 15m
  dc get -k token
  dc list --sort=expiry
`);
  }
}
