#!/usr/bin/env node
import pc from 'picocolors';
import { DiskCache } from '../storage/DiskCache';
import { createLogger } from '../common/Logger';
import { CLIParser } from './CLIParser';
import { EXIT_FAILURE, EXIT_OK, runCommand } from './Commands';
import type { CommandOutput } from './Commands';

const consoleOutput: CommandOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

async function main(): Promise<number> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return EXIT_OK;
  }
  if (options.command === undefined) {
    CLIParser.printHelp();
    return EXIT_FAILURE;
  }

  const cache = await DiskCache.open(options.config.cacheDir, {
    syncWrites: options.config.syncWrites,
    logger: createLogger('DiskCache', options.config.verbose),
  });

  return runCommand(options, {
    cache,
    output: consoleOutput,
    colors: pc,
    clock: Date.now,
    expiringSoonMs: options.config.expiringSoonMs,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = EXIT_FAILURE;
  });
