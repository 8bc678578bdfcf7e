#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';
import { formatError } from './formatters';

export function createProgram(): Command {
  const program = new Command();
  program.name('photon-bench').description('Sequence optical measurements across a probe station and a swept-source analyzer').version('0.1.0');
  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(formatError(error instanceof Error ? error.message : String(error)));
      process.exitCode = 1;
    });
}
