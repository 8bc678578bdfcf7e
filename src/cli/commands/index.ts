import { Command } from 'commander';
import { registerRunCommand } from './run';
import { registerServeCommand } from './serve';
import { registerValidateCommand } from './validate';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerValidateCommand(program);
  registerServeCommand(program);
}
