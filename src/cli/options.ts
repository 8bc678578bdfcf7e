import { Command } from 'commander';
import { loadConfig } from '../config/loader';
import type { DeepPartial } from '../config/loader';
import { ConfigValidationError, LogLevelSchema } from '../config/validator';
import type { Config } from '../config/validator';

/** Options shared by every command that talks to the instruments */
export type CommonOptions = {
  config?: string;
  stageUrl?: string;
  analyzerUrl?: string;
  logLevel?: string;
};

export function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to a photon-bench.yaml config file')
    .option('--stage-url <url>', 'Stage controller base URL')
    .option('--analyzer-url <url>', 'Analyzer base URL')
    .option('--log-level <level>', 'debug | info | warn | error | silent');
}

/**
 * Resolve configuration for a command, with its flags as the top layer.
 *
 * @throws {ConfigValidationError} for an unknown log level or an invalid merged config
 */
export function configFromOptions(options: CommonOptions, extra: DeepPartial<Config> = {}): Config {
  const overrides: DeepPartial<Config> = { ...extra };

  if (options.stageUrl) overrides.stage = { ...overrides.stage, baseUrl: options.stageUrl };
  if (options.analyzerUrl) overrides.analyzer = { ...overrides.analyzer, baseUrl: options.analyzerUrl };
  if (options.logLevel !== undefined) {
    const level = LogLevelSchema.safeParse(options.logLevel);
    if (!level.success) {
      throw new ConfigValidationError([`logging.level: unknown log level "${options.logLevel}"`]);
    }
    overrides.logging = { level: level.data };
  }

  return loadConfig(overrides, { configPath: options.config });
}
