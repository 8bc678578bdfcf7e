import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, ConfigValidationError } from './validator';
import type { Config } from './validator';
import { defaults } from './defaults';

export const CONFIG_FILE_NAME = 'photon-bench.yaml';

/**
 * DeepPartial allows for recursive partials of the Config type.
 * Used for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Explicit YAML file; defaults to photon-bench.yaml in `cwd` when present */
  configPath?: string;
  cwd?: string;
  /** Environment to read; when omitted, `.env` is loaded into process.env first */
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve configuration: defaults, then the YAML file, then environment
 * variables, then CLI overrides. The merged result is validated with zod.
 *
 * @throws {ConfigValidationError} if the merged configuration is invalid
 */
export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  let env = options.env;
  if (!env) {
    dotenv.config({ path: path.join(cwd, '.env') });
    env = process.env;
  }

  // 1. Start with Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with the YAML file
  const yamlPath = options.configPath ? path.resolve(cwd, options.configPath) : path.join(cwd, CONFIG_FILE_NAME);
  if (options.configPath && !fs.existsSync(yamlPath)) {
    throw new ConfigValidationError([`config file not found: ${yamlPath}`]);
  }
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with Environment Variables
  deepMerge(config, {
    stage: { baseUrl: env.STAGE_URL },
    analyzer: { baseUrl: env.ANALYZER_URL },
    server: { port: env.CONTROL_PORT ? Number(env.CONTROL_PORT) : undefined },
    logging: { level: env.LOG_LEVEL },
  });

  // 4. Override with CLI Arguments
  deepMerge(config, cliOverrides);

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw ConfigValidationError.fromZod(result.error);
  }

  return result.data;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep merge for config objects; `undefined` in the source never overwrites */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (isRecord(sourceValue)) {
      const targetValue = target[key];
      const nested = isRecord(targetValue) ? targetValue : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}
