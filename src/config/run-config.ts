import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { err, ok } from '../core/result';
import type { Result } from '../core/result';
import { AnalyzerSettingsSchema, PollingSettingsSchema, StageSettingsSchema, TimeoutSettingsSchema } from './validator';
import type { Config } from './validator';

export const DeviceSchema = z.object({
  name: z.string().min(1),
  /** Stage coordinates in micrometres */
  position: z.object({
    x: z.number().finite(),
    y: z.number().finite(),
    z: z.number().finite().optional(),
  }),
  alignment: z
    .object({
      mode: z.enum(['flat', 'focus']).default('flat'),
      searchRangeUm: z.number().positive().default(10),
    })
    .optional(),
  sweep: z
    .object({
      startNm: z.number().positive(),
      stopNm: z.number().positive(),
      speedNmPerS: z.number().positive(),
      powerDbm: z.number().finite(),
    })
    .refine((s) => s.stopNm > s.startNm, { message: 'stopNm must be greater than startNm', path: ['stopNm'] }),
});

export const RunPlanSchema = z.object({
  runName: z.string().min(1).optional(),
  devices: z.array(DeviceSchema).min(1, 'a run needs at least one device'),
});

export const RunConfigSchema = RunPlanSchema.extend({
  stage: StageSettingsSchema,
  analyzer: AnalyzerSettingsSchema,
  timeouts: TimeoutSettingsSchema,
  polling: PollingSettingsSchema,
});

export type DeviceDescriptor = z.infer<typeof DeviceSchema>;
export type RunPlan = z.infer<typeof RunPlanSchema>;

type DeepReadonly<T> = T extends (infer U)[] ? readonly DeepReadonly<U>[] : T extends object ? { readonly [K in keyof T]: DeepReadonly<T[K]> } : T;

/** Everything one run needs; created at start and never modified */
export type RunConfig = DeepReadonly<z.infer<typeof RunConfigSchema>>;

export function parseRunPlan(input: unknown): Result<RunPlan> {
  const parsed = RunPlanSchema.safeParse(input);
  if (!parsed.success) {
    return err(parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '));
  }
  return ok(parsed.data);
}

/** Read a run plan from a YAML or JSON file (YAML is a superset of JSON) */
export function readRunPlan(filePath: string): Result<RunPlan> {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    return err(`cannot read run plan ${resolved}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (error) {
    return err(`cannot parse run plan ${resolved}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseRunPlan(data);
}

/** Bind a plan to the configured instrument endpoints and budgets */
export function buildRunConfig(plan: RunPlan, config: Config): RunConfig {
  return freezeRunConfig({
    ...plan,
    stage: config.stage,
    analyzer: config.analyzer,
    timeouts: config.timeouts,
    polling: config.polling,
  });
}

/**
 * Detached, deeply frozen copy of a run config. Later changes to the
 * caller's objects do not reach a run holding the copy.
 */
export function freezeRunConfig(config: RunConfig): RunConfig {
  return deepFreeze(structuredClone(config));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach((child: unknown) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}
