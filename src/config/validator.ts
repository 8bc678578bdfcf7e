import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const StageSettingsSchema = z.object({
  baseUrl: z.string().url(),
  requestTimeoutMs: z.number().int().positive(),
  moveSpeedUmPerS: z.number().positive(),
});

export const AnalyzerSettingsSchema = z.object({
  baseUrl: z.string().url(),
  requestTimeoutMs: z.number().int().positive(),
  calibrateOnStart: z.boolean(),
});

export const TimeoutSettingsSchema = z
  .object({
    moveMs: z.number().int().positive(),
    alignmentMs: z.number().int().positive(),
    sweepMs: z.number().int().positive(),
  })
  .refine((t) => t.sweepMs >= t.moveMs, { message: 'sweepMs must not be shorter than moveMs', path: ['sweepMs'] });

export const PollingSettingsSchema = z.object({
  moveIntervalMs: z.number().int().positive(),
  alignmentIntervalMs: z.number().int().positive(),
  sweepIntervalMs: z.number().int().positive(),
});

export const ConfigSchema = z.object({
  stage: StageSettingsSchema,
  analyzer: AnalyzerSettingsSchema,
  timeouts: TimeoutSettingsSchema,
  polling: PollingSettingsSchema,
  manager: z.object({
    retentionMs: z.number().int().positive(),
    subscriberBufferSize: z.number().int().positive(),
  }),
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  }),
  logging: z.object({
    level: LogLevelSchema,
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }

  static fromZod(error: z.ZodError): ConfigValidationError {
    return new ConfigValidationError(error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }
}
