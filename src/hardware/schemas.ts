import { z } from 'zod';

// ── Request payloads ────────────────────────────────────────────────────

export const MoveParamsSchema = z.object({
  axis: z.enum(['x', 'y', 'z']),
  target: z.number().finite(),
  speed: z.number().positive(),
});

export const AlignmentParamsSchema = z.object({
  mode: z.enum(['flat', 'focus']),
  search_range_um: z.number().positive(),
});

export const SweepStartParamsSchema = z.object({
  wait: z.boolean(),
});

export const SweepConfigSchema = z
  .object({
    wavelength_range: z.object({
      start_nm: z.number().positive(),
      stop_nm: z.number().positive(),
    }),
    speed: z.number().positive(),
    power: z.number().finite(),
  })
  .refine((cfg) => cfg.wavelength_range.stop_nm > cfg.wavelength_range.start_nm, {
    message: 'stop_nm must be greater than start_nm',
    path: ['wavelength_range'],
  });

export type MoveParams = z.infer<typeof MoveParamsSchema>;
export type AlignmentParams = z.infer<typeof AlignmentParamsSchema>;
export type SweepStartParams = z.infer<typeof SweepStartParamsSchema>;
export type SweepConfig = z.infer<typeof SweepConfigSchema>;

// ── Response payloads ───────────────────────────────────────────────────

export const TaskAcceptedSchema = z.object({ task_id: z.union([z.string(), z.number()]).transform(String) });

export const StageTaskStatusSchema = z.object({
  status: z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']),
  progress_percent: z.number().default(0),
  current_position: z.unknown().optional(),
  phase: z.string().optional(),
  error: z.string().nullish(),
  result: z.unknown().optional(),
});

export const SweepStartResponseSchema = z.union([TaskAcceptedSchema, z.object({ accepted: z.literal(true) })]);

export const SweepStatusSchema = z.object({
  is_sweeping: z.boolean(),
  is_complete: z.boolean(),
  progress_percent: z.number().optional(),
  error: z.string().nullish(),
});

export const TraceSchema = z.object({
  wavelength_nm: z.array(z.number()),
  power_dbm: z.array(z.number()),
});
