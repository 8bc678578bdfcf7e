import { z } from 'zod';
import { err, ok } from '../core/result';
import { BaseHardwareClient } from './base-client';
import { hardwareError } from './errors';
import { SweepConfigSchema, SweepStartParamsSchema, SweepStartResponseSchema, SweepStatusSchema, TraceSchema } from './schemas';
import type { SweepConfig } from './schemas';
import { isTerminalTaskStatus } from './types';
import type { Analyzer, AnalyzerOperations, HardwareResult, HardwareTask, TaskHandle, TaskStatus, Trace } from './types';

/** Handle id used when the analyzer acknowledges a sweep without issuing a task id */
export const IMPLICIT_SWEEP_TASK_ID = 'sweep';

/**
 * Client for the sweep/detector analyzer. The instrument runs one sweep at a
 * time, so status and abort are global rather than per task id.
 */
export class AnalyzerClient extends BaseHardwareClient implements Analyzer {
  readonly name = 'analyzer';

  async configure(config: SweepConfig): Promise<HardwareResult<void>> {
    const validated = this.validateParams(SweepConfigSchema, config, 'configure');
    if (!validated.ok) return validated;

    const result = await this.post('/configure', validated.value, z.unknown());
    return result.ok ? ok(undefined) : result;
  }

  async calibrate(): Promise<HardwareResult<void>> {
    const result = await this.post('/calibrate', {}, z.unknown());
    return result.ok ? ok(undefined) : result;
  }

  async submit<K extends keyof AnalyzerOperations>(operation: K, params: AnalyzerOperations[K]): Promise<HardwareResult<TaskHandle<K>>> {
    const validated = this.validateParams(SweepStartParamsSchema, params, operation);
    if (!validated.ok) return validated;

    const started = await this.post('/sweep/start', validated.value, SweepStartResponseSchema);
    if (!started.ok) return started;

    const taskId = 'task_id' in started.value ? started.value.task_id : IMPLICIT_SWEEP_TASK_ID;
    return ok({ operation, taskId });
  }

  async poll(handle: TaskHandle<keyof AnalyzerOperations>): Promise<HardwareResult<HardwareTask>> {
    const result = await this.get('/sweep/status', SweepStatusSchema);
    if (!result.ok) return result;

    const status = result.value;
    const taskStatus = toTaskStatus(status);
    return ok({
      taskId: handle.taskId,
      status: taskStatus,
      progressPercent: status.progress_percent ?? (taskStatus === 'completed' ? 100 : 0),
      error: status.error ?? undefined,
    });
  }

  async cancel(handle: TaskHandle<keyof AnalyzerOperations>): Promise<HardwareResult<void>> {
    const current = await this.poll(handle);
    if (!current.ok) return current;
    if (isTerminalTaskStatus(current.value.status)) {
      return err(hardwareError('validation', `sweep ${handle.taskId} already ${current.value.status}`));
    }

    const aborted = await this.post('/sweep/abort', {}, z.unknown());
    return aborted.ok ? ok(undefined) : aborted;
  }

  async readTrace(): Promise<HardwareResult<Trace>> {
    const result = await this.get('/trace', TraceSchema);
    if (!result.ok) return result;
    return ok({ wavelengthNm: result.value.wavelength_nm, powerDbm: result.value.power_dbm });
  }
}

function toTaskStatus(status: z.infer<typeof SweepStatusSchema>): TaskStatus {
  if (status.error) return 'failed';
  if (status.is_complete) return 'completed';
  if (status.is_sweeping) return 'running';
  return 'pending';
}
