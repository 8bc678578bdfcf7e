import { z } from 'zod';
import { err, ok } from '../core/result';
import { BaseHardwareClient } from './base-client';
import { hardwareError } from './errors';
import { AlignmentParamsSchema, MoveParamsSchema, StageTaskStatusSchema, TaskAcceptedSchema } from './schemas';
import { isTerminalTaskStatus } from './types';
import type { HardwareResult, HardwareTask, StageController, StageOperations, TaskHandle } from './types';

type StageOperation = keyof StageOperations;

interface TaskRoutes {
  submit: string;
  status: (taskId: string) => string;
  stop: (taskId: string) => string;
}

const ROUTES: Record<StageOperation, TaskRoutes> = {
  move: {
    submit: '/move',
    status: (id) => `/move/status/${encodeURIComponent(id)}`,
    stop: (id) => `/move/stop/${encodeURIComponent(id)}`,
  },
  alignment: {
    submit: '/alignment/execute',
    status: (id) => `/alignment/status/${encodeURIComponent(id)}`,
    stop: (id) => `/alignment/stop/${encodeURIComponent(id)}`,
  },
};

const PARAM_SCHEMAS: { [K in StageOperation]: z.ZodType<StageOperations[K], z.ZodTypeDef, unknown> } = {
  move: MoveParamsSchema,
  alignment: AlignmentParamsSchema,
};

/**
 * Client for the multi-axis probe-station controller. Motion and alignment
 * run as instrument-side tasks; power is a direct read.
 */
export class StageClient extends BaseHardwareClient implements StageController {
  readonly name = 'stage';

  async submit<K extends StageOperation>(operation: K, params: StageOperations[K]): Promise<HardwareResult<TaskHandle<K>>> {
    const validated = this.validateParams(PARAM_SCHEMAS[operation], params, operation);
    if (!validated.ok) return validated;

    const accepted = await this.post(ROUTES[operation].submit, validated.value, TaskAcceptedSchema);
    if (!accepted.ok) return accepted;

    return ok({ operation, taskId: accepted.value.task_id });
  }

  async poll(handle: TaskHandle<StageOperation>): Promise<HardwareResult<HardwareTask>> {
    const result = await this.get(ROUTES[handle.operation].status(handle.taskId), StageTaskStatusSchema);
    if (!result.ok) return result;

    const status = result.value;
    return ok({
      taskId: handle.taskId,
      status: status.status,
      progressPercent: status.progress_percent,
      phase: status.phase,
      resultPayload: status.result ?? status.current_position,
      error: status.error ?? undefined,
    });
  }

  async cancel(handle: TaskHandle<StageOperation>): Promise<HardwareResult<void>> {
    const current = await this.poll(handle);
    if (!current.ok) return current;
    if (isTerminalTaskStatus(current.value.status)) {
      return err(hardwareError('validation', `task ${handle.taskId} already ${current.value.status}`));
    }

    const stopped = await this.post(ROUTES[handle.operation].stop(handle.taskId), {}, z.unknown());
    if (!stopped.ok) return stopped;
    return ok(undefined);
  }

  readPower(): Promise<HardwareResult<number>> {
    return this.readScalar('/power', 'power_dbm');
  }
}
