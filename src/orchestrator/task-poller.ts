import { err, ok } from '../core/result';
import { hardwareError } from '../hardware/errors';
import { isTerminalTaskStatus } from '../hardware/types';
import type { HardwareResult, HardwareTask, TaskClient, TaskHandle } from '../hardware/types';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { sleep } from '../utils/time';

export interface PollOptions {
  /** Fixed delay between status queries; no backoff */
  pollIntervalMs: number;
  /** Budget for the whole operation, measured from the first poll */
  timeoutMs: number;
  cancelSignal?: AbortSignal;
}

export interface AwaitOptions extends PollOptions {
  onProgress?: (task: HardwareTask) => void;
}

/**
 * Drives a submitted instrument task to a terminal status.
 *
 * A failing status query is returned immediately rather than retried, so a
 * broken status endpoint cannot stall a run.
 */
export class TaskPoller {
  constructor(
    private logger: Logger = silentLogger,
    private clock: () => number = Date.now,
  ) {}

  /**
   * Yields every polled snapshot (the terminal one included) and returns the
   * final outcome. Timeout and caller cancel both abort the instrument task.
   */
  async *track<Op extends string>(client: TaskClient<Op>, handle: TaskHandle<Op>, options: PollOptions): AsyncGenerator<HardwareTask, HardwareResult<HardwareTask>, void> {
    const startedAt = this.clock();

    for (;;) {
      if (this.clock() - startedAt >= options.timeoutMs) {
        await this.abortTask(client, handle, 'timeout');
        return err(hardwareError('timeout', 'timeout'));
      }
      if (options.cancelSignal?.aborted) {
        await this.abortTask(client, handle, 'cancel');
        return err(hardwareError('cancelled', 'cancelled by caller'));
      }

      const polled = await client.poll(handle);
      if (!polled.ok) return polled;

      const task = polled.value;
      yield task;

      if (isTerminalTaskStatus(task.status)) {
        return settle(task);
      }

      await sleep(options.pollIntervalMs, options.cancelSignal);
    }
  }

  async awaitCompletion<Op extends string>(client: TaskClient<Op>, handle: TaskHandle<Op>, options: AwaitOptions): Promise<HardwareResult<HardwareTask>> {
    const tracker = this.track(client, handle, options);
    for (;;) {
      const step = await tracker.next();
      if (step.done) return step.value;
      options.onProgress?.(step.value);
    }
  }

  private async abortTask<Op extends string>(client: TaskClient<Op>, handle: TaskHandle<Op>, reason: 'timeout' | 'cancel'): Promise<void> {
    this.logger.info(`Aborting ${handle.operation} task`, { taskId: handle.taskId, reason });
    const cancelled = await client.cancel(handle);
    if (!cancelled.ok) {
      this.logger.warn(`Best-effort abort of ${handle.operation} task failed`, { taskId: handle.taskId, error: cancelled.error.message });
    }
  }
}

function settle(task: HardwareTask): HardwareResult<HardwareTask> {
  switch (task.status) {
    case 'completed':
      return ok(task);
    case 'failed':
      return err(hardwareError('hardware_fault', task.error ?? 'task failed'));
    default:
      return err(hardwareError('hardware_fault', 'task cancelled by instrument'));
  }
}
