import { err, ok } from '../core/result';
import type { Result } from '../core/result';
import { freezeRunConfig } from '../config/run-config';
import type { DeviceDescriptor, RunConfig } from '../config/run-config';
import { hardwareError } from '../hardware/errors';
import type { HardwareError } from '../hardware/errors';
import type { SweepConfig } from '../hardware/schemas';
import { summarizeTrace } from '../hardware/trace';
import { isTerminalTaskStatus } from '../hardware/types';
import type { Analyzer, HardwareResult, HardwareTask, StageController, TaskClient, TaskHandle } from '../hardware/types';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { createProgressEvent } from './progress-events';
import type { AlignmentProgressEvent, DeviceOutcome, ProgressEvent, ProgressEventInput, RunFailureCode, RunProgress, RunSummary, StepOperation } from './progress-events';
import { RecoveryPolicy } from './recovery';
import type { HardwareSource } from './recovery';
import type { RunSignals } from './signals';
import { RunStateMachine } from './state-machine';
import type { RunState } from './states';
import { TaskPoller } from './task-poller';
import type { PollOptions } from './task-poller';
import type { Trigger } from './transitions';

export interface MeasurementClients {
  stage: StageController;
  analyzer: Analyzer;
}

/** Configuration for creating a MeasurementController */
export interface ControllerOptions {
  runId: string;
  config: RunConfig;
  clients: MeasurementClients;
  /** Shared with the manager: written there, only read here */
  signals: RunSignals;
  logger?: Logger;
  poller?: TaskPoller;
  recovery?: RecoveryPolicy;
  /** Defaults to a fresh machine for `runId` */
  machine?: RunStateMachine;
}

/** Whether the workflow goes on after a step */
type Flow = 'continue' | 'stop';

type StepEvents<T> = AsyncGenerator<ProgressEvent, T, void>;

interface SetupFailure {
  operation: StepOperation;
  error: HardwareError;
}

const AXES = ['x', 'y', 'z'] as const;

/**
 * MeasurementController runs one measurement over an ordered device list.
 *
 * `run()` is a pull-based async generator: it advances only when the consumer
 * asks for the next event, so events come out in exactly the order they are
 * produced. Pause and cancel are consulted at checkpoints before each device
 * and between its stage steps; a cancel also interrupts any in-flight task poll.
 */
export class MeasurementController {
  private machine: RunStateMachine;
  private config: RunConfig;
  private stage: StageController;
  private analyzer: Analyzer;
  private signals: RunSignals;
  private logger: Logger;
  private poller: TaskPoller;
  private recovery: RecoveryPolicy;
  private outcomes: DeviceOutcome[];
  private progress: RunProgress = {};
  private startedAt: number | undefined;
  private completedAt: number | undefined;

  constructor(options: ControllerOptions) {
    this.machine = options.machine ?? new RunStateMachine(options.runId);
    this.config = freezeRunConfig(options.config);
    this.stage = options.clients.stage;
    this.analyzer = options.clients.analyzer;
    this.signals = options.signals;
    this.logger = options.logger ?? silentLogger;
    this.poller = options.poller ?? new TaskPoller(this.logger);
    this.recovery = options.recovery ?? new RecoveryPolicy();
    this.outcomes = this.config.devices.map((device, index) => ({ index, name: device.name, status: 'pending' }));

    this.machine.events.onTransition((event) => {
      this.logger.debug('State transition', { runId: event.runId, from: event.from, to: event.to, trigger: event.trigger });
    });
    this.machine.events.onRejected((event) => {
      this.logger.warn('Rejected state trigger', { runId: event.runId, state: event.state, trigger: event.trigger });
    });
  }

  // ── Public API ──────────────────────────────────────────────────────

  getRunId(): string {
    return this.machine.getRunId();
  }

  getState(): RunState {
    return this.machine.getState();
  }

  /** Device and step in flight; empty before the first step and after the run ends */
  getProgress(): RunProgress {
    return { ...this.progress };
  }

  /** While the run is live, `durationMs` is the time elapsed so far */
  getSummary(): RunSummary {
    const summary: RunSummary = {
      totalDevices: this.outcomes.length,
      measured: this.outcomes.filter((o) => o.status === 'measured').length,
      failed: this.outcomes.filter((o) => o.status === 'failed').length,
      devices: [...this.outcomes],
    };
    if (this.startedAt === undefined) return summary;

    return {
      ...summary,
      startedAt: new Date(this.startedAt).toISOString(),
      ...(this.completedAt === undefined ? {} : { completedAt: new Date(this.completedAt).toISOString() }),
      durationMs: (this.completedAt ?? Date.now()) - this.startedAt,
    };
  }

  async *run(): AsyncGenerator<ProgressEvent, void, void> {
    try {
      yield* this.execute();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('Measurement run crashed', { runId: this.getRunId(), error: reason });
      yield* this.failRun('INTERNAL_ERROR', `internal error: ${reason}`);
    } finally {
      await Promise.all([this.stage.disconnect(), this.analyzer.disconnect()]);
    }
  }

  // ── Run Lifecycle ───────────────────────────────────────────────────

  private async *execute(): StepEvents<void> {
    if (!(yield* this.advance('START_MEASUREMENT'))) return;
    this.startedAt = Date.now();
    this.logger.info('Starting measurement run', { runId: this.getRunId(), devices: this.outcomes.length });
    yield this.event({ type: 'run_started', runId: this.getRunId(), totalDevices: this.outcomes.length, runName: this.config.runName });

    const calibrated = await this.calibrate();
    if (!calibrated.ok) {
      const { operation, error } = calibrated.error;
      yield this.event({ type: 'error_occurred', runId: this.getRunId(), deviceIndex: null, operation, reason: error.message, kind: error.kind });
      yield* this.failRun('CALIBRATION_FAILED', `${operation} failed: ${error.message}`);
      return;
    }
    if (this.signals.cancelRequested) {
      yield* this.cancelRun();
      return;
    }
    if (!(yield* this.advance('CALIBRATION_COMPLETE'))) return;

    for (const [index, device] of this.config.devices.entries()) {
      if ((yield* this.checkpoint(index)) === 'stop') return;
      if ((yield* this.measureDevice(index, device)) === 'stop') return;
    }

    if (!(yield* this.advance('COMPLETE'))) return;
    this.finish();
    const summary = this.getSummary();
    this.logger.info('Measurement run completed', { runId: this.getRunId(), measured: summary.measured, failed: summary.failed });
    yield this.event({ type: 'run_completed', runId: this.getRunId(), summary });
  }

  /** One-time setup: health-check both instruments, then the analyzer's calibration */
  private async calibrate(): Promise<Result<void, SetupFailure>> {
    this.progress = { currentOperation: 'connect' };
    for (const client of [this.stage, this.analyzer]) {
      const connected = await client.connect();
      if (!connected.ok) return err<SetupFailure>({ operation: 'connect', error: connected.error });
    }

    if (this.config.analyzer.calibrateOnStart) {
      this.progress = { currentOperation: 'calibration' };
      const calibrated = await this.analyzer.calibrate();
      if (!calibrated.ok) return err<SetupFailure>({ operation: 'calibration', error: calibrated.error });
    }
    return ok(undefined);
  }

  /** Cancel first, then pause; a paused run waits here for resume or cancel */
  private async *checkpoint(deviceIndex: number): StepEvents<Flow> {
    if (this.signals.cancelRequested) return yield* this.cancelRun();
    if (!this.signals.pauseRequested) return 'continue';

    if (!(yield* this.advance('PAUSE'))) return 'stop';
    this.logger.info('Run paused', { runId: this.getRunId(), deviceIndex });
    yield this.event({ type: 'run_paused', runId: this.getRunId(), deviceIndex });

    const outcome = await this.signals.waitForResumeOrCancel();
    if (outcome === 'cancelled') return yield* this.cancelRun();

    if (!(yield* this.advance('RESUME'))) return 'stop';
    this.logger.info('Run resumed', { runId: this.getRunId(), deviceIndex });
    yield this.event({ type: 'run_resumed', runId: this.getRunId(), deviceIndex });
    return 'continue';
  }

  private async *cancelRun(): StepEvents<Flow> {
    if (!(yield* this.advance('CANCEL'))) return 'stop';
    this.finish();
    this.logger.info('Measurement run cancelled', { runId: this.getRunId() });
    yield this.event({ type: 'run_cancelled', runId: this.getRunId(), summary: this.getSummary() });
    return 'stop';
  }

  private async *failRun(code: RunFailureCode, reason: string): StepEvents<Flow> {
    const failed = this.machine.apply('FAIL');
    if (!failed.ok) {
      this.logger.error('Cannot record run failure', { runId: this.getRunId(), code, error: failed.error });
    }
    this.finish();
    this.logger.error('Measurement run failed', { runId: this.getRunId(), code, reason });
    yield this.event({ type: 'run_failed', runId: this.getRunId(), reason, code, summary: this.getSummary() });
    return 'stop';
  }

  /**
   * Apply a trigger through the state machine. A rejected transition is a
   * logic error: the run fails with INVARIANT_VIOLATION and `false` is returned.
   */
  private async *advance(trigger: Trigger): StepEvents<boolean> {
    const next = this.machine.apply(trigger);
    if (next.ok) return true;

    this.logger.error('Invariant violation: state transition rejected', { runId: this.getRunId(), trigger, error: next.error });
    yield* this.failRun('INVARIANT_VIOLATION', next.error);
    return false;
  }

  // ── Device Workflow ─────────────────────────────────────────────────

  private async *measureDevice(index: number, device: DeviceDescriptor): StepEvents<Flow> {
    this.logger.info(`Device ${index}: ${device.name}`, { runId: this.getRunId() });
    yield this.event({ type: 'device_started', runId: this.getRunId(), deviceIndex: index, deviceName: device.name });

    const { polling, timeouts } = this.config;

    this.at(index, 'move');
    for (const axis of AXES) {
      const target = device.position[axis];
      if (target === undefined) continue;

      const submitted = await this.stage.submit('move', { axis, target, speed: this.config.stage.moveSpeedUmPerS });
      const moved = yield* this.runTask(this.stage, index, 'move', submitted, { pollIntervalMs: polling.moveIntervalMs, timeoutMs: timeouts.moveMs });
      if (!moved.ok) return yield* this.stepFailed('stage', index, 'move', moved.error);
    }
    if ((yield* this.checkpoint(index)) === 'stop') return 'stop';

    if (device.alignment) {
      this.at(index, 'alignment');
      const submitted = await this.stage.submit('alignment', { mode: device.alignment.mode, search_range_um: device.alignment.searchRangeUm });
      const aligned = yield* this.runTask(this.stage, index, 'alignment', submitted, { pollIntervalMs: polling.alignmentIntervalMs, timeoutMs: timeouts.alignmentMs });
      if (!aligned.ok) return yield* this.stepFailed('stage', index, 'alignment', aligned.error);
      if ((yield* this.checkpoint(index)) === 'stop') return 'stop';
    }

    this.at(index, 'power');
    const power = await this.stage.readPower();
    if (!power.ok) return yield* this.stepFailed('stage', index, 'power', power.error);

    this.at(index, 'configure');
    const configured = await this.analyzer.configure(toSweepConfig(device));
    if (!configured.ok) return yield* this.stepFailed('analyzer', index, 'configure', configured.error);

    this.at(index, 'sweep');
    const submitted = await this.analyzer.submit('sweep', { wait: false });
    const swept = yield* this.runTask(this.analyzer, index, 'sweep', submitted, { pollIntervalMs: polling.sweepIntervalMs, timeoutMs: timeouts.sweepMs });
    if (!swept.ok) return yield* this.stepFailed('analyzer', index, 'sweep', swept.error);

    this.at(index, 'trace');
    const trace = await this.analyzer.readTrace();
    if (!trace.ok) return yield* this.stepFailed('analyzer', index, 'trace', trace.error);
    const summary = summarizeTrace(trace.value);
    if (!summary.ok) return yield* this.stepFailed('analyzer', index, 'trace', hardwareError('hardware_fault', summary.error));

    this.record(index, { status: 'measured', powerDbm: power.value, traceSummary: summary.value });
    this.logger.info(`Device ${index} measured`, { runId: this.getRunId(), peakWavelengthNm: summary.value.peakWavelengthNm });
    yield this.event({
      type: 'measurement_completed',
      runId: this.getRunId(),
      deviceIndex: index,
      deviceName: device.name,
      powerDbm: power.value,
      traceSummary: summary.value,
    });
    return 'continue';
  }

  /** Poll a submitted task, surfacing intermediate snapshots as progress events */
  private async *runTask<Op extends AlignmentProgressEvent['operation']>(
    client: TaskClient<Op>,
    deviceIndex: number,
    operation: Op,
    submitted: HardwareResult<TaskHandle<Op>>,
    options: PollOptions,
  ): StepEvents<HardwareResult<HardwareTask>> {
    if (!submitted.ok) return submitted;

    const tracker = this.poller.track(client, submitted.value, { ...options, cancelSignal: this.signals.cancelSignal });
    for (;;) {
      const step = await tracker.next();
      if (step.done) return step.value;

      const task = step.value;
      if (!isTerminalTaskStatus(task.status)) {
        yield this.event({
          type: 'alignment_progress',
          runId: this.getRunId(),
          deviceIndex,
          operation,
          phase: task.phase ?? operation,
          percent: task.progressPercent,
        });
      }
    }
  }

  private async *stepFailed(source: HardwareSource, index: number, operation: StepOperation, error: HardwareError): StepEvents<Flow> {
    const decision = this.recovery.decide(source, error);
    if (decision.action === 'cancel_run') {
      return yield* this.cancelRun();
    }

    this.record(index, { status: 'failed', error: `${operation}: ${error.message}` });
    this.logger.warn(`Device ${index} ${operation} failed`, { runId: this.getRunId(), kind: error.kind, reason: error.message });
    yield this.event({ type: 'error_occurred', runId: this.getRunId(), deviceIndex: index, operation, reason: error.message, kind: error.kind });

    switch (decision.action) {
      case 'skip_device':
        return 'continue';
      case 'fail_run':
        return yield* this.failRun(decision.code, `${operation} failed on device ${index}: ${error.message}`);
    }
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private at(deviceIndex: number, operation: StepOperation): void {
    this.progress = { currentDeviceIndex: deviceIndex, currentOperation: operation };
  }

  private finish(): void {
    this.completedAt = Date.now();
    this.progress = {};
  }

  private record(index: number, patch: Partial<Omit<DeviceOutcome, 'index' | 'name'>>): void {
    this.outcomes = this.outcomes.map((outcome) => (outcome.index === index ? { ...outcome, ...patch } : outcome));
  }

  private event(input: ProgressEventInput): ProgressEvent {
    return createProgressEvent(input);
  }
}

function toSweepConfig(device: DeviceDescriptor): SweepConfig {
  return {
    wavelength_range: { start_nm: device.sweep.startNm, stop_nm: device.sweep.stopNm },
    speed: device.sweep.speedNmPerS,
    power: device.sweep.powerDbm,
  };
}
