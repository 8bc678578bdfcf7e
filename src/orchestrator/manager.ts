import crypto from 'crypto';
import { err, ok } from '../core/result';
import type { Result } from '../core/result';
import type { RunConfig } from '../config/run-config';
import { AnalyzerClient } from '../hardware/analyzer-client';
import { StageClient } from '../hardware/stage-client';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { Broadcaster } from './broadcaster';
import type { SubscriberQueue } from './broadcaster';
import { MeasurementController } from './measurement-controller';
import type { MeasurementClients } from './measurement-controller';
import { isFailureEvent } from './progress-events';
import type { ProgressEvent, RunProgress, RunSummary } from './progress-events';
import { RunSignals } from './signals';
import { transition } from './state-machine';
import { isTerminalState } from './states';
import type { RunState } from './states';

export type ClientFactory = (config: RunConfig, logger: Logger) => MeasurementClients;

/** Builds HTTP clients for the instrument endpoints named in the run config */
export const createHardwareClients: ClientFactory = (config, logger) => ({
  stage: new StageClient({ baseUrl: config.stage.baseUrl, timeoutMs: config.stage.requestTimeoutMs }, logger),
  analyzer: new AnalyzerClient({ baseUrl: config.analyzer.baseUrl, timeoutMs: config.analyzer.requestTimeoutMs }, logger),
});

export interface MeasurementManagerOptions {
  clientFactory?: ClientFactory;
  logger?: Logger;
  /** How long a finished run stays queryable if nobody reads its status (default: 600000) */
  retentionMs?: number;
  /** Per-subscriber event buffer; the oldest event is dropped when full (default: 256) */
  subscriberBufferSize?: number;
  idFactory?: () => string;
}

export interface RunOutcome {
  runId: string;
  finalState: RunState;
  summary: RunSummary;
}

export interface RunHandle {
  runId: string;
  /** Settles once the run reaches a terminal state and its clients are released */
  done: Promise<RunOutcome>;
}

export interface RunStatusSnapshot extends RunProgress {
  runId?: string;
  state: RunState;
  lastEvent?: ProgressEvent;
  /** Reason carried by the latest ErrorOccurred or RunFailed event */
  lastError?: string;
  summary?: RunSummary;
}

interface ActiveRun {
  runId: string;
  controller: MeasurementController;
  signals: RunSignals;
  lastEvent?: ProgressEvent;
  lastError?: string;
  finished: boolean;
  retention?: NodeJS.Timeout;
  done?: Promise<RunOutcome>;
}

/**
 * MeasurementManager supervises at most one run per process.
 *
 * Responsibilities:
 *  - Starts the controller as a background task and pumps its events
 *  - Translates control requests into the shared run signals
 *  - Keeps a status snapshot readable without waiting on the run
 *  - Broadcasts every event to the subscribers attached at the time
 */
export class MeasurementManager {
  private current: ActiveRun | undefined;
  private broadcaster: Broadcaster<ProgressEvent>;
  private clientFactory: ClientFactory;
  private logger: Logger;
  private retentionMs: number;
  private idFactory: () => string;

  constructor(options: MeasurementManagerOptions = {}) {
    this.clientFactory = options.clientFactory ?? createHardwareClients;
    this.logger = options.logger ?? silentLogger;
    this.retentionMs = options.retentionMs ?? 600_000;
    this.idFactory = options.idFactory ?? (() => crypto.randomUUID());
    this.broadcaster = new Broadcaster(options.subscriberBufferSize ?? 256, this.logger);
  }

  // ── Control ─────────────────────────────────────────────────────────

  start(config: RunConfig): Result<RunHandle> {
    if (this.current && !this.current.finished) {
      return err(`run ${this.current.runId} is already active`);
    }
    if (this.current) this.release(this.current);

    const runId = this.idFactory();
    const signals = new RunSignals();
    const runLogger = this.logger.child?.(runId) ?? this.logger;
    const controller = new MeasurementController({
      runId,
      config,
      clients: this.clientFactory(config, runLogger),
      signals,
      logger: runLogger,
    });

    const run: ActiveRun = { runId, controller, signals, finished: false };
    this.current = run;
    const done = this.pump(run);
    run.done = done;

    this.logger.info('Run accepted', { runId, devices: config.devices.length });
    return ok({ runId, done });
  }

  pause(): Result<void> {
    const run = this.liveRun();
    if (!run.ok) return run;

    const legal = transition(this.effectiveState(run.value), 'PAUSE');
    if (!legal.ok) return legal;

    run.value.signals.requestPause();
    this.logger.info('Pause requested', { runId: run.value.runId });
    return ok(undefined);
  }

  /** Also withdraws a pause that no checkpoint has acted on yet */
  resume(): Result<void> {
    const run = this.liveRun();
    if (!run.ok) return run;

    const legal = transition(this.effectiveState(run.value), 'RESUME');
    if (!legal.ok) return legal;

    run.value.signals.clearPause();
    this.logger.info('Resume requested', { runId: run.value.runId });
    return ok(undefined);
  }

  cancel(): Result<void> {
    const run = this.liveRun();
    if (!run.ok) return run;
    if (run.value.signals.cancelRequested) {
      return err(`cancel already requested for run ${run.value.runId}`);
    }

    const legal = transition(this.effectiveState(run.value), 'CANCEL');
    if (!legal.ok) return legal;

    run.value.signals.requestCancel();
    this.logger.info('Cancel requested', { runId: run.value.runId });
    return ok(undefined);
  }

  // ── Observation ─────────────────────────────────────────────────────

  /**
   * Current state plus the latest event. Once a finished run's terminal
   * snapshot has been returned, the run is released.
   */
  status(): RunStatusSnapshot {
    const run = this.current;
    if (!run) return { state: 'IDLE' };

    const state = run.controller.getState();
    const snapshot: RunStatusSnapshot = {
      runId: run.runId,
      state,
      ...run.controller.getProgress(),
      lastEvent: run.lastEvent,
      lastError: run.lastError,
      summary: run.controller.getSummary(),
    };

    if (run.finished && isTerminalState(state)) {
      this.release(run);
    }
    return snapshot;
  }

  subscribe(): SubscriberQueue<ProgressEvent> {
    return this.broadcaster.subscribe();
  }

  get subscriberCount(): number {
    return this.broadcaster.size;
  }

  /** Cancel any live run, wait for it to settle, then end every subscription */
  async shutdown(): Promise<void> {
    const run = this.current;
    if (run && !run.finished) {
      if (!run.signals.cancelRequested) run.signals.requestCancel();
      await run.done;
    }
    if (this.current) this.release(this.current);
    this.broadcaster.closeAll();
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async pump(run: ActiveRun): Promise<RunOutcome> {
    try {
      for await (const event of run.controller.run()) {
        run.lastEvent = event;
        if (isFailureEvent(event)) {
          run.lastError = event.reason;
        }
        this.broadcaster.publish(event);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      run.lastError = reason;
      this.logger.error('Run ended with an unhandled error', { runId: run.runId, error: reason });
    } finally {
      run.finished = true;
      this.scheduleRelease(run);
    }

    const outcome: RunOutcome = { runId: run.runId, finalState: run.controller.getState(), summary: run.controller.getSummary() };
    this.logger.info('Run finished', { runId: run.runId, state: outcome.finalState });
    return outcome;
  }

  private liveRun(): Result<ActiveRun> {
    if (!this.current || this.current.finished) return err('no active run');
    return ok(this.current);
  }

  /** State as it will be once pending signals reach a checkpoint */
  private effectiveState(run: ActiveRun): RunState {
    const state = run.controller.getState();
    // a started run leaves IDLE on its first step
    if (state === 'IDLE') return 'CALIBRATING';
    if (state === 'RUNNING' && run.signals.pauseRequested) return 'PAUSED';
    return state;
  }

  private scheduleRelease(run: ActiveRun): void {
    if (this.current !== run) return;
    run.retention = setTimeout(() => this.release(run), this.retentionMs);
    run.retention.unref();
  }

  private release(run: ActiveRun): void {
    if (run.retention) clearTimeout(run.retention);
    if (this.current === run) {
      this.current = undefined;
      this.logger.debug('Run released', { runId: run.runId });
    }
  }
}
