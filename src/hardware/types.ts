import type { Result } from '../core/result';
import type { HardwareError } from './errors';
import type { AlignmentParams, MoveParams, SweepConfig, SweepStartParams } from './schemas';

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

/** Snapshot of an instrument-side task, read-only for the orchestrator */
export interface HardwareTask {
  taskId: string;
  status: TaskStatus;
  progressPercent: number;
  /** Sub-phase reported by the instrument, e.g. an alignment search stage */
  phase?: string;
  resultPayload?: unknown;
  error?: string;
}

/** Identifies a submitted task together with the operation that created it */
export interface TaskHandle<Op extends string = string> {
  operation: Op;
  taskId: string;
}

export type HardwareResult<T> = Result<T, HardwareError>;

/** The subset of a client the task poller needs */
export interface TaskClient<Op extends string = string> {
  poll(handle: TaskHandle<Op>): Promise<HardwareResult<HardwareTask>>;
  cancel(handle: TaskHandle<Op>): Promise<HardwareResult<void>>;
}

/**
 * Typed client for one external instrument service. `Ops` maps each
 * asynchronous operation name to its request payload.
 */
export interface HardwareClient<Ops extends object> extends TaskClient<keyof Ops & string> {
  readonly name: string;
  connect(): Promise<HardwareResult<void>>;
  disconnect(): Promise<void>;
  submit<K extends keyof Ops & string>(operation: K, params: Ops[K]): Promise<HardwareResult<TaskHandle<K>>>;
  readScalar(path: string, field?: string): Promise<HardwareResult<number>>;
}

export interface StageOperations {
  move: MoveParams;
  alignment: AlignmentParams;
}

export interface AnalyzerOperations {
  sweep: SweepStartParams;
}

export interface Trace {
  wavelengthNm: number[];
  powerDbm: number[];
}

export interface StageController extends HardwareClient<StageOperations> {
  readPower(): Promise<HardwareResult<number>>;
}

export interface Analyzer extends HardwareClient<AnalyzerOperations> {
  configure(config: SweepConfig): Promise<HardwareResult<void>>;
  calibrate(): Promise<HardwareResult<void>>;
  readTrace(): Promise<HardwareResult<Trace>>;
}

export interface HardwareClientOptions {
  baseUrl: string;
  /** Per-request timeout in ms (default: 10000) */
  timeoutMs?: number;
}
