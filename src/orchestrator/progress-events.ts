import type { HardwareErrorKind } from '../hardware/errors';
import type { TraceSummary } from '../hardware/trace';
import { nowIso } from '../utils/time';

/** Discrete steps of the measurement workflow, as named in error reports */
export type StepOperation = 'connect' | 'calibration' | 'move' | 'alignment' | 'power' | 'configure' | 'sweep' | 'trace';

export type RunFailureCode = 'CALIBRATION_FAILED' | 'ANALYZER_FAULT' | 'VALIDATION_ERROR' | 'INVARIANT_VIOLATION' | 'INTERNAL_ERROR';

export type DeviceStatus = 'pending' | 'measured' | 'failed';

export interface DeviceOutcome {
  readonly index: number;
  readonly name: string;
  readonly status: DeviceStatus;
  readonly error?: string;
  readonly powerDbm?: number;
  readonly traceSummary?: TraceSummary;
}

export interface RunSummary {
  readonly totalDevices: number;
  readonly measured: number;
  readonly failed: number;
  readonly devices: readonly DeviceOutcome[];
  /** ISO timestamps; absent until the run has started */
  readonly startedAt?: string;
  readonly completedAt?: string;
  readonly durationMs?: number;
}

/** Where a live run is: the device being measured and its current step */
export interface RunProgress {
  readonly currentDeviceIndex?: number;
  readonly currentOperation?: StepOperation;
}

interface EventBase<T extends string> {
  readonly type: T;
  readonly runId: string;
  readonly timestamp: string;
}

export interface RunStartedEvent extends EventBase<'run_started'> {
  readonly totalDevices: number;
  readonly runName?: string;
}

export interface DeviceStartedEvent extends EventBase<'device_started'> {
  readonly deviceIndex: number;
  readonly deviceName: string;
}

export interface AlignmentProgressEvent extends EventBase<'alignment_progress'> {
  readonly deviceIndex: number;
  readonly operation: 'move' | 'alignment' | 'sweep';
  /** Instrument-reported phase, or the operation name when none is reported */
  readonly phase: string;
  readonly percent: number;
}

export interface MeasurementCompletedEvent extends EventBase<'measurement_completed'> {
  readonly deviceIndex: number;
  readonly deviceName: string;
  readonly powerDbm: number;
  readonly traceSummary: TraceSummary;
}

export interface ErrorOccurredEvent extends EventBase<'error_occurred'> {
  /** `null` for failures outside any device, e.g. during calibration */
  readonly deviceIndex: number | null;
  readonly operation: StepOperation;
  readonly reason: string;
  readonly kind: HardwareErrorKind;
}

export interface RunPausedEvent extends EventBase<'run_paused'> {
  readonly deviceIndex: number;
}

export interface RunResumedEvent extends EventBase<'run_resumed'> {
  readonly deviceIndex: number;
}

export interface RunCompletedEvent extends EventBase<'run_completed'> {
  readonly summary: RunSummary;
}

export interface RunCancelledEvent extends EventBase<'run_cancelled'> {
  readonly summary: RunSummary;
}

export interface RunFailedEvent extends EventBase<'run_failed'> {
  readonly reason: string;
  readonly code: RunFailureCode;
  readonly summary: RunSummary;
}

export type ProgressEvent =
  | RunStartedEvent
  | DeviceStartedEvent
  | AlignmentProgressEvent
  | MeasurementCompletedEvent
  | ErrorOccurredEvent
  | RunPausedEvent
  | RunResumedEvent
  | RunCompletedEvent
  | RunCancelledEvent
  | RunFailedEvent;

export type ProgressEventType = ProgressEvent['type'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type ProgressEventInput = DistributiveOmit<ProgressEvent, 'timestamp'>;

/** Stamp and freeze an event at the moment it is emitted */
export function createProgressEvent(input: ProgressEventInput): ProgressEvent {
  const event: ProgressEvent = { ...input, timestamp: nowIso() };
  return Object.freeze(event);
}

export function isFailureEvent(event: ProgressEvent): event is ErrorOccurredEvent | RunFailedEvent {
  return event.type === 'error_occurred' || event.type === 'run_failed';
}
