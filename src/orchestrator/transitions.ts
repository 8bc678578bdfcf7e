import type { RunState } from './states';

export type Trigger = 'START_MEASUREMENT' | 'CALIBRATION_COMPLETE' | 'PAUSE' | 'RESUME' | 'COMPLETE' | 'CANCEL' | 'FAIL';

export const transitions: Record<RunState, Partial<Record<Trigger, RunState>>> = {
  IDLE: { START_MEASUREMENT: 'CALIBRATING' },
  CALIBRATING: { CALIBRATION_COMPLETE: 'RUNNING', CANCEL: 'CANCELLED', FAIL: 'FAILED' },
  RUNNING: { PAUSE: 'PAUSED', COMPLETE: 'COMPLETED', CANCEL: 'CANCELLED', FAIL: 'FAILED' },
  PAUSED: { RESUME: 'RUNNING', CANCEL: 'CANCELLED' },
  COMPLETED: {},
  FAILED: {},
  CANCELLED: {},
};
