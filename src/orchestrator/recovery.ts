import type { HardwareError } from '../hardware/errors';
import type { RunFailureCode } from './progress-events';

/** Which instrument produced a failure */
export type HardwareSource = 'stage' | 'analyzer';

export type PolicyDecision = { action: 'skip_device' } | { action: 'cancel_run' } | { action: 'fail_run'; code: RunFailureCode };

/**
 * RecoveryPolicy decides what a failed step means for the run.
 *
 * Strategy:
 *  - A caller cancel ends the run cleanly.
 *  - A malformed request is a programming error and fails the run, whichever instrument saw it.
 *  - Stage faults (motion, alignment, power read) are local to the device: skip it.
 *  - Any other analyzer fault invalidates every later measurement: fail the run.
 */
export class RecoveryPolicy {
  decide(source: HardwareSource, error: HardwareError): PolicyDecision {
    if (error.kind === 'cancelled') return { action: 'cancel_run' };
    if (error.kind === 'validation') return { action: 'fail_run', code: 'VALIDATION_ERROR' };

    if (source === 'analyzer') {
      return { action: 'fail_run', code: 'ANALYZER_FAULT' };
    }
    return { action: 'skip_device' };
  }
}
