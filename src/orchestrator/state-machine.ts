import { err, ok } from '../core/result';
import type { Result } from '../core/result';
import { nowIso } from '../utils/time';
import type { RunState } from './states';
import { RunStateEvents } from './events';
import { transitions } from './transitions';
import type { Trigger } from './transitions';

/**
 * Pure transition function. A pair missing from the table is rejected and
 * the caller keeps its current state.
 */
export function transition(current: RunState, trigger: Trigger): Result<RunState> {
  const next = transitions[current][trigger];
  if (!next) {
    return err(`invalid transition: ${current} + ${trigger}`);
  }
  return ok(next);
}

/**
 * Holds the state of one run and routes every change through `transition`.
 * Accepted and rejected triggers are both announced on `events`.
 */
export class RunStateMachine {
  private state: RunState = 'IDLE';

  public events = new RunStateEvents();

  constructor(private runId: string) {}

  getState(): RunState {
    return this.state;
  }

  getRunId(): string {
    return this.runId;
  }

  apply(trigger: Trigger): Result<RunState> {
    const from = this.state;
    const next = transition(from, trigger);
    if (!next.ok) {
      this.events.emitRejected({ state: from, trigger, runId: this.runId, reason: next.error });
      return next;
    }

    this.state = next.value;
    this.events.emitTransition({
      from,
      to: next.value,
      trigger,
      runId: this.runId,
      timestamp: nowIso(),
    });
    return next;
  }
}
