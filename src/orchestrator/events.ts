import { EventEmitter } from 'events';
import type { Trigger } from './transitions';
import type { RunState } from './states';

export interface StateChangeEvent {
  from: RunState;
  to: RunState;
  trigger: Trigger;
  runId: string;
  timestamp: string;
}

/** A trigger the table has no entry for; the state is left as `state` */
export interface RejectedTriggerEvent {
  state: RunState;
  trigger: Trigger;
  runId: string;
  reason: string;
}

export class RunStateEvents extends EventEmitter {
  emitTransition(event: StateChangeEvent): void {
    this.emit('transition', event);
  }

  emitRejected(event: RejectedTriggerEvent): void {
    this.emit('rejected', event);
  }

  onTransition(listener: (event: StateChangeEvent) => void): this {
    return this.on('transition', listener);
  }

  onRejected(listener: (event: RejectedTriggerEvent) => void): this {
    return this.on('rejected', listener);
  }
}
