export type ActiveState = 'CALIBRATING' | 'RUNNING' | 'PAUSED';

export type TerminalState = 'COMPLETED' | 'FAILED' | 'CANCELLED';

export type RunState = 'IDLE' | ActiveState | TerminalState;

const TERMINAL_STATES: readonly RunState[] = ['COMPLETED', 'FAILED', 'CANCELLED'];

export function isTerminalState(state: RunState): state is TerminalState {
  return TERMINAL_STATES.includes(state);
}
