/**
 * Batch Pusher State Machine
 *
 * draining ──(item / timeout)──▶ pushing ──▶ draining
 *    │                              │
 *    │ stop sentinel / drained      ├── opportunistic failure ──▶ draining
 *    ▼                              └── mandatory failure ──────▶ failed
 * draining-final ──▶ pushing ──▶ completed
 */

export type PusherState =
  | 'idle'
  | 'draining'
  | 'pushing'
  | 'draining-final'
  | 'completed'
  | 'failed';

// ========== Transition Table ==========

const PUSHER_TRANSITIONS: Record<PusherState, PusherState[]> = {
  idle: ['draining'],
  draining: ['pushing', 'draining-final', 'failed'],
  pushing: ['draining', 'draining-final', 'failed'],
  'draining-final': ['pushing', 'completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalPusherState(state: PusherState): boolean {
  return PUSHER_TRANSITIONS[state].length === 0;
}

export function isValidPusherTransition(from: PusherState, to: PusherState): boolean {
  return PUSHER_TRANSITIONS[from].includes(to);
}

// ========== Events ==========

export type PusherEvent =
  | { type: 'START' }
  | { type: 'PUSH_BEGIN'; mandatory: boolean }
  | { type: 'PUSH_SUCCEEDED' }
  | { type: 'PUSH_SKIPPED' }
  | { type: 'PUSH_FAILED'; error: Error }
  | { type: 'STAGE_FAILED'; error: Error }
  | { type: 'INPUT_EXHAUSTED' }
  | { type: 'FINISH' };

export interface PusherTransitionResult {
  success: boolean;
  newState: PusherState;
  error?: string;
}

// ========== State Machine ==========

export class PusherStateMachine {
  private state: PusherState = 'idle';
  /** State to return to once the current push settles */
  private resumeState: 'draining' | 'draining-final' = 'draining';
  private mandatory = true;

  getState(): PusherState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalPusherState(this.state);
  }

  transition(event: PusherEvent): PusherTransitionResult {
    const targetState = this.getTargetState(event);

    if (!targetState) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid event ${event.type} for state ${this.state}`,
      };
    }

    if (!isValidPusherTransition(this.state, targetState)) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid transition from ${this.state} to ${targetState}`,
      };
    }

    if (targetState === 'pushing' && (this.state === 'draining' || this.state === 'draining-final')) {
      this.resumeState = this.state;
    }
    if (event.type === 'PUSH_BEGIN') {
      this.mandatory = event.mandatory;
    }
    this.state = targetState;
    return { success: true, newState: this.state };
  }

  private getTargetState(event: PusherEvent): PusherState | null {
    switch (event.type) {
      case 'START':
        return this.state === 'idle' ? 'draining' : null;

      case 'PUSH_BEGIN':
        return this.state === 'draining' || this.state === 'draining-final' ? 'pushing' : null;

      case 'PUSH_SUCCEEDED':
        return this.state === 'pushing' ? this.resumeState : null;

      case 'PUSH_SKIPPED':
        // Only opportunistic pushes may be skipped; they start from draining
        return this.state === 'pushing' && !this.mandatory ? this.resumeState : null;

      case 'PUSH_FAILED':
        return this.state === 'pushing' ? 'failed' : null;

      case 'STAGE_FAILED':
        return this.state === 'draining' ? 'failed' : null;

      case 'INPUT_EXHAUSTED':
        return this.state === 'draining' ? 'draining-final' : null;

      case 'FINISH':
        return this.state === 'draining-final' ? 'completed' : null;

      default:
        return null;
    }
  }
}
