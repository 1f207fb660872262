import type { ReceiverState } from '../../shared/types/transfer';

const TRANSITIONS: Record<ReceiverState, readonly ReceiverState[]> = {
  IDLE: ['AWAITING_NAME_LEN', 'FAILED'],
  AWAITING_NAME_LEN: ['AWAITING_NAME', 'FAILED'],
  AWAITING_NAME: ['AWAITING_SIZE', 'FAILED'],
  AWAITING_SIZE: ['RECEIVING_PAYLOAD', 'FAILED'],
  RECEIVING_PAYLOAD: ['COMPLETE', 'FAILED'],
  COMPLETE: [],
  FAILED: [],
};

/**
 * Per-connection receiver lifecycle:
 * IDLE → AWAITING_NAME_LEN → AWAITING_NAME → AWAITING_SIZE → RECEIVING_PAYLOAD → COMPLETE,
 * with FAILED reachable from every non-terminal state.
 */
export class ConnectionLifecycle {
  private current: ReceiverState = 'IDLE';
  private readonly visited: ReceiverState[] = ['IDLE'];

  get state(): ReceiverState {
    return this.current;
  }

  get history(): readonly ReceiverState[] {
    return this.visited;
  }

  get terminal(): boolean {
    return this.current === 'COMPLETE' || this.current === 'FAILED';
  }

  transition(next: ReceiverState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal receiver transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.visited.push(next);
  }

  /** Moves to FAILED and returns the state the failure happened in. */
  fail(): ReceiverState {
    const failedIn = this.current;
    if (!this.terminal) {
      this.transition('FAILED');
    }
    return failedIn;
  }
}
