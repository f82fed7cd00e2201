/**
 * Per-shard upload state machine.
 *
 * States:
 * - pending: planned, not started
 * - assembling: reading and encoding the shard's records
 * - transmitting: handed to the store, waiting for a verified receipt
 * - committed: receipt verified and recorded in the manifest (terminal)
 * - failed: the last attempt failed; a retry re-enters assembling, or
 *   transmitting when the encoded payload is still held
 */

export type ShardState =
  | "pending"
  | "assembling"
  | "transmitting"
  | "committed"
  | "failed";

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<ShardState, ReadonlySet<ShardState>> = {
  pending: new Set(["assembling"]),
  assembling: new Set(["transmitting", "failed"]),
  transmitting: new Set(["committed", "failed"]),
  committed: new Set(),
  failed: new Set(["assembling", "transmitting"]),
};

export interface ShardTransitionEvent {
  shardIndex: number;
  from: ShardState;
  to: ShardState;
  attempt: number;
  timestamp: Date;
  reason?: string;
}

export type ShardTransitionListener = (event: ShardTransitionEvent) => void;

export class ShardStateMachine {
  private state: ShardState = "pending";
  private attempts = 0;
  private listeners: ShardTransitionListener[] = [];

  constructor(readonly shardIndex: number) {}

  /** Get the current state. */
  getState(): ShardState {
    return this.state;
  }

  /** Attempts started so far; each entry into assembling or a retry counts one. */
  getAttempts(): number {
    return this.attempts;
  }

  /** Check whether a transition to the target state is valid. */
  canTransition(to: ShardState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /**
   * Transition to a new state.
   * Throws if the transition is not valid.
   */
  transition(to: ShardState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(
        `Invalid shard ${this.shardIndex} transition: ${this.state} -> ${to}`,
      );
    }

    if (this.state === "pending" || this.state === "failed") {
      this.attempts += 1;
    }

    const event: ShardTransitionEvent = {
      shardIndex: this.shardIndex,
      from: this.state,
      to,
      attempt: this.attempts,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Register a listener for state changes. Returns an unsubscribe function. */
  onStateChange(listener: ShardTransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
