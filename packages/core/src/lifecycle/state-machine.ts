/**
 * Lifecycle of one endpoint.
 *
 * States:
 * - unregistered: No configuration held for the endpoint
 * - registered: Configuration registered, no listener bound
 * - listening: At least one listener bound
 * - stopping: Listeners being shut down
 *
 * A failed start returns straight from registered to unregistered.
 */

export type EndpointState =
  | "unregistered"
  | "registered"
  | "listening"
  | "stopping";

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<EndpointState, ReadonlySet<EndpointState>> = {
  unregistered: new Set(["registered"]),
  registered: new Set(["listening", "stopping", "unregistered"]),
  listening: new Set(["stopping"]),
  stopping: new Set(["unregistered"]),
};

export interface StateTransitionEvent {
  endpointId: string;
  from: EndpointState;
  to: EndpointState;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener = (event: StateTransitionEvent) => void;

export class EndpointStateMachine {
  private state: EndpointState = "unregistered";
  private listeners: StateChangeListener[] = [];

  constructor(readonly endpointId: string) {}

  getState(): EndpointState {
    return this.state;
  }

  /** Check whether a transition to the target state is valid. */
  canTransition(to: EndpointState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /**
   * Transition to a new state.
   * Throws if the transition is not valid.
   */
  transition(to: EndpointState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(
        `Invalid state transition for ${this.endpointId}: ${this.state} -> ${to}`,
      );
    }

    const event: StateTransitionEvent = {
      endpointId: this.endpointId,
      from: this.state,
      to,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Register a listener for state changes. Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
