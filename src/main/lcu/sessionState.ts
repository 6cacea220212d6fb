import { EMPTY_SESSION_STATE, type SessionState } from "@shared/lcu";

export type SessionMutator = (state: SessionState) => SessionState;
export type SessionListener = (next: SessionState, previous: SessionState) => void;

function freezeState(state: SessionState): SessionState {
  return Object.freeze({
    ready: state.ready,
    phase: state.phase,
    identity: state.identity ? Object.freeze({ ...state.identity }) : null,
    region: state.region,
  });
}

/**
 * Single owner of the session snapshot. Writers hand in a whole new state,
 * so a reader can never observe one field of an update without the others.
 */
export class SessionStore {
  private current: SessionState = EMPTY_SESSION_STATE;
  private listeners = new Set<SessionListener>();

  snapshot(): SessionState {
    return this.current;
  }

  /** Only called from the connection context (handlers, handshake, reset) */
  update(mutator: SessionMutator): SessionState {
    const previous = this.current;
    const next = freezeState(mutator(previous));
    this.current = next;
    this.notify(next, previous);
    return next;
  }

  reset(): SessionState {
    return this.update(() => EMPTY_SESSION_STATE);
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify(next: SessionState, previous: SessionState): void {
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        console.warn("[Session] Listener failed:", error instanceof Error ? error.message : error);
      }
    }
  }
}
