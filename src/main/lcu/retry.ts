export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 30,
  delayMs: 10_000,
};

/**
 * State of one connect cycle. `attempt` counts attempts started so far in the
 * cycle, so `waiting` carries the number of attempts that already failed.
 */
export type RetryState =
  | { kind: "idle" }
  | { kind: "attempting"; attempt: number }
  | { kind: "waiting"; attempt: number; delayMs: number }
  | { kind: "succeeded"; attempt: number }
  | { kind: "exhausted"; attempts: number };

export type RetryEvent =
  | { type: "start" }
  | { type: "success" }
  | { type: "failure" }
  | { type: "timer" }
  | { type: "reset" };

export const IDLE_RETRY_STATE: RetryState = { kind: "idle" };

export function nextRetryState(state: RetryState, event: RetryEvent, policy: RetryPolicy): RetryState {
  switch (event.type) {
    case "reset":
      return IDLE_RETRY_STATE;
    case "start":
      // A cycle already in flight keeps going; finished cycles restart from 1.
      if (state.kind === "attempting" || state.kind === "waiting") {
        return state;
      }
      return { kind: "attempting", attempt: 1 };
    case "success":
      return state.kind === "attempting" ? { kind: "succeeded", attempt: state.attempt } : state;
    case "failure":
      if (state.kind !== "attempting") {
        return state;
      }
      if (state.attempt >= policy.maxAttempts) {
        return { kind: "exhausted", attempts: state.attempt };
      }
      return { kind: "waiting", attempt: state.attempt, delayMs: policy.delayMs };
    case "timer":
      return state.kind === "waiting" ? { kind: "attempting", attempt: state.attempt + 1 } : state;
  }
}

export function isCycleActive(state: RetryState): boolean {
  return state.kind === "attempting" || state.kind === "waiting";
}

/** Timer seam so retry timing can be driven by hand in tests */
export interface Scheduler {
  /** Runs `callback` after `delayMs` and returns a function that cancels it */
  schedule(callback: () => void, delayMs: number): () => void;
}

export const timerScheduler: Scheduler = {
  schedule(callback, delayMs) {
    const timer = setTimeout(callback, delayMs);
    return () => clearTimeout(timer);
  },
};
