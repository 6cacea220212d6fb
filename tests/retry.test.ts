/**
 * Unit tests for the connect retry state machine.
 *
 * Run: npx tsx tests/retry.test.ts
 */

import {
  DEFAULT_RETRY_POLICY,
  IDLE_RETRY_STATE,
  isCycleActive,
  nextRetryState,
  type RetryEvent,
  type RetryPolicy,
  type RetryState,
} from "../src/main/lcu/retry";

import { assert, runTests } from "./harness";

function drive(events: RetryEvent["type"][], policy: RetryPolicy, from: RetryState = IDLE_RETRY_STATE): RetryState {
  return events.reduce<RetryState>((state, type) => nextRetryState(state, { type }, policy), from);
}

runTests("Retry state machine", () => {
  console.log("Defaults:");
  {
    assert(DEFAULT_RETRY_POLICY.maxAttempts === 30, "30 attempts per cycle");
    assert(DEFAULT_RETRY_POLICY.delayMs === 10_000, "10 second delay");
  }

  const policy: RetryPolicy = { maxAttempts: 3, delayMs: 500 };

  console.log("\nHappy path:");
  {
    const started = drive(["start"], policy);
    assert(started.kind === "attempting" && started.attempt === 1, "start begins attempt 1");
    const succeeded = drive(["start", "success"], policy);
    assert(succeeded.kind === "succeeded" && succeeded.attempt === 1, "success records the attempt");
    assert(!isCycleActive(succeeded), "succeeded cycle is not active");
  }

  console.log("\nFailures and timers:");
  {
    const waiting = drive(["start", "failure"], policy);
    assert(waiting.kind === "waiting" && waiting.attempt === 1 && waiting.delayMs === 500, "failure waits with the policy delay");
    assert(isCycleActive(waiting), "waiting cycle is active");

    const second = drive(["start", "failure", "timer"], policy);
    assert(second.kind === "attempting" && second.attempt === 2, "timer starts the next attempt");

    const exhausted = drive(["start", "failure", "timer", "failure", "timer", "failure"], policy);
    assert(exhausted.kind === "exhausted" && exhausted.attempts === 3, "third failure exhausts a 3-attempt policy");

    const afterSuccess = drive(["start", "failure", "timer", "success"], policy);
    assert(afterSuccess.kind === "succeeded" && afterSuccess.attempt === 2, "success on a retry keeps its attempt number");
  }

  console.log("\nIgnored events:");
  {
    const waiting = drive(["start", "failure"], policy);
    assert(nextRetryState(waiting, { type: "start" }, policy) === waiting, "start during a cycle keeps it");
    assert(nextRetryState(waiting, { type: "success" }, policy) === waiting, "success while waiting is ignored");
    assert(nextRetryState(waiting, { type: "failure" }, policy) === waiting, "failure while waiting is ignored");
    assert(nextRetryState(IDLE_RETRY_STATE, { type: "timer" }, policy) === IDLE_RETRY_STATE, "timer while idle is ignored");

    const exhausted = drive(["start", "failure", "timer", "failure", "timer", "failure"], policy);
    const restarted = nextRetryState(exhausted, { type: "start" }, policy);
    assert(restarted.kind === "attempting" && restarted.attempt === 1, "start after exhaustion begins a new cycle");
    assert(nextRetryState(waiting, { type: "reset" }, policy).kind === "idle", "reset returns to idle");
  }

  console.log("\nSingle-attempt policy:");
  {
    const state = drive(["start", "failure"], { maxAttempts: 1, delayMs: 0 });
    assert(state.kind === "exhausted" && state.attempts === 1, "one failure exhausts");
  }
});
