/**
 * Unit tests for the session snapshot store.
 *
 * Run: npx tsx tests/session-state.test.ts
 */

import { EMPTY_SESSION_STATE, type SessionState } from "@shared/lcu";

import { SessionStore } from "../src/main/lcu/sessionState";

import { assert, runTests } from "./harness";

runTests("Session store", () => {
  console.log("Snapshots:");
  {
    const store = new SessionStore();
    assert(store.snapshot() === EMPTY_SESSION_STATE, "starts empty");
    assert(!store.snapshot().ready, "starts not ready");

    const before = store.snapshot();
    const next = store.update(() => ({ ready: true, phase: "Lobby", identity: { name: "Ahri", tag: "EUW1" }, region: "EUW" }));
    assert(store.snapshot() === next, "update replaces the snapshot");
    assert(before.phase === null, "earlier snapshot is untouched");
    assert(Object.isFrozen(next), "snapshot is frozen");
    assert(next.identity !== null && Object.isFrozen(next.identity), "identity is frozen");

    const phased = store.update((state) => ({ ...state, phase: "ChampSelect" }));
    assert(phased.identity?.name === "Ahri" && phased.region === "EUW", "partial update keeps other fields");
  }

  console.log("\nListeners:");
  {
    const store = new SessionStore();
    const seen: Array<[SessionState, SessionState]> = [];
    const unsubscribe = store.subscribe((next, previous) => seen.push([next, previous]));

    store.update((state) => ({ ...state, ready: true }));
    assert(seen.length === 1, "listener called once per update");
    assert(seen[0][0].ready && !seen[0][1].ready, "listener receives next and previous");

    store.subscribe(() => {
      throw new Error("listener boom");
    });
    store.update((state) => ({ ...state, phase: "Lobby" }));
    assert(seen.length === 2, "a throwing listener does not block the others");

    unsubscribe();
    store.reset();
    assert(seen.length === 2, "unsubscribed listener is not called");
    assert(store.snapshot().ready === false && store.snapshot().phase === null, "reset clears the state");
  }
});
