/**
 * Unit tests for the handshake and the session event handlers.
 *
 * Run: npx tsx tests/handlers.test.ts
 */

import {
  createPhaseHandler,
  createSessionRegistry,
  createSummonerHandler,
  fetchRegion,
  normalizeRegion,
  runHandshake,
} from "../src/main/lcu/handlers";
import { SessionStore } from "../src/main/lcu/sessionState";

import { FakeLcuHandle, readyClient } from "./fakes";
import { assert, runTests } from "./harness";

const PHASE = "/lol-gameflow/v1/gameflow-phase";
const SUMMONER = "/lol-summoner/v1/current-summoner";
const REGION = "/riotclient/region-locale";

runTests("Session handlers", async () => {
  console.log("Region normalisation:");
  {
    assert(normalizeRegion(" euw ") === "EUW", "trims and upper-cases");
    assert(normalizeRegion("") === null, "empty becomes null");
    assert(normalizeRegion(42) === null, "non-strings become null");

    const failing = new FakeLcuHandle().route("GET", REGION, new Error("socket hang up"));
    assert((await fetchRegion(failing)) === undefined, "transport failure reads as unknown");
    const notFound = new FakeLcuHandle();
    assert((await fetchRegion(notFound)) === undefined, "non-200 reads as unknown");
  }

  console.log("\nHandshake:");
  {
    const store = new SessionStore();
    const handle = readyClient({ phase: "Lobby", name: "Ahri", tag: "EUW1", region: "euw" });
    const updates: number[] = [];
    store.subscribe(() => updates.push(1));

    await runHandshake(handle, store);
    const state = store.snapshot();
    assert(state.ready, "ready after handshake");
    assert(state.phase === "Lobby", "phase read");
    assert(state.identity?.name === "Ahri" && state.identity.tag === "EUW1", "identity read");
    assert(state.region === "EUW", "region normalised");
    assert(updates.length === 1, "all fields committed in one update");
    assert(
      handle.requests.map((request) => request.path).join(",") === `${PHASE},${SUMMONER},${REGION}`,
      "reads phase, then summoner, then region",
    );
  }

  {
    const store = new SessionStore();
    const handle = new FakeLcuHandle()
      .route("GET", PHASE, new Error("phase boom"))
      .route("GET", SUMMONER, { status: 200, body: { gameName: "Ahri", tagLine: "" } })
      .route("GET", REGION, { status: 500, body: null });
    await runHandshake(handle, store);
    const state = store.snapshot();
    assert(state.ready, "ready even when every read fails");
    assert(state.phase === null, "failed phase read is null");
    assert(state.identity === null, "incomplete identity is null");
    assert(state.region === null, "failed region read is null");
  }

  {
    const store = new SessionStore();
    const handle = readyClient();
    handle.route("GET", REGION, () => {
      handle.drop("gone");
      return { status: 200, body: { region: "na" } };
    });
    await runHandshake(handle, store);
    assert(!store.snapshot().ready, "handshake on a dropped handle writes nothing");
  }

  console.log("\nPhase handler:");
  {
    const store = new SessionStore();
    const handler = createPhaseHandler(store);
    const handle = new FakeLcuHandle().route("GET", PHASE, { status: 200, body: "ChampSelect" });

    await handler(handle, { uri: PHASE, eventType: "UPDATE", data: "Lobby" });
    assert(store.snapshot().phase === "Lobby", "string payload is used directly");
    assert(handle.requests.length === 0, "no re-fetch for a string payload");

    await handler(handle, { uri: PHASE, eventType: "UPDATE", data: { unexpected: true } });
    assert(store.snapshot().phase === "ChampSelect", "non-string payload triggers a re-fetch");

    const broken = new FakeLcuHandle().route("GET", PHASE, new Error("down"));
    await handler(broken, { uri: PHASE, eventType: "DELETE", data: null });
    assert(store.snapshot().phase === null, "failed re-fetch clears the phase");

    const dropped = new FakeLcuHandle();
    dropped.drop();
    await handler(dropped, { uri: PHASE, eventType: "UPDATE", data: "InProgress" });
    assert(store.snapshot().phase === null, "closed handle writes nothing");
  }

  console.log("\nSummoner handler:");
  {
    const store = new SessionStore();
    store.update((state) => ({ ...state, ready: true, region: "EUW" }));
    const handler = createSummonerHandler(store);

    const ignored = readyClient();
    await handler(ignored, { uri: SUMMONER, eventType: "UPDATE", data: null });
    assert(ignored.requests.length === 0, "null payload is ignored");

    const direct = readyClient({ region: "kr" });
    await handler(direct, { uri: SUMMONER, eventType: "UPDATE", data: { gameName: "Faker", tagLine: "KR1" } });
    assert(store.snapshot().identity?.name === "Faker", "complete payload is used directly");
    assert(direct.requestsTo(SUMMONER).length === 0, "no summoner re-fetch for a complete payload");
    assert(store.snapshot().region === "KR", "region refreshed");

    const refetch = readyClient({ name: "Lux", tag: "NA1", region: "na" });
    await handler(refetch, { uri: SUMMONER, eventType: "CREATE", data: { gameName: "Lux" } });
    assert(store.snapshot().identity?.tag === "NA1", "incomplete payload falls back to a re-fetch");

    const noRegion = readyClient({ name: "Zed", tag: "EUNE" }).route("GET", REGION, { status: 503, body: null });
    await handler(noRegion, { uri: SUMMONER, eventType: "UPDATE", data: { gameName: "Zed", tagLine: "EUNE" } });
    assert(store.snapshot().region === "NA", "unknown region keeps the previous value");
    assert(store.snapshot().ready, "ready is untouched");
  }

  console.log("\nSummoner updates are atomic:");
  {
    const store = new SessionStore();
    store.update((state) => ({ ...state, ready: true, identity: { name: "Old", tag: "T1" }, region: "EUW" }));
    const handler = createSummonerHandler(store);
    const published: string[] = [];
    store.subscribe((next) => published.push(`${next.identity?.name}/${next.region}`));

    const seenMidway: string[] = [];
    const slow = readyClient().route("GET", REGION, () => {
      const current = store.snapshot();
      seenMidway.push(`${current.identity?.name}/${current.region}`);
      return { status: 200, body: { region: "kr" } };
    });
    await handler(slow, { uri: SUMMONER, eventType: "UPDATE", data: { gameName: "New", tagLine: "KR1" } });
    assert(seenMidway.join(",") === "Old/EUW", "readers see the old identity and region together mid-update");
    assert(published.join(",") === "New/KR", "identity and region published in one update");

    const dropping = readyClient();
    dropping.route("GET", REGION, () => {
      dropping.drop();
      return { status: 200, body: { region: "na" } };
    });
    await handler(dropping, { uri: SUMMONER, eventType: "UPDATE", data: { gameName: "Lux", tagLine: "NA1" } });
    const after = store.snapshot();
    assert(after.identity?.name === "New" && after.region === "KR", "drop mid-handler writes nothing");
    assert(published.length === 1, "no update published after the drop");
  }

  console.log("\nRegistry wiring:");
  {
    const registry = createSessionRegistry(new SessionStore());
    assert(registry.isFrozen, "session registry is frozen");
    assert(registry.resolve({ uri: SUMMONER, eventType: "UPDATE", data: {} })[0]?.name === "current-summoner", "summoner updates routed");
    assert(registry.resolve({ uri: SUMMONER, eventType: "DELETE", data: null }).length === 0, "summoner deletes ignored");
    assert(registry.resolve({ uri: PHASE, eventType: "DELETE", data: null })[0]?.name === "gameflow-phase", "phase events routed");
  }
});
