import { LCU_PATHS, formatIdentity, type GameflowPhase, type SummonerIdentity } from "@shared/lcu";

import type { LcuHandle } from "./connection";
import { describeError } from "./errors";
import { EventRegistry, type LcuEventHandler } from "./registry";
import type { SessionStore } from "./sessionState";

function readIdentity(data: unknown): SummonerIdentity | null {
  if (typeof data !== "object" || data === null) {
    return null;
  }
  const name = "gameName" in data ? data.gameName : undefined;
  const tag = "tagLine" in data ? data.tagLine : undefined;
  if (typeof name !== "string" || typeof tag !== "string" || !name || !tag) {
    return null;
  }
  return { name, tag };
}

export function normalizeRegion(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const region = value.trim().toUpperCase();
  return region.length > 0 ? region : null;
}

export async function fetchPhase(handle: LcuHandle): Promise<GameflowPhase | null> {
  const response = await handle.request("GET", LCU_PATHS.gameflowPhase);
  if (response.status !== 200 || typeof response.body !== "string") {
    return null;
  }
  return response.body;
}

export async function fetchIdentity(handle: LcuHandle): Promise<SummonerIdentity | null> {
  const response = await handle.request("GET", LCU_PATHS.currentSummoner);
  return response.status === 200 ? readIdentity(response.body) : null;
}

/** Resolves to undefined when the region could not be read, so callers can keep the last value */
export async function fetchRegion(handle: LcuHandle): Promise<string | null | undefined> {
  try {
    const response = await handle.request("GET", LCU_PATHS.regionLocale);
    if (response.status !== 200 || typeof response.body !== "object" || response.body === null) {
      return undefined;
    }
    return normalizeRegion("region" in response.body ? response.body.region : undefined);
  } catch (error) {
    console.warn("[Session] Error getting region data:", describeError(error));
    return undefined;
  }
}

function describeSummoner(identity: SummonerIdentity | null, region: string | null): string {
  return `${identity ? formatIdentity(identity) : "unknown"} Region: ${region ?? "unknown"}`;
}

/**
 * Initial read after connecting: phase, identity and region are collected
 * first and committed together with `ready`.
 */
export async function runHandshake(handle: LcuHandle, store: SessionStore): Promise<void> {
  let phase: GameflowPhase | null = null;
  try {
    phase = await fetchPhase(handle);
    console.log(`[Session] Initial phase: ${phase ?? "unknown"}`);
  } catch (error) {
    console.warn("[Session] Failed to get initial phase:", describeError(error));
  }

  let identity: SummonerIdentity | null = null;
  try {
    identity = await fetchIdentity(handle);
  } catch (error) {
    console.warn("[Session] Error fetching summoner info:", describeError(error));
  }

  const region = (await fetchRegion(handle)) ?? null;

  if (handle.closed) {
    return;
  }
  store.update(() => ({ ready: true, phase, identity, region }));
  console.log(`[Session] Fetched summoner info: ${describeSummoner(identity, region)}`);
}

export function createPhaseHandler(store: SessionStore): LcuEventHandler {
  return async (handle, event) => {
    let phase: GameflowPhase | null;
    if (typeof event.data === "string") {
      phase = event.data;
    } else {
      try {
        phase = await fetchPhase(handle);
      } catch (error) {
        console.warn("[Gameflow] Phase re-fetch failed:", describeError(error));
        phase = null;
      }
    }
    if (handle.closed) {
      return;
    }
    store.update((state) => ({ ...state, phase }));
    console.log(`[Gameflow] Phase changed to: ${phase ?? "unknown"}`);
  };
}

export function createSummonerHandler(store: SessionStore): LcuEventHandler {
  return async (handle, event) => {
    if (event.data === null || event.data === undefined) {
      return;
    }

    let identity = readIdentity(event.data);
    if (!identity) {
      try {
        identity = await fetchIdentity(handle);
      } catch (error) {
        console.warn("[Session] Error getting summoner data:", describeError(error));
      }
    }

    const region = await fetchRegion(handle);
    if (handle.closed) {
      return;
    }
    const next = store.update((state) => ({
      ...state,
      identity,
      region: region === undefined ? state.region : region,
    }));
    console.log(`[Session] Summoner updated: ${describeSummoner(next.identity, next.region)}`);
  };
}

/** Builds the frozen handler table for the paths the session model follows */
export function createSessionRegistry(store: SessionStore): EventRegistry {
  return new EventRegistry()
    .register(LCU_PATHS.currentSummoner, createSummonerHandler(store), {
      name: "current-summoner",
      eventTypes: ["CREATE", "UPDATE"],
    })
    .register(LCU_PATHS.gameflowPhase, createPhaseHandler(store), {
      name: "gameflow-phase",
    })
    .freeze();
}
