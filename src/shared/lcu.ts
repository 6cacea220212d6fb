/** Game-flow phase as reported by the local client, e.g. "Lobby" or "InProgress" */
export type GameflowPhase = string;

export interface SummonerIdentity {
  name: string;
  tag: string;
}

/** Immutable view of the local client session, replaced as a whole on every update */
export interface SessionState {
  /** True once the local endpoint has completed its handshake */
  ready: boolean;
  phase: GameflowPhase | null;
  identity: SummonerIdentity | null;
  /** Upper-case region code */
  region: string | null;
}

export const EMPTY_SESSION_STATE: SessionState = Object.freeze({
  ready: false,
  phase: null,
  identity: null,
  region: null,
});

export function formatIdentity(identity: SummonerIdentity): string {
  return `${identity.name}#${identity.tag}`;
}

export type LcuEventType = "CREATE" | "UPDATE" | "DELETE";

export const LCU_EVENT_TYPES: readonly LcuEventType[] = ["CREATE", "UPDATE", "DELETE"];

export function isLcuEventType(value: unknown): value is LcuEventType {
  return value === "CREATE" || value === "UPDATE" || value === "DELETE";
}

/** Push event decoded from an OnJsonApiEvent frame */
export interface LcuEvent {
  uri: string;
  eventType: LcuEventType;
  data: unknown;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface LcuResponse {
  status: number;
  /** Parsed JSON, the raw text when the body is not JSON, or null when empty */
  body: unknown;
}

export interface LcuCredentials {
  port: number;
  password: string;
  protocol: "https";
  pid?: number;
}

/** Lobby target issued by the backend's joinmatch call */
export interface JoinRequest {
  targetName: string;
  targetTag: string;
  credential: string;
}

export interface LobbyDescriptor {
  id: string;
  ownerDisplayName: string;
}

export type LobbyMatchRule = "exact" | "prefix";

export interface JoinOutcome {
  /** Display identity of the lobby owner, "Name#Tag" */
  target: string;
  lobbyId: string;
  matchedBy: LobbyMatchRule;
}

export const LCU_PATHS = {
  gameflowPhase: "/lol-gameflow/v1/gameflow-phase",
  currentSummoner: "/lol-summoner/v1/current-summoner",
  regionLocale: "/riotclient/region-locale",
  customLobbies: "/lol-lobby/v2/lobby/custom/available",
  customLobbyJoin: (id: string): string => `/lol-lobby/v2/lobby/custom/${encodeURIComponent(id)}/join`,
} as const;

export type DiscordPresencePayload =
  | { type: "idle" }
  | {
      type: "session";
      phase: GameflowPhase | null;
      identity: SummonerIdentity | null;
      region: string | null;
      startTimestamp?: number;
    };
