import {
  LCU_PATHS,
  type JoinOutcome,
  type JoinRequest,
  type LobbyDescriptor,
  type LobbyMatchRule,
} from "@shared/lcu";

import type { LcuHandle } from "./connection";
import type { ActionDispatcher } from "./dispatcher";
import { JoinFailedError, LobbyNotFoundError, LocalRequestError } from "./errors";

const UNKNOWN_JOIN_ERROR = "Unknown error";

function toLobbyDescriptor(entry: unknown): LobbyDescriptor | null {
  if (typeof entry !== "object" || entry === null || !("id" in entry)) {
    return null;
  }
  const { id } = entry;
  if (typeof id !== "string" && typeof id !== "number") {
    return null;
  }
  const owner = "ownerDisplayName" in entry ? entry.ownerDisplayName : undefined;
  return {
    id: String(id),
    ownerDisplayName: typeof owner === "string" ? owner : "",
  };
}

export async function listCustomLobbies(handle: LcuHandle): Promise<LobbyDescriptor[]> {
  const response = await handle.request("GET", LCU_PATHS.customLobbies);
  if (response.status !== 200) {
    throw new LocalRequestError("GET", LCU_PATHS.customLobbies, `status ${response.status}`, response.status);
  }
  if (!Array.isArray(response.body)) {
    throw new LocalRequestError("GET", LCU_PATHS.customLobbies, "lobby list is not an array", response.status);
  }
  return response.body
    .map(toLobbyDescriptor)
    .filter((lobby): lobby is LobbyDescriptor => lobby !== null);
}

/**
 * Exact match compares against "Name #Tag" (with the space the client puts in
 * owner names); the fallback accepts any owner starting with "Name#".
 */
export function findTargetLobby(
  lobbies: readonly LobbyDescriptor[],
  request: Pick<JoinRequest, "targetName" | "targetTag">,
): { lobby: LobbyDescriptor; matchedBy: LobbyMatchRule } | null {
  const exactTarget = `${request.targetName} #${request.targetTag}`.toLowerCase();
  const exact = lobbies.find((lobby) => lobby.ownerDisplayName.toLowerCase() === exactTarget);
  if (exact) {
    return { lobby: exact, matchedBy: "exact" };
  }

  const prefix = `${request.targetName}#`.toLowerCase();
  const partial = lobbies.find((lobby) => lobby.ownerDisplayName.toLowerCase().startsWith(prefix));
  if (partial) {
    return { lobby: partial, matchedBy: "prefix" };
  }

  return null;
}

function extractErrorMessage(body: unknown): string {
  if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  return UNKNOWN_JOIN_ERROR;
}

/** Lists lobbies, picks the target's and joins it; must run inside the connection context */
export async function runJoinSequence(handle: LcuHandle, request: JoinRequest): Promise<JoinOutcome> {
  const target = `${request.targetName}#${request.targetTag}`;
  console.log(`[Lobby] Attempting to join lobby of ${target}`);

  const lobbies = await listCustomLobbies(handle);
  const match = findTargetLobby(lobbies, request);
  if (!match) {
    throw new LobbyNotFoundError(target);
  }

  const { lobby, matchedBy } = match;
  console.log(`[Lobby] Matched lobby ${lobby.id} (${matchedBy}) owned by "${lobby.ownerDisplayName}"`);

  const response = await handle.request("POST", LCU_PATHS.customLobbyJoin(lobby.id), {
    asSpectator: false,
    password: request.credential,
  });

  if (response.status !== 200) {
    throw new JoinFailedError(extractErrorMessage(response.body), response.status);
  }

  console.log(`[Lobby] Successfully joined ${target}'s lobby`);
  return { target, lobbyId: lobby.id, matchedBy };
}

/** Schedules the join sequence on the connection context and resolves in the caller's context */
export function joinLobby(dispatcher: ActionDispatcher, request: JoinRequest): Promise<JoinOutcome> {
  return dispatcher.invokeOnConnectionContext((handle) => runJoinSequence(handle, request), "join-lobby");
}
