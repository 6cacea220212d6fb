/**
 * League of Leagues backend API.
 * Stateless GET calls with a fixed timeout; nothing here retries on its own.
 */

import type { JoinRequest } from "@shared/lcu";

import { MalformedResponseError, RemoteRequestError, describeError } from "../lcu/errors";

export const DEFAULT_API_BASE = "https://rust.gameras.gr";
export const REQUEST_TIMEOUT_MS = 10_000;

/** Body marker the backend sends with a 404 for an unknown identity */
const USER_NOT_FOUND_MARKER = "User not found";

export type AuthResult =
  | { ok: true }
  | { ok: false; reason: "not-registered"; retryable: false }
  | { ok: false; reason: "rejected"; status: number; retryable: true }
  | { ok: false; reason: "unreachable"; error: string; retryable: true };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface BackendClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

interface TextResponse {
  status: number;
  text: string;
}

/** Parses `Name#Tag,credential`: first comma, then first `#` of the left part */
export function parseJoinMatchBody(body: string): JoinRequest | null {
  const trimmed = body.trim();
  const comma = trimmed.indexOf(",");
  if (comma < 0) {
    return null;
  }
  const summoner = trimmed.slice(0, comma);
  const credential = trimmed.slice(comma + 1);
  const hash = summoner.indexOf("#");
  if (hash < 0) {
    return null;
  }
  const targetName = summoner.slice(0, hash);
  const targetTag = summoner.slice(hash + 1);
  if (!targetName || !targetTag || !credential) {
    return null;
  }
  return { targetName, targetTag, credential };
}

export class BackendClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: BackendClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get downloadUrl(): string {
    return `${this.baseUrl}/downloadclient`;
  }

  private buildUrl(path: string, params: Record<string, string> = {}): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async get(path: string, params?: Record<string, string>): Promise<TextResponse> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.buildUrl(path, params), {
        method: "GET",
        headers: { Accept: "application/json, text/plain" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
      throw new RemoteRequestError(
        path,
        timedOut ? `${path} timed out after ${this.timeoutMs}ms` : `${path} request failed: ${describeError(error)}`,
        undefined,
        { cause: error },
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new RemoteRequestError(path, `${path} body could not be read: ${describeError(error)}`, response.status, {
        cause: error,
      });
    }
    console.log(`[Backend] ${path} ${response.status}: ${text.slice(0, 200)}`);
    return { status: response.status, text };
  }

  async authenticate(identityToken: string): Promise<AuthResult> {
    let response: TextResponse;
    try {
      response = await this.get("/auth", { discord_id: identityToken });
    } catch (error) {
      console.warn("[Backend] Auth error:", describeError(error));
      return { ok: false, reason: "unreachable", error: describeError(error), retryable: true };
    }

    if (response.status === 200) {
      return { ok: true };
    }
    if (response.status === 404 && response.text.includes(USER_NOT_FOUND_MARKER)) {
      console.log("[Backend] User not registered");
      return { ok: false, reason: "not-registered", retryable: false };
    }
    return { ok: false, reason: "rejected", status: response.status, retryable: true };
  }

  /** Exchanges a one-time registration code for the identity token to store */
  async redeemCode(code: string, summonerIdentity: string): Promise<string> {
    const response = await this.get("/otp", { otp_pass: code.trim(), summonersname: summonerIdentity });
    if (response.status !== 200) {
      throw new RemoteRequestError("/otp", "Invalid registration code or server error", response.status);
    }
    const token = response.text.trim();
    if (!token) {
      throw new MalformedResponseError("/otp", response.text);
    }
    return token;
  }

  async fetchLatestVersion(): Promise<string> {
    const response = await this.get("/client_version");
    if (response.status !== 200) {
      throw new RemoteRequestError(
        "/client_version",
        `Failed to check for updates. Server returned error: ${response.status}`,
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.text);
    } catch {
      throw new MalformedResponseError("/client_version", response.text);
    }
    if (typeof payload !== "object" || payload === null || !("version" in payload)) {
      throw new MalformedResponseError("/client_version", response.text);
    }
    const { version } = payload;
    if (typeof version !== "string" && typeof version !== "number") {
      throw new MalformedResponseError("/client_version", response.text);
    }
    return String(version);
  }

  async joinMatch(password: string): Promise<JoinRequest> {
    const response = await this.get("/joinmatch", { password: password.trim() });
    if (response.status !== 200 || !response.text) {
      throw new RemoteRequestError("/joinmatch", "Failed to join: Invalid response from server", response.status);
    }
    const request = parseJoinMatchBody(response.text);
    if (!request) {
      throw new MalformedResponseError("/joinmatch", response.text);
    }
    return request;
  }
}
