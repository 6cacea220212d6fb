/**
 * In-process stand-ins for the local client, timers and the backend.
 */

import type { HttpMethod, LcuEvent, LcuResponse } from "@shared/lcu";

import type { LcuHandle } from "../src/main/lcu/connection";
import { NotConnectedError } from "../src/main/lcu/errors";
import type { Scheduler } from "../src/main/lcu/retry";
import type { FetchLike } from "../src/main/backend/client";

type RouteReply = LcuResponse | Error | ((body: unknown) => LcuResponse | Promise<LcuResponse>);

export interface RecordedRequest {
  method: HttpMethod;
  path: string;
  body: unknown;
}

export class FakeLcuHandle implements LcuHandle {
  closed = false;
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, RouteReply>();
  private readonly eventListeners = new Set<(event: LcuEvent) => void>();
  private readonly closeListeners = new Set<(reason: string) => void>();

  route(method: HttpMethod, path: string, reply: RouteReply): this {
    this.routes.set(`${method} ${path}`, reply);
    return this;
  }

  async request(method: HttpMethod, path: string, body?: unknown): Promise<LcuResponse> {
    if (this.closed) {
      throw new NotConnectedError();
    }
    this.requests.push({ method, path, body });
    const reply = this.routes.get(`${method} ${path}`);
    if (reply === undefined) {
      return { status: 404, body: { message: "no route" } };
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply(body) : reply;
  }

  requestsTo(path: string): RecordedRequest[] {
    return this.requests.filter((request) => request.path === path);
  }

  onEvent(listener: (event: LcuEvent) => void): () => void {
    this.eventListeners.add(listener);
    return () => this.eventListeners.delete(listener);
  }

  onClose(listener: (reason: string) => void): () => void {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  get listenerCount(): number {
    return this.eventListeners.size + this.closeListeners.size;
  }

  emit(event: LcuEvent): void {
    for (const listener of this.eventListeners) {
      listener(event);
    }
  }

  /** Simulates the transport going away */
  drop(reason = "socket closed"): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const listener of this.closeListeners) {
      listener(reason);
    }
  }

  close(): void {
    this.drop("closed by client");
  }
}

/** Session routes a healthy client answers with */
export function readyClient(
  options: { phase?: string; name?: string; tag?: string; region?: string } = {},
): FakeLcuHandle {
  return new FakeLcuHandle()
    .route("GET", "/lol-gameflow/v1/gameflow-phase", { status: 200, body: options.phase ?? "None" })
    .route("GET", "/lol-summoner/v1/current-summoner", {
      status: 200,
      body: { gameName: options.name ?? "Ahri", tagLine: options.tag ?? "EUW1" },
    })
    .route("GET", "/riotclient/region-locale", { status: 200, body: { region: options.region ?? "euw" } });
}

interface ScheduledTimer {
  callback: () => void;
  delayMs: number;
  cancelled: boolean;
}

/** Timers fire only when the test says so */
export class ManualScheduler implements Scheduler {
  private readonly timers: ScheduledTimer[] = [];

  schedule(callback: () => void, delayMs: number): () => void {
    const timer: ScheduledTimer = { callback, delayMs, cancelled: false };
    this.timers.push(timer);
    return () => {
      timer.cancelled = true;
    };
  }

  get pending(): number {
    return this.timers.filter((timer) => !timer.cancelled).length;
  }

  get lastDelay(): number | undefined {
    const live = this.timers.filter((timer) => !timer.cancelled);
    return live.length > 0 ? live[live.length - 1].delayMs : undefined;
  }

  /** Fires the oldest live timer; false when none is pending */
  fireNext(): boolean {
    const index = this.timers.findIndex((timer) => !timer.cancelled);
    if (index < 0) {
      return false;
    }
    const [timer] = this.timers.splice(index, 1);
    timer.callback();
    return true;
  }
}

export interface RecordedFetch {
  url: URL;
  init: RequestInit | undefined;
}

export type FetchReply = Response | Error | (() => Response | Promise<Response>);

/** Routes by URL pathname; unknown paths answer 404 */
export function fakeFetch(routes: Record<string, FetchReply>): { fetchImpl: FetchLike; calls: RecordedFetch[] } {
  const calls: RecordedFetch[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(input);
    calls.push({ url, init });
    const reply = routes[url.pathname];
    if (reply === undefined) {
      return new Response("not found", { status: 404 });
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply() : reply;
  };
  return { fetchImpl, calls };
}
