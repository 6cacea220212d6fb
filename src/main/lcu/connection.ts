import { request as httpsRequest } from "node:https";

import WebSocket from "ws";

import {
  isLcuEventType,
  type HttpMethod,
  type LcuCredentials,
  type LcuEvent,
  type LcuResponse,
} from "@shared/lcu";

import { ConnectionError, LocalRequestError, NotConnectedError, describeError } from "./errors";

const LCU_HOST = "127.0.0.1";
const CONNECT_TIMEOUT_MS = 5_000;

/** WAMP opcodes used by the local endpoint */
const WAMP_SUBSCRIBE = 5;
const WAMP_EVENT = 8;
const JSON_API_EVENT = "OnJsonApiEvent";

/** One transport to the local endpoint. A new handle is built for every connect attempt. */
export interface LcuHandle {
  readonly closed: boolean;
  request(method: HttpMethod, path: string, body?: unknown): Promise<LcuResponse>;
  onEvent(listener: (event: LcuEvent) => void): () => void;
  onClose(listener: (reason: string) => void): () => void;
  close(): void;
}

export function basicAuthHeader(password: string): string {
  return `Basic ${Buffer.from(`riot:${password}`).toString("base64")}`;
}

export function parseResponseBody(text: string): unknown {
  if (text.trim().length === 0) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/**
 * Decodes one WebSocket frame. Returns null for anything that is not an
 * OnJsonApiEvent carrying a uri and a known event type.
 */
export function decodeEventFrame(text: string): LcuEvent | null {
  let frame: unknown;
  try {
    frame = JSON.parse(text);
  } catch {
    return null;
  }

  if (!Array.isArray(frame) || frame[0] !== WAMP_EVENT || frame[1] !== JSON_API_EVENT) {
    return null;
  }

  const payload: unknown = frame[2];
  if (typeof payload !== "object" || payload === null) {
    return null;
  }

  const uri = "uri" in payload ? payload.uri : undefined;
  const rawType = "eventType" in payload ? payload.eventType : undefined;
  const eventType = typeof rawType === "string" ? rawType.toUpperCase() : undefined;
  if (typeof uri !== "string" || !isLcuEventType(eventType)) {
    return null;
  }

  return {
    uri,
    eventType,
    data: "data" in payload ? payload.data : null,
  };
}

function rawDataToString(raw: WebSocket.RawData): string {
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString("utf8");
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }
  return raw.toString("utf8");
}

export class LcuConnection implements LcuHandle {
  private ws: WebSocket | null = null;
  private isClosed = false;
  private readonly authorization: string;
  private eventListeners = new Set<(event: LcuEvent) => void>();
  private closeListeners = new Set<(reason: string) => void>();

  constructor(private readonly credentials: LcuCredentials) {
    this.authorization = basicAuthHeader(credentials.password);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Opens the event socket and subscribes to every JSON API event */
  async open(): Promise<void> {
    if (this.ws) {
      return;
    }

    const url = `wss://${LCU_HOST}:${this.credentials.port}/`;
    console.log("[LCU] Connecting to:", url);

    await new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(url, {
        rejectUnauthorized: false,
        handshakeTimeout: CONNECT_TIMEOUT_MS,
        headers: {
          Authorization: this.authorization,
        },
      });

      this.ws = ws;
      let opened = false;

      ws.on("error", (error) => {
        if (opened) {
          console.warn("[LCU] Event socket error:", describeError(error));
          return;
        }
        this.ws = null;
        this.isClosed = true;
        reject(new ConnectionError(`Event socket failed: ${describeError(error)}`, { cause: error }));
      });

      ws.once("open", () => {
        opened = true;
        ws.send(JSON.stringify([WAMP_SUBSCRIBE, JSON_API_EVENT]));
        resolve();
      });

      ws.on("message", (raw) => {
        this.handleMessage(rawDataToString(raw));
      });

      ws.on("close", (_code, reason) => {
        if (!opened) {
          return;
        }
        const reasonText = reason.toString("utf8");
        this.markClosed(reasonText || "socket closed");
      });
    });
  }

  onEvent(listener: (event: LcuEvent) => void): () => void {
    this.eventListeners.add(listener);
    return () => this.eventListeners.delete(listener);
  }

  onClose(listener: (reason: string) => void): () => void {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  request(method: HttpMethod, path: string, body?: unknown): Promise<LcuResponse> {
    if (this.isClosed) {
      return Promise.reject(new NotConnectedError());
    }

    const payload = body === undefined ? undefined : JSON.stringify(body);

    return new Promise<LcuResponse>((resolve, reject) => {
      const req = httpsRequest(
        {
          host: LCU_HOST,
          port: this.credentials.port,
          method,
          path,
          rejectUnauthorized: false,
          headers: {
            Accept: "application/json",
            Authorization: this.authorization,
            ...(payload !== undefined
              ? { "Content-Type": "application/json", "Content-Length": Buffer.byteLength(payload) }
              : {}),
          },
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("error", (error) => {
            reject(new LocalRequestError(method, path, describeError(error), res.statusCode, { cause: error }));
          });
          res.on("end", () => {
            resolve({
              status: res.statusCode ?? 0,
              body: parseResponseBody(Buffer.concat(chunks).toString("utf8")),
            });
          });
        },
      );

      req.on("error", (error) => {
        reject(new LocalRequestError(method, path, describeError(error), undefined, { cause: error }));
      });

      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }

  close(): void {
    if (this.ws) {
      this.ws.removeAllListeners("message");
      this.ws.close();
      this.ws = null;
    }
    this.markClosed("closed by client");
  }

  private handleMessage(text: string): void {
    const event = decodeEventFrame(text);
    if (!event) {
      return;
    }
    for (const listener of this.eventListeners) {
      listener(event);
    }
  }

  private markClosed(reason: string): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.ws = null;
    console.log(`[LCU] Connection closed: ${reason}`);
    for (const listener of this.closeListeners) {
      listener(reason);
    }
    this.closeListeners.clear();
    this.eventListeners.clear();
  }
}
