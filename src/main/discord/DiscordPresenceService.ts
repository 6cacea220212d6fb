import { Client } from "@xhayper/discord-rpc";
import { formatIdentity, type DiscordPresencePayload, type SessionState } from "@shared/lcu";

import { describeError } from "../lcu/errors";
import { timerScheduler, type Scheduler } from "../lcu/retry";

const RECONNECT_DELAY_MS = 15_000;
const MAX_RECONNECT_DELAY_MS = 120_000;
const LARGE_IMAGE_KEY = "leagueofleagues";
const LARGE_IMAGE_TEXT = "League of Leagues";

export interface PresenceActivity {
  details: string;
  state?: string;
  largeImageKey: string;
  largeImageText: string;
  startTimestamp?: Date;
}

/** The part of the RPC client the service drives */
export interface PresenceClient {
  onReady(listener: () => void): void;
  onDisconnected(listener: () => void): void;
  login(): Promise<void>;
  setActivity(activity: PresenceActivity): Promise<void>;
  clearActivity(): Promise<void>;
  destroy(): Promise<void>;
}

export type PresenceClientFactory = (clientId: string) => PresenceClient;

export const rpcClientFactory: PresenceClientFactory = (clientId) => {
  const client = new Client({ clientId });
  return {
    onReady: (listener) => {
      client.on("ready", listener);
    },
    onDisconnected: (listener) => {
      client.on("disconnected", listener);
    },
    login: async () => {
      await client.login();
    },
    setActivity: async (activity) => {
      await client.user?.setActivity(activity);
    },
    clearActivity: async () => {
      await client.user?.clearActivity();
    },
    destroy: () => client.destroy(),
  };
};

/** Phase names arrive in PascalCase ("ChampSelect"); spaced out for display */
export function describePhase(phase: string): string {
  return phase.replace(/([a-z])([A-Z])/g, "$1 $2");
}

/** Idle until the handshake has completed */
export function presencePayloadFor(state: SessionState, startTimestamp?: number): DiscordPresencePayload {
  if (!state.ready) {
    return { type: "idle" };
  }
  return {
    type: "session",
    phase: state.phase,
    identity: state.identity,
    region: state.region,
    ...(startTimestamp === undefined ? {} : { startTimestamp }),
  };
}

export function buildActivity(payload: DiscordPresencePayload): PresenceActivity {
  if (payload.type === "idle") {
    return {
      details: "Waiting for the League client",
      state: "Idle",
      largeImageKey: LARGE_IMAGE_KEY,
      largeImageText: LARGE_IMAGE_TEXT,
    };
  }

  const stateParts: string[] = [];
  if (payload.identity) {
    stateParts.push(formatIdentity(payload.identity));
  }
  if (payload.region) {
    stateParts.push(payload.region);
  }

  return {
    details: payload.phase ? describePhase(payload.phase) : "Connected",
    ...(stateParts.length > 0 ? { state: stateParts.join(" · ") } : {}),
    largeImageKey: LARGE_IMAGE_KEY,
    largeImageText: LARGE_IMAGE_TEXT,
    ...(payload.startTimestamp ? { startTimestamp: new Date(payload.startTimestamp) } : {}),
  };
}

export interface DiscordPresenceOptions {
  clientFactory?: PresenceClientFactory;
  scheduler?: Scheduler;
}

export class DiscordPresenceService {
  private client: PresenceClient | null = null;
  private readonly clientId: string;
  private readonly enabled: boolean;
  private connected = false;
  private disposed = false;
  private cancelReconnect: (() => void) | null = null;
  private reconnectAttempt = 0;
  private lastPayload: DiscordPresencePayload | null = null;
  private readonly clientFactory: PresenceClientFactory;
  private readonly scheduler: Scheduler;

  constructor(enabled: boolean, clientId: string, options: DiscordPresenceOptions = {}) {
    this.enabled = enabled;
    this.clientId = clientId;
    this.clientFactory = options.clientFactory ?? rpcClientFactory;
    this.scheduler = options.scheduler ?? timerScheduler;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  private get active(): boolean {
    return !this.disposed && this.enabled && Boolean(this.clientId);
  }

  async initialize(): Promise<void> {
    if (!this.active) {
      return;
    }
    await this.connect();
  }

  private async connect(): Promise<void> {
    if (!this.active) {
      return;
    }

    this.clearReconnectTimer();

    const client = this.clientFactory(this.clientId);
    client.onReady(() => {
      if (this.client !== client) {
        return;
      }
      console.log("[Discord] RPC connected");
      this.connected = true;
      this.reconnectAttempt = 0;
      if (this.lastPayload) {
        void this.setActivity(this.lastPayload);
      }
    });
    client.onDisconnected(() => {
      if (this.client !== client) {
        return;
      }
      console.log("[Discord] RPC disconnected");
      this.connected = false;
      this.client = null;
      this.scheduleReconnect();
    });

    try {
      this.client = client;
      await client.login();
    } catch (error) {
      const msg = describeError(error);
      if (msg.includes("ENOENT") || msg.includes("Could not connect")) {
        console.log("[Discord] Discord not running, will retry later");
      } else {
        console.warn("[Discord] RPC connect failed:", msg);
      }
      this.connected = false;
      this.client = null;
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (!this.active) {
      return;
    }

    this.clearReconnectTimer();
    const delay = Math.min(RECONNECT_DELAY_MS * 2 ** this.reconnectAttempt, MAX_RECONNECT_DELAY_MS);
    this.reconnectAttempt += 1;
    console.log(`[Discord] Reconnecting in ${Math.round(delay / 1000)}s (attempt ${this.reconnectAttempt})`);
    this.cancelReconnect = this.scheduler.schedule(() => {
      this.cancelReconnect = null;
      void this.connect();
    }, delay);
  }

  private clearReconnectTimer(): void {
    this.cancelReconnect?.();
    this.cancelReconnect = null;
  }

  async updatePresence(payload: DiscordPresencePayload): Promise<void> {
    this.lastPayload = payload;
    if (!this.active || !this.connected) {
      return;
    }
    await this.setActivity(payload);
  }

  private async setActivity(payload: DiscordPresencePayload): Promise<void> {
    if (!this.client || !this.connected) {
      return;
    }
    try {
      await this.client.setActivity(buildActivity(payload));
    } catch (error) {
      console.warn("[Discord] Failed to set activity:", describeError(error));
    }
  }

  async clearPresence(): Promise<void> {
    this.lastPayload = null;
    if (!this.client || !this.connected) {
      return;
    }
    try {
      await this.client.clearActivity();
    } catch (error) {
      console.warn("[Discord] Failed to clear activity:", describeError(error));
    }
  }

  private async disconnect(): Promise<void> {
    this.clearReconnectTimer();
    this.connected = false;

    const client = this.client;
    this.client = null;
    if (client) {
      try {
        await client.destroy();
      } catch (error) {
        console.warn("[Discord] Failed to close RPC client:", describeError(error));
      }
    }
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    this.lastPayload = null;
    await this.disconnect();
  }
}
