import { initLogCapture } from "@shared/logger";

import { CompanionActions } from "./actions";
import { BackendClient } from "./backend/client";
import { DiscordPresenceService, presencePayloadFor } from "./discord/DiscordPresenceService";
import { LcuConnection } from "./lcu/connection";
import { ConnectionManager } from "./lcu/connectionManager";
import { discoverCredentials } from "./lcu/credentials";
import { describeError } from "./lcu/errors";
import { createSessionRegistry } from "./lcu/handlers";
import { SessionStore } from "./lcu/sessionState";
import { getSettingsManager } from "./settings";
import { CompanionShell } from "./shell";

let connectionManager: ConnectionManager | null = null;
let discordService: DiscordPresenceService | null = null;
let shell: CompanionShell | null = null;
let shuttingDown = false;

async function shutdown(): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log("[Main] Shutting down");
  connectionManager?.stop();
  await discordService?.dispose();
  shell?.close();
}

async function main(): Promise<void> {
  initLogCapture("main");

  const settingsManager = getSettingsManager();
  const settings = settingsManager.getAll();
  console.log(`[Main] Using settings at ${settingsManager.path}`);

  const backend = new BackendClient({ baseUrl: settings.apiBaseUrl });
  const store = new SessionStore();

  connectionManager = new ConnectionManager({
    store,
    registry: createSessionRegistry(store),
    policy: { maxAttempts: settings.connectMaxAttempts, delayMs: settings.connectRetryDelayMs },
    reconnectOnDisconnect: settings.reconnectOnDisconnect,
    openConnection: async () => {
      const connection = new LcuConnection(discoverCredentials({ lockfilePath: settings.lockfilePath }));
      await connection.open();
      return connection;
    },
  });

  const presence = new DiscordPresenceService(settings.discordPresenceEnabled, settings.discordClientId);
  discordService = presence;
  void presence.initialize();

  let sessionStartedAt: number | undefined;
  store.subscribe((next, previous) => {
    if (next.ready && !previous.ready) {
      sessionStartedAt = Date.now();
    } else if (!next.ready) {
      sessionStartedAt = undefined;
    }
    void presence.updatePresence(presencePayloadFor(next, sessionStartedAt));
  });

  const companionShell = new CompanionShell();
  shell = companionShell;
  connectionManager.onStatus((status) => companionShell.showStatus(status));

  const actions = new CompanionActions({
    session: connectionManager,
    dispatcher: connectionManager.dispatcher,
    backend,
    settings: settingsManager,
    prompter: companionShell,
    shutdown,
  });

  await actions.startupAuth();

  console.log("[Main] Starting League client connector...");
  connectionManager.start();

  await companionShell.run(actions);
  await shutdown();
}

process.on("SIGINT", () => {
  void shutdown();
});

main().catch((error: unknown) => {
  console.error("[Main] Fatal error:", describeError(error));
  process.exitCode = 1;
  void shutdown();
});
