import { formatIdentity, type JoinOutcome, type SessionState, type SummonerIdentity } from "@shared/lcu";
import { writeLogExport } from "@shared/logger";

import type { AuthResult, BackendClient } from "./backend/client";
import { openInBrowser } from "./browser";
import type { ActionDispatcher } from "./lcu/dispatcher";
import {
  InvalidInputError,
  LogExportError,
  NotConnectedError,
  describeError,
  isCompanionError,
  type CompanionError,
} from "./lcu/errors";
import { joinLobby } from "./lcu/lobby";
import type { SettingsManager } from "./settings";

export const APP_VERSION = "1.3.0";

/** Dialog surface the actions talk through; `ask` resolves to null when the user backs out */
export interface Prompter {
  info(title: string, message: string): void;
  error(title: string, message: string): void;
  confirm(title: string, question: string): Promise<boolean>;
  ask(title: string, prompt: string): Promise<string | null>;
}

export type CommandOutcome<T = undefined> =
  | { status: "success"; value: T }
  | { status: "failure"; error: CompanionError }
  | { status: "cancelled" };

const CANCELLED = { status: "cancelled" } as const;

export interface SessionSource {
  snapshot(): SessionState;
  /** True while a connect cycle is still looking for the client */
  readonly connecting: boolean;
}

const STILL_CONNECTING = "Still looking for the League client, try again in a moment.";

export type BackendApi = Pick<
  BackendClient,
  "authenticate" | "redeemCode" | "fetchLatestVersion" | "joinMatch" | "downloadUrl"
>;

export type RegistrationSettings = Pick<SettingsManager, "get" | "set" | "isRegistered" | "forgetRegistration" | "dataDir">;

export interface CompanionActionsOptions {
  session: SessionSource;
  dispatcher: ActionDispatcher;
  backend: BackendApi;
  settings: RegistrationSettings;
  prompter: Prompter;
  /** Stops the connection, presence and shell */
  shutdown: () => Promise<void>;
  version?: string;
  writeLogs?: (dir: string) => string;
  openUrl?: (url: string) => Promise<void>;
}

export interface StatusReport {
  clientConnected: boolean;
  summoner: string | null;
  region: string | null;
  registered: boolean;
  text: string;
}

export interface UpdateCheck {
  current: string;
  latest: string;
  updateAvailable: boolean;
  /** Whether the download page was opened */
  opened: boolean;
}

/** Splits manual "Name#Tag" input on the first `#`; both parts must be non-empty after trimming */
export function parseManualIdentity(input: string): SummonerIdentity | null {
  const hash = input.indexOf("#");
  if (hash < 0) {
    return null;
  }
  const name = input.slice(0, hash).trim();
  const tag = input.slice(hash + 1).trim();
  return name && tag ? { name, tag } : null;
}

/** "Name#Tag", or "Name#Tag,REGION" once the region is known */
export function registrationDisplay(identity: SummonerIdentity, region: string | null): string {
  const display = formatIdentity(identity);
  return region ? `${display},${region}` : display;
}

export function formatStatus(report: Omit<StatusReport, "text">): string {
  return [
    "Status:",
    "",
    `Client Connected: ${report.clientConnected ? "Yes" : "No"}`,
    `Summoner: ${report.summoner ?? "Not detected"}`,
    `Region: ${report.region ?? "Unknown"}`,
    `Registered: ${report.registered ? "Yes" : "No"}`,
  ].join("\n");
}

/**
 * The user-facing commands. Each one reports through the prompter and
 * resolves to a typed outcome; failures outside the error taxonomy propagate.
 */
export class CompanionActions {
  private readonly session: SessionSource;
  private readonly dispatcher: ActionDispatcher;
  private readonly backend: BackendApi;
  private readonly settings: RegistrationSettings;
  private readonly prompter: Prompter;
  private readonly shutdown: () => Promise<void>;
  private readonly writeLogs: (dir: string) => string;
  private readonly openUrl: (url: string) => Promise<void>;
  readonly version: string;

  constructor(options: CompanionActionsOptions) {
    this.session = options.session;
    this.dispatcher = options.dispatcher;
    this.backend = options.backend;
    this.settings = options.settings;
    this.prompter = options.prompter;
    this.shutdown = options.shutdown;
    this.version = options.version ?? APP_VERSION;
    this.writeLogs = options.writeLogs ?? ((dir) => writeLogExport(dir));
    this.openUrl = options.openUrl ?? openInBrowser;
  }

  /** Validates the stored registration; only a definitive "not registered" clears it */
  async startupAuth(): Promise<AuthResult | null> {
    const identityToken = this.settings.get("discordId");
    if (!identityToken) {
      return null;
    }

    const result = await this.backend.authenticate(identityToken);
    if (result.ok) {
      console.log("[Auth] Successfully authenticated with stored credentials");
    } else if (result.reason === "not-registered") {
      console.log("[Auth] Stored registration is unknown to the server, clearing it");
      this.settings.forgetRegistration();
    } else {
      console.warn(`[Auth] Authentication failed (${result.reason}), keeping stored registration`);
    }
    return result;
  }

  async register(): Promise<CommandOutcome<string>> {
    console.log("[Actions] Register triggered");
    const state = this.session.snapshot();
    if (!state.ready) {
      return this.fail(
        new NotConnectedError(this.session.connecting ? STILL_CONNECTING : "Please open your League client first."),
      );
    }

    let identity = state.identity;
    if (!identity) {
      const manual = await this.prompter.confirm(
        "Summoner Info",
        "Could not automatically detect your summoner information. Would you like to enter it manually?",
      );
      if (!manual) {
        return CANCELLED;
      }
      const entered = await this.prompter.ask("Enter Summoner Info", "Enter your Summoner Name#Tag (e.g., PlayerName#NA1):");
      if (!entered?.trim()) {
        return CANCELLED;
      }
      identity = parseManualIdentity(entered);
      if (!identity) {
        return this.fail(new InvalidInputError("Please use format: Name#Tag"));
      }
    }

    const display = registrationDisplay(identity, state.region);
    const code = (
      await this.prompter.ask(
        "Enter Registration Code",
        `Registering summoner: ${display}\nEnter the registration code provided by the League of Leagues bot:`,
      )
    )?.trim();
    if (!code) {
      console.log("[Actions] Registration cancelled");
      return CANCELLED;
    }

    return this.attempt(async () => {
      const token = await this.backend.redeemCode(code, display);
      this.settings.set("discordId", token);
      this.prompter.info("Registered", "Successfully registered!");
      return display;
    });
  }

  async joinGame(): Promise<CommandOutcome<JoinOutcome>> {
    console.log("[Actions] Join game triggered");
    const state = this.session.snapshot();
    if (!state.ready && this.session.connecting) {
      return this.fail(new NotConnectedError(STILL_CONNECTING));
    }
    if (!state.ready || state.phase === null) {
      return this.fail(new NotConnectedError("Client not ready or no phase info."));
    }

    const password = (await this.prompter.ask("Join Game", "Enter match password:"))?.trim();
    if (!password) {
      console.log("[Actions] Join game cancelled");
      return CANCELLED;
    }

    return this.attempt(async () => {
      const request = await this.backend.joinMatch(password);
      const outcome = await joinLobby(this.dispatcher, request);
      this.prompter.info("Join Game", `Successfully joined ${outcome.target}'s lobby!`);
      return outcome;
    });
  }

  checkStatus(): CommandOutcome<StatusReport> {
    const state = this.session.snapshot();
    const report = {
      clientConnected: state.ready,
      summoner: state.identity ? formatIdentity(state.identity) : null,
      region: state.region,
      registered: this.settings.isRegistered(),
    };
    const text = formatStatus(report);
    this.prompter.info("League of Leagues Status", text);
    return { status: "success", value: { ...report, text } };
  }

  async checkForUpdates(): Promise<CommandOutcome<UpdateCheck>> {
    console.log("[Actions] Checking for client updates...");
    return this.attempt(async () => {
      const latest = await this.backend.fetchLatestVersion();
      console.log(`[Actions] Server version: ${latest}`);
      const updateAvailable = latest !== this.version;
      if (!updateAvailable) {
        this.prompter.info("Update Check", `You are running the latest version (v${this.version}).`);
        return { current: this.version, latest, updateAvailable, opened: false };
      }

      const downloadUrl = this.backend.downloadUrl;
      this.prompter.info(
        "Update Available",
        `League of Leagues v${latest} is available.\nDownload: ${downloadUrl}\nAfter downloading the new version, close this application and run the new version.`,
      );
      const opened =
        (await this.prompter.confirm("Update Available", "Open the download page?")) &&
        (await this.openDownloadPage(downloadUrl));
      return { current: this.version, latest, updateAvailable, opened };
    });
  }

  /** A browser that fails to start is reported; the link has already been shown */
  private async openDownloadPage(url: string): Promise<boolean> {
    try {
      await this.openUrl(url);
      console.log(`[Actions] Opened download page ${url}`);
      return true;
    } catch (error) {
      console.warn("[Actions] Could not open the download page:", describeError(error));
      this.prompter.error("Open Download Page", `Could not open a browser. Visit ${url} to download the update.`);
      return false;
    }
  }

  exportLogs(): CommandOutcome<string> {
    const dir = this.settings.dataDir;
    let filePath: string;
    try {
      filePath = this.writeLogs(dir);
    } catch (error) {
      return this.fail(new LogExportError(dir, describeError(error), { cause: error }));
    }
    console.log(`[Actions] Logs exported to ${filePath}`);
    this.prompter.info("Export Logs", `Logs exported to ${filePath}`);
    return { status: "success", value: filePath };
  }

  async quit(): Promise<CommandOutcome> {
    if (!(await this.prompter.confirm("Confirm Exit", "Are you sure you want to quit?"))) {
      return CANCELLED;
    }
    console.log("[Actions] Quitting application");
    await this.shutdown();
    return { status: "success", value: undefined };
  }

  private fail(error: CompanionError): CommandOutcome<never> {
    console.warn(`[Actions] ${error.title}: ${error.message}`);
    this.prompter.error(error.title, error.message);
    return { status: "failure", error };
  }

  private async attempt<T>(work: () => Promise<T>): Promise<CommandOutcome<T>> {
    try {
      return { status: "success", value: await work() };
    } catch (error) {
      if (isCompanionError(error)) {
        return this.fail(error);
      }
      throw error;
    }
  }
}
