import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";

import ini from "ini";

import { DEFAULT_API_BASE } from "./backend/client";
import { DEFAULT_RETRY_POLICY } from "./lcu/retry";

export interface Settings {
  /** Identity token returned by registration (empty-string values are treated as unset) */
  discordId: string | null;
  /** League of Leagues backend base URL */
  apiBaseUrl: string;
  /** Explicit path to the client lockfile (null = auto-detect) */
  lockfilePath: string | null;
  /** Start a new connect cycle when the client connection drops */
  reconnectOnDisconnect: boolean;
  /** Connect attempts per cycle */
  connectMaxAttempts: number;
  /** Delay between connect attempts */
  connectRetryDelayMs: number;
  /** Enable Discord Rich Presence */
  discordPresenceEnabled: boolean;
  /** Discord Application Client ID */
  discordClientId: string;
}

/** INI file earlier releases kept beside the settings, holding only `[DEFAULT] discord_id` */
export const LEGACY_CONFIG_FILE = "settings.cfg";

const DEFAULT_SETTINGS: Settings = {
  discordId: null,
  apiBaseUrl: DEFAULT_API_BASE,
  lockfilePath: null,
  reconnectOnDisconnect: true,
  connectMaxAttempts: DEFAULT_RETRY_POLICY.maxAttempts,
  connectRetryDelayMs: DEFAULT_RETRY_POLICY.delayMs,
  discordPresenceEnabled: false,
  discordClientId: "",
};

/** Per-user data directory: %LOCALAPPDATA%\LeagueOfLeagues on Windows */
export function defaultDataDir(): string {
  const override = process.env.LEAGUE_OF_LEAGUES_HOME;
  if (override) {
    return override;
  }
  if (process.platform === "win32" && process.env.LOCALAPPDATA) {
    return join(process.env.LOCALAPPDATA, "LeagueOfLeagues");
  }
  const configHome = process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(configHome, "league-of-leagues");
}

/** The id was stored either as a bare string or as `{"discord_id": "..."}` */
function readLegacyDiscordId(raw: unknown): string | null {
  if (typeof raw !== "string") {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && "discord_id" in parsed) {
      return typeof parsed.discord_id === "string" && parsed.discord_id ? parsed.discord_id : null;
    }
  } catch {
    // not JSON; fall through to the bare value
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function readLegacyConfig(content: string): string | null {
  const parsed: unknown = ini.parse(content);
  if (typeof parsed !== "object" || parsed === null || !("DEFAULT" in parsed)) {
    return null;
  }
  const section = parsed.DEFAULT;
  if (typeof section !== "object" || section === null || !("discord_id" in section)) {
    return null;
  }
  return readLegacyDiscordId(section.discord_id);
}

export class SettingsManager {
  private settings: Settings;
  private readonly settingsPath: string;

  constructor(settingsPath = join(defaultDataDir(), "settings.json")) {
    this.settingsPath = settingsPath;
    this.settings = this.load();
  }

  get path(): string {
    return this.settingsPath;
  }

  get dataDir(): string {
    return dirname(this.settingsPath);
  }

  /**
   * Load settings from disk, falling back to the legacy config and then to defaults
   */
  private load(): Settings {
    try {
      if (!existsSync(this.settingsPath)) {
        return this.migrateLegacyConfig();
      }

      const content = readFileSync(this.settingsPath, "utf-8");
      const parsed = JSON.parse(content) as Partial<Settings>;

      return {
        ...DEFAULT_SETTINGS,
        ...parsed,
      };
    } catch (error) {
      console.error("[Settings] Failed to load settings, using defaults:", error);
      return { ...DEFAULT_SETTINGS };
    }
  }

  private migrateLegacyConfig(): Settings {
    const settings: Settings = { ...DEFAULT_SETTINGS };
    const legacyPath = join(this.dataDir, LEGACY_CONFIG_FILE);
    if (!existsSync(legacyPath)) {
      return settings;
    }

    settings.discordId = readLegacyConfig(readFileSync(legacyPath, "utf-8"));
    if (settings.discordId) {
      this.save(settings);
      console.log(`[Settings] Migrated registration from ${legacyPath}`);
    }
    return settings;
  }

  /**
   * Save current settings to disk
   */
  private save(settings: Settings = this.settings): void {
    try {
      const dir = dirname(this.settingsPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      writeFileSync(this.settingsPath, JSON.stringify(settings, null, 2), "utf-8");
      console.log(`[Settings] Saved config to ${this.settingsPath}`);
    } catch (error) {
      console.error("[Settings] Failed to save settings:", error);
    }
  }

  getAll(): Settings {
    return { ...this.settings };
  }

  get<K extends keyof Settings>(key: K): Settings[K] {
    return this.settings[key];
  }

  set<K extends keyof Settings>(key: K, value: Settings[K]): void {
    this.settings[key] = value;
    this.save();
  }

  isRegistered(): boolean {
    return Boolean(this.settings.discordId);
  }

  forgetRegistration(): void {
    this.set("discordId", null);
    console.log("[Settings] Cleared stored registration");
  }
}

// Singleton instance
let settingsManager: SettingsManager | null = null;

export function getSettingsManager(): SettingsManager {
  if (!settingsManager) {
    settingsManager = new SettingsManager();
  }
  return settingsManager;
}
