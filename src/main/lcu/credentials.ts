import { execSync } from "node:child_process";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import type { LcuCredentials } from "@shared/lcu";

import { ConnectionError } from "./errors";

const DEFAULT_INSTALL_DIRS: Record<string, string[]> = {
  win32: ["C:\\Riot Games\\League of Legends", "D:\\Riot Games\\League of Legends"],
  darwin: ["/Applications/League of Legends.app/Contents/LoL"],
};

/** Parses `LeagueClient:<pid>:<port>:<password>:<protocol>` */
export function parseLockfile(content: string): LcuCredentials | null {
  const parts = content.trim().split(":");
  if (parts.length !== 5) {
    return null;
  }

  const [, pidText, portText, password, protocol] = parts;
  const port = Number(portText);
  const pid = Number(pidText);
  if (!Number.isInteger(port) || port <= 0 || port > 65535 || !password || protocol !== "https") {
    return null;
  }

  return {
    port,
    password,
    protocol: "https",
    ...(Number.isInteger(pid) && pid > 0 ? { pid } : {}),
  };
}

/** Reads `--app-port` and `--remoting-auth-token` from a client process command line */
export function parseProcessArgs(commandLine: string): LcuCredentials | null {
  const portMatch = commandLine.match(/--app-port=["']?(\d+)/);
  const tokenMatch = commandLine.match(/--remoting-auth-token=["']?([\w-]+)/);
  if (!portMatch || !tokenMatch) {
    return null;
  }
  const port = Number(portMatch[1]);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    return null;
  }
  return { port, password: tokenMatch[1], protocol: "https" };
}

function readClientCommandLine(): string {
  try {
    if (process.platform === "win32") {
      return execSync(
        'powershell -NoProfile -Command "Get-CimInstance Win32_Process -Filter \\"name = \'LeagueClientUx.exe\'\\" | Select-Object -ExpandProperty CommandLine"',
        { encoding: "utf-8", timeout: 3000 },
      );
    }
    return execSync("ps -A -o args | grep LeagueClientUx | grep -v grep", {
      encoding: "utf-8",
      timeout: 3000,
    });
  } catch {
    return "";
  }
}

function lockfileCandidates(explicitPath: string | null): string[] {
  if (explicitPath) {
    return [explicitPath];
  }
  return (DEFAULT_INSTALL_DIRS[process.platform] ?? []).map((dir) => join(dir, "lockfile"));
}

export interface DiscoveryOptions {
  /** Lockfile path from settings; skips the default install locations */
  lockfilePath: string | null;
  /** Command line of the running client, "" when it is not running */
  readCommandLine?: () => string;
}

/**
 * Finds the port and password of the running client: the running process's
 * command line first, then the lockfile.
 */
export function discoverCredentials(options: DiscoveryOptions): LcuCredentials {
  const readCommandLine = options.readCommandLine ?? readClientCommandLine;
  const fromProcess = parseProcessArgs(readCommandLine());
  if (fromProcess) {
    return fromProcess;
  }

  for (const path of lockfileCandidates(options.lockfilePath)) {
    if (!existsSync(path)) {
      continue;
    }
    try {
      const credentials = parseLockfile(readFileSync(path, "utf-8"));
      if (credentials) {
        return credentials;
      }
      console.warn(`[LCU] Ignoring malformed lockfile at ${path}`);
    } catch (error) {
      console.warn(`[LCU] Could not read lockfile at ${path}:`, error instanceof Error ? error.message : error);
    }
  }

  throw new ConnectionError("League client is not running");
}
