/**
 * Log capture and privacy-safe export.
 * Console output is buffered in memory; exports run every line through the redaction patterns.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

const LOG_LEVELS = ["log", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  prefix: string;
  message: string;
  args: unknown[];
}

/** Maximum number of log entries to keep in memory */
const MAX_LOG_ENTRIES = 5000;

const REDACTED = "[Redacted for privacy]";

/** Patterns for sensitive data redaction */
const SENSITIVE_PATTERNS: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  // Basic/Bearer authorization headers
  { pattern: /Authorization["']?\s*[:=]\s*["']?(?:Basic|Bearer)\s+[A-Za-z0-9+/=_\-.]+/gi, replacement: `Authorization: ${REDACTED}` },
  // Local client auth token on the command line
  { pattern: /--remoting-auth-token=[^\s"']+/gi, replacement: `--remoting-auth-token=${REDACTED}` },
  // Stored identity token in query strings or JSON
  { pattern: /discord[_-]?id["']?\s*[:=]\s*["']?[^\s"'&,}]+/gi, replacement: `discord_id: ${REDACTED}` },
  // One-time registration codes
  { pattern: /otp[_-]?pass["']?\s*[:=]\s*["']?[^\s"'&,}]+/gi, replacement: `otp_pass: ${REDACTED}` },
  // Match and lobby passwords
  { pattern: /password["']?\s*[:=]\s*["']?[^\s"'&,}]+/gi, replacement: `password: ${REDACTED}` },
  { pattern: /(?:access|refresh|auth)[_-]?token["']?\s*[:=]\s*["']?[A-Za-z0-9_\-.]{8,}/gi, replacement: `token: ${REDACTED}` },
  // IP addresses other than loopback
  { pattern: /\b(?!127\.0\.0\.1\b)(?:[0-9]{1,3}\.){3}[0-9]{1,3}\b/g, replacement: "[Redacted IP]" },
];

export function redactSensitiveData(text: string): string {
  let redacted = text;
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    redacted = redacted.replace(pattern, replacement);
  }
  return redacted;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return "[Object]";
    }
  }
  return String(arg);
}

export function formatLogEntry(entry: LogEntry): string {
  const timeStr = new Date(entry.timestamp).toISOString();
  const levelStr = entry.level.toUpperCase().padStart(5);
  const prefixStr = entry.prefix ? `[${entry.prefix}] ` : "";
  const argsStr = entry.args.length > 0 ? " " + entry.args.map(formatArg).join(" ") : "";
  return `${timeStr} ${levelStr} ${prefixStr}${entry.message}${argsStr}`;
}

export function createRedactedLogExport(entries: readonly LogEntry[]): string {
  return entries.map((entry) => redactSensitiveData(formatLogEntry(entry))).join("\n");
}

/** Splits "[Module] message" into its prefix and message */
function extractPrefix(args: unknown[], fallback: string): { prefix: string; message: string; rest: unknown[] } {
  const [first, ...rest] = args;
  if (typeof first === "string") {
    const match = /^\[([^\]]+)\]\s*(.*)$/s.exec(first);
    if (match) {
      return { prefix: match[1], message: match[2], rest };
    }
  }
  return { prefix: fallback, message: first === undefined ? "" : formatArg(first), rest };
}

type ConsoleMethod = (...args: unknown[]) => void;

/**
 * Buffers console output. With `echo` off the original console is not called,
 * which keeps test output quiet.
 */
export class LogCapture {
  private entries: LogEntry[] = [];
  private originals: Map<LogLevel, ConsoleMethod> | null = null;

  constructor(
    private readonly processName: string,
    private readonly echo = true,
  ) {}

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }

  getCount(): number {
    return this.entries.length;
  }

  addEntry(level: LogLevel, prefix: string, message: string, args: unknown[]): void {
    this.entries.push({ timestamp: Date.now(), level, prefix, message, args });
    if (this.entries.length > MAX_LOG_ENTRIES) {
      this.entries.shift();
    }
  }

  interceptConsole(): void {
    if (this.originals) {
      return;
    }
    const originals = new Map<LogLevel, ConsoleMethod>();
    for (const level of LOG_LEVELS) {
      const original: ConsoleMethod = console[level];
      originals.set(level, original);
      console[level] = (...args: unknown[]) => {
        const { prefix, message, rest } = extractPrefix(args, this.processName);
        this.addEntry(level, prefix, message, rest);
        if (this.echo) {
          original.apply(console, args);
        }
      };
    }
    this.originals = originals;
  }

  restoreConsole(): void {
    if (!this.originals) {
      return;
    }
    for (const [level, original] of this.originals) {
      console[level] = original;
    }
    this.originals = null;
  }

  exportRedacted(): string {
    const header = `League of Leagues Logs Export\nGenerated: ${new Date().toISOString()}\nSource: ${this.processName}\nTotal Entries: ${this.entries.length}\n${"=".repeat(60)}\n\n`;
    return header + createRedactedLogExport(this.entries);
  }

  exportJSON(): string {
    return JSON.stringify(
      {
        source: this.processName,
        generatedAt: Date.now(),
        entryCount: this.entries.length,
        entries: this.entries.map((entry) => ({
          ...entry,
          message: redactSensitiveData(entry.message),
          args: entry.args.map((arg) => (typeof arg === "number" || typeof arg === "boolean" ? arg : redactSensitiveData(formatArg(arg)))),
        })),
      },
      null,
      2,
    );
  }
}

let globalLogCapture: LogCapture | null = null;

export function initLogCapture(processName: string): LogCapture {
  if (!globalLogCapture) {
    globalLogCapture = new LogCapture(processName);
    globalLogCapture.interceptConsole();
  }
  return globalLogCapture;
}

/** Writes the redacted export to `<dir>/league-of-leagues-logs-<stamp>.txt` and returns the path */
export function writeLogExport(dir: string, capture: LogCapture | null = globalLogCapture, now = new Date()): string {
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  const filePath = join(dir, `league-of-leagues-logs-${stamp}.txt`);
  mkdirSync(dir, { recursive: true });
  writeFileSync(filePath, capture ? capture.exportRedacted() : "No logs captured", "utf-8");
  return filePath;
}
