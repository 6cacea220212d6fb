import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import type { CompanionActions, Prompter } from "./actions";
import type { ConnectionStatus } from "./lcu/connectionManager";
import { describeError } from "./lcu/errors";

export interface MenuItem {
  key: string;
  label: string;
  run(actions: CompanionActions): Promise<unknown> | unknown;
}

export const MENU_ITEMS: readonly MenuItem[] = [
  { key: "1", label: "Register", run: (actions) => actions.register() },
  { key: "2", label: "Join Game", run: (actions) => actions.joinGame() },
  { key: "3", label: "Check Status", run: (actions) => actions.checkStatus() },
  { key: "4", label: "Check for Updates", run: (actions) => actions.checkForUpdates() },
  { key: "5", label: "Export Logs", run: (actions) => actions.exportLogs() },
  { key: "q", label: "Quit", run: (actions) => actions.quit() },
];

export function findMenuItem(choice: string): MenuItem | undefined {
  const key = choice.trim().toLowerCase();
  return MENU_ITEMS.find((item) => item.key === key);
}

/** One-line summary of a connection status change, or null when it is not worth showing */
export function describeStatus(status: ConnectionStatus): string | null {
  switch (status.type) {
    case "connecting":
      return status.attempt === 1 ? "Looking for the League client..." : null;
    case "attempt-failed":
      return `League client not found, retrying in ${Math.round(status.retryInMs / 1000)}s (attempt ${status.attempt}/${status.maxAttempts})`;
    case "connected":
      return null;
    case "ready":
      return "Connected to the League client";
    case "disconnected":
      return status.willReconnect
        ? `League client disconnected (${status.reason}), reconnecting...`
        : `League client disconnected (${status.reason})`;
    case "exhausted":
      return `Failed to connect to the League client after ${status.attempts} attempts`;
  }
}

export interface ShellOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * Terminal menu standing in for the tray; also the dialog surface for the actions.
 * Input lines answer the pending prompt when there is one and pick a menu entry
 * otherwise, so the menu keeps reading while a command waits on the network.
 */
export class CompanionShell implements Prompter {
  private readonly rl: Interface;
  private readonly output: Writable;
  private isClosed = false;
  private actions: CompanionActions | null = null;
  private running: MenuItem | null = null;
  private pendingAnswer: ((answer: string | null) => void) | null = null;
  private readonly closeWaiters: Array<() => void> = [];

  constructor(options: ShellOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      terminal: false,
    });
    this.rl.on("line", (line) => this.handleLine(line));
    this.rl.on("close", () => {
      this.isClosed = true;
      this.answer(null);
      for (const resolve of this.closeWaiters.splice(0)) {
        resolve();
      }
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Label of the command in progress, if any */
  get busyWith(): string | null {
    return this.running?.label ?? null;
  }

  info(title: string, message: string): void {
    this.write(`\n[${title}]\n${message}\n`);
  }

  error(title: string, message: string): void {
    this.write(`\n[${title}] Error\n${message}\n`);
  }

  async confirm(title: string, question: string): Promise<boolean> {
    const answer = await this.prompt(`\n[${title}] ${question} [y/N] `);
    return answer !== null && /^y(es)?$/i.test(answer.trim());
  }

  async ask(title: string, prompt: string): Promise<string | null> {
    const answer = await this.prompt(`\n[${title}]\n${prompt}\n> `);
    return answer && answer.trim() ? answer : null;
  }

  showStatus(status: ConnectionStatus): void {
    const line = describeStatus(status);
    if (line) {
      this.write(`* ${line}\n`);
    }
  }

  /** Serves menu choices; resolves once the input ends or the shell is closed */
  run(actions: CompanionActions): Promise<void> {
    if (this.isClosed) {
      return Promise.resolve();
    }
    this.actions = actions;
    this.printMenu();
    return new Promise((resolve) => this.closeWaiters.push(resolve));
  }

  close(): void {
    if (!this.isClosed) {
      this.rl.close();
    }
  }

  private handleLine(line: string): void {
    if (this.pendingAnswer) {
      this.answer(line);
      return;
    }
    if (!this.actions) {
      return;
    }

    const choice = line.trim();
    const item = findMenuItem(choice);
    if (!item) {
      if (choice) {
        this.write(`Unknown option "${choice}"\n`);
      }
      this.write("> ");
      return;
    }
    if (this.running) {
      this.write(`Busy: ${this.running.label} is still running\n`);
      return;
    }

    this.running = item;
    void this.execute(item, this.actions);
  }

  private async execute(item: MenuItem, actions: CompanionActions): Promise<void> {
    try {
      await item.run(actions);
    } catch (error) {
      console.error(`[Shell] ${item.label} failed:`, describeError(error));
      this.error("Error", describeError(error));
    } finally {
      this.running = null;
      if (!this.isClosed) {
        this.printMenu();
      }
    }
  }

  private printMenu(): void {
    const lines = MENU_ITEMS.map((item) => `  ${item.key}) ${item.label}`);
    this.write(`\nLeague of Leagues\n${lines.join("\n")}\n> `);
  }

  private write(text: string): void {
    this.output.write(text);
  }

  private answer(line: string | null): void {
    const resolve = this.pendingAnswer;
    this.pendingAnswer = null;
    resolve?.(line);
  }

  /** Resolves to null once the input has ended */
  private prompt(query: string): Promise<string | null> {
    if (this.isClosed) {
      return Promise.resolve(null);
    }
    // a second prompt supersedes one nobody answered
    this.answer(null);
    this.write(query);
    return new Promise((resolve) => {
      this.pendingAnswer = resolve;
    });
  }
}
