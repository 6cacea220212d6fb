import type { LcuHandle } from "./connection";
import { NotConnectedError } from "./errors";

export type ConnectionJob<T> = (handle: LcuHandle) => Promise<T> | T;

interface QueuedJob {
  label: string;
  run: () => Promise<void>;
  fail: (error: Error) => void;
}

/**
 * Serial execution context bound to one connection handle. Push-event
 * handlers and user jobs share the queue, so everything that touches the
 * handle or writes session state runs one at a time in enqueue order.
 */
export class ConnectionContext {
  private readonly queue: QueuedJob[] = [];
  private running = false;
  private isClosed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handle: LcuHandle,
    readonly id: number,
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get pending(): number {
    return this.queue.length;
  }

  enqueue<T>(job: ConnectionJob<T>, label = "job"): Promise<T> {
    if (this.isClosed) {
      return Promise.reject(new NotConnectedError());
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        run: async () => {
          try {
            resolve(await job(this.handle));
          } catch (error) {
            reject(error);
          }
        },
        fail: reject,
      });
      this.schedulePump();
    });
  }

  /** Fails every job that has not started yet; the handle is never touched again */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    const dropped = this.queue.splice(0);
    if (dropped.length > 0) {
      console.log(`[Dispatcher] Context ${this.id} closed with ${dropped.length} queued job(s)`);
    }
    for (const job of dropped) {
      job.fail(new NotConnectedError(`Connection lost before "${job.label}" could run`));
    }
    this.settleIdle();
  }

  /** Resolves once the queue is empty and nothing is running */
  whenIdle(): Promise<void> {
    if (!this.running && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private schedulePump(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    queueMicrotask(() => {
      void this.pump();
    });
  }

  private async pump(): Promise<void> {
    let next = this.queue.shift();
    while (next && !this.isClosed) {
      await next.run();
      next = this.queue.shift();
    }
    this.running = false;
    this.settleIdle();
  }

  private settleIdle(): void {
    if (this.running || this.queue.length > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}

/**
 * Entry point for the UI side. Jobs go to whichever connection context is
 * current; with none attached they fail fast with NotConnectedError.
 */
export class ActionDispatcher {
  private context: ConnectionContext | null = null;

  attach(context: ConnectionContext): void {
    this.context = context;
  }

  /** Detaches only if `context` is still the current one */
  detach(context: ConnectionContext): void {
    if (this.context === context) {
      this.context = null;
    }
  }

  get connected(): boolean {
    return this.context !== null && !this.context.closed;
  }

  invokeOnConnectionContext<T>(job: ConnectionJob<T>, label?: string): Promise<T> {
    const context = this.context;
    if (!context || context.closed) {
      return Promise.reject(new NotConnectedError());
    }
    return context.enqueue(job, label);
  }
}
