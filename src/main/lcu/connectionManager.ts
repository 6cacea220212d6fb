import type { LcuEvent, SessionState } from "@shared/lcu";

import type { LcuHandle } from "./connection";
import { ActionDispatcher, ConnectionContext, type ConnectionJob } from "./dispatcher";
import {
  ConnectionError,
  ConnectionExhaustedError,
  NotConnectedError,
  describeError,
} from "./errors";
import { runHandshake } from "./handlers";
import type { EventRegistry } from "./registry";
import {
  DEFAULT_RETRY_POLICY,
  IDLE_RETRY_STATE,
  isCycleActive,
  nextRetryState,
  timerScheduler,
  type RetryEvent,
  type RetryPolicy,
  type RetryState,
  type Scheduler,
} from "./retry";
import type { SessionStore } from "./sessionState";

export type ConnectionStatus =
  | { type: "connecting"; attempt: number; maxAttempts: number }
  | { type: "attempt-failed"; attempt: number; maxAttempts: number; error: string; retryInMs: number }
  | { type: "connected"; contextId: number }
  | { type: "ready"; state: SessionState }
  | { type: "disconnected"; reason: string; willReconnect: boolean }
  | { type: "exhausted"; attempts: number };

/** Discovers the running client and opens a fresh handle; one call per attempt */
export type OpenConnection = () => Promise<LcuHandle>;

export interface ConnectionManagerOptions {
  openConnection: OpenConnection;
  store: SessionStore;
  registry: EventRegistry;
  dispatcher?: ActionDispatcher;
  policy?: RetryPolicy;
  /** Start a new connect cycle when an established connection drops */
  reconnectOnDisconnect?: boolean;
  scheduler?: Scheduler;
}

interface PendingCycle {
  promise: Promise<LcuHandle>;
  resolve: (handle: LcuHandle) => void;
  reject: (error: Error) => void;
}

export class ConnectionManager {
  readonly dispatcher: ActionDispatcher;

  private readonly openConnection: OpenConnection;
  private readonly store: SessionStore;
  private readonly registry: EventRegistry;
  private readonly policy: RetryPolicy;
  private readonly reconnectOnDisconnect: boolean;
  private readonly scheduler: Scheduler;

  private retryState: RetryState = IDLE_RETRY_STATE;
  private cancelRetryTimer: (() => void) | null = null;
  private cycle: PendingCycle | null = null;
  /** Bumped by stop() so attempts from an abandoned cycle discard their result */
  private generation = 0;
  private handle: LcuHandle | null = null;
  private context: ConnectionContext | null = null;
  private handleSubscriptions: Array<() => void> = [];
  private nextContextId = 1;
  private listeners = new Set<(status: ConnectionStatus) => void>();

  constructor(options: ConnectionManagerOptions) {
    this.openConnection = options.openConnection;
    this.store = options.store;
    this.registry = options.registry;
    this.dispatcher = options.dispatcher ?? new ActionDispatcher();
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.reconnectOnDisconnect = options.reconnectOnDisconnect ?? true;
    this.scheduler = options.scheduler ?? timerScheduler;

    if (!this.registry.isFrozen) {
      this.registry.freeze();
    }
  }

  get state(): RetryState {
    return this.retryState;
  }

  /** True while a connect cycle is attempting or waiting to retry */
  get connecting(): boolean {
    return isCycleActive(this.retryState);
  }

  onStatus(listener: (status: ConnectionStatus) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  snapshot(): SessionState {
    return this.store.snapshot();
  }

  invokeOnConnectionContext<T>(job: ConnectionJob<T>, label?: string): Promise<T> {
    return this.dispatcher.invokeOnConnectionContext(job, label);
  }

  /**
   * Resolves with the handle once the handshake has populated the session
   * state. Rejects with ConnectionExhaustedError after the last failed attempt.
   */
  connect(): Promise<LcuHandle> {
    if (this.cycle) {
      return this.cycle.promise;
    }
    if (this.handle && !this.handle.closed) {
      return Promise.resolve(this.handle);
    }

    let resolve: (handle: LcuHandle) => void = () => undefined;
    let reject: (error: Error) => void = () => undefined;
    const promise = new Promise<LcuHandle>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.cycle = { promise, resolve, reject };

    this.transition({ type: "start" });
    void this.attempt(this.generation);
    return promise;
  }

  /** Starts a background connect cycle; the outcome is reported through status events */
  start(): void {
    this.connect().catch((error: unknown) => {
      if (error instanceof ConnectionExhaustedError || error instanceof NotConnectedError) {
        return;
      }
      console.error("[LCU] Connect cycle failed:", describeError(error));
    });
  }

  stop(): void {
    this.generation += 1;
    this.cancelRetryTimer?.();
    this.cancelRetryTimer = null;

    const handle = this.handle;
    this.release();
    handle?.close();

    this.store.reset();
    this.retryState = IDLE_RETRY_STATE;
    this.settleCycle({ error: new NotConnectedError("Connection manager stopped") });
  }

  private transition(event: RetryEvent): RetryState {
    this.retryState = nextRetryState(this.retryState, event, this.policy);
    return this.retryState;
  }

  private emit(status: ConnectionStatus): void {
    for (const listener of this.listeners) {
      try {
        listener(status);
      } catch (error) {
        console.warn("[LCU] Status listener failed:", describeError(error));
      }
    }
  }

  private async attempt(generation: number): Promise<void> {
    const state = this.retryState;
    if (state.kind !== "attempting") {
      return;
    }

    this.emit({ type: "connecting", attempt: state.attempt, maxAttempts: this.policy.maxAttempts });

    let handle: LcuHandle;
    try {
      handle = await this.openConnection();
    } catch (error) {
      if (generation === this.generation) {
        this.handleAttemptFailure(error);
      }
      return;
    }

    if (generation !== this.generation) {
      handle.close();
      return;
    }

    this.transition({ type: "success" });
    this.adopt(handle);
  }

  private handleAttemptFailure(error: unknown): void {
    const next = this.transition({ type: "failure" });
    const message = describeError(error);

    if (next.kind === "exhausted") {
      const exhausted = new ConnectionExhaustedError(next.attempts, { cause: error });
      console.error(`[LCU] ${exhausted.message}`);
      this.emit({ type: "exhausted", attempts: next.attempts });
      this.settleCycle({ error: exhausted });
      return;
    }

    if (next.kind !== "waiting") {
      return;
    }

    console.log(
      `[LCU] Connection failed: ${message}, retrying in ${Math.round(next.delayMs / 1000)} seconds... (Attempt ${next.attempt}/${this.policy.maxAttempts})`,
    );
    this.emit({
      type: "attempt-failed",
      attempt: next.attempt,
      maxAttempts: this.policy.maxAttempts,
      error: message,
      retryInMs: next.delayMs,
    });

    const generation = this.generation;
    this.cancelRetryTimer = this.scheduler.schedule(() => {
      this.cancelRetryTimer = null;
      if (generation !== this.generation) {
        return;
      }
      this.transition({ type: "timer" });
      void this.attempt(generation);
    }, next.delayMs);
  }

  private adopt(handle: LcuHandle): void {
    const context = new ConnectionContext(handle, this.nextContextId++);
    this.handle = handle;
    this.context = context;
    this.handleSubscriptions = [
      handle.onEvent((event) => this.route(context, event)),
      handle.onClose((reason) => this.handleDrop(context, reason)),
    ];
    this.dispatcher.attach(context);
    console.log(`[LCU] Connected (context ${context.id})`);
    this.emit({ type: "connected", contextId: context.id });

    context
      .enqueue((active) => runHandshake(active, this.store), "handshake")
      .then(() => {
        if (this.context !== context) {
          return;
        }
        const state = this.store.snapshot();
        this.emit({ type: "ready", state });
        this.settleCycle({ handle });
      })
      .catch((error: unknown) => {
        console.warn("[LCU] Handshake did not complete:", describeError(error));
      });
  }

  /** Receive loop: events run through the connection context in arrival order */
  private route(context: ConnectionContext, event: LcuEvent): void {
    const handlers = this.registry.resolve(event);
    if (handlers.length === 0) {
      console.debug(`[LCU] Ignoring ${event.eventType} ${event.uri}`);
      return;
    }

    for (const { name, handler } of handlers) {
      context.enqueue((active) => handler(active, event), name).catch((error: unknown) => {
        if (error instanceof NotConnectedError) {
          return;
        }
        console.error(`[LCU] Handler "${name}" failed for ${event.eventType} ${event.uri}:`, describeError(error));
      });
    }
  }

  private handleDrop(context: ConnectionContext, reason: string): void {
    if (this.context !== context) {
      return;
    }

    const state = this.retryState;
    this.release();
    this.store.reset();

    // Dropped before the handshake finished: count it as a failed attempt of the running cycle.
    if (this.cycle && state.kind === "succeeded") {
      this.retryState = { kind: "attempting", attempt: state.attempt };
      this.handleAttemptFailure(new ConnectionError(`Connection dropped during handshake: ${reason}`));
      return;
    }

    const willReconnect = this.reconnectOnDisconnect;
    console.log(`[LCU] Disconnected: ${reason}${willReconnect ? ", reconnecting" : ""}`);
    this.retryState = IDLE_RETRY_STATE;
    this.emit({ type: "disconnected", reason, willReconnect });

    if (willReconnect) {
      this.start();
    }
  }

  /** Unhooks the current handle and fails its queued jobs without closing the transport */
  private release(): void {
    for (const unsubscribe of this.handleSubscriptions) {
      unsubscribe();
    }
    this.handleSubscriptions = [];

    const context = this.context;
    this.context = null;
    this.handle = null;
    if (context) {
      this.dispatcher.detach(context);
      context.close();
    }
  }

  private settleCycle(outcome: { handle: LcuHandle } | { error: Error }): void {
    const cycle = this.cycle;
    if (!cycle) {
      return;
    }
    this.cycle = null;
    if ("error" in outcome) {
      cycle.reject(outcome.error);
    } else {
      cycle.resolve(outcome.handle);
    }
  }
}
