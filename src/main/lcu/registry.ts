import { LCU_EVENT_TYPES, type LcuEvent, type LcuEventType } from "@shared/lcu";

import type { LcuHandle } from "./connection";

export type LcuEventHandler = (handle: LcuHandle, event: LcuEvent) => Promise<void> | void;

interface Registration {
  name: string;
  eventTypes: ReadonlySet<LcuEventType>;
  handler: LcuEventHandler;
}

export interface RegisterOptions {
  /** Defaults to every event type */
  eventTypes?: readonly LcuEventType[];
  /** Label used in logs */
  name?: string;
}

/**
 * Maps (path, event type) to handlers. Registration happens once at startup;
 * after `freeze()` the table is read-only and lookups for anything not
 * registered return an empty list.
 */
export class EventRegistry {
  private readonly routes = new Map<string, Registration[]>();
  private frozen = false;

  register(path: string, handler: LcuEventHandler, options: RegisterOptions = {}): this {
    if (this.frozen) {
      throw new Error(`Event registry is frozen; cannot register ${path}`);
    }
    const registration: Registration = {
      name: options.name ?? path,
      eventTypes: new Set(options.eventTypes ?? LCU_EVENT_TYPES),
      handler,
    };
    const existing = this.routes.get(path);
    if (existing) {
      existing.push(registration);
    } else {
      this.routes.set(path, [registration]);
    }
    return this;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  resolve(event: LcuEvent): Array<{ name: string; handler: LcuEventHandler }> {
    const registrations = this.routes.get(event.uri);
    if (!registrations) {
      return [];
    }
    return registrations
      .filter((registration) => registration.eventTypes.has(event.eventType))
      .map(({ name, handler }) => ({ name, handler }));
  }

  paths(): string[] {
    return [...this.routes.keys()];
  }
}
