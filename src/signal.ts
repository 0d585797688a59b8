/***
 * Signal — Named, synchronous, multi-listener channels.
 *
 * emit() calls every connected listener right away, in the order they
 * connected. There is no isolation: a listener that throws aborts the
 * emit and the error reaches the emitter.
 *
 * The SignalBus creates signals on first use and keeps them for the
 * lifetime of the app that owns it. Emitters and listeners agree on the
 * payload shape through the type argument:
 *
 *   const died = signals.signal<[entity: EntityID]>("entity_died");
 *   died.connect((e) => score.add(e));
 *   died.emit(e);
 *
 ***/

import { unsafe_cast } from "type_primitives";

export type Listener<Args extends unknown[]> = (...payload: Args) => void;

export class Signal<Args extends unknown[] = unknown[]> {
  readonly name: string;
  private readonly listeners: Listener<Args>[] = [];

  constructor(name: string) {
    this.name = name;
  }

  public get listener_count(): number {
    return this.listeners.length;
  }

  public connect(listener: Listener<Args>): void {
    this.listeners.push(listener);
  }

  public emit(...payload: Args): void {
    const listeners = this.listeners;
    for (let i = 0; i < listeners.length; i++) {
      listeners[i](...payload);
    }
  }
}

export class SignalBus {
  private readonly signals: Map<string, unknown> = new Map();

  public get size(): number {
    return this.signals.size;
  }

  public has(name: string): boolean {
    return this.signals.has(name);
  }

  public signal<Args extends unknown[] = unknown[]>(name: string): Signal<Args> {
    const existing = this.signals.get(name);
    // The payload type is a contract between the emitters and listeners
    // of one name; the bus only stores the channel.
    if (existing !== undefined) return unsafe_cast<Signal<Args>>(existing);

    const created = new Signal<Args>(name);
    this.signals.set(name, created);
    return created;
  }
}
