/***
 * Event — Typed, queued, FIFO notifications.
 *
 * Unlike signals, events are not delivered when emitted. emit() only
 * appends to the queue; process() later dispatches each event, oldest
 * first, to the listeners subscribed to its exact class (a subclass
 * does not reach listeners of its parent).
 *
 * process() keeps going until the queue is empty, so an event emitted
 * by a listener is dispatched in the same process() call, after every
 * event that was already waiting. The app calls process() once per
 * update(), before the UPDATE systems run.
 *
 * Usage:
 *
 *   class Damage extends Event {
 *     constructor(readonly target: EntityID, readonly amount: number) {
 *       super();
 *     }
 *   }
 *
 *   events.subscribe(Damage, (ev) => apply_damage(ev.target, ev.amount));
 *   events.emit(new Damage(e, 10));
 *
 ***/

import { ECS_ERROR, ECSError } from "./utils/error";
import { ANONYMOUS } from "./utils/constants";

/** Base class every event derives from. */
export class Event {
  /** Name of the event's class, for diagnostics. */
  public get event_name(): string {
    return this.constructor.name || ANONYMOUS;
  }
}

export type EventKind<E extends Event = Event> = new (...args: never[]) => E;

type Dispatch = (event: Event) => void;

export class EventBus {
  private readonly listeners: Map<Function, Dispatch[]> = new Map();
  private queue: Event[] = [];
  // Index of the next event to dispatch. Everything before it is spent.
  private head = 0;

  /** Number of events waiting to be dispatched. */
  public get pending(): number {
    return this.queue.length - this.head;
  }

  /** Snapshot of the waiting events, oldest first. */
  public queued(): readonly Event[] {
    return this.queue.slice(this.head);
  }

  public subscribe<E extends Event>(
    kind: EventKind<E>,
    listener: (event: E) => void,
  ): void {
    const dispatch: Dispatch = (event) => {
      if (event instanceof kind) listener(event);
    };
    const bucket = this.listeners.get(kind);
    if (bucket !== undefined) {
      bucket.push(dispatch);
    } else {
      this.listeners.set(kind, [dispatch]);
    }
  }

  public emit(event: Event): void {
    if (__DEV__ && !(event instanceof Event)) {
      throw new ECSError(
        ECS_ERROR.INVALID_EVENT,
        "Events must derive from Event",
        { event },
      );
    }
    this.queue.push(event);
  }

  /**
   * Dispatch until the queue is empty.
   *
   * A listener that throws stops the drain; the event it was handling
   * is consumed, the ones behind it stay queued for the next call.
   */
  public process(): void {
    while (this.head < this.queue.length) {
      const event = this.queue[this.head++];
      const bucket = this.listeners.get(event.constructor);
      if (bucket === undefined) continue;
      for (let i = 0; i < bucket.length; i++) {
        bucket[i](event);
      }
    }
    this.queue = [];
    this.head = 0;
  }
}
