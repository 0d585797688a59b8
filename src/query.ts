/***
 * Query — Read-only views over the ComponentStore.
 *
 * Everything here fails soft: an unknown entity or a missing kind
 * yields undefined (or an empty list), never an exception. Queries see
 * the world as of the last CommandBuffer.apply(); anything queued since
 * is invisible.
 *
 * Usage (inside a system):
 *
 *   for (const e of query.filter(Position, Velocity)) {
 *     const [pos, vel] = query.get_all(e, Position, Velocity) ?? [];
 *     ...
 *   }
 *
 ***/

import type { EntityID } from "./entity";
import type {
  ComponentID,
  ComponentKind,
  ComponentsOf,
} from "./component";
import type { ComponentRecord, ComponentStore } from "./store";
import { unsafe_cast } from "type_primitives";

const has_all = (
  record: ComponentRecord,
  required: readonly ComponentID[],
): boolean => {
  for (let i = 0; i < required.length; i++) {
    if (!record.has(required[i])) return false;
  }
  return true;
};

export class Query {
  private readonly store: ComponentStore;

  constructor(store: ComponentStore) {
    this.store = store;
  }

  /**
   * Entities that have every one of `kinds`, in record creation order.
   * With no kinds, every entity that has a record.
   */
  public filter(...kinds: ComponentKind[]): EntityID[] {
    const required = this.resolve(kinds);
    if (required === undefined) return [];

    const out: EntityID[] = [];
    for (const [entity, record] of this.store.entries()) {
      if (has_all(record, required)) out.push(entity);
    }
    return out;
  }

  public has(entity: EntityID, ...kinds: ComponentKind[]): boolean {
    const record = this.store.components_of(entity);
    if (record === undefined) return false;
    const required = this.resolve(kinds);
    return required !== undefined && has_all(record, required);
  }

  public get<T extends object>(
    entity: EntityID,
    kind: ComponentKind<T>,
  ): T | undefined {
    const id = this.store.kinds.find(kind);
    if (id === undefined) return undefined;
    const value = this.store.components_of(entity)?.get(id);
    return value instanceof kind ? value : undefined;
  }

  /**
   * One slot per requested kind, undefined where the entity lacks it.
   * Undefined as a whole when the entity has no record at all.
   */
  public get_all<const Kinds extends readonly ComponentKind[]>(
    entity: EntityID,
    ...kinds: Kinds
  ): ComponentsOf<Kinds> | undefined {
    if (!this.store.has_record(entity)) return undefined;
    const out = kinds.map((kind) => this.get(entity, kind));
    // map() widens the tuple to an array; slots line up with `kinds`
    return unsafe_cast<ComponentsOf<Kinds>>(out);
  }

  // undefined when some kind was never attached anywhere, so nothing can match
  private resolve(
    kinds: readonly ComponentKind[],
  ): ComponentID[] | undefined {
    const ids: ComponentID[] = [];
    for (let i = 0; i < kinds.length; i++) {
      const id = this.store.kinds.find(kinds[i]);
      if (id === undefined) return undefined;
      ids.push(id);
    }
    return ids;
  }
}
