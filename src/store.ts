/***
 * Store — Per-entity component records.
 *
 * The single source of truth for what data an entity has. Each entity
 * maps to a record of ComponentID → component instance, so "does this
 * entity have kinds X and Y" is two Map lookups, never a scan of values.
 *
 * The store does not consult the EntityRegistry: attach() creates a
 * record for any id it is given. Keeping the two consistent is the
 * CommandBuffer's job.
 *
 * Records iterate in the order they were first created. A record can
 * be left empty by detach_one(); only detach_all() deletes it.
 *
 ***/

import type { EntityID } from "./entity";
import type { ComponentID, ComponentKind } from "./component";
import { ComponentRegistry } from "./component/component_registry";

export type ComponentRecord = ReadonlyMap<ComponentID, object>;

export class ComponentStore {
  readonly kinds: ComponentRegistry = new ComponentRegistry();
  private readonly records: Map<EntityID, Map<ComponentID, object>> =
    new Map();

  /** Number of entities with a record. */
  public get size(): number {
    return this.records.size;
  }

  public has_record(entity: EntityID): boolean {
    return this.records.has(entity);
  }

  public components_of(entity: EntityID): ComponentRecord | undefined {
    return this.records.get(entity);
  }

  public entries(): IterableIterator<[EntityID, ComponentRecord]> {
    return this.records.entries();
  }

  /** Insert or overwrite the component under its kind. */
  public attach(entity: EntityID, component: object): void {
    const id = this.kinds.kind_of(component);
    let record = this.records.get(entity);
    if (record === undefined) {
      record = new Map();
      this.records.set(entity, record);
    }
    record.set(id, component);
  }

  public detach_one(entity: EntityID, kind: ComponentKind): void {
    const id = this.kinds.find(kind);
    if (id === undefined) return;
    this.records.get(entity)?.delete(id);
  }

  public detach_all(entity: EntityID): void {
    this.records.delete(entity);
  }
}
