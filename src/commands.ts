/***
 * CommandBuffer — The only write path into the world during a phase.
 *
 * Systems never touch the EntityRegistry or ComponentStore directly.
 * They queue commands here, and the scheduler calls apply() once at
 * the end of each phase. Until then no query can observe the change,
 * so every system in a phase reads the same world.
 *
 * spawn() is the one exception to "nothing happens until apply": the
 * entity id is allocated immediately so the caller can reference it in
 * later commands of the same tick. Its components still wait for apply.
 *
 * apply() runs four passes in a fixed order, each draining its queue
 * before the next starts:
 *
 *   1. spawns   — attach each spawned entity's components
 *   2. despawns — release the id (throws if not alive), drop its record
 *   3. adds     — attach, skipped for entities that are no longer alive
 *   4. removes  — detach one kind, no-op if absent
 *
 * Because despawns run before adds and removes, a despawn queued in the
 * same tick as an add for that entity wins: the entity does not come
 * back with the added component.
 *
 ***/

import type { EntityID } from "./entity";
import type { ComponentKind } from "./component";
import type { EntityRegistry } from "./entity/entity_registry";
import type { ComponentStore } from "./store";
import type { Signal, SignalBus } from "./signal";
import { SILENT_LOGGER, type Logger } from "./utils/logger";

interface SpawnCommand {
  entity: EntityID;
  components: object[];
}

interface AddCommand {
  entity: EntityID;
  component: object;
}

interface RemoveCommand {
  entity: EntityID;
  kind: ComponentKind;
}

export class CommandBuffer {
  private readonly entities: EntityRegistry;
  private readonly store: ComponentStore;
  private readonly signals: SignalBus;
  private readonly logger: Logger;

  private spawns: SpawnCommand[] = [];
  private despawns: EntityID[] = [];
  private adds: AddCommand[] = [];
  private removes: RemoveCommand[] = [];

  constructor(
    entities: EntityRegistry,
    store: ComponentStore,
    signals: SignalBus,
    logger: Logger = SILENT_LOGGER,
  ) {
    this.entities = entities;
    this.store = store;
    this.signals = signals;
    this.logger = logger;
  }

  /** Number of commands waiting for apply(). */
  public get pending(): number {
    return (
      this.spawns.length +
      this.despawns.length +
      this.adds.length +
      this.removes.length
    );
  }

  /** Signal channel shared by every system of the app. */
  public signal<Args extends unknown[] = unknown[]>(name: string): Signal<Args> {
    return this.signals.signal<Args>(name);
  }

  //=========================================================
  // Queueing
  //=========================================================

  public spawn(...components: object[]): EntityID {
    if (__DEV__) {
      // Reject kind-less components here, where the caller can see them,
      // instead of during apply()
      for (let i = 0; i < components.length; i++) {
        this.store.kinds.kind_of(components[i]);
      }
    }
    const entity = this.entities.allocate();
    this.spawns.push({ entity, components });
    return entity;
  }

  public despawn(entity: EntityID): void {
    this.despawns.push(entity);
  }

  public add_component(entity: EntityID, component: object): void {
    if (__DEV__) this.store.kinds.kind_of(component);
    this.adds.push({ entity, component });
  }

  public remove_component(entity: EntityID, kind: ComponentKind): void {
    this.removes.push({ entity, kind });
  }

  //=========================================================
  // Apply
  //=========================================================

  public apply(): void {
    // Each queue is taken off the buffer before it is processed. A
    // failing despawn puts back only the despawns it did not reach.
    const spawns = this.spawns;
    this.spawns = [];
    for (const { entity, components } of spawns) {
      for (let i = 0; i < components.length; i++) {
        this.store.attach(entity, components[i]);
      }
    }

    const despawns = this.despawns;
    this.despawns = [];
    for (let i = 0; i < despawns.length; i++) {
      const entity = despawns[i];
      if (!this.entities.is_alive(entity)) {
        this.despawns = despawns.slice(i + 1);
      }
      this.entities.release(entity);
      this.store.detach_all(entity);
    }

    const adds = this.adds;
    this.adds = [];
    for (const { entity, component } of adds) {
      if (!this.entities.is_alive(entity)) {
        this.logger.debug(
          `dropped ${component.constructor.name} for dead entity ${entity}`,
        );
        continue;
      }
      this.store.attach(entity, component);
    }

    const removes = this.removes;
    this.removes = [];
    for (const { entity, kind } of removes) {
      this.store.detach_one(entity, kind);
    }

    const total =
      spawns.length + despawns.length + adds.length + removes.length;
    if (total > 0) {
      this.logger.debug(`applied ${total} commands`, {
        spawns: spawns.length,
        despawns: despawns.length,
        adds: adds.length,
        removes: removes.length,
      });
    }
  }
}
