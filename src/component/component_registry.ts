/***
 *
 * ComponentRegistry - Assigns a ComponentID to every component class.
 *
 * Ids are handed out lazily the first time an instance of a kind is
 * attached or queued, and are stable for the lifetime of the owning
 * store. Lookup is by constructor identity, never by
 * name.
 *
 ***/

import {
  as_component_id,
  kind_name,
  type ComponentID,
  type ComponentKind,
} from "../component";
import { ECS_ERROR, ECSError } from "../utils/error";
import { ANONYMOUS } from "../utils/constants";

export class ComponentRegistry {
  private readonly ids: Map<Function, ComponentID> = new Map();
  private readonly names: string[] = [];

  /** Number of distinct kinds seen so far. */
  public get count(): number {
    return this.names.length;
  }

  /** Id for a kind, or undefined if nothing of that kind was ever seen. */
  public find(kind: ComponentKind): ComponentID | undefined {
    return this.ids.get(kind);
  }

  /**
   * Id for the kind of a component instance.
   *
   * Object literals and null-prototype objects have no class of their
   * own, so they cannot be told apart from each other and are rejected.
   */
  public kind_of(component: object): ComponentID {
    const ctor = component.constructor;
    if (typeof ctor !== "function" || ctor === Object) {
      throw new ECSError(
        ECS_ERROR.INVALID_COMPONENT,
        "Components must be class instances",
        { component },
      );
    }
    return this.resolve(ctor);
  }

  public name_of(id: ComponentID): string {
    return this.names[id] ?? ANONYMOUS;
  }

  private resolve(ctor: Function): ComponentID {
    const existing = this.ids.get(ctor);
    if (existing !== undefined) return existing;

    const id = as_component_id(this.names.length);
    this.ids.set(ctor, id);
    this.names.push(kind_name(ctor));
    return id;
  }
}
