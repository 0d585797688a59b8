/***
 * Component — Kinds are classes, components are their instances.
 *
 * A component is any class instance; its kind is its constructor. The
 * store keys records by a numeric ComponentID that the ComponentRegistry
 * assigns per constructor, so two classes that happen to share a name
 * (say, `Position` from two different modules) never collide.
 *
 * Usage:
 *
 *   class Position { constructor(public x = 0, public y = 0) {} }
 *   class Velocity { constructor(public dx = 0, public dy = 0) {} }
 *
 *   const e = commands.spawn(new Position(), new Velocity(1, 0));
 *   commands.remove_component(e, Velocity);
 *
 ***/

import {
  Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import { ANONYMOUS } from "./utils/constants";

export type ComponentID = Brand<number, "component_id">;

export const as_component_id = (value: number) =>
  validate_and_cast<number, ComponentID>(
    value,
    is_non_negative_integer,
    "ComponentID must be a non-negative integer",
  );

/** Constructor of a component class. The instance type is the component. */
export type ComponentKind<T extends object = object> = new (
  ...args: never[]
) => T;

// Maps a tuple of kinds to a tuple of optional instances.
// e.g. [typeof Position, typeof Velocity] → [Position | undefined, Velocity | undefined]
export type ComponentsOf<Kinds extends readonly ComponentKind[]> = {
  [K in keyof Kinds]: Kinds[K] extends ComponentKind<infer T extends object>
    ? T | undefined
    : never;
};

export const kind_name = (kind: Function): string => kind.name || ANONYMOUS;
