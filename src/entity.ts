/***
 * Entity — Opaque integer identity.
 *
 * An entity carries no data of its own; it is only a key into the
 * component store. Ids come from a per-app counter that starts at
 * FIRST_ENTITY_ID and never hands the same value out twice, so a stale
 * id can never alias a newer entity.
 *
 ***/

import {
  Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";

export type EntityID = Brand<number, "entity_id">;

export const as_entity_id = (value: number) =>
  validate_and_cast<number, EntityID>(
    value,
    is_non_negative_integer,
    "EntityID must be a non-negative integer",
  );
