/***
 *
 * EntityRegistry - Allocates entity ids and tracks which are alive.
 *
 * Ids are handed out from a monotonically increasing counter and are
 * never recycled. Releasing an id that is not alive is a caller bug
 * (double despawn, or a stale id reused) and always throws.
 *
 ***/

import { as_entity_id, type EntityID } from "../entity";
import { ECS_ERROR, ECSError } from "../utils/error";
import { FIRST_ENTITY_ID } from "../utils/constants";

export class EntityRegistry {
  private next_id = FIRST_ENTITY_ID;
  private readonly live: Set<EntityID> = new Set();

  //=========================================================
  // Queries
  //=========================================================

  /** Number of entities currently alive. */
  public get count(): number {
    return this.live.size;
  }

  public is_alive(id: EntityID): boolean {
    return this.live.has(id);
  }

  //=========================================================
  // Mutations
  //=========================================================

  public allocate(): EntityID {
    const id = as_entity_id(this.next_id++);
    this.live.add(id);
    return id;
  }

  public release(id: EntityID): void {
    if (!this.live.delete(id)) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_FOUND,
        `Entity ${id} is not alive`,
        { entity: id },
      );
    }
  }
}
