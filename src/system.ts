/***
 * System — Plain functions over the world's handles.
 *
 * A system receives the app's CommandBuffer, Query and EventBus, reads
 * through the query, and changes the world only by queueing commands
 * or events. It returns nothing.
 *
 ***/

import type { CommandBuffer } from "./commands";
import type { Query } from "./query";
import type { EventBus } from "./event";
import { ANONYMOUS } from "./utils/constants";

export type SystemFn = (
  commands: CommandBuffer,
  query: Query,
  events: EventBus,
) => void;

/** The three handles every system of one app is called with. */
export interface SystemContext {
  readonly commands: CommandBuffer;
  readonly query: Query;
  readonly events: EventBus;
}

export const system_name = (system: SystemFn): string =>
  system.name || ANONYMOUS;
