/***
 * debug_system — Logs what a system sees before it runs.
 *
 * Wraps a system in another with the same signature. Before calling
 * through it logs the system's name, the entities currently in the
 * store, and the kinds of any queued events; after, that it finished.
 * The wrapped system's behavior is untouched.
 *
 *   app.add_systems(PHASE.UPDATE, debug_system(movement));
 *
 ***/

import { system_name, type SystemFn } from "./system";
import { create_logger, LOG_LEVEL, type Logger } from "./utils/logger";
import { DEFAULT_LOGGER_SCOPE } from "./utils/constants";

export function debug_system(
  system: SystemFn,
  logger: Logger = create_logger(DEFAULT_LOGGER_SCOPE, LOG_LEVEL.DEBUG),
): SystemFn {
  const name = system_name(system);

  const wrapped: SystemFn = (commands, query, events) => {
    logger.debug(`running system ${name}`);
    logger.debug(`entities in scene: [${query.filter().join(", ")}]`);
    const queued = events.queued();
    if (queued.length > 0) {
      logger.debug(`queued events: [${queued.map((e) => e.event_name).join(", ")}]`);
    }

    system(commands, query, events);

    logger.debug(`system ${name} finished`);
  };

  // Keep the original name visible to schedules and stack traces
  Object.defineProperty(wrapped, "name", { value: name });
  return wrapped;
}
