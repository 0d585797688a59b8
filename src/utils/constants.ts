import { LOG_LEVEL } from "./logger";

// Entity ids start here and only ever count upwards
export const FIRST_ENTITY_ID = 0;

export const DEFAULT_LOG_LEVEL = LOG_LEVEL.WARN;
export const DEFAULT_LOGGER_SCOPE = "ecs";

// Name reported for systems and kinds declared as anonymous functions/classes
export const ANONYMOUS = "<anonymous>";
