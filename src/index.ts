// App
export { App, type AppOptions } from "./app";

// Schedule
export { PHASE, PHASE_ORDER } from "./schedule";

// Systems
export type { SystemFn, SystemContext } from "./system";
export { debug_system } from "./debug";

// World handles
export { CommandBuffer } from "./commands";
export { Query } from "./query";

// Entities
export type { EntityID } from "./entity";

// Components
export type { ComponentID, ComponentKind, ComponentsOf } from "./component";
export type { ComponentRecord } from "./store";

// Events & signals
export { Event, EventBus, type EventKind } from "./event";
export { Signal, SignalBus, type Listener } from "./signal";

// Errors & logging
export { AppError, ECSError, ECS_ERROR, is_ecs_error } from "./utils/error";
export { LOG_LEVEL, create_logger, type Logger } from "./utils/logger";
