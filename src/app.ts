/***
 * App — Public ECS facade and tick driver.
 *
 * Owns one of everything: the EntityRegistry and ComponentStore (data),
 * the CommandBuffer (the only write path), the Query (reads), the
 * SignalBus and EventBus (notification), and the Schedule (when systems
 * run). Nothing is global, so two apps never share state.
 *
 * Usage:
 *
 *   class Position { constructor(public x = 0, public y = 0) {} }
 *   class Velocity { constructor(public dx = 0, public dy = 0) {} }
 *
 *   const spawn_player: SystemFn = (commands) => {
 *     commands.spawn(new Position(), new Velocity(1, 0));
 *   };
 *
 *   const movement: SystemFn = (_commands, query) => {
 *     for (const e of query.filter(Position, Velocity)) {
 *       const pos = query.get(e, Position);
 *       const vel = query.get(e, Velocity);
 *       if (pos && vel) { pos.x += vel.dx; pos.y += vel.dy; }
 *     }
 *   };
 *
 *   const app = new App()
 *     .add_systems(PHASE.INIT, spawn_player)
 *     .add_systems(PHASE.UPDATE, movement);
 *
 *   app.init();
 *   // game loop
 *   app.update();
 *   app.draw();
 *
 ***/

import { EntityRegistry } from "./entity/entity_registry";
import { ComponentStore } from "./store";
import { CommandBuffer } from "./commands";
import { Query } from "./query";
import { EventBus } from "./event";
import { SignalBus } from "./signal";
import { PHASE, Schedule } from "./schedule";
import type { SystemContext, SystemFn } from "./system";
import { create_logger, type LOG_LEVEL, type Logger } from "./utils/logger";
import { DEFAULT_LOG_LEVEL, DEFAULT_LOGGER_SCOPE } from "./utils/constants";

export interface AppOptions {
  /** Threshold for the default console logger. Ignored when `logger` is given. */
  log_level?: LOG_LEVEL;
  logger?: Logger;
}

export class App {
  private readonly entities: EntityRegistry;
  private readonly store: ComponentStore;
  private readonly schedule: Schedule;
  private readonly ctx: SystemContext;
  private readonly logger: Logger;

  readonly commands: CommandBuffer;
  readonly query: Query;
  readonly events: EventBus;
  readonly signals: SignalBus;

  constructor(options?: AppOptions) {
    this.logger =
      options?.logger ??
      create_logger(DEFAULT_LOGGER_SCOPE, options?.log_level ?? DEFAULT_LOG_LEVEL);

    this.entities = new EntityRegistry();
    this.store = new ComponentStore();
    this.signals = new SignalBus();
    this.events = new EventBus();
    this.commands = new CommandBuffer(
      this.entities,
      this.store,
      this.signals,
      this.logger,
    );
    this.query = new Query(this.store);
    this.schedule = new Schedule();
    this.ctx = {
      commands: this.commands,
      query: this.query,
      events: this.events,
    };
  }

  /** Number of live entities, including spawned ones not yet applied. */
  public get entity_count(): number {
    return this.entities.count;
  }

  public get system_count(): number {
    return this.schedule.system_count;
  }

  public add_systems(phase: PHASE, ...systems: SystemFn[]): this {
    this.schedule.add_systems(phase, ...systems);
    return this;
  }

  /** Names of the systems registered in `phase`, in run order. */
  public systems_in(phase: PHASE): string[] {
    return this.schedule.describe(phase);
  }

  public init(): void {
    this.run(PHASE.INIT);
  }

  public update(): void {
    // Events queued since the last update are handled before any
    // UPDATE system runs
    this.events.process();
    this.run(PHASE.UPDATE);
  }

  public draw(): void {
    this.run(PHASE.DRAW);
  }

  /** Run any phase with the run-then-apply protocol. */
  public run(phase: PHASE): void {
    const ran = this.schedule.run_phase(phase, this.ctx);
    this.logger.debug(`phase ${phase} ran ${ran} systems`, {
      entities: this.entities.count,
    });
  }
}
