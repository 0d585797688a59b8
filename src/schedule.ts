/***
 * Schedule — Phase buckets and the run-then-apply protocol.
 *
 * Systems are grouped into six phases, in this order:
 *
 *   INIT → PRE_UPDATE → UPDATE → POST_UPDATE → DRAW → UNLOAD
 *
 * Within a phase, systems run in registration order, one at a time, to
 * completion. After the last one returns, the phase's CommandBuffer is
 * applied once, so commands queued by any system of the phase become
 * visible together and only to later phases.
 *
 * The App drives INIT, UPDATE and DRAW through init(), update() and
 * draw(). The other phases are run by a caller's own loop through
 * App.run(phase).
 *
 ***/

import { system_name, type SystemContext, type SystemFn } from "./system";
import { ECS_ERROR, ECSError } from "./utils/error";

export enum PHASE {
  INIT = "INIT",
  PRE_UPDATE = "PRE_UPDATE",
  UPDATE = "UPDATE",
  POST_UPDATE = "POST_UPDATE",
  DRAW = "DRAW",
  UNLOAD = "UNLOAD",
}

export const PHASE_ORDER = [
  PHASE.INIT,
  PHASE.PRE_UPDATE,
  PHASE.UPDATE,
  PHASE.POST_UPDATE,
  PHASE.DRAW,
  PHASE.UNLOAD,
] as const;

export class Schedule {
  private readonly phase_systems: Map<PHASE, SystemFn[]> = new Map();

  constructor() {
    for (let i = 0; i < PHASE_ORDER.length; i++) {
      this.phase_systems.set(PHASE_ORDER[i], []);
    }
  }

  add_systems(phase: PHASE, ...systems: SystemFn[]): void {
    const bucket = this.bucket(phase);
    for (const system of systems) bucket.push(system);
  }

  get system_count(): number {
    let total = 0;
    for (const bucket of this.phase_systems.values()) total += bucket.length;
    return total;
  }

  /** Run every system of `phase`, then apply the queued commands once. */
  run_phase(phase: PHASE, ctx: SystemContext): number {
    const bucket = this.bucket(phase);
    const { commands, query, events } = ctx;
    for (let i = 0; i < bucket.length; i++) {
      bucket[i](commands, query, events);
    }
    commands.apply();
    return bucket.length;
  }

  describe(phase: PHASE): string[] {
    return this.bucket(phase).map(system_name);
  }

  private bucket(phase: PHASE): SystemFn[] {
    const bucket = this.phase_systems.get(phase);
    if (bucket === undefined) {
      throw new ECSError(ECS_ERROR.UNKNOWN_PHASE, `Unknown phase ${phase}`, {
        phase,
      });
    }
    return bucket;
  }
}
