import { describe, expect, it } from "vitest";
import { ComponentStore } from "../store";
import { as_entity_id } from "../entity";

class Position {
  constructor(
    public x = 0,
    public y = 0,
  ) {}
}
class Velocity {
  constructor(
    public dx = 0,
    public dy = 0,
  ) {}
}

const e0 = as_entity_id(0);
const e1 = as_entity_id(1);

describe("ComponentStore", () => {
  //=========================================================
  // attach
  //=========================================================

  it("attach creates a record for an unknown entity", () => {
    const store = new ComponentStore();
    expect(store.has_record(e0)).toBe(false);

    store.attach(e0, new Position());
    expect(store.has_record(e0)).toBe(true);
    expect(store.size).toBe(1);
  });

  it("attaching the same kind twice keeps only the second", () => {
    const store = new ComponentStore();
    const first = new Position(1, 1);
    const second = new Position(2, 2);
    store.attach(e0, first);
    store.attach(e0, second);

    const record = store.components_of(e0);
    const id = store.kinds.find(Position);
    expect(record?.size).toBe(1);
    expect(id).toBeDefined();
    if (id !== undefined) expect(record?.get(id)).toBe(second);
  });

  it("different kinds live side by side", () => {
    const store = new ComponentStore();
    store.attach(e0, new Position());
    store.attach(e0, new Velocity());
    expect(store.components_of(e0)?.size).toBe(2);
  });

  //=========================================================
  // components_of
  //=========================================================

  it("components_of is undefined for an entity with no record", () => {
    const store = new ComponentStore();
    expect(store.components_of(e1)).toBeUndefined();
  });

  //=========================================================
  // detach_one
  //=========================================================

  it("detach_one removes a single kind", () => {
    const store = new ComponentStore();
    store.attach(e0, new Position());
    store.attach(e0, new Velocity());
    store.detach_one(e0, Velocity);

    const record = store.components_of(e0);
    expect(record?.size).toBe(1);
    expect(record?.has(store.kinds.kind_of(new Position()))).toBe(true);
  });

  it("detach_one leaves an empty record behind", () => {
    const store = new ComponentStore();
    store.attach(e0, new Position());
    store.detach_one(e0, Position);
    expect(store.has_record(e0)).toBe(true);
    expect(store.components_of(e0)?.size).toBe(0);
  });

  it("detach_one is a no-op for a missing kind or entity", () => {
    const store = new ComponentStore();
    store.attach(e0, new Position());
    expect(() => store.detach_one(e0, Velocity)).not.toThrow();
    expect(() => store.detach_one(e1, Position)).not.toThrow();
    expect(store.components_of(e0)?.size).toBe(1);
  });

  //=========================================================
  // detach_all
  //=========================================================

  it("detach_all deletes the whole record", () => {
    const store = new ComponentStore();
    store.attach(e0, new Position());
    store.attach(e0, new Velocity());
    store.detach_all(e0);
    expect(store.has_record(e0)).toBe(false);
    expect(store.components_of(e0)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("detach_all is a no-op for an entity with no record", () => {
    const store = new ComponentStore();
    expect(() => store.detach_all(e1)).not.toThrow();
  });

  //=========================================================
  // Iteration
  //=========================================================

  it("entries iterate in record creation order", () => {
    const store = new ComponentStore();
    store.attach(e1, new Position());
    store.attach(e0, new Position());
    store.attach(e1, new Velocity());
    expect([...store.entries()].map(([e]) => e)).toEqual([e1, e0]);
  });
});
