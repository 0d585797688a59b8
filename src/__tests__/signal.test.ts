import { describe, expect, it } from "vitest";
import { Signal, SignalBus } from "../signal";

describe("Signal", () => {
  it("calls listeners synchronously in connection order", () => {
    const sig = new Signal<[string]>("hit");
    const order: string[] = [];
    sig.connect((who) => order.push(`L1 ${who}`));
    sig.connect((who) => order.push(`L2 ${who}`));
    sig.connect((who) => order.push(`L3 ${who}`));

    sig.emit("a");
    expect(order).toEqual(["L1 a", "L2 a", "L3 a"]);

    sig.emit("b");
    expect(order).toEqual(["L1 a", "L2 a", "L3 a", "L1 b", "L2 b", "L3 b"]);
  });

  it("passes every payload argument through", () => {
    const sig = new Signal<[number, number]>("moved");
    const got: number[][] = [];
    sig.connect((x, y) => got.push([x, y]));
    sig.emit(3, 4);
    expect(got).toEqual([[3, 4]]);
  });

  it("emit with no listeners does nothing", () => {
    const sig = new Signal("idle");
    expect(() => sig.emit()).not.toThrow();
    expect(sig.listener_count).toBe(0);
  });

  it("a throwing listener propagates and stops the rest", () => {
    const sig = new Signal<[]>("fail");
    let reached = false;
    sig.connect(() => {
      throw new Error("listener failed");
    });
    sig.connect(() => {
      reached = true;
    });

    expect(() => sig.emit()).toThrow("listener failed");
    expect(reached).toBe(false);
  });
});

describe("SignalBus", () => {
  it("creates a signal on first use and returns it afterwards", () => {
    const bus = new SignalBus();
    expect(bus.has("spawned")).toBe(false);

    const first = bus.signal("spawned");
    const second = bus.signal("spawned");
    expect(second).toBe(first);
    expect(first.name).toBe("spawned");
    expect(bus.size).toBe(1);
  });

  it("different names are different channels", () => {
    const bus = new SignalBus();
    const calls: string[] = [];
    bus.signal("a").connect(() => calls.push("a"));
    bus.signal("b").connect(() => calls.push("b"));

    bus.signal("b").emit();
    expect(calls).toEqual(["b"]);
  });

  it("separate buses share nothing", () => {
    const one = new SignalBus();
    const two = new SignalBus();
    one.signal("x").connect(() => {});
    expect(two.has("x")).toBe(false);
    expect(two.signal("x").listener_count).toBe(0);
  });
});
