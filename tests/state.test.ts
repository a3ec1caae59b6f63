import { describe, it, expect, vi } from "vitest";
import type { Logger } from "../src/logger.js";
import { StateStore, type DeviceState } from "../src/state.js";

describe("StateStore", () => {
  it("should emit one change for values and availability together", () => {
    const store = new StateStore();
    const seen: DeviceState[] = [];
    store.on("change", (state: DeviceState) => seen.push(state));

    const update = store.update({ values: { power: true }, available: true, at: 1000 });

    expect(update).toEqual({ valuesChanged: true, availabilityChanged: true });
    expect(seen).toEqual([{ values: { power: true }, available: true, lastUpdated: 1000 }]);
  });

  it("should stay silent when nothing observable changed", () => {
    const store = new StateStore();
    store.update({ values: { power: true }, available: true, at: 1000 });
    let changes = 0;
    store.on("change", () => changes++);

    const update = store.update({ values: { power: true }, at: 2000 });

    expect(update).toEqual({ valuesChanged: false, availabilityChanged: false });
    expect(changes).toBe(0);
    expect(store.state.lastUpdated).toBe(2000);
  });

  it("should merge partial values and keep the rest", () => {
    const store = new StateStore();
    store.update({ values: { light1: true, light2: false } });
    store.update({ values: { light2: true } });
    expect(store.state.values).toEqual({ light1: true, light2: true });
  });

  it("should hand out frozen snapshots", () => {
    const store = new StateStore();
    store.update({ values: { level1: 40 }, available: true });
    const snapshot = store.state;

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.values)).toBe(true);
    store.update({ values: { level1: 60 } });
    expect(snapshot.values.level1).toBe(40);
  });

  it("should log a throwing listener and still reach the others", () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const store = new StateStore({ logger });
    const failure = new Error("listener bug");
    const seen: boolean[] = [];
    store.on("change", () => {
      throw failure;
    });
    store.on("change", (state: DeviceState) => seen.push(state.available));

    const update = store.update({ available: true });

    expect(update).toEqual({ valuesChanged: false, availabilityChanged: true });
    expect(seen).toEqual([true]);
    expect(store.state.available).toBe(true);
    expect(logger.error).toHaveBeenCalledWith("State listener failed:", failure);
  });

  it("should drop once listeners after their first change", () => {
    const store = new StateStore();
    let calls = 0;
    store.once("change", () => calls++);
    store.update({ available: true });
    store.update({ available: false });
    expect(calls).toBe(1);
  });
});
