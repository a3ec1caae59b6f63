import { describe, it, expect } from "vitest";
import type { Channel } from "../src/codec.js";
import { UnknownProfileError } from "../src/errors.js";
import {
  DEVICE_TYPES,
  documentedConfigCodes,
  planReads,
  resolve,
} from "../src/profiles.js";

function names(channels: readonly Channel[]): string[] {
  return channels.map((c) => c.name);
}

describe("resolve", () => {
  it("should resolve every documented type and config code", () => {
    for (const type of DEVICE_TYPES) {
      for (const code of documentedConfigCodes(type)) {
        const profile = resolve(type, code);
        expect(profile.deviceType).toBe(type);
        expect(profile.configCode).toBe(code);
        expect(profile.channels.length).toBeGreaterThan(0);
        expect(profile.reads.length).toBeGreaterThan(0);
      }
    }
  });

  it("should be deterministic", () => {
    expect(resolve("STM", 2)).toBe(resolve("STM", 2));
    expect(resolve("sdm", 9)).toEqual(resolve("SDM", 9));
  });

  it("should return frozen capability sets", () => {
    const profile = resolve("ACM", 0);
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.channels)).toBe(true);
    expect(Object.isFrozen(profile.channels[0])).toBe(true);
  });

  it("should fail closed for unknown types and codes", () => {
    expect(() => resolve("XYZ", 0)).toThrow(UnknownProfileError);
    expect(() => resolve("STM", 0)).toThrow(UnknownProfileError);
    expect(() => resolve("STM", 4)).toThrow(UnknownProfileError);
    expect(() => resolve("SDM", 8)).toThrow(UnknownProfileError);
    expect(() => resolve("PMM", 3)).toThrow(UnknownProfileError);
    expect(() => resolve("ACM", 1.5)).toThrow(UnknownProfileError);
    expect(() => resolve("HCM", 0)).toThrow("No register layout for device type HCM with config code 0");
  });

  it("should expose one light per switch gang", () => {
    expect(names(resolve("STM", 1).channels)).toEqual(["light1"]);
    expect(names(resolve("SBM", 3).channels)).toEqual(["light1", "light2", "light3"]);
    expect(resolve("STM", 3).channels.map((c) => c.address)).toEqual([0, 1, 2]);
  });

  it("should add colour temperature to dimmers with config codes above 8", () => {
    expect(names(resolve("SDM", 2).channels)).toEqual(["level1", "level2"]);
    const tunable = resolve("SDM", 10).channels;
    expect(names(tunable)).toEqual(["level1", "colorTemperature1", "level2", "colorTemperature2"]);
    expect(tunable.map((c) => c.address)).toEqual([0, 1, 2, 3]);
  });

  it("should let dimmer levels report and accept the last-level word", () => {
    const [level] = resolve("SDM", 1).channels;
    expect(level).toMatchObject({ kind: "number", name: "level1", special: { on: 101 } });
  });

  it("should add the room temperature only to the probe variant of the AC controller", () => {
    expect(names(resolve("ACM", 0).channels)).not.toContain("currentTemperature");
    expect(names(resolve("ACM", 1).channels)).toContain("currentTemperature");
  });

  it("should select the power meter's sub-metering channels from the config code", () => {
    const subMeters = (code: number) =>
      resolve("PMM", code).channels.filter((c) => c.name.startsWith("subPower"));
    expect(subMeters(0)).toHaveLength(0);
    expect(subMeters(2).map((c) => [c.name, c.address])).toEqual([
      ["subPower1", 48],
      ["subPower2", 49],
    ]);
  });

  it("should read every profile in a single exchange", () => {
    expect(resolve("PMM", 2).reads).toEqual([{ start: 0, quantity: 50 }]);
    expect(resolve("PMM", 0).reads).toEqual([{ start: 0, quantity: 42 }]);
    expect(resolve("ACM", 0).reads).toEqual([{ start: 0, quantity: 56 }]);
    expect(resolve("STM", 2).reads).toEqual([{ start: 0, quantity: 2 }]);
  });
});

describe("planReads", () => {
  it("should split channels that do not fit one 64-register read", () => {
    const channels: Channel[] = [
      { kind: "number", name: "a", address: 0, access: "read" },
      { kind: "number", name: "b", address: 63, access: "read" },
      { kind: "uint32", name: "c", address: 63, access: "read" },
      { kind: "number", name: "d", address: 100, access: "read" },
    ];
    expect(planReads(channels)).toEqual([
      { start: 0, quantity: 64 },
      { start: 63, quantity: 38 },
    ]);
  });

  it("should keep a counter's scattered registers in one read", () => {
    const channels: Channel[] = [
      { kind: "number", name: "a", address: 0, access: "read" },
      { kind: "counter", name: "e", address: 70, access: "read", factor: 10, remainderAddress: 2 },
    ];
    expect(planReads(channels)).toEqual([
      { start: 0, quantity: 1 },
      { start: 2, quantity: 69 },
    ]);
  });

  it("should return no reads for an empty layout", () => {
    expect(planReads([])).toEqual([]);
  });
});
