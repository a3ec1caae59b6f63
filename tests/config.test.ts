import { describe, it, expect } from "vitest";
import { normalizeHost, normalizeMac, parseDeviceSetup } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

describe("normalizeHost", () => {
  it("should drop leading zeros from dotted-quad parts", () => {
    expect(normalizeHost("192.168.001.020")).toBe("192.168.1.20");
    expect(normalizeHost(" 10.0.0.9 ")).toBe("10.0.0.9");
  });

  it("should leave host names alone", () => {
    expect(normalizeHost("boiler.local")).toBe("boiler.local");
  });
});

describe("normalizeMac", () => {
  it("should produce lower-case colon form", () => {
    expect(normalizeMac("AABBCCDDEEFF")).toBe("aa:bb:cc:dd:ee:ff");
    expect(normalizeMac("aa-bb-cc-dd-ee-0f")).toBe("aa:bb:cc:dd:ee:0f");
    expect(normalizeMac("AA:BB:CC:DD:EE:FF")).toBe("aa:bb:cc:dd:ee:ff");
  });

  it("should reject anything else", () => {
    expect(normalizeMac("aabbcc")).toBeNull();
    expect(normalizeMac("zzbbccddeeff")).toBeNull();
  });
});

describe("parseDeviceSetup", () => {
  it("should apply defaults and normalise fields", () => {
    expect(
      parseDeviceSetup({ host: "192.168.000.015", mac: "AABBCCDDEEFF", deviceType: "stm", configCode: 2 })
    ).toEqual({
      host: "192.168.0.15",
      mac: "aa:bb:cc:dd:ee:ff",
      deviceType: "STM",
      configCode: 2,
      port: 502,
      pollIntervalSeconds: 5,
      timeoutMs: 1000,
      failureThreshold: 3,
    });
  });

  it("should reject sub-second and overly long poll intervals", () => {
    const base = { host: "10.0.0.9", deviceType: "ACM", configCode: 0 };
    expect(() => parseDeviceSetup({ ...base, pollIntervalSeconds: 0.5 })).toThrow(ConfigurationError);
    expect(() => parseDeviceSetup({ ...base, pollIntervalSeconds: 7200 })).toThrow(ConfigurationError);
  });

  it("should list every problem in one error", () => {
    try {
      parseDeviceSetup({ host: "", mac: "nope", deviceType: "ACM", configCode: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (!(err instanceof ConfigurationError)) return;
      expect(err.kind).toBe("ValidationError");
      expect(err.issues).toHaveLength(3);
      expect(err.issues[1]).toBe('mac: "nope" is not a MAC address');
    }
  });
});
