/**
 * Device profile registry.
 *
 * A closed table keyed by device type. Each entry lists the configuration
 * codes it accepts and builds the channel layout for one of them. Resolution
 * fails closed: unknown types and undocumented codes raise
 * {@link UnknownProfileError} rather than falling back to a default layout.
 */

import {
  registersOf,
  type Access,
  type Channel,
  type ChannelLayout,
  type NumberChannel,
} from "./codec.js";
import { UnknownProfileError } from "./errors.js";
import { MAX_REGISTERS_PER_READ } from "./frame.js";

// ---------- Types ----------

export const DEVICE_TYPES = ["ACM", "BCM", "TCM", "CCM", "PMM", "AQM", "RBM", "STM", "SBM", "SDM"] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

/** One contiguous read of holding registers. */
export interface ReadSpan {
  start: number;
  quantity: number;
}

export interface CapabilitySet extends ChannelLayout {
  readonly deviceType: DeviceType;
  readonly configCode: number;
  readonly description: string;
  readonly channels: readonly Channel[];
  /** Minimum set of contiguous reads covering every channel */
  readonly reads: readonly ReadSpan[];
}

interface ProfileDefinition {
  description: string;
  configCodes: readonly number[];
  channels(configCode: number): Channel[];
}

// ---------- Channel builders ----------

type NumberOptions = Omit<NumberChannel, "kind" | "name" | "address" | "access">;

function num(name: string, address: number, options: NumberOptions = {}, access: Access = "read"): Channel {
  return { kind: "number", name, address, access, ...options };
}

function flag(name: string, address: number, access: Access = "read"): Channel {
  return { kind: "boolean", name, address, access };
}

function bit(name: string, address: number, mask: number): Channel {
  return { kind: "boolean", name, address, access: "read", mask };
}

function choice(name: string, address: number, options: readonly string[], access: Access = "read"): Channel {
  return { kind: "enum", name, address, access, options };
}

function tone(name: string, address: number): Channel {
  return { kind: "colorTemperature", name, address, access: "readwrite", unit: "mired" };
}

function range(from: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => from + i);
}

// ---------- Option tables ----------

const AC_MODES = ["cool", "dry", "fan_only", "auto", "heat"] as const;
const AC_FAN_MODES = ["low", "medium", "high", "auto"] as const;
const AC_SWING_MODES = ["off", "vertical", "horizontal", "both"] as const;
const BOILER_MANUFACTURERS = [
  "kyungdong",
  "kiturami",
  "daesung",
  "rinnai",
  "dmax",
  "reserved1",
  "reserved2",
] as const;
const THERMOSTAT_FAN_SPEEDS = ["auto", "low", "middle", "high"] as const;
const THERMOSTAT_RUN_MODES = ["heating", "cooling"] as const;
const BLIND_COMMANDS = ["close", "open", "stop"] as const;
const BLIND_MOTION = ["closed", "open", "stopped", "closing", "opening"] as const;

/** First register of the power meter's sub-metering block. */
export const PMM_SUBMETER_START = 48;
export const PMM_SUBMETER_SCALE = 0.1;

// Energy counters hold tens of Wh, or hundreds once register 31 is set; register 16 carries the remainder.
const PMM_ENERGY_REMAINDER = 16;
const PMM_ENERGY_RANGE = 31;

/** Dimmer level word meaning "on at the last level". */
export const DIMMER_LAST_LEVEL = 101;

// ---------- Profile table ----------

const PROFILES: { readonly [T in DeviceType]: ProfileDefinition } = {
  ACM: {
    description: "IR air-conditioner controller",
    configCodes: [0, 1],
    channels: (code) => [
      flag("power", 0, "readwrite"),
      num("targetTemperature", 1, { min: 18, max: 30, unit: "°C" }, "readwrite"),
      choice("hvacMode", 2, AC_MODES, "readwrite"),
      choice("fanMode", 3, AC_FAN_MODES, "readwrite"),
      choice("swingMode", 4, AC_SWING_MODES, "readwrite"),
      num("remoteCode", 5, { min: 0, max: 19 }, "readwrite"),
      // Only the variant with a built-in probe reports the room temperature.
      ...(code === 1 ? [num("currentTemperature", 6, { scale: 0.1, signed: true, unit: "°C" })] : []),
      { kind: "boolean", name: "vibration", address: 7, access: "read", truthy: "nonzero" },
      { kind: "uint32", name: "learnedRemotes", address: 54, access: "read" },
    ],
  },

  BCM: {
    description: "boiler controller",
    configCodes: [0],
    channels: () => [
      flag("power", 0, "readwrite"),
      num("roomTargetTemperature", 1, { min: 0, max: 80, unit: "°C" }, "readwrite"),
      num("floorTargetTemperature", 2, { min: 0, max: 80, unit: "°C" }, "readwrite"),
      num("hotWaterTargetTemperature", 3, { min: 0, max: 80, unit: "°C" }, "readwrite"),
      bit("hotWater", 4, 0x01),
      bit("heating", 4, 0x02),
      bit("floorHeatMode", 4, 0x04),
      flag("awayMode", 5, "readwrite"),
      flag("reservationMode", 6, "readwrite"),
      num("reservationTime", 7),
      num("roomTemperature", 8, { scale: 0.1, signed: true, unit: "°C" }),
      num("floorTemperature", 9, { unit: "°C" }),
      num("hotWaterTemperature", 10, { unit: "°C" }),
      flag("burning", 11),
      num("errorCode", 12),
      flag("waterRefill", 13),
      flag("boilerOffline", 14),
      choice("manufacturer", 15, BOILER_MANUFACTURERS),
    ],
  },

  TCM: {
    description: "room thermostat",
    configCodes: [0],
    channels: () => [
      flag("power", 0, "readwrite"),
      num("targetTemperature", 1, { scale: 0.1, min: 5, max: 40, unit: "°C" }, "readwrite"),
      flag("awayMode", 2, "readwrite"),
      num("currentTemperature", 3, { scale: 0.1, signed: true, unit: "°C" }),
      flag("valve", 4),
      flag("alarm", 5),
      choice("fanSpeed", 6, THERMOSTAT_FAN_SPEEDS, "readwrite"),
      choice("runMode", 7, THERMOSTAT_RUN_MODES, "readwrite"),
      flag("childLock", 8, "readwrite"),
    ],
  },

  CCM: {
    description: "smart plug",
    configCodes: [0],
    channels: () => [
      flag("power", 0, "readwrite"),
      num("voltage", 1, { scale: 0.01, unit: "V" }),
      num("current", 2, { scale: 0.001, unit: "A" }),
      num("activePower", 3, { scale: 0.1, unit: "W" }),
      num("powerFactor", 4, { scale: 0.1, unit: "%" }),
    ],
  },

  PMM: {
    description: "power meter",
    // The code is the number of sub-metering channels.
    configCodes: [0, 1, 2],
    channels: (code) => [
      num("voltage", 0, { scale: 0.1, unit: "V" }),
      num("current", 1, { scale: 0.01, unit: "A" }),
      num("activePower", 2, { unit: "W" }),
      num("powerFactor", 3, { scale: 0.1, unit: "%" }),
      num("frequency", 4, { scale: 0.1, unit: "Hz" }),
      {
        kind: "counter",
        name: "todayEnergy",
        address: 8,
        access: "read",
        unit: "Wh",
        factor: 10,
        remainderAddress: PMM_ENERGY_REMAINDER,
      },
      {
        kind: "counter",
        name: "monthEnergy",
        address: 10,
        access: "read",
        unit: "Wh",
        factor: 10,
        wideFactor: 100,
        remainderAddress: PMM_ENERGY_REMAINDER,
        rangeAddress: PMM_ENERGY_RANGE,
      },
      {
        kind: "counter",
        name: "lastMonthEnergy",
        address: 11,
        access: "read",
        unit: "Wh",
        factor: 10,
        wideFactor: 100,
        rangeAddress: PMM_ENERGY_RANGE,
      },
      { kind: "uint32", name: "totalEnergy", address: 40, access: "read", unit: "Wh" },
      ...range(0, code).map((i) =>
        num(`subPower${i + 1}`, PMM_SUBMETER_START + i, { scale: PMM_SUBMETER_SCALE, unit: "W" })
      ),
    ],
  },

  AQM: {
    description: "air-quality sensor",
    configCodes: [0],
    channels: () => [
      num("temperature", 0, { scale: 0.1, signed: true, unit: "°C" }),
      num("humidity", 1, { scale: 0.1, min: 0, max: 100, unit: "%" }),
      num("co2", 2, { unit: "ppm" }),
      num("pm25", 3, { unit: "µg/m³" }),
      num("pm10", 4, { unit: "µg/m³" }),
      num("tvoc", 5, { unit: "ppb" }),
      num("illuminance", 6, { unit: "lx" }),
    ],
  },

  RBM: {
    description: "roller blind",
    configCodes: [0],
    channels: () => [
      choice("command", 0, BLIND_COMMANDS, "readwrite"),
      num("targetPosition", 1, { min: 0, max: 100, unit: "%" }, "readwrite"),
      choice("motion", 2, BLIND_MOTION),
      num("position", 3, { min: 0, max: 100, unit: "%" }),
    ],
  },

  STM: {
    description: "wall light switch",
    configCodes: [1, 2, 3],
    channels: (code) => range(0, code).map((i) => flag(`light${i + 1}`, i, "readwrite")),
  },

  SBM: {
    description: "battery light switch",
    configCodes: [1, 2, 3],
    channels: (code) => range(0, code).map((i) => flag(`light${i + 1}`, i, "readwrite")),
  },

  SDM: {
    description: "dimmer switch",
    // Low three bits give the gang count; codes above 8 add colour temperature.
    configCodes: [1, 2, 3, 9, 10, 11],
    channels: (code) =>
      range(0, code & 0x07).flatMap((i): Channel[] => [
        num(
          `level${i + 1}`,
          i * 2,
          { min: 0, max: 100, unit: "%", special: { on: DIMMER_LAST_LEVEL } },
          "readwrite"
        ),
        ...(code > 0x08 ? [tone(`colorTemperature${i + 1}`, i * 2 + 1)] : []),
      ]),
  },
};

// ---------- Read planning ----------

/**
 * Cover every channel with the fewest contiguous reads of at most
 * {@link MAX_REGISTERS_PER_READ} registers. A channel's registers always
 * land in the same read.
 */
export function planReads(channels: readonly Channel[]): ReadSpan[] {
  const extents = channels
    .map((channel) => {
      const addresses = registersOf(channel);
      return { start: Math.min(...addresses), end: Math.max(...addresses) + 1 };
    })
    .sort((a, b) => a.start - b.start);
  const spans: ReadSpan[] = [];
  let current: ReadSpan | null = null;

  for (const { start, end } of extents) {
    if (current === null || end - current.start > MAX_REGISTERS_PER_READ) {
      current = { start, quantity: end - start };
      spans.push(current);
    } else {
      current.quantity = Math.max(current.quantity, end - current.start);
    }
  }
  return spans;
}

// ---------- Resolution ----------

const cache = new Map<string, CapabilitySet>();
const knownTypes: ReadonlySet<string> = new Set(DEVICE_TYPES);

export function isDeviceType(tag: string): tag is DeviceType {
  return knownTypes.has(tag);
}

export function profileTypes(): readonly DeviceType[] {
  return DEVICE_TYPES;
}

export function documentedConfigCodes(deviceType: DeviceType): readonly number[] {
  return PROFILES[deviceType].configCodes;
}

export function describeProfile(deviceType: DeviceType): string {
  return PROFILES[deviceType].description;
}

/**
 * Resolve the capability set of a device.
 *
 * @throws UnknownProfileError for an unknown type or undocumented config code
 */
export function resolve(deviceType: string, configCode: number): CapabilitySet {
  const tag = deviceType.toUpperCase();
  if (!isDeviceType(tag)) {
    throw new UnknownProfileError(deviceType, configCode);
  }
  const definition = PROFILES[tag];
  if (!Number.isInteger(configCode) || !definition.configCodes.includes(configCode)) {
    throw new UnknownProfileError(tag, configCode);
  }

  const key = `${tag}:${configCode}`;
  const cached = cache.get(key);
  if (cached) return cached;

  const channels = definition.channels(configCode).map((c) => Object.freeze(c));
  const set: CapabilitySet = Object.freeze({
    deviceType: tag,
    configCode,
    description: definition.description,
    channels: Object.freeze(channels),
    reads: Object.freeze(planReads(channels).map((span) => Object.freeze(span))),
  });
  cache.set(key, set);
  return set;
}
