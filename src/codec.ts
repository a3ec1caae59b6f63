/**
 * Register codec.
 *
 * Converts raw 16-bit register words into typed channel values and back.
 * Decoding never throws: raw words outside a channel's domain decode to
 * {@link INVALID}. Encoding rejects bad domain values with {@link ValidationError}.
 */

import { NotWritableError, ValidationError } from "./errors.js";

// ---------- Values ----------

/** Sentinel for a raw word that does not map to a valid domain value. */
export const INVALID: unique symbol = Symbol("INVALID");
export type Invalid = typeof INVALID;

export type ChannelValue = number | boolean | string | Invalid;
export type ChannelValues = Readonly<Record<string, ChannelValue>>;

// ---------- Channels ----------

export type Access = "read" | "readwrite";

interface ChannelBase {
  /** Stable channel name, unique within a capability set */
  name: string;
  /** Register address of the (first) word */
  address: number;
  access: Access;
  unit?: string;
}

/** Integer or fixed-point quantity. */
export interface NumberChannel extends ChannelBase {
  kind: "number";
  /** Scaling factor applied to the raw word. Default: 1 */
  scale?: number;
  /** Interpret as signed (2s complement). Default: false */
  signed?: boolean;
  /** Lowest valid domain value */
  min?: number;
  /** Highest valid domain value */
  max?: number;
  /** Named raw words outside min..max, decoded to and encoded from their name */
  special?: Readonly<Record<string, number>>;
}

export interface BooleanChannel extends ChannelBase {
  kind: "boolean";
  /** `one`: only 1 is true, anything but 0/1 is invalid. `nonzero`: any non-zero word is true. Default: one */
  truthy?: "one" | "nonzero";
  /** Test a single flag of the word instead of the whole word */
  mask?: number;
}

export interface EnumChannel extends ChannelBase {
  kind: "enum";
  /** Option names indexed by raw value */
  options: readonly string[];
}


/** Two consecutive words, low word first. */
export interface Uint32Channel extends ChannelBase {
  kind: "uint32";
  scale?: number;
}

/**
 * Counter spread over several registers: `word * factor + remainder`.
 * While the range register is non-zero, `wideFactor` replaces `factor`.
 */
export interface CounterChannel extends ChannelBase {
  kind: "counter";
  factor: number;
  /** Register added to the scaled word */
  remainderAddress?: number;
  /** Register selecting the wide factor */
  rangeAddress?: number;
  wideFactor?: number;
}

/** Device 0 (warm) .. 100 (cool) exposed as mired 500 .. 154. */
export interface ColorTemperatureChannel extends ChannelBase {
  kind: "colorTemperature";
}

export type Channel =
  | NumberChannel
  | BooleanChannel
  | EnumChannel
  | Uint32Channel
  | CounterChannel
  | ColorTemperatureChannel;

export type ChannelKind = Channel["kind"];

/** Anything that carries an ordered channel list. */
export interface ChannelLayout {
  readonly channels: readonly Channel[];
}

/** A contiguous span of words returned by one read. */
export interface RegisterBlock {
  start: number;
  words: readonly number[];
}

export interface EncodedWrite {
  channel: Channel;
  address: number;
  word: number;
}

// ---------- Helpers ----------

/** Calculate 2s complement */
export function twosComplement(val: number, numBits: number): number {
  if (val < 0) {
    val = (1 << numBits) + val;
  } else {
    if (val & (1 << (numBits - 1))) {
      val = val - (1 << numBits);
    }
  }
  return val;
}

/** Registers a channel is decoded from, in the order {@link decodeChannel} expects them. */
export function registersOf(channel: Channel): number[] {
  switch (channel.kind) {
    case "uint32":
      return [channel.address, channel.address + 1];
    case "counter":
      return [
        channel.address,
        ...(channel.remainderAddress === undefined ? [] : [channel.remainderAddress]),
        ...(channel.rangeAddress === undefined ? [] : [channel.rangeAddress]),
      ];
    default:
      return [channel.address];
  }
}

function isWord(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

function decimalsOf(scale: number): number {
  return scale >= 1 ? 0 : Math.round(-Math.log10(scale));
}

function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

function clamp(value: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, value));
}

const NO_SPECIAL: Readonly<Record<string, number>> = {};

function outOfDomain(channel: NumberChannel, value: number): boolean {
  return (
    (channel.min !== undefined && value < channel.min) ||
    (channel.max !== undefined && value > channel.max)
  );
}

// ---------- Color temperature ----------

export const MIRED_COOLEST = 154;
export const MIRED_WARMEST = 500;
const DEVICE_CT_MAX = 100;
const MIRED_PER_STEP = (MIRED_WARMEST - MIRED_COOLEST) / DEVICE_CT_MAX;

/** Device colour temperature (0..100) to mired, clamped. */
export function colorTemperatureToMired(raw: number): number {
  const x = clamp(raw, 0, DEVICE_CT_MAX);
  return Math.round(MIRED_WARMEST - x * MIRED_PER_STEP);
}

/** Mired to device colour temperature (0..100), clamped and rounded. */
export function miredToColorTemperature(mired: number): number {
  const m = clamp(mired, MIRED_COOLEST, MIRED_WARMEST);
  return Math.round((MIRED_WARMEST - m) / MIRED_PER_STEP);
}

// ---------- Decoding ----------

/**
 * Decode one channel. `words` holds the registers listed by
 * {@link registersOf}, in the same order.
 */
export function decodeChannel(channel: Channel, words: readonly number[]): ChannelValue {
  const raw = words[0];
  if (!isWord(raw)) {
    return INVALID;
  }

  switch (channel.kind) {
    case "number": {
      const named = Object.entries(channel.special ?? NO_SPECIAL).find(([, word]) => word === raw);
      if (named) return named[0];
      const scale = channel.scale ?? 1;
      const base = channel.signed ? twosComplement(raw, 16) : raw;
      const value = roundTo(base * scale, decimalsOf(scale));
      return outOfDomain(channel, value) ? INVALID : value;
    }
    case "boolean": {
      if (channel.mask !== undefined) return (raw & channel.mask) !== 0;
      if ((channel.truthy ?? "one") === "nonzero") return raw !== 0;
      if (raw === 0) return false;
      if (raw === 1) return true;
      return INVALID;
    }
    case "enum":
      return raw < channel.options.length ? channel.options[raw] : INVALID;
    case "uint32": {
      const high = words[1];
      if (!isWord(high)) {
        return INVALID;
      }
      const scale = channel.scale ?? 1;
      return roundTo((high * 0x10000 + raw) * scale, decimalsOf(scale));
    }
    case "counter": {
      let next = 1;
      const remainder = channel.remainderAddress === undefined ? 0 : words[next++];
      const range = channel.rangeAddress === undefined ? 0 : words[next++];
      if (!isWord(remainder) || !isWord(range)) {
        return INVALID;
      }
      const factor = range !== 0 ? channel.wideFactor ?? channel.factor : channel.factor;
      return raw * factor + remainder;
    }
    case "colorTemperature":
      return colorTemperatureToMired(raw);
  }
}

/**
 * Decode every channel covered by the given blocks. Channels whose registers
 * were not read are left out of the result.
 */
export function decode(layout: ChannelLayout, blocks: readonly RegisterBlock[]): Record<string, ChannelValue> {
  const words = new Map<number, number>();
  for (const block of blocks) {
    block.words.forEach((word, i) => words.set(block.start + i, word));
  }

  const values: Record<string, ChannelValue> = {};
  for (const channel of layout.channels) {
    const addresses = registersOf(channel);
    const raw: number[] = [];
    for (const address of addresses) {
      const word = words.get(address);
      if (word === undefined) break;
      raw.push(word);
    }
    if (raw.length === addresses.length) {
      values[channel.name] = decodeChannel(channel, raw);
    }
  }
  return values;
}

// ---------- Encoding ----------

export function findChannel(layout: ChannelLayout, name: string): Channel | undefined {
  return layout.channels.find((c) => c.name === name);
}

function toWord(channel: NumberChannel, value: number): number {
  const scale = channel.scale ?? 1;
  const word = Math.round(value / scale);
  if (channel.signed) {
    if (word < -0x8000 || word > 0x7fff) {
      throw new ValidationError(`${channel.name}: ${value} does not fit a signed register`);
    }
    return word & 0xffff;
  }
  if (word < 0 || word > 0xffff) {
    throw new ValidationError(`${channel.name}: ${value} does not fit a register`);
  }
  return word;
}

/** Encode a domain value for one channel into the register word to write. */
export function encodeChannel(channel: Channel, value: unknown): number {
  switch (channel.kind) {
    case "number": {
      const named = Object.entries(channel.special ?? NO_SPECIAL).find(([name]) => name === value);
      if (named) return named[1];
      if (typeof value !== "number" || !Number.isFinite(value)) {
        const names = Object.keys(channel.special ?? NO_SPECIAL);
        throw new ValidationError(
          `${channel.name} expects a finite number${names.length > 0 ? ` or one of ${names.join(", ")}` : ""}`
        );
      }
      if (outOfDomain(channel, value)) {
        throw new ValidationError(
          `${channel.name}: ${value} is outside ${channel.min ?? "-inf"}..${channel.max ?? "inf"}`
        );
      }
      return toWord(channel, value);
    }
    case "boolean":
      if (channel.mask !== undefined) {
        throw new ValidationError(`${channel.name} is a status flag and cannot be encoded`);
      }
      if (typeof value !== "boolean") {
        throw new ValidationError(`${channel.name} expects a boolean`);
      }
      return value ? 1 : 0;
    case "enum": {
      const index = typeof value === "string" ? channel.options.indexOf(value) : -1;
      if (index < 0) {
        throw new ValidationError(
          `${channel.name} expects one of ${channel.options.join(", ")}, got ${String(value)}`
        );
      }
      return index;
    }
    case "colorTemperature":
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ValidationError(`${channel.name} expects a colour temperature in mired`);
      }
      return miredToColorTemperature(value);
    case "uint32":
    case "counter":
      throw new ValidationError(`${channel.name} (${channel.kind}) cannot be encoded`);
  }
}

/**
 * Encode a write for a named channel.
 *
 * @throws NotWritableError for unknown or read-only channels
 * @throws ValidationError for values outside the channel's domain
 */
export function encode(layout: ChannelLayout, channelName: string, value: unknown): EncodedWrite {
  const channel = findChannel(layout, channelName);
  if (!channel) {
    throw new NotWritableError(channelName, "does not exist on this device");
  }
  if (channel.access !== "readwrite") {
    throw new NotWritableError(channelName);
  }
  return { channel, address: channel.address, word: encodeChannel(channel, value) };
}
