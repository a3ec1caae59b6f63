/**
 * SiHAS register frame construction and parsing.
 *
 * Frames are big-endian. Requests and responses share a 7-byte header:
 *   packet id (2) | protocol id, always 0 (2) | length (2) | header checksum (1)
 * where `length` counts every byte after offset 5 (checksum byte + PDU), and the
 * checksum is the byte sum of the first six header bytes.
 */

import { FeatureDisabledError, MalformedResponseError } from "./errors.js";

// ---------- Constants ----------

export const FunctionCode = {
  READ_HOLDING_REGISTERS: 0x03,
  WRITE_SINGLE_REGISTER: 0x06,
} as const;

export type FunctionCodeValue = (typeof FunctionCode)[keyof typeof FunctionCode];

export const DEFAULT_PORT = 502;
export const HEADER_LENGTH = 7;
export const POS_FUNCTION_CODE = 7;
/** A device with the HA option switched off answers with this bit set in the function code. */
export const FEATURE_DISABLED_FLAG = 0x08;
export const EXCEPTION_FLAG = 0x80;
export const MAX_REGISTERS_PER_READ = 64;

// ---------- Device exception mapping ----------

export const EXCEPTION_NAMES: Record<number, string> = {
  1: "IllegalFunction",
  2: "IllegalDataAddress",
  3: "IllegalDataValue",
  4: "ServerDeviceFailure",
  5: "Acknowledge",
  6: "ServerDeviceBusy",
};

export class DeviceExceptionError extends MalformedResponseError {
  readonly exceptionCode: number;

  constructor(exceptionCode: number) {
    const name = EXCEPTION_NAMES[exceptionCode] ?? `UnknownException(${exceptionCode})`;
    super(`Device exception: ${name}`);
    this.exceptionCode = exceptionCode;
  }
}

// ---------- Header ----------

/** Byte sum of the first six header bytes, truncated to 8 bits. */
export function headerChecksum(frame: Buffer): number {
  let checksum = 0;
  for (let i = 0; i < HEADER_LENGTH - 1 && i < frame.length; i++) {
    checksum = (checksum + frame[i]) & 0xff;
  }
  return checksum;
}

function buildRequest(packetId: number, functionCode: FunctionCodeValue, data: Buffer): Buffer {
  const frame = Buffer.alloc(HEADER_LENGTH + 1 + data.length);
  frame.writeUInt16BE(packetId & 0xffff, 0);
  frame.writeUInt16BE(0, 2);
  frame.writeUInt16BE(frame.length - 6, 4);
  frame[6] = headerChecksum(frame);
  frame[POS_FUNCTION_CODE] = functionCode;
  data.copy(frame, HEADER_LENGTH + 1);
  return frame;
}

/**
 * Total frame length announced by a (possibly partial) frame, or null when
 * fewer than six bytes have arrived.
 */
export function frameLength(data: Buffer): number | null {
  if (data.length < 6) return null;
  return 6 + data.readUInt16BE(4);
}

export function packetIdOf(frame: Buffer): number {
  return frame.readUInt16BE(0);
}

// ---------- Request builders ----------

/** FC 3 – Read Holding Registers */
export function readHoldingRegisters(
  packetId: number,
  startAddr: number,
  quantity: number
): Buffer {
  if (!Number.isInteger(quantity) || quantity < 1 || quantity > MAX_REGISTERS_PER_READ) {
    throw new RangeError(`Register quantity must be 1..${MAX_REGISTERS_PER_READ}, got ${quantity}`);
  }
  const data = Buffer.alloc(4);
  data.writeUInt16BE(startAddr, 0);
  data.writeUInt16BE(quantity, 2);
  return buildRequest(packetId, FunctionCode.READ_HOLDING_REGISTERS, data);
}

/** FC 6 – Write Single Register */
export function writeSingleRegister(
  packetId: number,
  addr: number,
  value: number
): Buffer {
  const data = Buffer.alloc(4);
  data.writeUInt16BE(addr, 0);
  data.writeUInt16BE(value & 0xffff, 2);
  return buildRequest(packetId, FunctionCode.WRITE_SINGLE_REGISTER, data);
}

// ---------- Response parsing ----------

/**
 * Validate the parts every response shares: disabled flag, header checksum,
 * echoed packet id, announced length and exception responses.
 */
function checkResponse(response: Buffer, request: Buffer): number {
  if (response.length < HEADER_LENGTH + 1) {
    throw new MalformedResponseError(`Response too short: ${response.length} bytes`);
  }

  const responseFc = response[POS_FUNCTION_CODE];
  const requestFc = request[POS_FUNCTION_CODE];

  if (responseFc & FEATURE_DISABLED_FLAG) {
    throw new FeatureDisabledError();
  }
  if (response[6] !== headerChecksum(response)) {
    throw new MalformedResponseError("Response header checksum mismatch");
  }
  if (packetIdOf(response) !== packetIdOf(request)) {
    throw new MalformedResponseError(
      `Response packet id ${packetIdOf(response)} does not match request ${packetIdOf(request)}`
    );
  }
  if (frameLength(response) !== response.length) {
    throw new MalformedResponseError(
      `Response length ${response.length} does not match header length ${frameLength(response)}`
    );
  }
  if (responseFc === (requestFc | EXCEPTION_FLAG)) {
    throw new DeviceExceptionError(response.length > 8 ? response[8] : 0);
  }
  if (responseFc !== requestFc) {
    throw new MalformedResponseError(
      `Unexpected function code 0x${responseFc.toString(16)} for request 0x${requestFc.toString(16)}`
    );
  }
  return responseFc;
}

/**
 * Parse a read holding registers response.
 *
 * @returns Register words in address order
 */
export function parseReadResponse(response: Buffer, request: Buffer): number[] {
  checkResponse(response, request);

  const quantity = request.readUInt16BE(10);
  const byteCount = response.length > 8 ? response[8] : -1;
  if (byteCount !== quantity * 2 || response.length !== 9 + byteCount) {
    throw new MalformedResponseError(
      `Expected ${quantity} registers, got byte count ${byteCount} in ${response.length} bytes`
    );
  }

  const values: number[] = [];
  for (let i = 0; i < quantity; i++) {
    values.push(response.readUInt16BE(9 + i * 2));
  }
  return values;
}

/**
 * Parse a write single register response.
 *
 * @returns Value the device echoed back
 */
export function parseWriteResponse(response: Buffer, request: Buffer): number {
  checkResponse(response, request);

  if (response.length !== 12) {
    throw new MalformedResponseError(`Write response must be 12 bytes, got ${response.length}`);
  }
  const addr = response.readUInt16BE(8);
  if (addr !== request.readUInt16BE(8)) {
    throw new MalformedResponseError(
      `Write response echoed register ${addr}, expected ${request.readUInt16BE(8)}`
    );
  }
  return response.readUInt16BE(10);
}
