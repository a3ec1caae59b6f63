/**
 * Frame decoder utility.
 *
 * Parses a request or response frame and renders it in human-readable form.
 */

import {
  EXCEPTION_FLAG,
  EXCEPTION_NAMES,
  FEATURE_DISABLED_FLAG,
  FunctionCode,
  HEADER_LENGTH,
  POS_FUNCTION_CODE,
  frameLength,
  headerChecksum,
} from "./frame.js";

// ---------- Enums ----------

export enum FrameKind {
  ReadRequest = "ReadRequest",
  ReadResponse = "ReadResponse",
  Write = "Write",
  Exception = "Exception",
  FeatureDisabled = "FeatureDisabled",
  Unknown = "Unknown",
}

function hex(value: number, width = 2): string {
  return value.toString(16).padStart(width, "0");
}

// ---------- SihasFrame class ----------

export class SihasFrame {
  private readonly frame: Buffer;

  constructor(hexString: string) {
    this.frame = Buffer.from(hexString.replace(/\s+/g, ""), "hex");
  }

  get length(): number {
    return this.frame.length;
  }

  get complete(): boolean {
    return this.frame.length > HEADER_LENGTH;
  }

  get packetId(): number {
    return this.frame.length >= 2 ? this.frame.readUInt16BE(0) : 0;
  }

  get protocolId(): number {
    return this.frame.length >= 4 ? this.frame.readUInt16BE(2) : 0;
  }

  get announcedLength(): number | null {
    return frameLength(this.frame);
  }

  get lengthValid(): boolean {
    return this.announcedLength === this.frame.length;
  }

  get checksum(): number {
    return this.frame.length >= HEADER_LENGTH ? this.frame[6] : 0;
  }

  get checksumValid(): boolean {
    return this.frame.length >= HEADER_LENGTH && this.checksum === headerChecksum(this.frame);
  }

  get functionCode(): number {
    return this.complete ? this.frame[POS_FUNCTION_CODE] : 0;
  }

  get kind(): FrameKind {
    if (!this.complete) return FrameKind.Unknown;
    const fc = this.functionCode;
    if (fc & FEATURE_DISABLED_FLAG) return FrameKind.FeatureDisabled;
    if (fc & EXCEPTION_FLAG) return FrameKind.Exception;
    if (fc === FunctionCode.WRITE_SINGLE_REGISTER && this.frame.length === 12) return FrameKind.Write;
    if (fc === FunctionCode.READ_HOLDING_REGISTERS) {
      if (this.frame.length === 12) return FrameKind.ReadRequest;
      if (this.frame.length >= 9 && this.frame.length === 9 + this.frame[8]) return FrameKind.ReadResponse;
    }
    return FrameKind.Unknown;
  }

  /** Start address and quantity of a read request. */
  get readRange(): { start: number; quantity: number } | null {
    if (this.kind !== FrameKind.ReadRequest) return null;
    return { start: this.frame.readUInt16BE(8), quantity: this.frame.readUInt16BE(10) };
  }

  /** Register address and value of a write request or its echo. */
  get write(): { address: number; value: number } | null {
    if (this.kind !== FrameKind.Write) return null;
    return { address: this.frame.readUInt16BE(8), value: this.frame.readUInt16BE(10) };
  }

  get registers(): number[] {
    if (this.kind !== FrameKind.ReadResponse) return [];
    const values: number[] = [];
    for (let offset = 9; offset + 1 < this.frame.length; offset += 2) {
      values.push(this.frame.readUInt16BE(offset));
    }
    return values;
  }

  get exceptionName(): string | null {
    if (this.kind !== FrameKind.Exception) return null;
    const code = this.frame.length > 8 ? this.frame[8] : 0;
    return EXCEPTION_NAMES[code] ?? `UnknownException(${code})`;
  }

  payloadString(): string {
    const lines: string[] = [];
    lines.push(`${"=".repeat(10)} Payload - [${this.kind}] ${"=".repeat(10)}`);
    lines.push(`  Function code: 0x${hex(this.functionCode)}`);

    switch (this.kind) {
      case FrameKind.ReadRequest: {
        const range = this.readRange;
        if (range) {
          lines.push(`  Request Start Addr: ${range.start} (${hex(range.start)})`);
          lines.push(`  Request Quantity: ${range.quantity} (${hex(range.quantity)})`);
        }
        break;
      }
      case FrameKind.ReadResponse: {
        const registers = this.registers;
        lines.push(`  Quantity: ${registers.length}`);
        registers.forEach((value, i) => {
          if (value !== 0) lines.push(`  r${i}: ${value} (0x${hex(value, 4)})`);
        });
        break;
      }
      case FrameKind.Write: {
        const write = this.write;
        if (write) {
          lines.push(`  Register: ${write.address}`);
          lines.push(`  Value: ${write.value} (0x${hex(write.value, 4)})`);
        }
        break;
      }
      case FrameKind.Exception:
        lines.push(`  Exception: ${this.exceptionName}`);
        break;
      case FrameKind.FeatureDisabled:
        lines.push("  Remote control (HA) option is disabled on the device");
        break;
      case FrameKind.Unknown:
        lines.push(`  Data: ${this.frame.subarray(HEADER_LENGTH).toString("hex")}`);
        break;
    }
    return lines.join("\n");
  }
}

/**
 * Decode a frame and return a human-readable string.
 *
 * @param hexBytes  Array of hex byte strings (e.g. ["00", "2a", "00", ...])
 *                  or a single hex string
 */
export function describeFrame(hexBytes: string | string[]): string {
  const hexString = Array.isArray(hexBytes) ? hexBytes.join("") : hexBytes;
  const frame = new SihasFrame(hexString);

  const lines: string[] = [];
  lines.push(`Packet id: ${frame.packetId} (hex: ${hex(frame.packetId, 4)})`);
  lines.push(`Protocol id: ${frame.protocolId}`);
  lines.push(`Length: ${frame.length} bytes (header says ${frame.announcedLength ?? "?"}, valid: ${frame.lengthValid})`);
  lines.push(`Header checksum: ${hex(frame.checksum)} (valid: ${frame.checksumValid})`);
  if (frame.complete) {
    lines.push(frame.payloadString());
  }
  return lines.join("\n");
}
