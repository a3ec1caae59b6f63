/**
 * Register-level client for a single device.
 *
 * Builds request frames with a rolling packet id, sends them through a
 * {@link Transport} and validates the responses.
 */

import { FeatureDisabledError } from "./errors.js";
import * as frame from "./frame.js";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";
import { TcpTransport, type Transport, type TransportAddress } from "./transport.js";

export interface RegisterClientOptions extends LoggingOptions {
  /** TCP port of the device. Default: 502 */
  port?: number;
  /** Per-exchange timeout in milliseconds. Default: 1000 */
  timeoutMs?: number;
  /** Transport to use. Default: a new {@link TcpTransport} */
  transport?: Transport;
}

export class RegisterClient {
  public readonly port: number;
  public readonly timeoutMs: number;

  private host: string;
  private readonly transport: Transport;
  private readonly log: Logger;
  private packetId: number | null = null;

  constructor(host: string, options: RegisterClientOptions = {}) {
    this.host = host;
    this.port = options.port ?? frame.DEFAULT_PORT;
    this.timeoutMs = options.timeoutMs ?? 1000;
    this.log = resolveLogger(options);
    this.transport = options.transport ?? new TcpTransport({ logger: this.log });
  }

  get address(): TransportAddress {
    return { host: this.host, port: this.port };
  }

  /** Point the client at a new host; the next exchange reconnects. */
  retarget(host: string): void {
    if (host !== this.host) {
      this.log.info(`Device moved from ${this.host} to ${host}`);
      this.host = host;
    }
  }

  /** Packet ids roll over 1..255. */
  private nextPacketId(): number {
    if (this.packetId === null) {
      this.packetId = Math.floor(Math.random() * 255) + 1;
    } else {
      this.packetId = this.packetId >= 0xff ? 1 : this.packetId + 1;
    }
    return this.packetId;
  }

  private async send(request: Buffer): Promise<Buffer> {
    return this.transport.exchange(this.address, request, this.timeoutMs);
  }

  /**
   * Read holding registers (function code 3)
   *
   * @param startAddr  First register address
   * @param quantity   Number of registers, at most 64
   */
  async readHoldingRegisters(startAddr: number, quantity: number): Promise<number[]> {
    const request = frame.readHoldingRegisters(this.nextPacketId(), startAddr, quantity);
    const response = await this.send(request);
    return this.withHost(() => frame.parseReadResponse(response, request));
  }

  /**
   * Write a single holding register (function code 6)
   *
   * @returns Value echoed by the device
   */
  async writeHoldingRegister(addr: number, value: number): Promise<number> {
    const request = frame.writeSingleRegister(this.nextPacketId(), addr, value);
    const response = await this.send(request);
    return this.withHost(() => frame.parseWriteResponse(response, request));
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private withHost<T>(parse: () => T): T {
    try {
      return parse();
    } catch (err) {
      if (err instanceof FeatureDisabledError) {
        throw new FeatureDisabledError(this.host);
      }
      throw err;
    }
  }
}
