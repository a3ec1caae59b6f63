/**
 * Per-device TCP transport.
 *
 * Owns at most one socket and keeps exactly one request on the wire: calls to
 * `exchange()` are queued and run in order. Each exchange has a single timer
 * covering connect, send and the full response. When it expires the socket is
 * torn down, so the next exchange reconnects.
 */

import net from "node:net";
import {
  ConnectionError,
  DeviceClosedError,
  TransportTimeoutError,
  errnoCode,
} from "./errors.js";
import { frameLength } from "./frame.js";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";

export interface TransportAddress {
  host: string;
  port: number;
}

export interface Transport {
  /** Send one request frame and resolve with the complete response frame. */
  exchange(address: TransportAddress, request: Buffer, timeoutMs: number): Promise<Buffer>;
  /** Cancel the in-flight and queued exchanges and release the connection. */
  close(): Promise<void>;
}

interface PendingExchange {
  host: string;
  received: Buffer;
  timer: NodeJS.Timeout;
  resolve: (frame: Buffer) => void;
  reject: (err: Error) => void;
}

export type TcpTransportOptions = LoggingOptions;

export class TcpTransport implements Transport {
  private readonly log: Logger;
  private socket: net.Socket | null = null;
  private socketKey: string | null = null;
  private pending: PendingExchange | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private closed = false;

  constructor(options: TcpTransportOptions = {}) {
    this.log = resolveLogger(options);
  }

  get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed && !this.socket.connecting;
  }

  exchange(address: TransportAddress, request: Buffer, timeoutMs: number): Promise<Buffer> {
    const run = (): Promise<Buffer> => {
      if (this.closed) {
        return Promise.reject(new DeviceClosedError());
      }
      return this.transact(address, request, timeoutMs);
    };
    const result = this.queue.then(run, run);
    // Keep the chain alive whatever the outcome of this exchange.
    this.queue = result.catch(() => undefined);
    return result;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.rejectPending(new DeviceClosedError("Exchange cancelled: transport closed"));
    this.dropSocket();
  }

  // ---------- Exchange ----------

  private transact(address: TransportAddress, request: Buffer, timeoutMs: number): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      let socket: net.Socket;
      try {
        socket = this.socketFor(address);
      } catch (err) {
        reject(
          new ConnectionError(`Cannot open connection to ${address.host}:${address.port}`, {
            code: errnoCode(err),
            cause: err,
          })
        );
        return;
      }

      const timer = setTimeout(() => {
        this.log.debug(`[${address.host}] TIMEOUT after ${timeoutMs} ms`);
        this.rejectPending(new TransportTimeoutError(address.host, timeoutMs));
        this.dropSocket();
      }, timeoutMs);

      this.pending = { host: address.host, received: Buffer.alloc(0), timer, resolve, reject };
      this.log.debug(`[${address.host}] SENT: ${request.toString("hex")}`);
      socket.write(request);
    });
  }

  private resolvePending(frame: Buffer): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(frame);
  }

  private rejectPending(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(err);
  }

  // ---------- Connection management ----------

  /** Reuse the open socket for the same endpoint, otherwise open a new one. */
  private socketFor(address: TransportAddress): net.Socket {
    const key = `${address.host}:${address.port}`;
    if (this.socket && !this.socket.destroyed && this.socketKey === key) {
      return this.socket;
    }
    if (this.socket) {
      this.log.debug(`Endpoint changed from ${this.socketKey} to ${key}, reconnecting`);
      this.dropSocket();
    }

    const socket = net.createConnection({ host: address.host, port: address.port });
    socket.setNoDelay(true);
    this.socket = socket;
    this.socketKey = key;
    this.setupSocketListeners(socket);
    this.log.debug(`Connecting to ${key}`);
    return socket;
  }

  private setupSocketListeners(socket: net.Socket): void {
    socket.on("connect", () => {
      this.log.debug(`Connected to ${this.socketKey}`);
    });

    socket.on("data", (data: Buffer) => {
      if (socket !== this.socket) return;
      this.handleData(data);
    });

    socket.on("error", (err: Error) => {
      this.log.debug(`Socket error: ${err.message}`);
      if (socket !== this.socket) return;
      this.rejectPending(
        new ConnectionError(`Connection to ${this.socketKey} failed: ${err.message}`, {
          code: errnoCode(err),
          cause: err,
        })
      );
      this.dropSocket();
    });

    socket.on("close", () => {
      if (socket !== this.socket) return;
      this.log.debug("Socket closed");
      this.socket = null;
      this.socketKey = null;
      this.rejectPending(new ConnectionError("Connection closed before a full response arrived"));
    });
  }

  private handleData(data: Buffer): void {
    const pending = this.pending;
    if (!pending) {
      this.log.debug(`[DISCARDED] RECD: ${data.toString("hex")}`);
      return;
    }

    pending.received = Buffer.concat([pending.received, data]);
    const expected = frameLength(pending.received);
    if (expected === null || pending.received.length < expected) {
      return;
    }

    const frame = pending.received.subarray(0, expected);
    if (pending.received.length > expected) {
      this.log.debug(`[DISCARDED] trailing bytes: ${pending.received.subarray(expected).toString("hex")}`);
    }
    this.log.debug(`[${pending.host}] RECD: ${frame.toString("hex")}`);
    this.resolvePending(frame);
  }

  private dropSocket(): void {
    const socket = this.socket;
    this.socket = null;
    this.socketKey = null;
    if (socket) {
      socket.removeAllListeners("data");
      socket.destroy();
    }
  }
}
