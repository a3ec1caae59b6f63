import net from "node:net";

/**
 * In-process mock SiHAS device.
 *
 * Answers read holding registers (FC 3) from its register bank and applies
 * write single register (FC 6) requests, echoing them back like the firmware.
 */
export class MockDevice {
  readonly registers: number[];
  readonly writes: Array<{ address: number; value: number }> = [];
  readonly requests: Buffer[] = [];
  /** Answer every request with the HA-disabled flag set */
  featureDisabled = false;
  /** Swallow requests without answering */
  silent = false;
  /** Delay before each answer, in milliseconds */
  delayMs = 0;
  connections = 0;

  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();

  constructor(registers: number[] = []) {
    this.registers = Array.from({ length: 64 }, (_, i) => registers[i] ?? 0);
    this.server = net.createServer((socket) => this.accept(socket));
  }

  listen(): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(0, "127.0.0.1", () => {
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("mock device has no TCP address"));
          return;
        }
        resolve(address.port);
      });
    });
  }

  close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    return new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });
  }

  /** Drop every open connection, as a rebooting device would. */
  dropConnections(): void {
    for (const socket of this.sockets) socket.destroy();
  }

  private accept(socket: net.Socket): void {
    this.connections++;
    this.sockets.add(socket);
    socket.on("close", () => this.sockets.delete(socket));
    socket.on("error", () => this.sockets.delete(socket));

    let pending = Buffer.alloc(0);
    socket.on("data", (data: Buffer) => {
      pending = Buffer.concat([pending, data]);
      while (pending.length >= 6) {
        const total = 6 + pending.readUInt16BE(4);
        if (pending.length < total) break;
        const request = pending.subarray(0, total);
        pending = pending.subarray(total);
        this.handle(socket, request);
      }
    });
  }

  private handle(socket: net.Socket, request: Buffer): void {
    this.requests.push(Buffer.from(request));
    if (this.silent) return;

    const response = this.respond(request);
    const send = () => {
      if (!socket.destroyed) socket.write(response);
    };
    if (this.delayMs > 0) {
      setTimeout(send, this.delayMs);
    } else {
      send();
    }
  }

  private respond(request: Buffer): Buffer {
    const fc = request[7];
    if (this.featureDisabled) {
      const response = Buffer.from(request);
      response[7] = fc | 0x08;
      return response;
    }

    if (fc === 0x03) {
      const start = request.readUInt16BE(8);
      const quantity = request.readUInt16BE(10);
      const response = Buffer.alloc(9 + quantity * 2);
      response.writeUInt16BE(request.readUInt16BE(0), 0);
      response.writeUInt16BE(response.length - 6, 4);
      response[6] = checksum(response);
      response[7] = 0x03;
      response[8] = quantity * 2;
      for (let i = 0; i < quantity; i++) {
        response.writeUInt16BE(this.registers[start + i] ?? 0, 9 + i * 2);
      }
      return response;
    }

    if (fc === 0x06) {
      const address = request.readUInt16BE(8);
      const value = request.readUInt16BE(10);
      this.registers[address] = value;
      this.writes.push({ address, value });
      return Buffer.from(request);
    }

    // Unsupported function: exception response
    const response = Buffer.alloc(9);
    response.writeUInt16BE(request.readUInt16BE(0), 0);
    response.writeUInt16BE(3, 4);
    response[6] = checksum(response);
    response[7] = fc | 0x80;
    response[8] = 0x01;
    return response;
  }
}

export function checksum(frame: Buffer): number {
  let sum = 0;
  for (let i = 0; i < 6; i++) sum = (sum + frame[i]) & 0xff;
  return sum;
}
