import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { RegisterClient } from "../src/client.js";
import {
  ConnectionError,
  DeviceClosedError,
  FeatureDisabledError,
  TransportTimeoutError,
} from "../src/errors.js";
import { TcpTransport } from "../src/transport.js";
import { MockDevice } from "./mock-device.js";

describe("TcpTransport", () => {
  let device: MockDevice;
  let port: number;
  let transport: TcpTransport;

  beforeEach(async () => {
    device = new MockDevice([10, 20, 30]);
    port = await device.listen();
    transport = new TcpTransport();
  });

  afterEach(async () => {
    await transport.close();
    await device.close();
  });

  it("should read holding registers through a client", async () => {
    const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 2000 });
    expect(await client.readHoldingRegisters(0, 4)).toEqual([10, 20, 30, 0]);
  });

  it("should write a holding register", async () => {
    const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 2000 });
    expect(await client.writeHoldingRegister(5, 0x1234)).toBe(0x1234);
    expect(device.writes).toEqual([{ address: 5, value: 0x1234 }]);
  });

  it("should reuse one connection for consecutive exchanges", async () => {
    const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 2000 });
    await client.readHoldingRegisters(0, 1);
    await client.readHoldingRegisters(1, 1);
    expect(device.connections).toBe(1);
  });

  it("should keep one request on the wire at a time", async () => {
    device.delayMs = 30;
    const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 2000 });
    const results = await Promise.all([
      client.readHoldingRegisters(0, 1),
      client.writeHoldingRegister(1, 99),
      client.readHoldingRegisters(1, 1),
    ]);
    expect(results).toEqual([[10], 99, [99]]);
    expect(device.requests.map((r) => r[7])).toEqual([0x03, 0x06, 0x03]);
  });

  it("should time out and reconnect on the next call", async () => {
    device.silent = true;
    const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 150 });
    await expect(client.readHoldingRegisters(0, 1)).rejects.toThrow(TransportTimeoutError);
    expect(transport.connected).toBe(false);

    device.silent = false;
    expect(await client.readHoldingRegisters(0, 1)).toEqual([10]);
    expect(device.connections).toBe(2);
  });

  it("should reject with ConnectionError when nothing listens", async () => {
    const unused = new MockDevice();
    const unusedPort = await unused.listen();
    await unused.close();

    const client = new RegisterClient("127.0.0.1", { port: unusedPort, transport, timeoutMs: 2000 });
    await expect(client.readHoldingRegisters(0, 1)).rejects.toThrow(ConnectionError);
  });

  it("should recover after the device drops the connection", async () => {
    const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 2000 });
    await client.readHoldingRegisters(0, 1);
    device.dropConnections();
    await new Promise((r) => setTimeout(r, 50));
    expect(await client.readHoldingRegisters(2, 1)).toEqual([30]);
  });

  it("should report the disabled HA option with the device host", async () => {
    device.featureDisabled = true;
    const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 2000 });
    await expect(client.readHoldingRegisters(0, 64)).rejects.toThrow(FeatureDisabledError);
    await expect(client.writeHoldingRegister(0, 1)).rejects.toThrow(
      "Remote control is disabled on 127.0.0.1"
    );
  });

  it("should cancel in-flight and queued exchanges on close", async () => {
    device.silent = true;
    const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 5000 });
    const first = client.readHoldingRegisters(0, 1).catch((err: unknown) => err);
    const second = client.readHoldingRegisters(1, 1).catch((err: unknown) => err);
    await new Promise((r) => setTimeout(r, 50));
    await transport.close();

    expect(await first).toBeInstanceOf(DeviceClosedError);
    expect(await second).toBeInstanceOf(DeviceClosedError);
    await expect(client.readHoldingRegisters(0, 1)).rejects.toThrow(DeviceClosedError);
  });

  it("should reconnect when the client is re-targeted", async () => {
    const other = new MockDevice([7]);
    const otherPort = await other.listen();
    try {
      const client = new RegisterClient("127.0.0.1", { port, transport, timeoutMs: 2000 });
      await client.readHoldingRegisters(0, 1);

      const moved = new RegisterClient("127.0.0.1", { port: otherPort, transport, timeoutMs: 2000 });
      expect(await moved.readHoldingRegisters(0, 1)).toEqual([7]);
      expect(other.connections).toBe(1);
    } finally {
      await other.close();
    }
  });
});
