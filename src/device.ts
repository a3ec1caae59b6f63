/**
 * Device handle: the unit a caller creates per physical device.
 *
 * Ties together one register client, the cached state, the poller and the
 * command dispatcher. Polls and writes share the client's transport, so they
 * never overlap on the wire.
 */

import { EventEmitter } from "node:events";
import { RegisterClient } from "./client.js";
import { parseDeviceSetup, normalizeHost, type DeviceSetup, type DeviceSetupInput } from "./config.js";
import { CommandDispatcher, type CommandAck } from "./dispatcher.js";
import { DeviceClosedError } from "./errors.js";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";
import { Poller, type PollResult } from "./poller.js";
import { resolve, type CapabilitySet, type DeviceType } from "./profiles.js";
import { StateStore, type DeviceState, type StateListener } from "./state.js";
import type { Transport } from "./transport.js";

export interface DeviceOptions extends LoggingOptions {
  /** Transport to use. Default: a new TCP transport owned by the device */
  transport?: Transport;
  /** Start polling as soon as the device is created. Default: true */
  autoStart?: boolean;
}

export class Device extends EventEmitter {
  public readonly setup: DeviceSetup;
  public readonly profile: CapabilitySet;

  private readonly log: Logger;
  private readonly client: RegisterClient;
  private readonly store: StateStore;
  private readonly poller: Poller;
  private readonly dispatcher: CommandDispatcher;
  private host: string;
  private destroyed = false;

  constructor(setup: DeviceSetup, profile: CapabilitySet, options: DeviceOptions = {}) {
    super();
    this.setup = setup;
    this.profile = profile;
    this.host = setup.host;
    this.log = resolveLogger(options);
    this.store = new StateStore({ logger: this.log });

    const label = `${profile.deviceType} ${setup.mac ?? setup.host}`;
    this.client = new RegisterClient(setup.host, {
      port: setup.port,
      timeoutMs: setup.timeoutMs,
      transport: options.transport,
      logger: this.log,
    });
    this.poller = new Poller(this.client, profile, this.store, {
      intervalMs: setup.pollIntervalSeconds * 1000,
      failureThreshold: setup.failureThreshold,
      onResult: (result) => this.emit("poll", result),
      label,
      logger: this.log,
    });
    this.dispatcher = new CommandDispatcher(this.client, profile, this.store, {
      label,
      logger: this.log,
    });
  }

  get deviceType(): DeviceType {
    return this.profile.deviceType;
  }

  get address(): { host: string; port: number; mac: string | undefined; deviceType: DeviceType } {
    return { host: this.host, port: this.setup.port, mac: this.setup.mac, deviceType: this.deviceType };
  }

  /** `TYPE-mac`, or `TYPE-host` when no MAC was given. */
  get id(): string {
    return `${this.deviceType}-${this.setup.mac ?? this.host}`;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get polling(): boolean {
    return this.poller.running;
  }

  /** Last cached snapshot; never touches the network. */
  getState(): DeviceState {
    return this.store.state;
  }

  /**
   * Invoke `listener` whenever availability flips or a channel value changes.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: StateListener): () => void {
    this.store.on("change", listener);
    return () => {
      this.store.off("change", listener);
    };
  }

  async write(channel: string, value: unknown): Promise<CommandAck> {
    if (this.destroyed) {
      throw new DeviceClosedError(`${this.id} has been destroyed`);
    }
    return this.dispatcher.write(channel, value);
  }

  /** Run one poll cycle now; resolves null when a cycle was already running. */
  async refresh(): Promise<PollResult | null> {
    if (this.destroyed) {
      throw new DeviceClosedError(`${this.id} has been destroyed`);
    }
    return this.poller.tick();
  }

  start(): void {
    if (this.destroyed) {
      throw new DeviceClosedError(`${this.id} has been destroyed`);
    }
    this.poller.start();
  }

  stop(): void {
    this.poller.stop();
  }

  /** Re-target the device after its IP changed; the MAC identity stays. */
  updateHost(host: string): void {
    const next = normalizeHost(host);
    if (next === this.host) return;
    this.host = next;
    this.client.retarget(next);
  }

  /** Stop polling, cancel the in-flight exchange and release the connection. */
  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;
    this.poller.dispose();
    await this.client.close();
    this.store.removeAllListeners();
    this.removeAllListeners();
    this.log.debug(`[${this.id}] destroyed`);
  }
}

/**
 * Create a device from its setup record.
 *
 * @throws ConfigurationError for an invalid setup record
 * @throws UnknownProfileError for an unknown device type or config code
 */
export function createDevice(input: DeviceSetupInput, options: DeviceOptions = {}): Device {
  const setup = parseDeviceSetup(input);
  const profile = resolve(setup.deviceType, setup.configCode);
  const device = new Device(setup, profile, options);
  if (options.autoStart ?? true) {
    device.start();
  }
  return device;
}
