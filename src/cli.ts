#!/usr/bin/env node

/**
 * sihas CLI – command-line interface for polling and controlling SiHAS
 * devices on the local network.
 */

import { Command } from "commander";
import { RegisterClient } from "./client.js";
import { INVALID, findChannel, type Channel, type ChannelValues } from "./codec.js";
import { DEFAULT_TIMEOUT_MS } from "./config.js";
import { describeFrame } from "./decoder.js";
import { createDevice, type Device } from "./device.js";
import { DEFAULT_PORT } from "./frame.js";
import type { PollResult } from "./poller.js";
import { describeProfile, documentedConfigCodes, profileTypes, resolve } from "./profiles.js";
import type { DeviceState } from "./state.js";

const program = new Command();

program
  .name("sihas")
  .description("CLI for polling and controlling SiHAS Wi-Fi home devices")
  .version("1.0.0");

interface ConnectionOptions {
  host: string;
  port: number;
  timeout: number;
  verbose: boolean;
}

interface DeviceCommandOptions extends ConnectionOptions {
  type: string;
  config: number;
}

const toInt = (v: string) => parseInt(v, 10);

function withConnection(command: Command): Command {
  return command
    .requiredOption("-H, --host <ip>", "IP address of the device")
    .option("-p, --port <number>", "TCP port", toInt, DEFAULT_PORT)
    .option("--timeout <ms>", "Exchange timeout in milliseconds", toInt, DEFAULT_TIMEOUT_MS)
    .option("-v, --verbose", "Enable verbose logging", false);
}

function withDevice(command: Command): Command {
  return withConnection(command)
    .requiredOption("-t, --type <type>", "Device type, e.g. ACM or STM")
    .requiredOption("-c, --config <code>", "Device config code (CFG in the app)", toInt);
}

function openDevice(opts: DeviceCommandOptions, pollIntervalSeconds?: number, autoStart = false): Device {
  try {
    return createDevice(
      {
        host: opts.host,
        deviceType: opts.type,
        configCode: opts.config,
        port: opts.port,
        timeoutMs: opts.timeout,
        pollIntervalSeconds,
      },
      { verbose: opts.verbose, autoStart }
    );
  } catch (err) {
    fail(err);
  }
}

/** Values as plain JSON; undecodable words become null. */
function toJson(values: ChannelValues): Record<string, number | boolean | string | null> {
  const out: Record<string, number | boolean | string | null> = {};
  for (const [name, value] of Object.entries(values)) {
    out[name] = value === INVALID ? null : value;
  }
  return out;
}

function printState(state: DeviceState): void {
  console.log(
    JSON.stringify({
      available: state.available,
      lastUpdated: state.lastUpdated === null ? null : new Date(state.lastUpdated).toISOString(),
      values: toJson(state.values),
    })
  );
}

/** Booleans take true/on and false/off; numeric text becomes a number; anything else stays a name. */
function parseCommandValue(raw: string, channel: Channel | undefined): boolean | number | string {
  const trimmed = raw.trim();
  const lowered = trimmed.toLowerCase();
  if (channel?.kind === "boolean") {
    if (lowered === "true" || lowered === "on") return true;
    if (lowered === "false" || lowered === "off") return false;
  }
  if (lowered !== "" && !Number.isNaN(Number(lowered))) return Number(lowered);
  return trimmed;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function fail(err: unknown): never {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

function report(err: unknown): void {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
}

// ---------- read ----------

withDevice(
  program.command("read").description("Poll a device once and print its state as JSON")
).action(async (opts: DeviceCommandOptions) => {
  const device = openDevice(opts);
  try {
    const result = await device.refresh();
    if (result?.status === "failed") {
      throw new Error(`${result.error.kind}: ${result.error.message}`);
    }
    printState(device.getState());
  } catch (err) {
    report(err);
  } finally {
    await device.destroy();
  }
});

// ---------- watch ----------

withDevice(
  program.command("watch").description("Poll a device and print every state change until interrupted")
)
  .option("-i, --interval <seconds>", "Poll interval in seconds", toInt, 5)
  .action(async (opts: DeviceCommandOptions & { interval: number }) => {
    const device = openDevice(opts, opts.interval, true);
    device.subscribe(printState);
    device.on("poll", (result: PollResult) => {
      if (result.status === "failed") {
        console.error(`poll failed: ${result.error.kind} (${result.consecutiveFailures} in a row)`);
      }
    });

    await new Promise<void>((done) => {
      process.once("SIGINT", () => {
        device.destroy().then(done, fail);
      });
    });
  });

// ---------- write ----------

withDevice(
  program.command("write").description("Write one channel of a device")
)
  .requiredOption("-n, --channel <name>", "Channel name, see the profiles command")
  .requiredOption("-V, --value <value>", "Value: number, true/false, or an option name such as on")
  .action(async (opts: DeviceCommandOptions & { channel: string; value: string }) => {
    const device = openDevice(opts);
    try {
      const channel = findChannel(device.profile, opts.channel);
      const ack = await device.write(opts.channel, parseCommandValue(opts.value, channel));
      console.log(JSON.stringify({ ...ack, value: ack.value === INVALID ? null : ack.value }));
    } catch (err) {
      report(err);
    } finally {
      await device.destroy();
    }
  });

// ---------- read-raw ----------

withConnection(
  program.command("read-raw").description("Read raw holding registers (function code 3)")
)
  .option("-r, --register <number>", "Start register address", toInt, 0)
  .option("-q, --quantity <number>", "Number of registers to read (max 64)", toInt, 64)
  .action(async (opts: ConnectionOptions & { register: number; quantity: number }) => {
    const client = new RegisterClient(opts.host, {
      port: opts.port,
      timeoutMs: opts.timeout,
      verbose: opts.verbose,
    });
    try {
      const result = await client.readHoldingRegisters(opts.register, opts.quantity);
      console.log(JSON.stringify(result));
    } catch (err) {
      report(err);
    } finally {
      await client.close();
    }
  });

// ---------- profiles ----------

program
  .command("profiles")
  .description("List device types, or the channels of one type and config code")
  .option("-t, --type <type>", "Device type")
  .option("-c, --config <code>", "Device config code", toInt)
  .action((opts: { type?: string; config?: number }) => {
    if (opts.type === undefined) {
      for (const type of profileTypes()) {
        console.log(`${type}  ${describeProfile(type)}  (config codes: ${documentedConfigCodes(type).join(", ")})`);
      }
      return;
    }
    try {
      const profile = resolve(opts.type, opts.config ?? 0);
      console.log(`${profile.deviceType} config ${profile.configCode}: ${profile.description}`);
      for (const channel of profile.channels) {
        const unit = channel.unit ? ` [${channel.unit}]` : "";
        console.log(`  r${channel.address}\t${channel.access}\t${channel.kind}\t${channel.name}${unit}`);
      }
      console.log(`  reads: ${profile.reads.map((r) => `${r.start}+${r.quantity}`).join(", ")}`);
    } catch (err) {
      fail(err);
    }
  });

// ---------- decode ----------

program
  .command("decode")
  .description("Decode a request or response frame")
  .argument("<hex...>", "Frame bytes as hex")
  .action((hex: string[]) => {
    try {
      console.log(describeFrame(hex));
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
