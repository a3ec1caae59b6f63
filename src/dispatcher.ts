/**
 * Command dispatcher.
 *
 * Validates a write against the capability set, sends exactly one register
 * write and, once the device acknowledges it, updates the cached value
 * without waiting for the next poll.
 */

import { toDeviceError } from "./classifier.js";
import { decodeChannel, encode, type ChannelValue } from "./codec.js";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";
import type { CapabilitySet } from "./profiles.js";
import type { StateStore } from "./state.js";

/** The part of a register client the dispatcher needs. */
export interface RegisterWriter {
  writeHoldingRegister(addr: number, value: number): Promise<number>;
}

export interface CommandAck {
  channel: string;
  /** Value now held in the cache for the channel */
  value: ChannelValue;
  address: number;
  word: number;
}

export interface CommandDispatcherOptions extends LoggingOptions {
  label?: string;
}

export class CommandDispatcher {
  private readonly log: Logger;
  private readonly label: string;

  constructor(
    private readonly writer: RegisterWriter,
    private readonly profile: CapabilitySet,
    private readonly store: StateStore,
    options: CommandDispatcherOptions = {}
  ) {
    this.log = resolveLogger(options);
    this.label = options.label ?? profile.deviceType;
  }

  /**
   * Write a domain value to a channel.
   *
   * @throws NotWritableError for unknown or read-only channels, before any exchange
   * @throws ValidationError for values outside the channel's domain, before any exchange
   */
  async write(channelName: string, value: unknown): Promise<CommandAck> {
    const { channel, address, word } = encode(this.profile, channelName, value);

    this.log.debug(`[${this.label}] write ${channelName}=${String(value)} -> register ${address} = ${word}`);
    try {
      await this.writer.writeHoldingRegister(address, word);
    } catch (err) {
      const error = toDeviceError(err);
      this.log.warn(`[${this.label}] write to ${channelName} failed: ${error.message}`);
      throw error;
    }

    const cached = decodeChannel(channel, [word]);
    this.store.update({ values: { [channelName]: cached }, at: Date.now() });
    return { channel: channelName, value: cached, address, word };
  }
}
