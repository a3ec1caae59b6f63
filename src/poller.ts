/**
 * Fixed-cadence poller for one device.
 *
 * Phases: idle → polling → (updated | failed) → idle. A tick that fires while
 * a cycle is still running is skipped, never queued. There is no backoff:
 * the next cycle always starts at the next scheduled tick.
 */

import { classify, type Classification } from "./classifier.js";
import { decode, type ChannelValues, type RegisterBlock } from "./codec.js";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";
import type { CapabilitySet } from "./profiles.js";
import type { StateStore } from "./state.js";

export type PollPhase = "idle" | "polling" | "updated" | "failed";

export type PollResult =
  | { status: "updated"; values: ChannelValues; at: number }
  | { status: "failed"; error: Classification; consecutiveFailures: number; at: number };

/** The part of a register client the poller needs. */
export interface RegisterReader {
  readHoldingRegisters(startAddr: number, quantity: number): Promise<number[]>;
}

export const DEFAULT_FAILURE_THRESHOLD = 3;

export interface PollerOptions extends LoggingOptions {
  /** Time between ticks in milliseconds */
  intervalMs: number;
  /** Consecutive failures before the device is marked unavailable. Default: 3 */
  failureThreshold?: number;
  /** Receives every completed cycle */
  onResult?: (result: PollResult) => void;
  /** Prefix for log lines. Default: the device type */
  label?: string;
}

export class Poller {
  public readonly intervalMs: number;
  public readonly failureThreshold: number;

  private readonly log: Logger;
  private readonly label: string;
  private readonly onResult: ((result: PollResult) => void) | undefined;
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private disposed = false;
  private _phase: PollPhase = "idle";
  private _consecutiveFailures = 0;
  private _skippedTicks = 0;

  constructor(
    private readonly reader: RegisterReader,
    private readonly profile: CapabilitySet,
    private readonly store: StateStore,
    options: PollerOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.onResult = options.onResult;
    this.label = options.label ?? profile.deviceType;
    this.log = resolveLogger(options);
  }

  get phase(): PollPhase {
    return this._phase;
  }

  get consecutiveFailures(): number {
    return this._consecutiveFailures;
  }

  get skippedTicks(): number {
    return this._skippedTicks;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Run one cycle now, then one every interval. */
  start(): void {
    if (this.disposed || this.timer !== null) return;
    this.timer = setInterval(() => this.fire(), this.intervalMs);
    this.fire();
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Stop for good; a cycle still in flight completes without a result. */
  dispose(): void {
    this.disposed = true;
    this.stop();
  }

  private fire(): void {
    this.tick().catch((err: unknown) => {
      this.log.error(`[${this.label}] poll cycle failed:`, err);
    });
  }

  /**
   * Run one poll cycle.
   *
   * @returns The cycle's result, or null when the tick was skipped or the
   *          poller was disposed before the cycle finished
   */
  async tick(): Promise<PollResult | null> {
    if (this.disposed) return null;
    if (this.inFlight) {
      this._skippedTicks++;
      this.log.debug(`[${this.label}] previous poll still running, tick skipped`);
      return null;
    }

    this.inFlight = true;
    this._phase = "polling";
    let result: PollResult;
    try {
      result = await this.cycle();
    } catch (err) {
      if (this.disposed) return null;
      result = this.fail(err);
    } finally {
      this.inFlight = false;
    }
    if (this.disposed) return null;

    try {
      this.onResult?.(result);
    } catch (err) {
      this.log.error(`[${this.label}] poll result listener failed:`, err);
    }
    this._phase = "idle";
    return result;
  }

  private async cycle(): Promise<PollResult> {
    const blocks: RegisterBlock[] = [];
    for (const span of this.profile.reads) {
      const words = await this.reader.readHoldingRegisters(span.start, span.quantity);
      blocks.push({ start: span.start, words });
    }

    const values = Object.freeze(decode(this.profile, blocks));
    const at = Date.now();
    if (this.disposed) return { status: "updated", values, at };

    const previousFailures = this._consecutiveFailures;
    this._consecutiveFailures = 0;
    this._phase = "updated";
    const update = this.store.update({ values, available: true, at });
    if (update.availabilityChanged && previousFailures > 0) {
      this.log.info(`[${this.label}] device available again`);
    }
    return { status: "updated", values, at };
  }

  private fail(err: unknown): PollResult {
    const error = classify(err);
    this._consecutiveFailures++;
    this._phase = "failed";

    if (error.kind === "FeatureDisabled") {
      this.log.warn(`[${this.label}] ${error.message}`);
    } else {
      this.log.debug(
        `[${this.label}] poll failed (${error.kind}, ${this._consecutiveFailures} in a row): ${error.message}`
      );
    }

    if (this._consecutiveFailures >= this.failureThreshold) {
      const update = this.store.update({ available: false });
      if (update.availabilityChanged) {
        this.log.info(
          `[${this.label}] device unavailable after ${this._consecutiveFailures} failed polls`
        );
      }
    }
    return { status: "failed", error, consecutiveFailures: this._consecutiveFailures, at: Date.now() };
  }
}
