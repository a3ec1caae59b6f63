/**
 * Cached device state.
 *
 * Owned by one device; readers only ever receive frozen snapshots. Emits
 * "change" with the new snapshot when availability flips or a channel value
 * actually changes. A listener that throws is logged and skipped; the update
 * itself and the other listeners are unaffected.
 */

import { EventEmitter } from "node:events";
import type { ChannelValue, ChannelValues } from "./codec.js";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";

export interface DeviceState {
  readonly values: ChannelValues;
  readonly available: boolean;
  /** Epoch milliseconds of the last successful update, null before the first one */
  readonly lastUpdated: number | null;
}

export type StateListener = (state: DeviceState) => void;

export interface StatePatch {
  values?: Readonly<Record<string, ChannelValue>>;
  available?: boolean;
  /** Timestamp recorded as `lastUpdated` */
  at?: number;
}

export interface StateUpdate {
  valuesChanged: boolean;
  availabilityChanged: boolean;
}

export class StateStore extends EventEmitter {
  private readonly log: Logger;
  private snapshot: DeviceState = Object.freeze({
    values: Object.freeze({}),
    available: false,
    lastUpdated: null,
  });

  constructor(options: LoggingOptions = {}) {
    super();
    this.log = resolveLogger(options);
  }

  get state(): DeviceState {
    return this.snapshot;
  }

  get available(): boolean {
    return this.snapshot.available;
  }

  /** Apply a patch as one transition and emit at most one "change". */
  update(patch: StatePatch): StateUpdate {
    const current = this.snapshot;
    const incoming = patch.values ?? {};
    const valuesChanged = Object.entries(incoming).some(
      ([name, value]) => !(name in current.values) || !Object.is(current.values[name], value)
    );
    const available = patch.available ?? current.available;
    const availabilityChanged = available !== current.available;

    this.snapshot = Object.freeze({
      values: valuesChanged ? Object.freeze({ ...current.values, ...incoming }) : current.values,
      available,
      lastUpdated: patch.at ?? current.lastUpdated,
    });

    if (valuesChanged || availabilityChanged) {
      this.notify(this.snapshot);
    }
    return { valuesChanged, availabilityChanged };
  }

  private notify(state: DeviceState): void {
    for (const listener of this.rawListeners("change")) {
      try {
        listener.call(this, state);
      } catch (err) {
        this.log.error("State listener failed:", err);
      }
    }
  }
}
