import {
  GrblStatus,
  GrblStatusPaths,
  FullStatusChangeCallback,
  Position,
  StatusPropertyValue,
  StatusPropertyWatchCallback,
} from "@grbl-node/types";
import isEqual from "fast-deep-equal";
import delve from "dlv";
import {
  DEFAULT_STATUS_POLL_INTERVAL,
  MIN_STATUS_POLL_INTERVAL,
} from "./constants";
import { Logger } from "./types";

export interface StatusChannelOptions {
  /** Milliseconds between status queries @default 250 */
  pollInterval?: number;
  logger?: Logger;
}

export interface WatchOptions {
  /** Also call back right away with the value in the current snapshot */
  immediate?: boolean;
  /** Drop the watch after its first change */
  once?: boolean;
}

/** Sends one status query; the report arrives later through update() */
export type StatusRequest = () => void | Promise<void>;

export interface PollOptions {
  /** Polling ends when this aborts */
  signal?: AbortSignal;
  /**
   * Receives a failed query instead of the logger. Polling goes on unless
   * the handler stops it.
   */
  onError?: (error: unknown) => void;
}

interface Watcher {
  check: (status: GrblStatus) => void;
}

function readPath<P extends GrblStatusPaths>(
  status: GrblStatus,
  path: P
): StatusPropertyValue<P> {
  return delve(status, path);
}

function roundPosition(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}

function combine(a: Position, b: Position, sign: 1 | -1): Position {
  return {
    x: roundPosition(a.x + sign * b.x),
    y: roundPosition(a.y + sign * b.y),
    z: roundPosition(a.z + sign * b.z),
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const field of Object.values(value)) {
    if (typeof field === "object" && field !== null) deepFreeze(field);
  }
  return Object.freeze(value);
}

/**
 * Completes a report with what earlier reports said.
 *
 * GRBL sends WCO and Ov only every few reports. The last known offset and
 * override values are carried forward, and whichever of MPos and WPos the
 * report lacks is derived from the other through WCO.
 */
export function mergeStatus(
  report: GrblStatus,
  previous: GrblStatus | null
): GrblStatus {
  const offset =
    report.workCoordinateOffset ?? previous?.workCoordinateOffset ?? null;
  const machine = report.machinePosition;
  const work = report.workPosition;

  return {
    ...report,
    workCoordinateOffset: offset,
    machinePosition:
      machine ?? (work && offset ? combine(work, offset, 1) : null),
    workPosition:
      work ?? (machine && offset ? combine(machine, offset, -1) : null),
    overrides: report.overrides ?? previous?.overrides ?? null,
    accessories: report.accessories ?? previous?.accessories ?? null,
  };
}

/**
 * The live machine status.
 *
 * Holds one frozen {@link GrblStatus} snapshot that is replaced as a whole on
 * every report, so readers never see a half-applied update. Polls the
 * controller at a fixed interval while started.
 *
 * @example
 * ```typescript
 * channel.addWatch("state", (state, previous) => {
 *   console.log(`${previous} -> ${state}`);
 * });
 * channel.addWatch("workPosition.x", (x) => console.log(`X ${x}`), { immediate: true });
 * ```
 */
export class StatusChannel {
  private pollInterval: number;
  private poller: NodeJS.Timeout | null = null;
  private isPolling: boolean = false;
  private request: StatusRequest | null = null;
  private onError: ((error: unknown) => void) | null = null;
  private readonly logger: Logger;

  private currentStatus: GrblStatus | null = null;
  private watchers: Map<GrblStatusPaths, Map<object, Watcher>> = new Map();
  private fullChangeCallbacks: Set<FullStatusChangeCallback> = new Set();

  constructor(options?: StatusChannelOptions) {
    this.pollInterval = Math.max(
      MIN_STATUS_POLL_INTERVAL,
      options?.pollInterval ?? DEFAULT_STATUS_POLL_INTERVAL
    );
    this.logger = options?.logger ?? console;
  }

  // ==========================================================================
  // Polling
  // ==========================================================================

  /**
   * Starts querying the controller every poll interval until {@link stop}
   * is called or the signal aborts.
   */
  start(request: StatusRequest, options: PollOptions = {}): void {
    const { signal, onError } = options;
    this.stop();
    if (signal?.aborted) return;
    this.request = request;
    this.onError = onError ?? null;
    signal?.addEventListener("abort", () => this.stop(), { once: true });
    this.startPolling();
  }

  stop(): void {
    this.stopPolling();
    this.request = null;
    this.onError = null;
  }

  isRunning(): boolean {
    return this.poller !== null;
  }

  private startPolling(): void {
    if (this.poller || !this.request) return;
    this.poller = setInterval(() => {
      void this.performPoll();
    }, this.pollInterval);
  }

  private stopPolling(): void {
    if (this.poller) {
      clearInterval(this.poller);
      this.poller = null;
    }
  }

  private async performPoll(): Promise<void> {
    // A slow write skips ticks rather than stacking queries
    if (this.isPolling || !this.request) return;
    this.isPolling = true;

    try {
      await this.request();
    } catch (e) {
      this.reportPollError(e);
    } finally {
      this.isPolling = false;
    }
  }

  private reportPollError(error: unknown): void {
    if (!this.onError) {
      this.logger.error("Error during status poll:", error);
      return;
    }
    try {
      this.onError(error);
    } catch (e) {
      this.logger.error("Error in StatusChannel poll error callback:", e);
    }
  }

  /**
   * Changes the query interval, restarting the timer when polling.
   * Values under 10 ms are raised to 10 ms.
   */
  setPollInterval(interval: number): void {
    this.pollInterval = Math.max(MIN_STATUS_POLL_INTERVAL, interval);
    if (this.poller) {
      this.stopPolling();
      this.startPolling();
    }
  }

  getPollInterval(): number {
    return this.pollInterval;
  }

  // ==========================================================================
  // Snapshot
  // ==========================================================================

  /**
   * Replaces the snapshot with a parsed report and notifies watchers.
   * @returns The new snapshot
   */
  update(report: GrblStatus): GrblStatus {
    const oldStatus = this.currentStatus;
    const newStatus = deepFreeze(mergeStatus(report, oldStatus));
    this.currentStatus = newStatus; // Update before callbacks run

    if (isEqual(newStatus, oldStatus)) return newStatus;

    this.fullChangeCallbacks.forEach((cb) => {
      try {
        cb(newStatus, oldStatus);
      } catch (e) {
        this.logger.error("Error in full StatusChannel change callback:", e);
      }
    });

    this.watchers.forEach((byCallback) => {
      byCallback.forEach((watcher) => watcher.check(newStatus));
    });

    return newStatus;
  }

  /** Frozen snapshot of the last report, or null before the first one */
  getStatus(): GrblStatus | null {
    return this.currentStatus;
  }

  /** Forgets the snapshot, e.g. after reconnecting to another controller */
  reset(): void {
    this.currentStatus = null;
  }

  // ==========================================================================
  // Watchers
  // ==========================================================================

  /** Called with the new and previous snapshot when a report changes it */
  onFullChange(callback: FullStatusChangeCallback): void {
    this.fullChangeCallbacks.add(callback);
  }

  removeFullChange(callback: FullStatusChangeCallback): void {
    this.fullChangeCallbacks.delete(callback);
  }

  /**
   * Calls back when the value at a dotted path, such as `state` or
   * `machinePosition.z`, differs from the one last seen there.
   */
  addWatch<P extends GrblStatusPaths>(
    propertyPath: P,
    callback: StatusPropertyWatchCallback<P>,
    options: WatchOptions = {}
  ): void {
    const { immediate = false, once = false } = options;

    let lastValue: StatusPropertyValue<P> | null = this.currentStatus
      ? readPath(this.currentStatus, propertyPath)
      : null;

    const watcher: Watcher = {
      check: (status) => {
        const newValue = readPath(status, propertyPath);
        if (isEqual(newValue, lastValue)) return;
        const oldValue = lastValue;
        lastValue = newValue;
        if (once) this.removeWatch(propertyPath, callback);
        try {
          callback(newValue, oldValue, propertyPath);
        } catch (e) {
          this.logger.error(
            `Error in StatusChannel watch callback for ${propertyPath}:`,
            e
          );
        }
      },
    };

    let byCallback = this.watchers.get(propertyPath);
    if (!byCallback) {
      byCallback = new Map();
      this.watchers.set(propertyPath, byCallback);
    }
    byCallback.set(callback, watcher);

    if (immediate && this.currentStatus) {
      const currentValue = readPath(this.currentStatus, propertyPath);
      try {
        callback(currentValue, null, propertyPath);
      } catch (e) {
        this.logger.error(
          `Error in immediate StatusChannel watch callback for ${propertyPath}:`,
          e
        );
      }
    }
  }

  removeWatch<P extends GrblStatusPaths>(
    propertyPath: P,
    callback: StatusPropertyWatchCallback<P>
  ): void {
    const byCallback = this.watchers.get(propertyPath);
    if (byCallback) {
      byCallback.delete(callback);
      if (byCallback.size === 0) {
        this.watchers.delete(propertyPath);
      }
    }
  }

  /** Stops polling and drops every watcher */
  destroy(): void {
    this.stop();
    this.watchers.clear();
    this.fullChangeCallbacks.clear();
  }
}
