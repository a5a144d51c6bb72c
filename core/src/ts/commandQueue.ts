import { EventEmitter } from "events";
import {
  CommandState,
  GrblCommand,
  GrblResponse,
  QueuedCommand,
  QueueState,
  QueueStats,
  ResponseType,
} from "@grbl-node/types";
import { formatCommand, gcode } from "./commands";
import { DEFAULT_COMMAND_TIMEOUT, DEFAULT_QUEUE_CAPACITY } from "./constants";
import {
  CommandError,
  CommandRejectedError,
  CommandTimeoutError,
  QueueClearedError,
  QueueFullError,
} from "./errors";
import {
  CommandQueueEvents,
  CommandResult,
  EnqueuedCommand,
  Logger,
} from "./types";

export interface CommandQueueOptions {
  /** @default 128 */
  capacity?: number;
  /** Milliseconds a sent command may wait for `ok` or `error:` @default 5000 */
  commandTimeout?: number;
  logger?: Logger;
}

interface Entry {
  command: QueuedCommand;
  resolve: (result: CommandResult) => void;
}

interface Waiter {
  resolve: (command: QueuedCommand) => void;
  detach: () => void;
}

export interface CommandQueue {
  on<E extends keyof CommandQueueEvents>(
    event: E,
    listener: CommandQueueEvents[E]
  ): this;
  once<E extends keyof CommandQueueEvents>(
    event: E,
    listener: CommandQueueEvents[E]
  ): this;
  off<E extends keyof CommandQueueEvents>(
    event: E,
    listener: CommandQueueEvents[E]
  ): this;
  emit<E extends keyof CommandQueueEvents>(
    event: E,
    ...args: Parameters<CommandQueueEvents[E]>
  ): boolean;
}

/**
 * FIFO of outbound commands with GRBL's one-command-in-flight discipline.
 *
 * The queue never writes anything itself. A sender takes the next command
 * with {@link takeNext} or {@link next}, writes its `text`, and feeds every
 * parsed response back through {@link handleResponse}.
 *
 * - `ok` acknowledges the command in flight.
 * - `error:<code>` fails it. Nothing is retried.
 * - `ALARM:<code>` fails it and pauses the queue until {@link resume}.
 * - The welcome banner of a reset fails it without pausing.
 * - A command unacknowledged for `commandTimeout` ms is marked TIMED_OUT and
 *   the next one may be sent.
 *
 * @example
 * ```typescript
 * const queue = new CommandQueue({ commandTimeout: 10000 });
 * const { completion } = queue.enqueue("G0 X10");
 * const command = queue.takeNext(); // "G0 X10\n", now SENT
 * queue.handleResponse({ type: ResponseType.OK });
 * (await completion).command.state; // CommandState.ACKED
 * ```
 */
export class CommandQueue extends EventEmitter {
  private readonly capacity: number;
  private commandTimeout: number;
  private readonly logger: Logger;

  private state: QueueState = QueueState.IDLE;
  private pending: Entry[] = [];
  private inFlight: Entry | null = null;
  private ackTimer: NodeJS.Timeout | null = null;
  private waiters: Waiter[] = [];
  private nextId = 1;

  private stats = {
    totalQueued: 0,
    totalSent: 0,
    totalAcked: 0,
    totalFailed: 0,
    totalTimedOut: 0,
    roundTripTotalMs: 0,
  };

  constructor(options: CommandQueueOptions = {}) {
    super();
    this.capacity = options.capacity ?? DEFAULT_QUEUE_CAPACITY;
    if (!(this.capacity >= 1)) {
      throw new RangeError(`capacity must be at least 1, got ${this.capacity}`);
    }
    this.commandTimeout = options.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT;
    this.logger = options.logger ?? console;
  }

  // ==========================================================================
  // Enqueueing
  // ==========================================================================

  /**
   * Appends a command. A string is sent as a G-code line.
   *
   * @throws QueueFullError when the queue already holds `capacity` commands;
   * nothing is stored in that case
   */
  enqueue(command: GrblCommand | string): EnqueuedCommand {
    if (this.length >= this.capacity) throw new QueueFullError(this.capacity);
    return this.append(command);
  }

  /**
   * Appends several commands, or none of them if they do not all fit.
   *
   * @throws QueueFullError when the batch exceeds the free capacity
   */
  enqueueAll(commands: ReadonlyArray<GrblCommand | string>): EnqueuedCommand[] {
    if (this.length + commands.length > this.capacity) {
      throw new QueueFullError(this.capacity);
    }
    return commands.map((command) => this.append(command));
  }

  private append(command: GrblCommand | string): EnqueuedCommand {
    const text = formatCommand(
      typeof command === "string" ? gcode(command) : command
    );
    const queued: QueuedCommand = {
      id: this.nextId++,
      text,
      enqueuedAt: Date.now(),
      sentAt: null,
      completedAt: null,
      state: CommandState.QUEUED,
      errorCode: null,
      failure: null,
    };

    let resolve: (result: CommandResult) => void = () => undefined;
    const completion = new Promise<CommandResult>((r) => {
      resolve = r;
    });

    this.pending.push({ command: queued, resolve });
    this.stats.totalQueued++;
    this.settle();
    this.wake();

    return { id: queued.id, completion };
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Marks the oldest pending command SENT and returns it, or returns null
   * when the queue is paused, a command is in flight, or nothing is pending.
   */
  takeNext(): QueuedCommand | null {
    if (
      this.state === QueueState.PAUSED ||
      this.inFlight !== null ||
      this.pending.length === 0
    ) {
      return null;
    }

    const entry = this.pending.shift();
    if (!entry) return null;
    const { command } = entry;
    command.state = CommandState.SENT;
    command.sentAt = Date.now();
    this.inFlight = entry;
    this.stats.totalSent++;

    const id = command.id;
    this.ackTimer = setTimeout(() => this.timeOut(id), this.commandTimeout);

    this.settle();
    this.notify("commandSent", { ...command });
    return { ...command };
  }

  /**
   * Resolves with the next command as soon as one may be sent, marking it
   * SENT. Rejects with the signal's reason when `signal` aborts first.
   */
  next(signal?: AbortSignal): Promise<QueuedCommand> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    const ready = this.takeNext();
    if (ready) return Promise.resolve(ready);

    return new Promise<QueuedCommand>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((waiter) => waiter !== entry);
        reject(signal?.reason);
      };
      const entry: Waiter = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(entry);
    });
  }

  private wake(): void {
    while (this.waiters.length > 0) {
      const command = this.takeNext();
      if (!command) return;
      const waiter = this.waiters.shift();
      if (!waiter) return;
      waiter.detach();
      waiter.resolve(command);
    }
  }

  // ==========================================================================
  // Responses
  // ==========================================================================

  /**
   * Applies a controller response to the command in flight. Status reports,
   * settings and feedback leave the queue untouched.
   */
  handleResponse(response: GrblResponse): void {
    switch (response.type) {
      case ResponseType.OK:
        if (this.inFlight) {
          this.complete(CommandState.ACKED, null);
        } else {
          this.logger.debug("CommandQueue: ok with no command in flight");
        }
        break;

      case ResponseType.ERROR:
        this.failInFlight(
          `error:${response.code}${withDescription(response.description)}`,
          response.code
        );
        break;

      case ResponseType.ALARM:
        this.pause();
        this.failInFlight(
          `ALARM:${response.code}${withDescription(response.description)}`,
          response.code
        );
        break;

      case ResponseType.WELCOME:
        this.failInFlight("Controller reset before acknowledging", null);
        break;

      default:
        return;
    }
    this.wake();
  }

  private failInFlight(reason: string, code: number | null): void {
    const entry = this.inFlight;
    if (!entry) return;
    const error = new CommandRejectedError(
      `Command ${entry.command.id} failed: ${reason}`,
      entry.command.id,
      code
    );
    this.complete(CommandState.FAILED, error);
  }

  private timeOut(id: number): void {
    this.ackTimer = null;
    if (this.inFlight?.command.id !== id) return;
    const error = new CommandTimeoutError(id, this.commandTimeout);
    this.logger.warn(error.message);
    this.complete(CommandState.TIMED_OUT, error);
    this.wake();
  }

  /** Finishes the command in flight */
  private complete(state: CommandState, error: CommandError | null): void {
    const entry = this.inFlight;
    if (!entry) return;
    this.inFlight = null;
    if (this.ackTimer) {
      clearTimeout(this.ackTimer);
      this.ackTimer = null;
    }

    const { command } = entry;
    command.completedAt = Date.now();
    if (state === CommandState.ACKED && command.sentAt !== null) {
      this.stats.totalAcked++;
      this.stats.roundTripTotalMs += command.completedAt - command.sentAt;
    } else if (state === CommandState.TIMED_OUT) {
      this.stats.totalTimedOut++;
    }
    this.settle();
    this.finish(entry, state, error);
  }

  private finish(
    entry: Entry,
    state: CommandState,
    error: CommandError | null
  ): void {
    const { command } = entry;
    command.state = state;
    command.completedAt ??= Date.now();
    if (error) {
      if (state === CommandState.FAILED) this.stats.totalFailed++;
      command.failure = error.message;
      if (error instanceof CommandRejectedError) command.errorCode = error.code;
    }

    const result: CommandResult = { command: { ...command }, error };
    entry.resolve(result);
    if (error) this.notify("commandError", { ...command }, error);
    this.notify("commandComplete", result);
  }

  // ==========================================================================
  // Control
  // ==========================================================================

  /**
   * Stops dispatching. Pending commands are kept and a command already in
   * flight can still be acknowledged.
   */
  pause(): void {
    this.setState(QueueState.PAUSED);
  }

  /** Leaves PAUSED and dispatches again */
  resume(): void {
    if (this.state !== QueueState.PAUSED) return;
    this.setState(this.activeState());
    this.wake();
  }

  /**
   * Fails every pending command with a {@link QueueClearedError}. The
   * command in flight, if any, is left to its response.
   *
   * @returns The number of commands cleared
   */
  clear(): number {
    const cleared = this.pending;
    this.pending = [];
    this.settle();
    for (const entry of cleared) {
      this.finish(
        entry,
        CommandState.FAILED,
        new QueueClearedError(entry.command.id)
      );
    }
    return cleared.length;
  }

  /**
   * Fails every command, in flight included. Used when the connection goes
   * away and no response can arrive.
   */
  abort(reason: string): void {
    this.clear();
    const entry = this.inFlight;
    if (!entry) return;
    this.complete(
      CommandState.FAILED,
      new CommandError(
        `Command ${entry.command.id} abandoned: ${reason}`,
        entry.command.id
      )
    );
  }

  // ==========================================================================
  // State
  // ==========================================================================

  private activeState(): QueueState {
    if (this.inFlight) return QueueState.WAITING_FOR_ACK;
    if (this.pending.length > 0) return QueueState.ACTIVE;
    return QueueState.IDLE;
  }

  // PAUSED only ends through resume()
  private settle(): void {
    if (this.state === QueueState.PAUSED) return;
    this.setState(this.activeState());
  }

  private setState(state: QueueState): void {
    const previous = this.state;
    if (state === previous) return;
    this.state = state;
    this.notify("stateChange", state, previous);
  }

  private notify<E extends keyof CommandQueueEvents>(
    event: E,
    ...args: Parameters<CommandQueueEvents[E]>
  ): void {
    try {
      this.emit(event, ...args);
    } catch (e) {
      this.logger.error(`Error in CommandQueue ${event} callback:`, e);
    }
  }

  getState(): QueueState {
    return this.state;
  }

  /** Pending plus in flight */
  get length(): number {
    return this.pending.length + (this.inFlight ? 1 : 0);
  }

  isFull(): boolean {
    return this.length >= this.capacity;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /** Copy of the command in flight, or null */
  getInFlight(): QueuedCommand | null {
    return this.inFlight ? { ...this.inFlight.command } : null;
  }

  /** Copies of the pending commands, oldest first */
  getPending(): QueuedCommand[] {
    return this.pending.map((entry) => ({ ...entry.command }));
  }

  setCommandTimeout(timeout: number): void {
    this.commandTimeout = Math.max(1, timeout);
  }

  getCommandTimeout(): number {
    return this.commandTimeout;
  }

  getStats(): QueueStats {
    const { roundTripTotalMs, ...totals } = this.stats;
    return {
      ...totals,
      currentLength: this.length,
      averageRoundTripMs:
        totals.totalAcked > 0 ? roundTripTotalMs / totals.totalAcked : 0,
    };
  }

  resetStats(): void {
    this.stats = {
      totalQueued: 0,
      totalSent: 0,
      totalAcked: 0,
      totalFailed: 0,
      totalTimedOut: 0,
      roundTripTotalMs: 0,
    };
  }
}

function withDescription(description: string | null): string {
  return description ? ` (${description})` : "";
}
