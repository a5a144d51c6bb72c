import { EventEmitter, on, once } from "events";
import {
  ConnectionEvent,
  ConnectionEventType,
  ConnectionInfo,
  ConnectionStatus,
  GrblCommand,
  GrblStatus,
  OverrideKind,
  ParsedCommand,
  QueuedCommand,
  QueueState,
  RealtimeCommand,
  ResponseType,
  Segment,
} from "@grbl-node/types";
import { programToGCode } from "@grbl-node/gcode";
import { CommandQueue, CommandQueueOptions } from "./commandQueue";
import { gcode, realtimeByte } from "./commands";
import { DEFAULT_CONNECT_TIMEOUT } from "./constants";
import {
  CommandError,
  ConnectionTimeoutError,
  NotConnectedError,
  TransportError,
} from "./errors";
import { planOverride } from "./overrides";
import { parseResponse } from "./responses";
import { GrblSettings } from "./settings";
import { StatusChannel } from "./statusChannel";
import { Transport } from "./transport";
import {
  CommandResult,
  ConnectionManagerEvents,
  EnqueuedCommand,
  Logger,
  StreamProgress,
} from "./types";

export interface ConnectionManagerOptions {
  /** Milliseconds between `?` status queries @default 250 */
  pollInterval?: number;
  /** Milliseconds the transport may take to open @default 5000 */
  connectTimeout?: number;
  queue?: Omit<CommandQueueOptions, "logger">;
  logger?: Logger;
}

export interface StreamOptions {
  /** Stops feeding lines; commands already queued are left to run */
  signal?: AbortSignal;
  /** Stop feeding lines after the first failed command @default true */
  stopOnError?: boolean;
  /** Called whenever a line is queued, sent or completed */
  onProgress?: (progress: StreamProgress) => void;
  /** Line count reported as `total`; counted from arrays when omitted */
  total?: number;
}

export interface ConnectionManager {
  on<E extends keyof ConnectionManagerEvents>(
    event: E,
    listener: ConnectionManagerEvents[E]
  ): this;
  once<E extends keyof ConnectionManagerEvents>(
    event: E,
    listener: ConnectionManagerEvents[E]
  ): this;
  off<E extends keyof ConnectionManagerEvents>(
    event: E,
    listener: ConnectionManagerEvents[E]
  ): this;
  emit<E extends keyof ConnectionManagerEvents>(
    event: E,
    ...args: Parameters<ConnectionManagerEvents[E]>
  ): boolean;
}

function countLines(
  lines: Iterable<string> | AsyncIterable<string>
): number | null {
  if (!Array.isArray(lines)) return null;
  return lines.filter((line: string) => line.trim() !== "").length;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new TransportError(String(e));
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(
      () => reject(new ConnectionTimeoutError(timeoutMs)),
      timeoutMs
    );
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * One live session with a GRBL controller.
 *
 * While connected three loops share one abort signal:
 * - the receive loop parses every line, applies it to the queue and
 *   republishes it, in arrival order;
 * - the send loop writes the next queued command whenever the queue allows
 *   one to be in flight;
 * - the status channel writes `?` every poll interval.
 *
 * Real-time bytes ({@link sendRealtime}, {@link setOverride}) are written
 * immediately and never pass through the queue.
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager(
 *   new SerialTransport({ path: "/dev/ttyUSB0" })
 * );
 * manager.on("status", (status) => console.log(status.state));
 * await manager.connect();
 *
 * const { completion } = manager.sendGCode("G0 X10");
 * const { error } = await completion;
 * ```
 */
export class ConnectionManager extends EventEmitter {
  readonly queue: CommandQueue;
  readonly statusChannel: StatusChannel;
  readonly settings: GrblSettings = new GrblSettings();

  private readonly transport: Transport;
  private readonly connectTimeout: number;
  private readonly logger: Logger;

  private status: ConnectionStatus = ConnectionStatus.DISCONNECTED;
  private controller: AbortController | null = null;
  private loops: Promise<void> = Promise.resolve();
  private closing: Promise<void> = Promise.resolve();
  private version: string | null = null;

  constructor(transport: Transport, options: ConnectionManagerOptions = {}) {
    super();
    this.transport = transport;
    this.connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
    this.logger = options.logger ?? console;
    this.queue = new CommandQueue({ ...options.queue, logger: this.logger });
    this.statusChannel = new StatusChannel({
      pollInterval: options.pollInterval,
      logger: this.logger,
    });

    this.transport.on("error", this.handleTransportError);
    this.transport.on("close", this.handleTransportClose);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Opens the transport and starts the loops. Resolves once CONNECTED.
   *
   * @throws ConnectionTimeoutError when the transport takes longer than
   * `connectTimeout` to open; the transport is closed again
   * @throws TransportError when the transport cannot be opened
   */
  async connect(): Promise<void> {
    if (
      this.status === ConnectionStatus.CONNECTED ||
      this.status === ConnectionStatus.CONNECTING
    ) {
      return;
    }
    await this.closing;

    const description = this.transport.description;
    this.status = ConnectionStatus.CONNECTING;
    this.notifyConnection({
      type: ConnectionEventType.CONNECTING,
      description,
    });

    try {
      await withTimeout(this.transport.open(), this.connectTimeout);
    } catch (e) {
      const error = toError(e);
      await this.closeTransport();
      if (this.status === ConnectionStatus.CONNECTING) {
        this.logger.error(`Failed to connect to ${description}:`, error);
        this.status = ConnectionStatus.ERROR;
        this.notifyConnection({ type: ConnectionEventType.ERROR, error });
      }
      throw error;
    }

    // disconnect() ran while the transport was opening
    if (this.status !== ConnectionStatus.CONNECTING) {
      await this.closeTransport();
      throw new NotConnectedError("Connection was closed while connecting");
    }

    this.version = null;
    this.statusChannel.reset();
    this.settings.clear();

    const controller = new AbortController();
    this.controller = controller;
    this.loops = Promise.all([
      this.receiveLoop(controller.signal),
      this.sendLoop(controller.signal),
    ]).then(() => undefined);
    this.statusChannel.start(
      () => this.transport.write(realtimeByte(RealtimeCommand.STATUS_QUERY)),
      {
        signal: controller.signal,
        onError: (e) => this.fail(toError(e)),
      }
    );

    this.status = ConnectionStatus.CONNECTED;
    this.logger.info(`Connected to ${description}`);
    this.notifyConnection({ type: ConnectionEventType.CONNECTED, description });
  }

  /**
   * Stops every loop, fails the queued commands and closes the transport.
   */
  async disconnect(): Promise<void> {
    if (this.status === ConnectionStatus.DISCONNECTED) return;

    this.teardown("Connection closed");
    this.status = ConnectionStatus.DISCONNECTED;
    await this.loops;
    await this.closeTransport();
    this.notifyConnection({
      type: ConnectionEventType.DISCONNECTED,
      description: this.transport.description,
    });
  }

  /** Disconnects and drops every listener */
  async destroy(): Promise<void> {
    await this.disconnect();
    this.transport.off("error", this.handleTransportError);
    this.transport.off("close", this.handleTransportClose);
    this.statusChannel.destroy();
    this.queue.removeAllListeners();
    this.removeAllListeners();
  }

  private teardown(reason: string): void {
    this.controller?.abort();
    this.controller = null;
    this.statusChannel.stop();
    this.queue.abort(reason);
  }

  private fail(error: Error): void {
    if (this.status !== ConnectionStatus.CONNECTED) return;
    this.logger.error(
      `Connection to ${this.transport.description} failed:`,
      error
    );

    this.status = ConnectionStatus.ERROR;
    this.teardown("Connection lost");
    this.closing = this.closeTransport();
    this.notifyConnection({ type: ConnectionEventType.ERROR, error });
  }

  private async closeTransport(): Promise<void> {
    try {
      await this.transport.close();
    } catch (e) {
      this.logger.error(`Error closing ${this.transport.description}:`, e);
    }
  }

  private handleTransportError = (error: Error): void => {
    if (this.status === ConnectionStatus.CONNECTED) {
      this.fail(error);
    } else {
      this.logger.warn(`${this.transport.description}:`, error.message);
    }
  };

  private handleTransportClose = (): void => {
    this.fail(
      new TransportError(`${this.transport.description} closed unexpectedly`)
    );
  };

  // ==========================================================================
  // Loops
  // ==========================================================================

  private async receiveLoop(signal: AbortSignal): Promise<void> {
    try {
      for await (const args of on(this.transport, "line", { signal })) {
        const line: unknown = args[0];
        if (typeof line === "string") this.handleLine(line);
      }
    } catch (e) {
      if (!signal.aborted) this.fail(toError(e));
    }
  }

  private async sendLoop(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        const command = await this.queue.next(signal);
        await this.transport.write(command.text);
      }
    } catch (e) {
      if (!signal.aborted) this.fail(toError(e));
    }
  }

  private handleLine(line: string): void {
    this.notifyConnection({ type: ConnectionEventType.DATA_RECEIVED, line });

    const response = parseResponse(line);
    if (!response) return;

    this.queue.handleResponse(response);

    switch (response.type) {
      case ResponseType.STATUS:
        this.notify("status", this.statusChannel.update(response.status));
        break;
      case ResponseType.ALARM:
        this.logger.warn(
          `ALARM:${response.code} ${response.description ?? ""}`.trim(),
          "- command queue paused until resume()"
        );
        break;
      case ResponseType.WELCOME:
        this.version = response.version;
        break;
      case ResponseType.SETTING:
        this.settings.apply(response);
        break;
    }

    this.notify("response", response);
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Queues a command. A string is sent as a G-code line.
   *
   * @throws NotConnectedError when not connected
   * @throws QueueFullError when the queue is at capacity
   */
  sendCommand(command: GrblCommand | string): EnqueuedCommand {
    this.assertConnected();
    return this.queue.enqueue(command);
  }

  sendGCode(line: string): EnqueuedCommand {
    return this.sendCommand(gcode(line));
  }

  /**
   * Renders parsed segments to G-code and queues every line, or none of them
   * when they do not fit. Pass the program's commands to keep spindle,
   * coolant and dwell lines in place.
   */
  enqueueProgram(
    segments: readonly Segment[],
    commands: readonly ParsedCommand[] = []
  ): EnqueuedCommand[] {
    this.assertConnected();
    return this.queue.enqueueAll(
      programToGCode(segments, commands).map((line) => gcode(line))
    );
  }

  /**
   * Feeds lines into the queue as space frees up, so programs of any length
   * can be run. Blank lines are skipped.
   *
   * @returns The results of every queued line, once all have completed
   *
   * @example
   * ```typescript
   * const lines = programToGCode(parseProgram(text).segments);
   * const results = await manager.streamProgram(lines);
   * const failed = results.find((result) => result.error);
   * ```
   */
  async streamProgram(
    lines: Iterable<string> | AsyncIterable<string>,
    options: StreamOptions = {}
  ): Promise<CommandResult[]> {
    const { signal, stopOnError = true, onProgress } = options;
    this.assertConnected();

    const ids = new Set<number>();
    const failures: CommandError[] = [];
    const completions: Array<Promise<CommandResult>> = [];
    const onCommandError = (command: QueuedCommand, error: CommandError) => {
      if (ids.has(command.id)) failures.push(error);
    };
    const stopped = (): boolean => stopOnError && failures.length > 0;

    const progress: StreamProgress = {
      queued: 0,
      sent: 0,
      completed: 0,
      failed: 0,
      total: options.total ?? countLines(lines),
      elapsed: 0,
    };
    const startedAt = Date.now();
    const report = (): void => {
      if (!onProgress) return;
      progress.elapsed = Date.now() - startedAt;
      try {
        onProgress({ ...progress });
      } catch (e) {
        this.logger.error("Error in streamProgram progress callback:", e);
      }
    };
    // An idle send loop takes a command before enqueue returns its id
    const sentEarly = new Set<number>();
    const onCommandSent = (command: QueuedCommand) => {
      if (!ids.has(command.id)) {
        sentEarly.add(command.id);
        return;
      }
      progress.sent++;
      report();
    };
    const onCommandComplete = (result: CommandResult) => {
      if (!ids.has(result.command.id)) return;
      progress.completed++;
      if (result.error) progress.failed++;
      report();
    };

    this.queue.on("commandError", onCommandError);
    this.queue.on("commandSent", onCommandSent);
    this.queue.on("commandComplete", onCommandComplete);
    try {
      for await (const line of lines) {
        if (!line.trim()) continue;
        signal?.throwIfAborted();
        while (this.queue.isFull() && !stopped()) {
          try {
            await once(this.queue, "commandComplete", { signal });
          } catch (e) {
            signal?.throwIfAborted();
            throw e;
          }
        }
        if (stopped()) break;

        const { id, completion } = this.sendGCode(line);
        ids.add(id);
        completions.push(completion);
        progress.queued++;
        report();
        if (sentEarly.delete(id)) {
          progress.sent++;
          report();
        }
      }
      return await Promise.all(completions);
    } finally {
      this.queue.off("commandError", onCommandError);
      this.queue.off("commandSent", onCommandSent);
      this.queue.off("commandComplete", onCommandComplete);
    }
  }

  /**
   * Writes a real-time byte immediately, ahead of anything queued.
   */
  async sendRealtime(command: RealtimeCommand): Promise<void> {
    this.assertConnected();
    await this.transport.write(realtimeByte(command));
  }

  /**
   * Moves an override to `target` percent with the fewest real-time bytes,
   * starting from the last reported value (100 before any report).
   *
   * @returns The bytes written
   */
  async setOverride(
    kind: OverrideKind,
    target: number
  ): Promise<RealtimeCommand[]> {
    this.assertConnected();
    const plan = planOverride(kind, this.currentOverride(kind), target);
    for (const command of plan) {
      await this.transport.write(realtimeByte(command));
    }
    return plan;
  }

  private currentOverride(kind: OverrideKind): number {
    const overrides = this.statusChannel.getStatus()?.overrides;
    if (!overrides) return 100;
    switch (kind) {
      case OverrideKind.FEED:
        return overrides.feed;
      case OverrideKind.RAPID:
        return overrides.rapid;
      case OverrideKind.SPINDLE:
        return overrides.spindle;
    }
  }

  /**
   * Stops sending queued commands. Motion already planned continues; send
   * {@link RealtimeCommand.FEED_HOLD} to stop it.
   */
  pause(): void {
    this.queue.pause();
  }

  /** Resumes sending, e.g. after an alarm was cleared with `$X` */
  resume(): void {
    this.queue.resume();
  }

  /** @returns The number of pending commands dropped */
  clearQueue(): number {
    return this.queue.clear();
  }

  private assertConnected(): void {
    if (this.status !== ConnectionStatus.CONNECTED) {
      throw new NotConnectedError();
    }
  }

  // ==========================================================================
  // State
  // ==========================================================================

  /** Latest status snapshot, or null before the first report */
  getStatus(): GrblStatus | null {
    return this.statusChannel.getStatus();
  }

  getConnectionStatus(): ConnectionStatus {
    return this.status;
  }

  queueState(): QueueState {
    return this.queue.getState();
  }

  getInfo(): ConnectionInfo {
    return { status: this.status, description: this.transport.description };
  }

  /** Firmware version from the last welcome banner */
  getVersion(): string | null {
    return this.version;
  }

  private notifyConnection(event: ConnectionEvent): void {
    this.notify("connection", event);
  }

  private notify<E extends keyof ConnectionManagerEvents>(
    event: E,
    ...args: Parameters<ConnectionManagerEvents[E]>
  ): void {
    try {
      this.emit(event, ...args);
    } catch (e) {
      this.logger.error(`Error in ConnectionManager ${event} callback:`, e);
    }
  }
}
