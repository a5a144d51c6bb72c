/**
 * Errors raised by the connection, transports and command queue.
 *
 * Controller-reported `error:` and `ALARM:` lines are responses and are never
 * thrown; the queue attaches them to the command they failed as a
 * {@link CommandRejectedError}.
 */
export class GrblError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GrblError";
  }
}

/** The transport failed to open, read or write. */
export class TransportError extends GrblError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TransportError";
  }
}

export class NotConnectedError extends GrblError {
  constructor(message = "Not connected to a controller") {
    super(message);
    this.name = "NotConnectedError";
  }
}

export class ConnectionTimeoutError extends GrblError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Connection attempt timed out after ${timeoutMs} ms`);
    this.name = "ConnectionTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================================
// Queue
// ============================================================================

/** Thrown by enqueue when the queue already holds `capacity` commands. */
export class QueueFullError extends GrblError {
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Command queue is full (capacity ${capacity})`);
    this.name = "QueueFullError";
    this.capacity = capacity;
  }
}

/**
 * Base of the failures a queued command can end with.
 */
export class CommandError extends GrblError {
  readonly commandId: number;

  constructor(message: string, commandId: number) {
    super(message);
    this.name = "CommandError";
    this.commandId = commandId;
  }
}

/**
 * The controller answered the command with `error:<code>`, raised an alarm
 * while it was in flight, or was reset before acknowledging it.
 */
export class CommandRejectedError extends CommandError {
  /** GRBL error or alarm code, null after a reset */
  readonly code: number | null;

  constructor(message: string, commandId: number, code: number | null) {
    super(message, commandId);
    this.name = "CommandRejectedError";
    this.code = code;
  }
}

export class CommandTimeoutError extends CommandError {
  readonly timeoutMs: number;

  constructor(commandId: number, timeoutMs: number) {
    super(
      `Command ${commandId} was not acknowledged within ${timeoutMs} ms`,
      commandId
    );
    this.name = "CommandTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class QueueClearedError extends CommandError {
  constructor(commandId: number) {
    super(`Command ${commandId} was cleared before it was sent`, commandId);
    this.name = "QueueClearedError";
  }
}
