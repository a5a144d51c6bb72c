import {
  ConnectionEvent,
  GrblResponse,
  GrblStatus,
  QueuedCommand,
  QueueState,
} from "@grbl-node/types";
import type { CommandError } from "./errors";

/** The console methods the long-lived classes log through */
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

// ============================================================================
// Command Queue
// ============================================================================

/**
 * Final outcome of a queued command. `error` is null only for ACKED commands.
 */
export interface CommandResult {
  command: QueuedCommand;
  error: CommandError | null;
}

/**
 * Handle returned by enqueue. `completion` always resolves, never rejects.
 */
export interface EnqueuedCommand {
  id: number;
  completion: Promise<CommandResult>;
}

export interface CommandQueueEvents {
  stateChange: (state: QueueState, previous: QueueState) => void;
  commandSent: (command: QueuedCommand) => void;
  commandComplete: (result: CommandResult) => void;
  commandError: (command: QueuedCommand, error: CommandError) => void;
}

// ============================================================================
// Connection Manager
// ============================================================================

/** Where a streamProgram run stands */
export interface StreamProgress {
  /** Lines handed to the queue */
  queued: number;
  /** Lines written to the controller */
  sent: number;
  /** Lines acknowledged or failed */
  completed: number;
  failed: number;
  /** Non-blank lines in the program, null when not known up front */
  total: number | null;
  /** Milliseconds since the run started */
  elapsed: number;
}

export interface ConnectionManagerEvents {
  status: (status: GrblStatus) => void;
  response: (response: GrblResponse) => void;
  connection: (event: ConnectionEvent) => void;
}

// ============================================================================
// Transports
// ============================================================================

export interface TransportEvents {
  /** One received line without its terminator */
  line: (line: string) => void;
  close: () => void;
  error: (error: Error) => void;
}
