import { EventEmitter } from "events";
import { TransportEvents } from "./types";

export interface Transport {
  on<E extends keyof TransportEvents>(
    event: E,
    listener: TransportEvents[E]
  ): this;
  once<E extends keyof TransportEvents>(
    event: E,
    listener: TransportEvents[E]
  ): this;
  off<E extends keyof TransportEvents>(
    event: E,
    listener: TransportEvents[E]
  ): this;
  emit<E extends keyof TransportEvents>(
    event: E,
    ...args: Parameters<TransportEvents[E]>
  ): boolean;
}

/**
 * A line-oriented byte stream to a controller.
 *
 * Emits `line` for every received line (terminator stripped), `close` when
 * the stream ends for any reason other than {@link close}, and `error` for
 * read or write failures.
 */
export abstract class Transport extends EventEmitter {
  /** Human-readable endpoint, e.g. "/dev/ttyUSB0 @ 115200" */
  abstract readonly description: string;

  /** Opens the stream. Rejects with a TransportError when it cannot. */
  abstract open(): Promise<void>;

  /** Closes the stream. Closing a closed transport does nothing. */
  abstract close(): Promise<void>;

  /** Writes raw text or bytes, resolving once they are handed to the OS */
  abstract write(data: string | Buffer): Promise<void>;

  abstract isOpen(): boolean;
}
