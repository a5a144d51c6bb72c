import WebSocket, { RawData } from "ws";
import { DEFAULT_WEBSOCKET_PING_INTERVAL } from "./constants";
import { TransportError } from "./errors";
import { Transport } from "./transport";

export interface WebSocketTransportOptions {
  /** `ws://` or `wss://` endpoint of the bridge */
  url: string;
  /** Milliseconds between keep-alive pings, 0 to disable @default 30000 */
  pingInterval?: number;
}

function rawText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * WebSocket link to a GRBL behind a web bridge (ESP3D, FluidNC and similar).
 *
 * Every text message may carry several lines; each non-empty one is emitted
 * as `line`. Binary messages are ignored. Commands go out as text messages,
 * real-time bytes as binary ones.
 *
 * @example
 * ```typescript
 * const transport = new WebSocketTransport({ url: "ws://192.168.1.50:81" });
 * const manager = new ConnectionManager(transport);
 * await manager.connect();
 * ```
 */
export class WebSocketTransport extends Transport {
  readonly description: string;
  private readonly url: string;
  private readonly pingInterval: number;
  private socket: WebSocket | null = null;
  private pinger: NodeJS.Timeout | null = null;
  private connected: boolean = false;

  constructor(options: WebSocketTransportOptions) {
    super();
    this.url = options.url;
    this.pingInterval = options.pingInterval ?? DEFAULT_WEBSOCKET_PING_INTERVAL;
    this.description = options.url;
  }

  async open(): Promise<void> {
    if (this.socket) return;
    const socket = new WebSocket(this.url);
    this.socket = socket;

    try {
      await new Promise<void>((resolve, reject) => {
        const onOpen = (): void => {
          socket.off("error", onError);
          resolve();
        };
        const onError = (err: Error): void => {
          socket.off("open", onOpen);
          reject(err);
        };
        socket.once("open", onOpen);
        socket.once("error", onError);
      });
    } catch (e) {
      if (this.socket === socket) this.socket = null;
      socket.terminate();
      const message = e instanceof Error ? e.message : String(e);
      throw new TransportError(
        `Failed to connect to ${this.description}: ${message}`,
        e
      );
    }

    if (this.socket !== socket) {
      socket.terminate();
      throw new TransportError(`${this.description} was closed while opening`);
    }

    this.connected = true;
    socket.on("message", (data: RawData, isBinary: boolean) => {
      if (isBinary) return;
      for (const line of rawText(data).split(/\r?\n/)) {
        const trimmed = line.trimEnd();
        if (trimmed) this.emit("line", trimmed);
      }
    });
    socket.on("error", (err: Error) => {
      this.emit(
        "error",
        new TransportError(`${this.description}: ${err.message}`, err)
      );
    });
    socket.on("close", () => {
      if (this.socket !== socket) return;
      this.release();
      this.emit("close");
    });

    if (this.pingInterval > 0) {
      this.pinger = setInterval(() => socket.ping(), this.pingInterval);
    }
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.release();
    socket.close();
  }

  async write(data: string | Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.connected || socket.readyState !== WebSocket.OPEN) {
      throw new TransportError(`${this.description} is not open`);
    }
    await new Promise<void>((resolve, reject) => {
      socket.send(data, { binary: typeof data !== "string" }, (err) => {
        if (!err) return resolve();
        reject(new TransportError(`Write to ${this.description} failed`, err));
      });
    });
  }

  isOpen(): boolean {
    return this.connected;
  }

  private release(): void {
    if (this.pinger) {
      clearInterval(this.pinger);
      this.pinger = null;
    }
    this.socket = null;
    this.connected = false;
  }
}
