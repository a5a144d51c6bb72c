import { createConnection, NetConnectOpts } from "net";
import { createInterface, Interface } from "readline";
import { Duplex } from "stream";
import { DEFAULT_TCP_PORT } from "./constants";
import { TransportError } from "./errors";
import { Transport } from "./transport";

export interface TcpTransportOptions {
  host: string;
  /** @default 23 */
  port?: number;
  /**
   * Opens the socket. Must emit `connect` once usable; defaults to
   * `net.createConnection`.
   */
  connect?: (options: NetConnectOpts) => Duplex;
}

/**
 * Raw TCP link to a network-attached GRBL, such as an ESP32 serial bridge
 * listening on the telnet port.
 *
 * @example
 * ```typescript
 * const transport = new TcpTransport({ host: "192.168.1.50" });
 * const manager = new ConnectionManager(transport);
 * await manager.connect();
 * ```
 */
export class TcpTransport extends Transport {
  readonly description: string;
  private readonly host: string;
  private readonly port: number;
  private readonly connect: (options: NetConnectOpts) => Duplex;
  private socket: Duplex | null = null;
  private lines: Interface | null = null;
  private connected: boolean = false;

  constructor(options: TcpTransportOptions) {
    super();
    this.host = options.host;
    this.port = options.port ?? DEFAULT_TCP_PORT;
    this.connect = options.connect ?? createConnection;
    this.description = `${this.host}:${this.port}`;
  }

  async open(): Promise<void> {
    if (this.socket) return;
    const socket = this.connect({ host: this.host, port: this.port });
    this.socket = socket;

    try {
      await new Promise<void>((resolve, reject) => {
        const onConnect = (): void => {
          socket.off("error", onError);
          resolve();
        };
        const onError = (err: Error): void => {
          socket.off("connect", onConnect);
          reject(err);
        };
        socket.once("connect", onConnect);
        socket.once("error", onError);
      });
    } catch (e) {
      if (this.socket === socket) this.socket = null;
      socket.destroy();
      const message = e instanceof Error ? e.message : String(e);
      throw new TransportError(
        `Failed to connect to ${this.description}: ${message}`,
        e
      );
    }

    if (this.socket !== socket) {
      socket.destroy();
      throw new TransportError(`${this.description} was closed while opening`);
    }

    this.connected = true;
    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    this.lines = lines;
    lines.on("line", (line) => this.emit("line", line));

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
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.release();
    socket.destroy();
  }

  async write(data: string | Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.connected) {
      throw new TransportError(`${this.description} is not open`);
    }
    await new Promise<void>((resolve, reject) => {
      socket.write(data, (err) => {
        if (!err) return resolve();
        reject(new TransportError(`Write to ${this.description} failed`, err));
      });
    });
  }

  isOpen(): boolean {
    return this.connected;
  }

  private release(): void {
    this.lines?.close();
    this.lines = null;
    this.socket = null;
    this.connected = false;
  }
}
