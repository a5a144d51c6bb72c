import { ReadlineParser, SerialPort } from "serialport";
import { DEFAULT_BAUD_RATE } from "./constants";
import { TransportError } from "./errors";
import { Transport } from "./transport";

type ErrorCallback = (err: Error | null) => void;

/**
 * The part of a serialport stream the transport uses. `SerialPort` and
 * `SerialPortMock` both satisfy it.
 */
export interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback?: ErrorCallback): void;
  close(callback?: ErrorCallback): void;
  write(
    data: string | Buffer,
    callback?: (err: Error | null | undefined) => void
  ): boolean;
  drain(callback?: ErrorCallback): void;
  pipe<T extends NodeJS.WritableStream>(destination: T): T;
  on(event: "close", listener: () => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  removeAllListeners(event?: string | symbol): this;
}

export interface SerialPortOptions {
  path: string;
  baudRate: number;
}

export interface SerialTransportOptions {
  /** Device path, e.g. "/dev/ttyUSB0" or "COM3" */
  path: string;
  /** @default 115200 */
  baudRate?: number;
  /** Creates the port; defaults to a real, not yet opened, SerialPort */
  createPort?: (options: SerialPortOptions) => SerialPortHandle;
}

export type SerialPortInfo = Awaited<
  ReturnType<typeof SerialPort.list>
>[number];

/**
 * Lists the serial ports the OS reports.
 *
 * @example
 * ```typescript
 * for (const port of await listSerialPorts()) {
 *   console.log(`${port.path} - ${port.manufacturer ?? "Unknown"}`);
 * }
 * ```
 */
export async function listSerialPorts(): Promise<SerialPortInfo[]> {
  return SerialPort.list();
}

function openSerialPort(options: SerialPortOptions): SerialPortHandle {
  return new SerialPort({ ...options, autoOpen: false });
}

/**
 * USB serial link to a GRBL board.
 *
 * @example
 * ```typescript
 * const transport = new SerialTransport({ path: "/dev/ttyUSB0" });
 * const manager = new ConnectionManager(transport);
 * await manager.connect();
 * ```
 */
export class SerialTransport extends Transport {
  readonly description: string;
  private readonly options: SerialPortOptions;
  private readonly createPort: (options: SerialPortOptions) => SerialPortHandle;
  private port: SerialPortHandle | null = null;

  constructor(options: SerialTransportOptions) {
    super();
    this.options = {
      path: options.path,
      baudRate: options.baudRate ?? DEFAULT_BAUD_RATE,
    };
    this.createPort = options.createPort ?? openSerialPort;
    this.description = `${this.options.path} @ ${this.options.baudRate}`;
  }

  async open(): Promise<void> {
    if (this.port) return;
    const port = this.createPort(this.options);
    this.port = port;

    const parser = port.pipe(new ReadlineParser({ delimiter: "\n" }));
    parser.on("data", (line: string) => {
      this.emit("line", line.replace(/\r$/, ""));
    });
    port.on("error", (err) => {
      this.emit(
        "error",
        new TransportError(`${this.description}: ${err.message}`, err)
      );
    });
    port.on("close", () => {
      if (this.port !== port) return;
      this.port = null;
      this.emit("close");
    });

    try {
      await new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      });
    } catch (e) {
      if (this.port === port) this.port = null;
      port.removeAllListeners();
      const message = e instanceof Error ? e.message : String(e);
      throw new TransportError(
        `Failed to open ${this.description}: ${message}`,
        e
      );
    }

    // close() ran while the port was opening
    if (this.port !== port) {
      port.removeAllListeners();
      port.close((err) => {
        if (err) this.emit("error", new TransportError(err.message, err));
      });
      throw new TransportError(`${this.description} was closed while opening`);
    }
  }

  async close(): Promise<void> {
    const port = this.port;
    if (!port) return;
    this.port = null;
    if (!port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((err) => {
        if (!err) return resolve();
        reject(new TransportError(`Failed to close ${this.description}`, err));
      });
    });
  }

  async write(data: string | Buffer): Promise<void> {
    const port = this.port;
    if (!port?.isOpen) {
      throw new TransportError(`${this.description} is not open`);
    }
    await new Promise<void>((resolve, reject) => {
      port.write(data, (err) => {
        if (!err) return resolve();
        reject(new TransportError(`Write to ${this.description} failed`, err));
      });
    });
  }

  isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }
}
