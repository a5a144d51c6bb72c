import { NetConnectOpts } from "net";
import { Duplex } from "stream";
import { TcpTransport } from "../../src/ts/tcpTransport";
import { TransportError } from "../../src/ts/errors";
import { flush, waitFor } from "../helpers/wait";

class FakeSocket extends Duplex {
  readonly written: string[] = [];

  _read(): void {
    // Data is pushed by the test
  }

  _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.written.push(chunk.toString());
    callback();
  }
}

describe("TcpTransport", () => {
  let socket: FakeSocket;
  let connectOptions: NetConnectOpts | null;
  let refuse: boolean;
  let transport: TcpTransport;

  function connect(options: NetConnectOpts): Duplex {
    connectOptions = options;
    const created = new FakeSocket();
    socket = created;
    process.nextTick(() => {
      if (refuse) created.emit("error", new Error("connect ECONNREFUSED"));
      else created.emit("connect");
    });
    return created;
  }

  beforeEach(() => {
    connectOptions = null;
    refuse = false;
    transport = new TcpTransport({ host: "grbl.local", connect });
  });

  afterEach(async () => {
    await transport.close();
  });

  it("should connect to the telnet port by default", async () => {
    await transport.open();

    expect(connectOptions).toEqual({ host: "grbl.local", port: 23 });
    expect(transport.description).toBe("grbl.local:23");
    expect(transport.isOpen()).toBe(true);
  });

  it("should use the given port", () => {
    expect(new TcpTransport({ host: "10.0.0.2", port: 8880 }).description).toBe(
      "10.0.0.2:8880"
    );
  });

  it("should emit received lines", async () => {
    const lines: string[] = [];
    transport.on("line", (line) => lines.push(line));
    await transport.open();

    socket.push("ok\r\n<Idle|MPos:0.000,0.000,0.000>\npartial");
    await waitFor(() => lines.length === 2);
    expect(lines).toEqual(["ok", "<Idle|MPos:0.000,0.000,0.000>"]);
  });

  it("should write to the socket", async () => {
    await transport.open();
    await transport.write("G0 X1\n");
    await transport.write(Buffer.from([0x21]));

    expect(socket.written).toEqual(["G0 X1\n", "!"]);
  });

  it("should wrap connection failures", async () => {
    refuse = true;
    const attempt = transport.open();

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toThrow(
      "Failed to connect to grbl.local:23: connect ECONNREFUSED"
    );
    expect(socket.destroyed).toBe(true);
    expect(transport.isOpen()).toBe(false);
  });

  it("should reject writes after close without emitting close", async () => {
    const onClose = jest.fn();
    transport.on("close", onClose);
    await transport.open();

    await transport.close();
    await flush();

    expect(socket.destroyed).toBe(true);
    expect(onClose).not.toHaveBeenCalled();
    await expect(transport.write("G0 X1\n")).rejects.toThrow(
      "grbl.local:23 is not open"
    );
  });

  it("should emit close when the peer goes away", async () => {
    const onClose = jest.fn();
    transport.on("close", onClose);
    await transport.open();

    socket.destroy();
    await waitFor(() => onClose.mock.calls.length === 1);
    expect(transport.isOpen()).toBe(false);
  });

  it("should report socket errors as transport errors", async () => {
    const errors: Error[] = [];
    transport.on("error", (error) => errors.push(error));
    await transport.open();

    socket.emit("error", new Error("ECONNRESET"));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(TransportError);
    expect(errors[0].message).toBe("grbl.local:23: ECONNRESET");
  });
});
