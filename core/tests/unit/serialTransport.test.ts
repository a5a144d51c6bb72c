import { SerialPortMock } from "serialport";
import {
  SerialPortOptions,
  SerialTransport,
} from "../../src/ts/serialTransport";
import { TransportError } from "../../src/ts/errors";
import { flush, waitFor } from "../helpers/wait";

const PATH = "/dev/ttyMOCK0";

describe("SerialTransport", () => {
  let port: SerialPortMock | null;
  let transport: SerialTransport;

  function createPort(options: SerialPortOptions): SerialPortMock {
    port = new SerialPortMock({ ...options, autoOpen: false });
    return port;
  }

  beforeEach(() => {
    port = null;
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
    transport = new SerialTransport({ path: PATH, createPort });
  });

  afterEach(async () => {
    await transport.close();
    SerialPortMock.binding.reset();
  });

  it("should describe the port and default baud rate", () => {
    expect(transport.description).toBe("/dev/ttyMOCK0 @ 115200");
    expect(
      new SerialTransport({ path: "COM3", baudRate: 9600 }).description
    ).toBe("COM3 @ 9600");
  });

  it("should open the port", async () => {
    expect(transport.isOpen()).toBe(false);
    await transport.open();
    expect(transport.isOpen()).toBe(true);
    expect(port?.isOpen).toBe(true);
  });

  it("should emit received lines without terminators", async () => {
    const lines: string[] = [];
    transport.on("line", (line) => lines.push(line));
    await transport.open();

    port?.port?.emitData("ok\r\n<Idle|MPos:0.000,0.000,0.000>\r\nerr");
    await waitFor(() => lines.length === 2);
    expect(lines).toEqual(["ok", "<Idle|MPos:0.000,0.000,0.000>"]);

    port?.port?.emitData("or:20\n");
    await waitFor(() => lines.length === 3);
    expect(lines[2]).toBe("error:20");
  });

  it("should write text and bytes", async () => {
    await transport.open();
    await transport.write("G0 X1\n");
    await transport.write(Buffer.from([0x3f]));

    expect(port?.port?.recording.toString()).toBe("G0 X1\n?");
  });

  it("should reject writes while closed", async () => {
    await expect(transport.write("G0 X1\n")).rejects.toThrow(
      "/dev/ttyMOCK0 @ 115200 is not open"
    );
  });

  it("should wrap open failures", async () => {
    const missing = new SerialTransport({ path: "/dev/missing", createPort });
    const attempt = missing.open();

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toThrow(
      "Failed to open /dev/missing @ 115200"
    );
    expect(missing.isOpen()).toBe(false);
  });

  it("should not emit close for a requested close", async () => {
    const onClose = jest.fn();
    transport.on("close", onClose);
    await transport.open();

    await transport.close();
    await flush();
    expect(onClose).not.toHaveBeenCalled();
    expect(transport.isOpen()).toBe(false);
  });

  it("should emit close when the port goes away", async () => {
    const onClose = jest.fn();
    transport.on("close", onClose);
    await transport.open();

    port?.close();
    await waitFor(() => onClose.mock.calls.length === 1);
    expect(transport.isOpen()).toBe(false);
  });

  it("should report port errors as transport errors", async () => {
    const errors: Error[] = [];
    transport.on("error", (error) => errors.push(error));
    await transport.open();

    port?.emit("error", new Error("unplugged"));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(TransportError);
    expect(errors[0].message).toBe("/dev/ttyMOCK0 @ 115200: unplugged");
  });
});
