import { parseProgram } from "@grbl-node/gcode";
import { ConnectionManager } from "../../src/ts/connectionManager";
import {
  ConnectionTimeoutError,
  NotConnectedError,
  TransportError,
} from "../../src/ts/errors";
import {
  CommandState,
  ConnectionEvent,
  ConnectionEventType,
  ConnectionStatus,
  GrblCommandType,
  MachineState,
  OverrideKind,
  QueueState,
  RealtimeCommand,
  ResponseType,
} from "@grbl-node/types";
import { StreamProgress } from "../../src/ts/types";
import { MockTransport } from "../helpers/mockTransport";
import { flush } from "../helpers/wait";

function createLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe("ConnectionManager", () => {
  let transport: MockTransport;
  let manager: ConnectionManager;
  let events: ConnectionEvent[];

  function createManager(
    options: ConstructorParameters<typeof MockTransport>[0] = {},
    capacity?: number
  ): void {
    transport = new MockTransport(options);
    manager = new ConnectionManager(transport, {
      connectTimeout: 1000,
      logger: createLogger(),
      queue: capacity === undefined ? undefined : { capacity },
    });
    events = [];
    manager.on("connection", (event) => {
      if (event.type !== ConnectionEventType.DATA_RECEIVED) events.push(event);
    });
  }

  beforeEach(() => {
    jest.useFakeTimers({
      doNotFake: ["nextTick", "setImmediate", "queueMicrotask"],
    });
    createManager();
  });

  afterEach(async () => {
    await manager.destroy();
    jest.useRealTimers();
  });

  describe("connecting", () => {
    it("should move through CONNECTING to CONNECTED", async () => {
      await manager.connect();

      expect(manager.getConnectionStatus()).toBe(ConnectionStatus.CONNECTED);
      expect(manager.getInfo()).toEqual({
        status: ConnectionStatus.CONNECTED,
        description: "mock",
      });
      expect(events).toEqual([
        { type: ConnectionEventType.CONNECTING, description: "mock" },
        { type: ConnectionEventType.CONNECTED, description: "mock" },
      ]);
    });

    it("should end in ERROR and close the transport on timeout", async () => {
      createManager({ hangOnOpen: true });
      const attempt = expect(manager.connect()).rejects.toThrow(
        "Connection attempt timed out after 1000 ms"
      );
      await flush();
      await jest.advanceTimersByTimeAsync(1000);
      await attempt;

      expect(manager.getConnectionStatus()).toBe(ConnectionStatus.ERROR);
      expect(transport.closeCalls).toBe(1);
      expect(events.map(({ type }) => type)).toEqual([
        ConnectionEventType.CONNECTING,
        ConnectionEventType.ERROR,
      ]);
      const last = events[1];
      expect(
        last.type === ConnectionEventType.ERROR &&
          last.error instanceof ConnectionTimeoutError
      ).toBe(true);
    });

    it("should end in ERROR when the transport cannot open", async () => {
      createManager({ openError: new TransportError("no such port") });

      await expect(manager.connect()).rejects.toThrow("no such port");
      expect(manager.getConnectionStatus()).toBe(ConnectionStatus.ERROR);
    });

    it("should refuse commands while disconnected", () => {
      expect(() => manager.sendGCode("G0 X1")).toThrow(NotConnectedError);
      expect(() => manager.enqueueProgram([])).toThrow(
        "Not connected to a controller"
      );
    });
  });

  describe("while connected", () => {
    beforeEach(async () => {
      await manager.connect();
    });

    it("should poll status every 250 ms with the ? byte", async () => {
      await jest.advanceTimersByTimeAsync(249);
      expect(transport.realtimeBytes).toEqual([]);

      await jest.advanceTimersByTimeAsync(1);
      expect(transport.realtimeBytes).toEqual([0x3f]);

      await jest.advanceTimersByTimeAsync(500);
      expect(transport.realtimeBytes).toEqual([0x3f, 0x3f, 0x3f]);
    });

    it("should send one command at a time", async () => {
      const first = manager.sendGCode("G0 X1");
      const second = manager.sendCommand({
        type: GrblCommandType.VIEW_PARSER_STATE,
      });
      await flush();
      expect(transport.lines).toEqual(["G0 X1\n"]);

      transport.receive("ok");
      await flush();
      expect(transport.lines).toEqual(["G0 X1\n", "$G\n"]);

      transport.receive("ok");
      const results = await Promise.all([first.completion, second.completion]);
      expect(results.map(({ command }) => command.state)).toEqual([
        CommandState.ACKED,
        CommandState.ACKED,
      ]);
    });

    it("should republish responses in arrival order", async () => {
      const received: ResponseType[] = [];
      const raw: string[] = [];
      manager.on("response", (response) => received.push(response.type));
      manager.on("connection", (event) => {
        if (event.type === ConnectionEventType.DATA_RECEIVED) {
          raw.push(event.line);
        }
      });

      for (const line of [
        "Grbl 1.1h ['$' for help]",
        "[MSG:'$H'|'$X' to unlock]",
        "<Idle|MPos:1.000,2.000,3.000|FS:0,0>",
        "",
        "$110=5000.000",
        "ok",
      ]) {
        transport.receive(line);
      }
      await flush();

      expect(received).toEqual([
        ResponseType.WELCOME,
        ResponseType.FEEDBACK,
        ResponseType.STATUS,
        ResponseType.SETTING,
        ResponseType.OK,
      ]);
      expect(raw).toHaveLength(6);
      expect(raw[4]).toBe("$110=5000.000");
      expect(manager.getVersion()).toBe("1.1h");
      expect(manager.settings.getNumber(110)).toBe(5000);
    });

    it("should publish status snapshots", async () => {
      const statuses: MachineState[] = [];
      manager.on("status", (status) => statuses.push(status.state));

      transport.receive("<Idle|MPos:1.000,2.000,3.000|FS:0,0>");
      transport.receive("<Run|MPos:1.500,2.000,3.000|FS:500,0>");
      await flush();

      expect(statuses).toEqual([MachineState.IDLE, MachineState.RUN]);
      expect(manager.getStatus()?.machinePosition).toEqual({
        x: 1.5,
        y: 2,
        z: 3,
      });
      expect(manager.getStatus()?.workPosition).toBeNull();
    });

    it("should pause the queue on ALARM until resumed", async () => {
      manager.sendGCode("G0 X1");
      manager.sendGCode("G0 X2");
      await flush();

      transport.receive("ALARM:9");
      await flush();
      expect(manager.queueState()).toBe(QueueState.PAUSED);
      expect(transport.lines).toEqual(["G0 X1\n"]);

      manager.resume();
      await flush();
      expect(transport.lines).toEqual(["G0 X1\n", "G0 X2\n"]);
    });

    it("should write real-time bytes ahead of queued commands", async () => {
      manager.pause();
      manager.sendGCode("G0 X1");
      await manager.sendRealtime(RealtimeCommand.FEED_HOLD);
      await flush();

      expect(transport.realtimeBytes).toEqual([0x21]);
      expect(transport.lines).toEqual([]);
    });

    it("should step overrides from the last reported value", async () => {
      transport.receive("<Run|MPos:0,0,0|Ov:100,100,100>");
      await flush();

      const plan = await manager.setOverride(OverrideKind.FEED, 120);
      expect(plan).toEqual([
        RealtimeCommand.FEED_OVERRIDE_COARSE_PLUS,
        RealtimeCommand.FEED_OVERRIDE_COARSE_PLUS,
      ]);
      expect(transport.realtimeBytes).toEqual([0x91, 0x91]);
    });

    it("should reject an override target that is not a number", async () => {
      await expect(
        manager.setOverride(OverrideKind.SPINDLE, Number.NaN)
      ).rejects.toThrow(RangeError);
      expect(transport.realtimeBytes).toEqual([]);
    });

    it("should drop pending commands on clearQueue", async () => {
      manager.sendGCode("G0 X1");
      const second = manager.sendGCode("G0 X2");
      await flush();

      expect(manager.clearQueue()).toBe(1);
      expect((await second.completion).command.state).toBe(
        CommandState.FAILED
      );
    });

    it("should enqueue a parsed program", async () => {
      const { segments } = parseProgram("G0 X1\nG1 X2 F100\n");
      transport.responder = () => "ok";

      const queued = manager.enqueueProgram(segments);
      await Promise.all(queued.map(({ completion }) => completion));

      expect(transport.lines).toEqual([
        "G90\n",
        "G21\n",
        "G0 X1.000 Y0.000 Z0.000\n",
        "G1 X2.000 Y0.000 Z0.000 F100\n",
      ]);
    });
  });

  describe("streaming", () => {
    beforeEach(async () => {
      await manager.destroy();
      createManager({}, 2);
      await manager.connect();
    });

    it("should stream more lines than the queue holds", async () => {
      transport.responder = () => "ok";
      const lines = ["G1 X1 F100", "", "G1 X2", "G1 X3", "G1 X4", "G1 X5"];

      const results = await manager.streamProgram(lines);

      expect(results).toHaveLength(5);
      expect(results.every(({ error }) => error === null)).toBe(true);
      expect(transport.lines).toEqual([
        "G1 X1 F100\n",
        "G1 X2\n",
        "G1 X3\n",
        "G1 X4\n",
        "G1 X5\n",
      ]);
    });

    it("should stop feeding after the first failure", async () => {
      transport.responder = (line) => (line === "G1 X2" ? "error:20" : "ok");
      const lines = ["G1 X1 F100", "G1 X2", "G1 X3", "G1 X4", "G1 X5"];

      const results = await manager.streamProgram(lines);

      expect(results.map(({ command }) => command.state)).toEqual([
        CommandState.ACKED,
        CommandState.FAILED,
        CommandState.ACKED,
      ]);
      expect(results[1].command.errorCode).toBe(20);
      expect(transport.lines).toHaveLength(3);
    });

    it("should report progress as lines are queued, sent and completed", async () => {
      transport.responder = () => "ok";
      const reports: StreamProgress[] = [];

      await manager.streamProgram(["G1 X1 F100", "", "G1 X2", "G1 X3"], {
        onProgress: (progress) => reports.push(progress),
      });

      expect(reports[reports.length - 1]).toEqual({
        queued: 3,
        sent: 3,
        completed: 3,
        failed: 0,
        total: 3,
        elapsed: 0,
      });
      expect(
        reports.every(
          ({ queued, sent, completed }) => completed <= sent && sent <= queued
        )
      ).toBe(true);
      expect(reports.map(({ completed }) => completed)).toContain(1);
      expect(reports.map(({ completed }) => completed)).toContain(2);
    });

    it("should count failed lines in the progress", async () => {
      transport.responder = (line) => (line === "G1 X2" ? "error:20" : "ok");
      const reports: StreamProgress[] = [];

      await manager.streamProgram(
        ["G1 X1 F100", "G1 X2", "G1 X3", "G1 X4", "G1 X5"],
        { onProgress: (progress) => reports.push(progress) }
      );

      expect(reports[reports.length - 1]).toEqual({
        queued: 3,
        sent: 3,
        completed: 3,
        failed: 1,
        total: 5,
        elapsed: 0,
      });
    });

    it("should leave the total unknown for generated lines", async () => {
      transport.responder = () => "ok";
      function* program(): Generator<string> {
        yield "G1 X1 F100";
        yield "G1 X2";
      }
      const reports: StreamProgress[] = [];

      await manager.streamProgram(program(), {
        onProgress: (progress) => reports.push(progress),
      });

      expect(reports.every(({ total }) => total === null)).toBe(true);
      expect(reports[reports.length - 1].completed).toBe(2);

      reports.length = 0;
      await manager.streamProgram(program(), {
        total: 2,
        onProgress: (progress) => reports.push(progress),
      });
      expect(reports.every(({ total }) => total === 2)).toBe(true);
    });

    it("should stop feeding when the signal aborts", async () => {
      const controller = new AbortController();
      const lines = ["G1 X1 F100", "G1 X2", "G1 X3"];

      const run = expect(
        manager.streamProgram(lines, { signal: controller.signal })
      ).rejects.toThrow("stopped by user");
      await flush();
      controller.abort(new Error("stopped by user"));
      await run;

      expect(manager.queue.length).toBe(2);
    });
  });

  describe("disconnecting", () => {
    beforeEach(async () => {
      await manager.connect();
    });

    it("should stop every loop and fail queued commands", async () => {
      const first = manager.sendGCode("G0 X1");
      const second = manager.sendGCode("G0 X2");
      await flush();

      await manager.disconnect();
      const writes = transport.writes.length;
      await jest.advanceTimersByTimeAsync(1000);
      transport.receive("ok");
      await flush();

      expect(transport.writes).toHaveLength(writes);
      expect(manager.getConnectionStatus()).toBe(
        ConnectionStatus.DISCONNECTED
      );
      expect((await first.completion).error?.message).toBe(
        "Command 1 abandoned: Connection closed"
      );
      expect((await second.completion).command.state).toBe(
        CommandState.FAILED
      );
      expect(events[events.length - 1]).toEqual({
        type: ConnectionEventType.DISCONNECTED,
        description: "mock",
      });
      expect(transport.closeCalls).toBe(1);
    });

    it("should end in ERROR when the transport closes unexpectedly", async () => {
      const { completion } = manager.sendGCode("G0 X1");
      await flush();

      transport.drop();
      await flush();

      expect(manager.getConnectionStatus()).toBe(ConnectionStatus.ERROR);
      const last = events[events.length - 1];
      expect(last.type).toBe(ConnectionEventType.ERROR);
      expect(last.type === ConnectionEventType.ERROR && last.error.message).toBe(
        "mock closed unexpectedly"
      );
      expect((await completion).error?.message).toBe(
        "Command 1 abandoned: Connection lost"
      );

      await jest.advanceTimersByTimeAsync(1000);
      expect(transport.realtimeBytes).toEqual([]);
    });

    it("should end in ERROR when a write fails", async () => {
      transport.failWrites = true;
      manager.sendGCode("G0 X1");
      await flush();

      expect(manager.getConnectionStatus()).toBe(ConnectionStatus.ERROR);
      const last = events[events.length - 1];
      expect(last.type === ConnectionEventType.ERROR && last.error.message).toBe(
        "mock write failed"
      );
    });

    it("should end in ERROR when a status query cannot be written", async () => {
      transport.failWrites = true;
      await jest.advanceTimersByTimeAsync(250);
      await flush();

      expect(manager.getConnectionStatus()).toBe(ConnectionStatus.ERROR);
      const errors = events.filter(
        (event) => event.type === ConnectionEventType.ERROR
      );
      expect(errors).toHaveLength(1);
      const [error] = errors;
      expect(
        error.type === ConnectionEventType.ERROR && error.error.message
      ).toBe("mock write failed");

      transport.failWrites = false;
      await jest.advanceTimersByTimeAsync(1000);
      expect(transport.realtimeBytes).toEqual([]);
    });

    it("should reconnect after an error", async () => {
      transport.drop();
      await flush();

      await manager.connect();
      expect(manager.getConnectionStatus()).toBe(ConnectionStatus.CONNECTED);
      manager.sendGCode("G0 X1");
      await flush();
      expect(transport.lines).toEqual(["G0 X1\n"]);
    });
  });
});
