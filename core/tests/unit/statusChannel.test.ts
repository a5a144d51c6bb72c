import { StatusChannel, mergeStatus } from "../../src/ts/statusChannel";
import { parseStatusReport } from "../../src/ts/responses";
import { MachineState } from "@grbl-node/types";

function createLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe("mergeStatus", () => {
  it("should leave the work position unset without an offset", () => {
    const status = mergeStatus(
      parseStatusReport("Idle|MPos:1.000,2.000,3.000|FS:0,0"),
      null
    );
    expect(status.state).toBe(MachineState.IDLE);
    expect(status.machinePosition).toEqual({ x: 1, y: 2, z: 3 });
    expect(status.workPosition).toBeNull();
  });

  it("should derive the work position from the offset", () => {
    const status = mergeStatus(
      parseStatusReport("Idle|MPos:10,5,-1|WCO:2,1,-3"),
      null
    );
    expect(status.workPosition).toEqual({ x: 8, y: 4, z: 2 });
  });

  it("should carry the offset, overrides and accessories forward", () => {
    const first = mergeStatus(
      parseStatusReport("Idle|MPos:10,5,-1|WCO:2,1,-3|Ov:120,50,80|A:SF"),
      null
    );
    const second = mergeStatus(parseStatusReport("Run|MPos:11,5,-1"), first);

    expect(second.workCoordinateOffset).toEqual({ x: 2, y: 1, z: -3 });
    expect(second.workPosition).toEqual({ x: 9, y: 4, z: 2 });
    expect(second.overrides).toEqual({ feed: 120, rapid: 50, spindle: 80 });
    expect(second.accessories?.spindleCw).toBe(true);
    expect(second.accessories?.flood).toBe(true);
  });

  it("should derive the machine position from a work position report", () => {
    const previous = mergeStatus(
      parseStatusReport("Idle|WPos:0,0,0|WCO:2,1,-3"),
      null
    );
    const status = mergeStatus(parseStatusReport("Run|WPos:1,1,1"), previous);
    expect(status.machinePosition).toEqual({ x: 3, y: 2, z: -2 });
  });

  it("should round derived positions to 0.1 micron", () => {
    const status = mergeStatus(
      parseStatusReport("Idle|MPos:0.3,0,0|WCO:0.1,0,0"),
      null
    );
    expect(status.workPosition?.x).toBe(0.2);
  });
});

describe("StatusChannel", () => {
  let logger: ReturnType<typeof createLogger>;
  let channel: StatusChannel;

  beforeEach(() => {
    logger = createLogger();
    channel = new StatusChannel({ logger });
  });

  afterEach(() => {
    channel.destroy();
  });

  describe("snapshot", () => {
    it("should be null before the first report", () => {
      expect(channel.getStatus()).toBeNull();
    });

    it("should replace the snapshot with a frozen copy", () => {
      const first = channel.update(parseStatusReport("Idle|MPos:10,5,-1"));
      const second = channel.update(parseStatusReport("Run|MPos:12,5,-1"));

      expect(channel.getStatus()).toBe(second);
      expect(Object.isFrozen(second)).toBe(true);
      expect(Object.isFrozen(second.machinePosition)).toBe(true);
      expect(first.machinePosition).toEqual({ x: 10, y: 5, z: -1 });
    });

    it("should forget the snapshot on reset", () => {
      channel.update(parseStatusReport("Idle|MPos:0,0,0"));
      channel.reset();
      expect(channel.getStatus()).toBeNull();
    });
  });

  describe("watchers", () => {
    it("should call full change callbacks only when something changed", () => {
      const callback = jest.fn();
      channel.onFullChange(callback);

      const first = channel.update(parseStatusReport("Idle|MPos:0,0,0"));
      channel.update(parseStatusReport("Idle|MPos:0,0,0"));
      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(first, null);

      channel.removeFullChange(callback);
      channel.update(parseStatusReport("Run|MPos:0,0,0"));
      expect(callback).toHaveBeenCalledTimes(1);
    });

    it("should report property changes with the previous value", () => {
      channel.update(parseStatusReport("Idle|MPos:0,0,0"));
      const callback = jest.fn();
      channel.addWatch("state", callback);

      channel.update(parseStatusReport("Idle|MPos:1,0,0"));
      expect(callback).not.toHaveBeenCalled();

      channel.update(parseStatusReport("Run|MPos:1,0,0"));
      expect(callback).toHaveBeenCalledWith(
        MachineState.RUN,
        MachineState.IDLE,
        "state"
      );
    });

    it("should watch nested paths", () => {
      const callback = jest.fn();
      channel.addWatch("machinePosition.x", callback);

      channel.update(parseStatusReport("Run|MPos:1,0,0"));
      channel.update(parseStatusReport("Run|MPos:1,2,0"));
      channel.update(parseStatusReport("Run|MPos:3,2,0"));

      expect(callback.mock.calls).toEqual([
        [1, null, "machinePosition.x"],
        [3, 1, "machinePosition.x"],
      ]);
    });

    it("should call immediately with the current value when asked", () => {
      channel.update(parseStatusReport("Alarm|MPos:0,0,0"));
      const callback = jest.fn();
      channel.addWatch("state", callback, { immediate: true });
      expect(callback).toHaveBeenCalledWith(MachineState.ALARM, null, "state");
    });

    it("should remove a once watcher after it fires", () => {
      const callback = jest.fn();
      channel.addWatch("state", callback, { once: true });

      channel.update(parseStatusReport("Run|MPos:0,0,0"));
      channel.update(parseStatusReport("Hold:0|MPos:0,0,0"));
      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(MachineState.RUN, null, "state");
    });

    it("should stop calling a removed watcher", () => {
      const callback = jest.fn();
      channel.addWatch("state", callback);
      channel.removeWatch("state", callback);
      channel.update(parseStatusReport("Run|MPos:0,0,0"));
      expect(callback).not.toHaveBeenCalled();
    });

    it("should log watcher errors and keep notifying others", () => {
      const other = jest.fn();
      channel.addWatch("state", () => {
        throw new Error("watcher failed");
      });
      channel.addWatch("state", other);

      channel.update(parseStatusReport("Run|MPos:0,0,0"));
      expect(other).toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith(
        "Error in StatusChannel watch callback for state:",
        expect.any(Error)
      );
    });
  });

  describe("polling", () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      channel.stop();
      jest.useRealTimers();
    });

    it("should query every poll interval until stopped", async () => {
      const request = jest.fn();
      channel.start(request);
      expect(channel.isRunning()).toBe(true);

      await jest.advanceTimersByTimeAsync(249);
      expect(request).not.toHaveBeenCalled();
      await jest.advanceTimersByTimeAsync(1);
      expect(request).toHaveBeenCalledTimes(1);
      await jest.advanceTimersByTimeAsync(500);
      expect(request).toHaveBeenCalledTimes(3);

      channel.stop();
      await jest.advanceTimersByTimeAsync(1000);
      expect(request).toHaveBeenCalledTimes(3);
      expect(channel.isRunning()).toBe(false);
    });

    it("should stop when the signal aborts", async () => {
      const request = jest.fn();
      const controller = new AbortController();
      channel.start(request, { signal: controller.signal });

      controller.abort();
      await jest.advanceTimersByTimeAsync(1000);
      expect(request).not.toHaveBeenCalled();
      expect(channel.isRunning()).toBe(false);
    });

    it("should skip a poll while the previous one is pending", async () => {
      const request = jest.fn(() => new Promise<void>(() => undefined));
      channel.start(request);

      await jest.advanceTimersByTimeAsync(750);
      expect(request).toHaveBeenCalledTimes(1);
    });

    it("should log failed queries and keep polling", async () => {
      const failure = new Error("write failed");
      const request = jest.fn(() => Promise.reject(failure));
      channel.start(request);

      await jest.advanceTimersByTimeAsync(500);
      expect(request).toHaveBeenCalledTimes(2);
      expect(logger.error).toHaveBeenCalledWith(
        "Error during status poll:",
        failure
      );
    });

    it("should hand failed queries to the error handler", async () => {
      const failure = new Error("write failed");
      const request = jest.fn(() => Promise.reject(failure));
      const onError = jest.fn(() => channel.stop());
      channel.start(request, { onError });

      await jest.advanceTimersByTimeAsync(1000);
      expect(request).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(failure);
      expect(logger.error).not.toHaveBeenCalled();
      expect(channel.isRunning()).toBe(false);
    });

    it("should log an error handler that throws", async () => {
      const request = jest.fn(() => Promise.reject(new Error("write failed")));
      channel.start(request, {
        onError: () => {
          throw new Error("handler failed");
        },
      });

      await jest.advanceTimersByTimeAsync(250);
      expect(logger.error).toHaveBeenCalledWith(
        "Error in StatusChannel poll error callback:",
        expect.any(Error)
      );
    });

    it("should apply a new interval with a floor of 10 ms", async () => {
      const request = jest.fn();
      channel.start(request);
      channel.setPollInterval(5);
      expect(channel.getPollInterval()).toBe(10);

      await jest.advanceTimersByTimeAsync(100);
      expect(request).toHaveBeenCalledTimes(10);
    });
  });
});
