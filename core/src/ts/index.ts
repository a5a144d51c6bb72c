/**
 * @grbl-node/core
 *
 * GRBL protocol codec, command queue, status channel and connection manager.
 */

// Export all types (re-exported from @grbl-node/types)
export * from "@grbl-node/types";

export * from "./constants";
export * from "./errors";
export {
  Logger,
  CommandResult,
  EnqueuedCommand,
  CommandQueueEvents,
  ConnectionManagerEvents,
  StreamProgress,
  TransportEvents,
} from "./types";

export { formatCommand, formatJog, realtimeByte, gcode } from "./commands";
export {
  parseResponse,
  parseStatusReport,
  describeError,
  describeAlarm,
} from "./responses";
export {
  MIN_OVERRIDE,
  MAX_OVERRIDE,
  RAPID_OVERRIDE_LEVELS,
  nearestRapidLevel,
  planOverride,
} from "./overrides";
export { GrblSettings, SettingInfo, describeSetting } from "./settings";

export { CommandQueue, CommandQueueOptions } from "./commandQueue";
export {
  StatusChannel,
  PollOptions,
  StatusChannelOptions,
  StatusRequest,
  WatchOptions,
  mergeStatus,
} from "./statusChannel";

export { Transport } from "./transport";
export {
  SerialTransport,
  SerialTransportOptions,
  SerialPortHandle,
  SerialPortOptions,
  SerialPortInfo,
  listSerialPorts,
} from "./serialTransport";
export { TcpTransport, TcpTransportOptions } from "./tcpTransport";
export {
  WebSocketTransport,
  WebSocketTransportOptions,
} from "./webSocketTransport";

export {
  ConnectionManager,
  ConnectionManagerOptions,
  StreamOptions,
} from "./connectionManager";
