import {
  CommandState,
  ConnectionEventType,
  ConnectionStatus,
  GrblCommandType,
  MachineState,
  ResetTarget,
  ResponseType,
} from "./grbl-constants";

// ============================================================================
// Commands
// ============================================================================

export interface GCodeCommand {
  type: GrblCommandType.GCODE;
  line: string;
}

/** Commands that format to a fixed `$` string */
export interface SystemCommand {
  type:
    | GrblCommandType.HELP
    | GrblCommandType.VIEW_SETTINGS
    | GrblCommandType.VIEW_PARAMETERS
    | GrblCommandType.VIEW_PARSER_STATE
    | GrblCommandType.VIEW_BUILD_INFO
    | GrblCommandType.VIEW_STARTUP_BLOCKS
    | GrblCommandType.CHECK_MODE
    | GrblCommandType.KILL_ALARM_LOCK
    | GrblCommandType.HOMING_CYCLE
    | GrblCommandType.SLEEP;
}

/**
 * `$J=` jog. Axes left out are not moved.
 */
export interface JogCommand {
  type: GrblCommandType.JOG;
  x?: number;
  y?: number;
  z?: number;
  feedRate: number;
  /** Absolute target instead of an incremental move. Default false */
  absolute?: boolean;
  /** Inch units (G20) instead of millimeters. Default false */
  inches?: boolean;
}

export interface SetSettingCommand {
  type: GrblCommandType.SET_SETTING;
  setting: number;
  value: number | string;
}

export interface ResetCommand {
  type: GrblCommandType.RESET;
  target: ResetTarget;
}

export type GrblCommand =
  | GCodeCommand
  | SystemCommand
  | JogCommand
  | SetSettingCommand
  | ResetCommand;

// ============================================================================
// Status
// ============================================================================

export interface Position {
  x: number;
  y: number;
  z: number;
}

export interface BufferState {
  /** Free planner blocks */
  plannerBlocks: number;
  /** Free bytes in the serial RX buffer */
  rxBytes: number;
}

/** Override values in percent */
export interface OverrideValues {
  feed: number;
  rapid: number;
  spindle: number;
}

/** Input pins reported active in `Pn:` */
export interface PinState {
  x: boolean;
  y: boolean;
  z: boolean;
  probe: boolean;
  door: boolean;
  hold: boolean;
  softReset: boolean;
  cycleStart: boolean;
}

/** Accessory outputs reported in `A:` */
export interface AccessoryState {
  spindleCw: boolean;
  spindleCcw: boolean;
  flood: boolean;
  mist: boolean;
}

/**
 * One `<...>` status report. Fields GRBL did not report are null.
 */
export interface GrblStatus {
  state: MachineState;
  /** Hold:0, Door:1 etc. */
  subState: number | null;
  machinePosition: Position | null;
  workPosition: Position | null;
  workCoordinateOffset: Position | null;
  buffer: BufferState | null;
  feedRate: number | null;
  spindleSpeed: number | null;
  overrides: OverrideValues | null;
  pins: PinState | null;
  accessories: AccessoryState | null;
  lineNumber: number | null;
}

// ============================================================================
// Responses
// ============================================================================

export interface OkResponse {
  type: ResponseType.OK;
}

export interface ErrorResponse {
  type: ResponseType.ERROR;
  code: number;
  /** null for codes GRBL documents no text for */
  description: string | null;
}

export interface AlarmResponse {
  type: ResponseType.ALARM;
  code: number;
  description: string | null;
}

export interface StatusResponse {
  type: ResponseType.STATUS;
  status: GrblStatus;
}

export interface SettingResponse {
  type: ResponseType.SETTING;
  setting: number;
  value: string;
}

/**
 * `[...]` feedback, or any line the codec does not recognise.
 */
export interface FeedbackResponse {
  type: ResponseType.FEEDBACK;
  message: string;
  bracketed: boolean;
}

export interface WelcomeResponse {
  type: ResponseType.WELCOME;
  version: string;
}

export type GrblResponse =
  | OkResponse
  | ErrorResponse
  | AlarmResponse
  | StatusResponse
  | SettingResponse
  | FeedbackResponse
  | WelcomeResponse;

// ============================================================================
// Queue
// ============================================================================

export interface QueuedCommand {
  readonly id: number;
  /** Newline-terminated wire text */
  readonly text: string;
  readonly enqueuedAt: number;
  sentAt: number | null;
  completedAt: number | null;
  state: CommandState;
  /** GRBL error or alarm code for failed commands */
  errorCode: number | null;
  failure: string | null;
}

export interface QueueStats {
  totalQueued: number;
  totalSent: number;
  totalAcked: number;
  totalFailed: number;
  totalTimedOut: number;
  /** Pending plus in flight */
  currentLength: number;
  /** Mean time from send to acknowledgement, 0 before the first ack */
  averageRoundTripMs: number;
}

// ============================================================================
// Connection
// ============================================================================

export type ConnectionEvent =
  | { type: ConnectionEventType.CONNECTING; description: string }
  | { type: ConnectionEventType.CONNECTED; description: string }
  | { type: ConnectionEventType.DISCONNECTED; description: string }
  | { type: ConnectionEventType.ERROR; error: Error }
  | { type: ConnectionEventType.DATA_RECEIVED; line: string };

export interface ConnectionInfo {
  status: ConnectionStatus;
  description: string;
}

// ============================================================================
// Watch Helpers
// ============================================================================

type NestedPaths<T, K extends keyof T = keyof T> = K extends string
  ? NonNullable<T[K]> extends object
    ? `${K}` | `${K}.${NestedPaths<NonNullable<T[K]>>}`
    : `${K}`
  : never;

/** Dot-separated paths into a GrblStatus, e.g. "workPosition.x" */
export type GrblStatusPaths = NestedPaths<GrblStatus>;

// A path through a null field resolves to undefined
type GetPropertyType<T, P extends string> = P extends keyof T
  ? T[P]
  : P extends `${infer K}.${infer R}`
  ? K extends keyof T
    ?
        | GetPropertyType<NonNullable<T[K]>, R>
        | (null extends T[K] ? undefined : never)
    : never
  : never;

export type StatusPropertyValue<P extends GrblStatusPaths> = GetPropertyType<
  GrblStatus,
  P
>;

export type StatusPropertyWatchCallback<P extends GrblStatusPaths> = (
  newValue: StatusPropertyValue<P>,
  oldValue: StatusPropertyValue<P> | null,
  propertyPath: P
) => void;

export type FullStatusChangeCallback = (
  newStatus: GrblStatus,
  oldStatus: GrblStatus | null
) => void;
