/**
 * GRBL Constants and Enums
 *
 * Real-time command values are the bytes GRBL 1.1 reads from the serial
 * stream, so an enum member can be written to the wire as is.
 */

export enum RealtimeCommand {
  STATUS_QUERY = 0x3f, // '?'
  CYCLE_START = 0x7e, // '~'
  FEED_HOLD = 0x21, // '!'
  SOFT_RESET = 0x18, // ctrl-x
  SAFETY_DOOR = 0x84,
  JOG_CANCEL = 0x85,

  FEED_OVERRIDE_RESET = 0x90,
  FEED_OVERRIDE_COARSE_PLUS = 0x91,
  FEED_OVERRIDE_COARSE_MINUS = 0x92,
  FEED_OVERRIDE_FINE_PLUS = 0x93,
  FEED_OVERRIDE_FINE_MINUS = 0x94,

  RAPID_OVERRIDE_RESET = 0x95,
  RAPID_OVERRIDE_MEDIUM = 0x96,
  RAPID_OVERRIDE_LOW = 0x97,

  SPINDLE_OVERRIDE_RESET = 0x99,
  SPINDLE_OVERRIDE_COARSE_PLUS = 0x9a,
  SPINDLE_OVERRIDE_COARSE_MINUS = 0x9b,
  SPINDLE_OVERRIDE_FINE_PLUS = 0x9c,
  SPINDLE_OVERRIDE_FINE_MINUS = 0x9d,
  SPINDLE_STOP_TOGGLE = 0x9e,

  FLOOD_COOLANT_TOGGLE = 0xa0,
  MIST_COOLANT_TOGGLE = 0xa1,
}

export enum GrblCommandType {
  GCODE = 1,
  HELP = 2,
  VIEW_SETTINGS = 3,
  VIEW_PARAMETERS = 4,
  VIEW_PARSER_STATE = 5,
  VIEW_BUILD_INFO = 6,
  VIEW_STARTUP_BLOCKS = 7,
  CHECK_MODE = 8,
  KILL_ALARM_LOCK = 9,
  HOMING_CYCLE = 10,
  JOG = 11,
  SET_SETTING = 12,
  RESET = 13,
  SLEEP = 14,
}

/**
 * What `$RST=` restores: settings, coordinate data, or everything.
 */
export enum ResetTarget {
  SETTINGS = "$",
  PARAMETERS = "#",
  ALL = "*",
}

export enum ResponseType {
  OK = 1,
  ERROR = 2,
  ALARM = 3,
  STATUS = 4,
  SETTING = 5,
  FEEDBACK = 6,
  WELCOME = 7,
}

export enum MachineState {
  IDLE = "Idle",
  RUN = "Run",
  HOLD = "Hold",
  JOG = "Jog",
  ALARM = "Alarm",
  DOOR = "Door",
  CHECK = "Check",
  HOME = "Home",
  SLEEP = "Sleep",
  UNKNOWN = "Unknown",
}

/**
 * Lifecycle of a queued command.
 */
export enum CommandState {
  QUEUED = 1,
  SENT = 2,
  ACKED = 3,
  TIMED_OUT = 4,
  FAILED = 5,
}

export enum QueueState {
  IDLE = 1,
  ACTIVE = 2,
  WAITING_FOR_ACK = 3,
  PAUSED = 4,
}

export enum ConnectionStatus {
  DISCONNECTED = 1,
  CONNECTING = 2,
  CONNECTED = 3,
  ERROR = 4,
}

export enum ConnectionEventType {
  CONNECTING = 1,
  CONNECTED = 2,
  DISCONNECTED = 3,
  ERROR = 4,
  DATA_RECEIVED = 5,
}

export enum OverrideKind {
  FEED = 1,
  RAPID = 2,
  SPINDLE = 3,
}
