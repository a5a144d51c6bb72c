/**
 * Inbound half of the protocol codec.
 *
 * Lines are matched on their prefix. Anything unrecognised becomes an
 * unbracketed FEEDBACK response so nothing the controller says is lost.
 */

import {
  AccessoryState,
  BufferState,
  GrblResponse,
  GrblStatus,
  MachineState,
  OverrideValues,
  PinState,
  Position,
  ResponseType,
} from "@grbl-node/types";
import codes from "./grbl-codes.json";

const ERROR_DESCRIPTIONS = toCodeMap(codes.errors);
const ALARM_DESCRIPTIONS = toCodeMap(codes.alarms);

function toCodeMap(table: Record<string, string>): Map<number, string> {
  return new Map(
    Object.entries(table).map(([code, text]) => [Number(code), text])
  );
}

const MACHINE_STATES: ReadonlyMap<string, MachineState> = new Map(
  Object.values(MachineState).map((state) => [state.toLowerCase(), state])
);

const ERROR_PATTERN = /^error:\s*(\d+)$/i;
const ALARM_PATTERN = /^alarm:\s*(\d+)$/i;
const SETTING_PATTERN = /^\$(\d+)=(.*)$/;
const WELCOME_PREFIX = "Grbl ";

/** Text GRBL documents for `error:<code>`, or null. */
export function describeError(code: number): string | null {
  return ERROR_DESCRIPTIONS.get(code) ?? null;
}

/** Text GRBL documents for `ALARM:<code>`, or null. */
export function describeAlarm(code: number): string | null {
  return ALARM_DESCRIPTIONS.get(code) ?? null;
}

/**
 * Classifies one received line.
 *
 * @returns The response, or null for a blank line
 *
 * @example
 * ```typescript
 * parseResponse("ok");        // { type: ResponseType.OK }
 * parseResponse("error:20");  // { type: ResponseType.ERROR, code: 20, description: "Unsupported ..." }
 * parseResponse("$110=500.000"); // { type: ResponseType.SETTING, setting: 110, value: "500.000" }
 * ```
 */
export function parseResponse(raw: string): GrblResponse | null {
  const line = raw.trim();
  if (line === "") return null;

  if (line.toLowerCase() === "ok") return { type: ResponseType.OK };

  const error = ERROR_PATTERN.exec(line);
  if (error) {
    const code = Number(error[1]);
    return { type: ResponseType.ERROR, code, description: describeError(code) };
  }

  const alarm = ALARM_PATTERN.exec(line);
  if (alarm) {
    const code = Number(alarm[1]);
    return { type: ResponseType.ALARM, code, description: describeAlarm(code) };
  }

  if (line.startsWith("<") && line.endsWith(">")) {
    return {
      type: ResponseType.STATUS,
      status: parseStatusReport(line.slice(1, -1)),
    };
  }

  if (line.startsWith(WELCOME_PREFIX)) {
    const version = line.slice(WELCOME_PREFIX.length).split("[")[0].trim();
    return { type: ResponseType.WELCOME, version };
  }

  const setting = SETTING_PATTERN.exec(line);
  if (setting) {
    return {
      type: ResponseType.SETTING,
      setting: Number(setting[1]),
      value: setting[2].trim(),
    };
  }

  if (line.startsWith("[") && line.endsWith("]")) {
    return {
      type: ResponseType.FEEDBACK,
      message: line.slice(1, -1),
      bracketed: true,
    };
  }

  return { type: ResponseType.FEEDBACK, message: line, bracketed: false };
}

// ============================================================================
// Status Reports
// ============================================================================

function parseNumbers(text: string): number[] | null {
  const parts = text.split(",");
  const values = parts.map((part) => (part.trim() === "" ? NaN : Number(part)));
  return values.every(Number.isFinite) ? values : null;
}

/** First three axes of a position field; extra axes are ignored */
function parsePosition(text: string): Position | null {
  const values = parseNumbers(text);
  if (!values || values.length < 3) return null;
  return { x: values[0], y: values[1], z: values[2] };
}

function parseBuffer(text: string): BufferState | null {
  const values = parseNumbers(text);
  if (!values || values.length !== 2) return null;
  return { plannerBlocks: values[0], rxBytes: values[1] };
}

function parseOverrides(text: string): OverrideValues | null {
  const values = parseNumbers(text);
  if (!values || values.length !== 3) return null;
  return { feed: values[0], rapid: values[1], spindle: values[2] };
}

function parsePins(text: string): PinState {
  const has = (letter: string): boolean => text.includes(letter);
  return {
    x: has("X"),
    y: has("Y"),
    z: has("Z"),
    probe: has("P"),
    door: has("D"),
    hold: has("H"),
    softReset: has("R"),
    cycleStart: has("S"),
  };
}

function parseAccessories(text: string): AccessoryState {
  const has = (letter: string): boolean => text.includes(letter);
  return {
    spindleCw: has("S"),
    spindleCcw: has("C"),
    flood: has("F"),
    mist: has("M"),
  };
}

function parseSingle(text: string): number | null {
  const values = parseNumbers(text);
  return values && values.length === 1 ? values[0] : null;
}

/**
 * Reads the body of a `<...>` status report.
 *
 * Fields are matched by name in any order after the leading state. Unknown
 * fields are skipped; absent or malformed ones stay null.
 *
 * @example
 * ```typescript
 * const status = parseStatusReport("Idle|MPos:1.000,2.000,3.000|FS:0,0");
 * status.machinePosition; // { x: 1, y: 2, z: 3 }
 * status.workPosition;    // null
 * ```
 */
export function parseStatusReport(body: string): GrblStatus {
  const [stateField, ...fields] = body.split("|");
  const colon = stateField.indexOf(":");
  const stateName = colon === -1 ? stateField : stateField.slice(0, colon);

  const status: GrblStatus = {
    state:
      MACHINE_STATES.get(stateName.trim().toLowerCase()) ??
      MachineState.UNKNOWN,
    subState: colon === -1 ? null : parseSingle(stateField.slice(colon + 1)),
    machinePosition: null,
    workPosition: null,
    workCoordinateOffset: null,
    buffer: null,
    feedRate: null,
    spindleSpeed: null,
    overrides: null,
    pins: null,
    accessories: null,
    lineNumber: null,
  };

  for (const field of fields) {
    const separator = field.indexOf(":");
    if (separator === -1) continue;
    const name = field.slice(0, separator);
    const value = field.slice(separator + 1);

    switch (name) {
      case "MPos":
        status.machinePosition = parsePosition(value);
        break;
      case "WPos":
        status.workPosition = parsePosition(value);
        break;
      case "WCO":
        status.workCoordinateOffset = parsePosition(value);
        break;
      case "Bf":
        status.buffer = parseBuffer(value);
        break;
      case "F":
        status.feedRate = parseSingle(value);
        break;
      case "FS": {
        const values = parseNumbers(value);
        if (values && values.length === 2) {
          status.feedRate = values[0];
          status.spindleSpeed = values[1];
        }
        break;
      }
      case "Ov":
        status.overrides = parseOverrides(value);
        break;
      case "Pn":
        status.pins = parsePins(value);
        break;
      case "A":
        status.accessories = parseAccessories(value);
        break;
      case "Ln":
        status.lineNumber = parseSingle(value);
        break;
    }
  }

  // GRBL leaves A: out of a report carrying Ov: when every accessory is off
  if (status.overrides !== null && status.accessories === null) {
    status.accessories = parseAccessories("");
  }

  return status;
}
