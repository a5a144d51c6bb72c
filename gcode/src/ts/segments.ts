/**
 * Segment Generator
 *
 * Turns a parsed motion line into a segment starting at the tracked tool
 * position, then moves the tracked position to the segment's end.
 */

import {
  ArcDirection,
  ArcSegment,
  CommandType,
  FeedRateMode,
  MotionMode,
  ParsedCommand,
  ParserState,
  Point3D,
  PositioningMode,
  Segment,
  SegmentType,
  Units,
} from "@grbl-node/types";
import {
  arcSweep,
  centerFromOffsets,
  centerFromRadius,
  planeAxes,
  planeRadius,
} from "./arc";
import { GCodeDomainError } from "./errors";
import { MM_PER_INCH } from "./units";

// Start/end radius mismatch GRBL tolerates for I/J/K arcs, in mm
const ARC_RADIUS_ERROR_MM = 0.005;
const ARC_RADIUS_ERROR_MAX_MM = 0.5;
const ARC_RADIUS_ERROR_RELATIVE = 0.001;

/**
 * Target of a motion line: given axes replace (absolute) or add to
 * (relative) the current position, the others stay put.
 */
export function resolveTarget(
  parameters: Readonly<Record<string, number>>,
  state: ParserState
): Point3D {
  const relative = state.positioningMode === PositioningMode.RELATIVE;
  const axis = (letter: "X" | "Y" | "Z", current: number): number => {
    if (!(letter in parameters)) return current;
    return relative ? current + parameters[letter] : parameters[letter];
  };
  return {
    x: axis("X", state.position.x),
    y: axis("Y", state.position.y),
    z: axis("Z", state.position.z),
  };
}

/**
 * Segment for a parsed line, or null if the line does not move the tool.
 *
 * Probe moves (G38.x) end wherever the probe trips, so they produce no
 * segment and leave the tracked position unchanged.
 *
 * @throws GCodeDomainError for feed moves without a feed rate and arcs with
 * no valid geometry
 */
export function generateSegment(
  command: ParsedCommand,
  state: ParserState
): Segment | null {
  if (command.commandType !== CommandType.MOTION || command.motion === null) {
    return null;
  }
  if (command.motion === MotionMode.PROBE) return null;

  const start = { ...state.position };
  const end = resolveTarget(command.parameters, state);
  const base = {
    start,
    end,
    feedRate: 0,
    inverseTime: state.feedRateMode === FeedRateMode.INVERSE_TIME,
    spindleSpeed: state.spindleSpeed,
    units: state.units,
    sourceLine: command.sourceLine,
    lineNumber: command.lineNumber,
  };

  if (command.motion !== MotionMode.RAPID) {
    const feedOnLine = "F" in command.parameters;
    if (state.feedRateMode === FeedRateMode.INVERSE_TIME && !feedOnLine) {
      throw new GCodeDomainError(
        "Inverse time feed mode needs an F word on every feed move",
        command.sourceLine
      );
    }
    if (state.feedRate <= 0) {
      throw new GCodeDomainError("Feed rate is not set", command.sourceLine);
    }
    base.feedRate = state.feedRate;
  }

  let segment: Segment;
  switch (command.motion) {
    case MotionMode.RAPID:
      segment = { type: SegmentType.RAPID, ...base };
      break;
    case MotionMode.LINEAR:
      segment = { type: SegmentType.LINEAR, ...base };
      break;
    default:
      segment = buildArc(
        command,
        state,
        base,
        command.motion === MotionMode.ARC_CW
          ? ArcDirection.CW
          : ArcDirection.CCW
      );
      break;
  }

  state.position = { ...end };
  return segment;
}

function buildArc(
  command: ParsedCommand,
  state: ParserState,
  base: Omit<
    ArcSegment,
    "type" | "center" | "radius" | "plane" | "direction" | "sweep"
  >,
  direction: ArcDirection
): ArcSegment {
  const { parameters, sourceLine } = command;
  const { start, end } = base;
  const axes = planeAxes(state.plane);

  let center: Point3D;
  let radius: number;

  if ("R" in parameters) {
    const found = centerFromRadius(start, end, parameters.R, direction, axes);
    if (found === null) {
      throw new GCodeDomainError(
        `Arc radius ${parameters.R} cannot reach the target`,
        sourceLine
      );
    }
    center = found;
    radius = Math.abs(parameters.R);
  } else {
    const hasFirst = axes.firstOffset in parameters;
    const hasSecond = axes.secondOffset in parameters;
    if (!hasFirst && !hasSecond) {
      throw new GCodeDomainError(
        "Arc needs an R word or center offsets in the active plane",
        sourceLine
      );
    }
    center = centerFromOffsets(
      start,
      parameters[axes.firstOffset] ?? 0,
      parameters[axes.secondOffset] ?? 0,
      axes
    );
    radius = planeRadius(start, center, axes);
    if (radius === 0) {
      throw new GCodeDomainError("Arc has zero radius", sourceLine);
    }
    const endRadius = planeRadius(end, center, axes);
    const scale = state.units === Units.INCHES ? 1 / MM_PER_INCH : 1;
    const mismatch = Math.abs(endRadius - radius);
    if (
      mismatch > ARC_RADIUS_ERROR_MM * scale &&
      (mismatch > ARC_RADIUS_ERROR_MAX_MM * scale ||
        mismatch > ARC_RADIUS_ERROR_RELATIVE * radius)
    ) {
      throw new GCodeDomainError(
        "Arc end point is not on the circle through the start point",
        sourceLine
      );
    }
  }

  return {
    ...base,
    type:
      direction === ArcDirection.CW ? SegmentType.ARC_CW : SegmentType.ARC_CCW,
    center,
    radius,
    plane: state.plane,
    direction,
    sweep: arcSweep(start, end, center, direction, axes),
  };
}
