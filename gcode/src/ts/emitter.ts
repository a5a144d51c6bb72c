/**
 * G-Code Emitter
 *
 * Renders segments back into GRBL command lines, ready to be queued.
 * Coordinates are always absolute; the program preamble sets G90.
 */

import {
  CommandType,
  ParsedCommand,
  Plane,
  Segment,
  SegmentType,
  Units,
} from "@grbl-node/types";
import { planeAxes } from "./arc";
import { isArc } from "./preprocessor";

const PLANE_WORD: Record<Plane, string> = {
  [Plane.XY]: "G17",
  [Plane.XZ]: "G18",
  [Plane.YZ]: "G19",
};

/** Lines sent to the machine as written */
const PASSTHROUGH_TYPES = new Set([
  CommandType.SPINDLE,
  CommandType.COOLANT,
  CommandType.TOOL_CHANGE,
  CommandType.PROGRAM_FLOW,
  CommandType.NON_MODAL,
]);

/** Work coordinate system selection, spindle, coolant and tool words */
const MACHINE_WORD = /^(G5[4-9]|[MST]\d)/;

/**
 * The words of a command that segments do not carry, as one line.
 * Empty when the line only moves or changes modes the segments restate.
 */
function machineLine(command: ParsedCommand): string {
  if (PASSTHROUGH_TYPES.has(command.commandType)) return command.text;
  return command.text
    .split(" ")
    .filter((word) => MACHINE_WORD.test(word))
    .join(" ");
}

function decimalsFor(units: Units): number {
  return units === Units.INCHES ? 4 : 3;
}

/**
 * Fixed-point rendering that never prints a negative zero.
 */
export function formatNumber(value: number, decimals: number): string {
  const fixed = value.toFixed(decimals);
  return Number(fixed) === 0 ? (0).toFixed(decimals) : fixed;
}

/**
 * Shortest rendering of a value rounded to `decimals` places: 500, 12.5.
 */
export function formatCompact(value: number, decimals = 3): string {
  const rounded = Number(value.toFixed(decimals));
  return String(rounded === 0 ? 0 : rounded);
}

/**
 * One command line for a segment, without a line terminator.
 *
 * @example
 * ```typescript
 * segmentToGCode(linear); // "G1 X10.000 Y0.000 Z0.000 F500"
 * ```
 */
export function segmentToGCode(segment: Segment): string {
  const decimals = decimalsFor(segment.units);
  const { end } = segment;
  const axes = [
    `X${formatNumber(end.x, decimals)}`,
    `Y${formatNumber(end.y, decimals)}`,
    `Z${formatNumber(end.z, decimals)}`,
  ].join(" ");
  const feed = `F${formatCompact(segment.feedRate)}`;

  if (segment.type === SegmentType.RAPID) return `G0 ${axes}`;
  if (segment.type === SegmentType.LINEAR) return `G1 ${axes} ${feed}`;

  const plane = planeAxes(segment.plane);
  const offsets: Record<string, number> = {
    [plane.firstOffset]:
      segment.center[plane.first] - segment.start[plane.first],
    [plane.secondOffset]:
      segment.center[plane.second] - segment.start[plane.second],
  };
  const offsetWords = Object.keys(offsets)
    .sort()
    .map((letter) => `${letter}${formatNumber(offsets[letter], decimals)}`)
    .join(" ");
  const motion = segment.type === SegmentType.ARC_CW ? "G2" : "G3";
  const planeWord = PLANE_WORD[segment.plane];

  return `${planeWord} ${motion} ${axes} ${offsetWords} ${feed}`;
}

/**
 * Command lines for a whole program.
 *
 * Starts with G90 and the units of the first segment, and switches units and
 * feed rate mode where the segments do. When the parsed commands are given,
 * spindle, coolant, tool, program flow, dwell, work offset and other
 * non-modal commands are kept in source order. Such words sharing a line with
 * a move are sent on their own line just before it.
 *
 * @example
 * ```typescript
 * const { segments, commands } = parseProgram("G55\nG1 X10 F100 M3 S12000\n");
 * programToGCode(segments, commands);
 * // ["G90", "G55", "M3 S12000", "G21", "G1 X10.000 Y0.000 Z0.000 F100"]
 * ```
 */
export function programToGCode(
  segments: readonly Segment[],
  commands: readonly ParsedCommand[] = []
): string[] {
  const lines: string[] = ["G90"];
  let units: Units | null = null;
  let inverseTime = false;

  const extra = commands
    .map((command) => ({
      command,
      line: machineLine(command),
      whole: PASSTHROUGH_TYPES.has(command.commandType),
    }))
    .filter(({ line }) => line !== "");
  let next = 0;
  const flushThrough = (sourceLine: number): void => {
    while (
      next < extra.length &&
      extra[next].command.sourceLine <= sourceLine
    ) {
      const { command, line, whole } = extra[next];
      lines.push(line);
      next++;
      if (!whole) continue;
      // Modes set by a line sent as written
      const { gCodes } = command;
      if (gCodes.includes(91)) lines.push("G90");
      if (gCodes.includes(20)) units = Units.INCHES;
      if (gCodes.includes(21)) units = Units.MM;
      if (gCodes.includes(93)) inverseTime = true;
      if (gCodes.includes(94)) inverseTime = false;
    }
  };

  for (const segment of segments) {
    flushThrough(segment.sourceLine);
    if (segment.units !== units) {
      units = segment.units;
      lines.push(units === Units.INCHES ? "G20" : "G21");
    }
    if (
      segment.type !== SegmentType.RAPID &&
      segment.inverseTime !== inverseTime
    ) {
      inverseTime = segment.inverseTime;
      lines.push(inverseTime ? "G93" : "G94");
    }
    lines.push(segmentToGCode(segment));
  }
  flushThrough(Number.POSITIVE_INFINITY);

  return lines;
}

/**
 * Length of the tool path of a segment. Arcs include their helical travel.
 */
export function segmentLength(segment: Segment): number {
  if (isArc(segment)) {
    const axes = planeAxes(segment.plane);
    const planar = Math.abs(segment.sweep) * segment.radius;
    const helix = segment.end[axes.normal] - segment.start[axes.normal];
    return Math.hypot(planar, helix);
  }
  const { start, end } = segment;
  return Math.hypot(end.x - start.x, end.y - start.y, end.z - start.z);
}

/**
 * Machining time in minutes at programmed feed rates, rapids excluded.
 */
export function estimateDuration(segments: readonly Segment[]): number {
  let minutes = 0;
  for (const segment of segments) {
    if (segment.type === SegmentType.RAPID || segment.feedRate <= 0) continue;
    minutes += segment.inverseTime
      ? 1 / segment.feedRate
      : segmentLength(segment) / segment.feedRate;
  }
  return minutes;
}
