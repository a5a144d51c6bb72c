/**
 * Program Loader
 *
 * Parses a whole program line by line. A bad line is recorded and skipped;
 * the lines after it are still parsed against the last good modal state.
 */

import { readFile } from "node:fs/promises";
import {
  Extents,
  GCodeLineError,
  ParsedCommand,
  ParseOptions,
  ParseProgress,
  Point3D,
  ProgramParseResult,
  Segment,
} from "@grbl-node/types";
import { interpolateArc } from "./arc";
import { GCodeError, GCodeSyntaxError } from "./errors";
import { GCodeParser } from "./parser";
import { isArc } from "./preprocessor";

export const DEFAULT_PROGRESS_UPDATES = 40;

/** Arc extents are traced to within this fraction of the radius */
const EXTENTS_ARC_PRECISION = 1e-3;

function extend(extents: Extents | null, point: Point3D): Extents {
  if (!extents) return { min: { ...point }, max: { ...point } };
  const { min, max } = extents;
  min.x = Math.min(min.x, point.x);
  min.y = Math.min(min.y, point.y);
  min.z = Math.min(min.z, point.z);
  max.x = Math.max(max.x, point.x);
  max.y = Math.max(max.y, point.y);
  max.z = Math.max(max.z, point.z);
  return extents;
}

/**
 * Bounding box of a segment stream, following arcs between their endpoints.
 */
export function computeExtents(segments: readonly Segment[]): Extents | null {
  let extents: Extents | null = null;
  for (const segment of segments) {
    extents = extendWithSegment(extents, segment);
  }
  return extents;
}

function extendWithSegment(extents: Extents | null, segment: Segment): Extents {
  let result = extend(extend(extents, segment.start), segment.end);
  if (isArc(segment)) {
    const tolerance = Math.max(segment.radius * EXTENTS_ARC_PRECISION, 1e-9);
    for (const point of interpolateArc(segment, tolerance)) {
      result = extend(result, point);
    }
  }
  return result;
}

/**
 * Parses program text.
 *
 * @example
 * ```typescript
 * const result = parseProgram("G21 G90\nG0 X0 Y0\nG1 X10 F500\n");
 * result.segments.length; // 2
 * result.errors; // []
 * ```
 */
export function parseProgram(
  text: string,
  options: ParseOptions = {}
): ProgramParseResult {
  const parser = new GCodeParser(options.initialPosition);
  const lines = text.split(/\r?\n/);
  // A trailing newline does not start another line
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();

  const commands: ParsedCommand[] = [];
  const segments: Segment[] = [];
  const errors: GCodeLineError[] = [];
  let extents: Extents | null = null;

  const onProgress = options.onProgress;
  const progressUpdates = options.progressUpdates ?? DEFAULT_PROGRESS_UPDATES;
  const interval =
    onProgress && progressUpdates > 0
      ? Math.max(1, Math.ceil(lines.length / progressUpdates))
      : 0;
  const totalBytes = Buffer.byteLength(text);
  let bytesRead = 0;

  lines.forEach((line, index) => {
    const sourceLine = index + 1;
    bytesRead = Math.min(totalBytes, bytesRead + Buffer.byteLength(line) + 1);

    try {
      const { command, segment } = parser.parseLine(line, sourceLine);
      if (command) commands.push(command);
      if (segment) {
        segments.push(segment);
        extents = extendWithSegment(extents, segment);
      }
    } catch (e) {
      if (!(e instanceof GCodeError)) throw e;
      errors.push({
        sourceLine,
        column: e instanceof GCodeSyntaxError ? e.column : null,
        message: e.message,
        text: line,
      });
    }

    if (
      onProgress &&
      interval > 0 &&
      (sourceLine % interval === 0 || sourceLine === lines.length)
    ) {
      const progress: ParseProgress = {
        bytesRead,
        totalBytes,
        percent:
          totalBytes > 0 ? Math.round((bytesRead / totalBytes) * 100) : 100,
        segmentCount: segments.length,
      };
      try {
        onProgress(progress);
      } catch (err) {
        console.error("Error in parse progress callback:", err);
      }
    }
  });

  return {
    commands,
    segments,
    errors,
    extents,
    state: parser.getState(),
  };
}

/**
 * Reads and parses a G-code file (.nc, .gcode, .ngc, ...).
 *
 * @param filepath - Path to the program file
 * @param options - Starting position and progress reporting
 * @returns Parsed commands, segments, per-line errors and extents
 * @throws Error if the file cannot be read; G-code errors are returned in `errors`
 *
 * @example
 * ```typescript
 * import { parseGCode, SegmentType } from "@grbl-node/gcode";
 *
 * const result = await parseGCode("/path/to/program.nc", {
 *   onProgress: (progress) => {
 *     console.log(`${progress.percent}% complete`);
 *   },
 * });
 *
 * for (const error of result.errors) {
 *   console.warn(`line ${error.sourceLine}: ${error.message}`);
 * }
 * console.log(`Extents: X ${result.extents?.min.x} to ${result.extents?.max.x}`);
 * ```
 */
export async function parseGCode(
  filepath: string,
  options: ParseOptions = {}
): Promise<ProgramParseResult> {
  const text = await readFile(filepath, "utf8");
  return parseProgram(text, options);
}
