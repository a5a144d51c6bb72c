/**
 * Segment Preprocessor
 *
 * Rewrites a segment stream before it is streamed: arcs become chords,
 * lengths move to one unit system, and redundant rapids are dropped. The
 * stages run in that order.
 */

import {
  ArcSegment,
  LinearSegment,
  Point3D,
  Segment,
  SegmentType,
  Units,
} from "@grbl-node/types";
import { interpolateArc } from "./arc";
import { convertSegment } from "./units";

export const DEFAULT_ARC_TOLERANCE = 0.1;

/** Endpoints closer than this on every axis are the same point */
export const POINT_TOLERANCE = 1e-4;

export interface PreprocessorOptions {
  /**
   * Maximum distance between a chord and the arc it replaces, in the arc's
   * own units.
   * @default 0.1
   */
  arcTolerance?: number;
  /** @default true */
  expandArcs?: boolean;
  /** Convert every segment to these units. Unset keeps each segment's own. */
  targetUnits?: Units;
  /** @default true */
  optimizeRapids?: boolean;
}

export function isArc(segment: Segment): segment is ArcSegment {
  return (
    segment.type === SegmentType.ARC_CW || segment.type === SegmentType.ARC_CCW
  );
}

export function samePoint(a: Point3D, b: Point3D): boolean {
  return (
    Math.abs(a.x - b.x) <= POINT_TOLERANCE &&
    Math.abs(a.y - b.y) <= POINT_TOLERANCE &&
    Math.abs(a.z - b.z) <= POINT_TOLERANCE
  );
}

/**
 * Replaces an arc with linear chords that never stray more than `tolerance`
 * from it. The last chord ends exactly at the arc's end.
 *
 * Under inverse time every chord gets its share of the arc's duration.
 */
export function expandArc(arc: ArcSegment, tolerance: number): LinearSegment[] {
  const points = interpolateArc(arc, tolerance);
  const feedRate = arc.inverseTime
    ? arc.feedRate * points.length
    : arc.feedRate;

  let start = arc.start;
  return points.map((end) => {
    const chord: LinearSegment = {
      type: SegmentType.LINEAR,
      start,
      end,
      feedRate,
      inverseTime: arc.inverseTime,
      spindleSpeed: arc.spindleSpeed,
      units: arc.units,
      sourceLine: arc.sourceLine,
      lineNumber: arc.lineNumber,
    };
    start = end;
    return chord;
  });
}

export function expandArcs(
  segments: readonly Segment[],
  tolerance: number
): Segment[] {
  return segments.flatMap((segment) =>
    isArc(segment) ? expandArc(segment, tolerance) : [segment]
  );
}

/**
 * Expresses every segment in `units`. Segments already in `units` are
 * returned untouched, so converting twice changes nothing.
 */
export function convertUnits(
  segments: readonly Segment[],
  units: Units
): Segment[] {
  return segments.map((segment) => convertSegment(segment, units));
}

/**
 * Drops rapids that end where the tool already is: zero-length rapids and
 * repeats of the previous endpoint. The visited points are unchanged.
 */
export function optimizeRapids(segments: readonly Segment[]): Segment[] {
  const result: Segment[] = [];
  let current: Point3D | null = segments.length > 0 ? segments[0].start : null;

  for (const segment of segments) {
    if (
      segment.type === SegmentType.RAPID &&
      current !== null &&
      samePoint(segment.end, current)
    ) {
      continue;
    }
    result.push(segment);
    current = segment.end;
  }

  return result;
}

/**
 * Runs the configured stages over a segment stream.
 *
 * @example
 * ```typescript
 * const preprocessor = new Preprocessor({ arcTolerance: 0.01, targetUnits: Units.MM });
 * const ready = preprocessor.process(result.segments);
 * ```
 */
export class Preprocessor {
  private readonly arcTolerance: number;
  private readonly expand: boolean;
  private readonly targetUnits: Units | null;
  private readonly optimize: boolean;

  constructor(options: PreprocessorOptions = {}) {
    this.arcTolerance = options.arcTolerance ?? DEFAULT_ARC_TOLERANCE;
    if (!(this.arcTolerance > 0)) {
      throw new RangeError(
        `arcTolerance must be positive, got ${options.arcTolerance}`
      );
    }
    this.expand = options.expandArcs ?? true;
    this.targetUnits = options.targetUnits ?? null;
    this.optimize = options.optimizeRapids ?? true;
  }

  process(segments: readonly Segment[]): Segment[] {
    let result = this.expand
      ? expandArcs(segments, this.arcTolerance)
      : [...segments];
    if (this.targetUnits !== null) {
      result = convertUnits(result, this.targetUnits);
    }
    if (this.optimize) {
      result = optimizeRapids(result);
    }
    return result;
  }

  getArcTolerance(): number {
    return this.arcTolerance;
  }
}
