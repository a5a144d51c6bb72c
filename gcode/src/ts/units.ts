import { Point3D, Segment, SegmentType, Units } from "@grbl-node/types";

export const MM_PER_INCH = 25.4;

/**
 * Factor that converts a length in `from` units to `to` units.
 */
export function unitFactor(from: Units, to: Units): number {
  if (from === to) return 1;
  return to === Units.MM ? MM_PER_INCH : 1 / MM_PER_INCH;
}

export function scalePoint(point: Point3D, factor: number): Point3D {
  return { x: point.x * factor, y: point.y * factor, z: point.z * factor };
}

/**
 * Copy of `segment` expressed in `units`. Lengths and arc geometry scale,
 * as does a units-per-minute feed rate.
 */
export function convertSegment(segment: Segment, units: Units): Segment {
  if (segment.units === units) return segment;
  const factor = unitFactor(segment.units, units);

  const base = {
    start: scalePoint(segment.start, factor),
    end: scalePoint(segment.end, factor),
    feedRate: segment.inverseTime
      ? segment.feedRate
      : segment.feedRate * factor,
    units,
  };

  if (
    segment.type === SegmentType.ARC_CW ||
    segment.type === SegmentType.ARC_CCW
  ) {
    return {
      ...segment,
      ...base,
      center: scalePoint(segment.center, factor),
      radius: segment.radius * factor,
    };
  }
  return { ...segment, ...base };
}
