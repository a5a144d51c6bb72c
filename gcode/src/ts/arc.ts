/**
 * Arc geometry: centers from I/J/K offsets or from a radius, signed sweep,
 * and chord interpolation within a deviation tolerance.
 */

import {
  ArcDirection,
  ArcSegment,
  Axis,
  Plane,
  Point3D,
} from "@grbl-node/types";

/** Sweeps smaller than this collapse to a full turn, as GRBL does */
const ANGULAR_EPSILON = 5e-7;

export interface PlaneAxes {
  /** First in-plane axis; sweeps are measured from it towards `second` */
  first: Axis;
  second: Axis;
  /** Helix axis, interpolated linearly */
  normal: Axis;
  /** Offset words for `first` and `second` */
  firstOffset: "I" | "J" | "K";
  secondOffset: "I" | "J" | "K";
}

// G18 runs Z then X so that G2 turns clockwise seen from +Y
const PLANE_AXES: Record<Plane, PlaneAxes> = {
  [Plane.XY]: {
    first: "x",
    second: "y",
    normal: "z",
    firstOffset: "I",
    secondOffset: "J",
  },
  [Plane.XZ]: {
    first: "z",
    second: "x",
    normal: "y",
    firstOffset: "K",
    secondOffset: "I",
  },
  [Plane.YZ]: {
    first: "y",
    second: "z",
    normal: "x",
    firstOffset: "J",
    secondOffset: "K",
  },
};

export function planeAxes(plane: Plane): PlaneAxes {
  return PLANE_AXES[plane];
}

/**
 * Center given as offsets from the start point.
 */
export function centerFromOffsets(
  start: Point3D,
  offsetFirst: number,
  offsetSecond: number,
  axes: PlaneAxes
): Point3D {
  const center = { ...start };
  center[axes.first] += offsetFirst;
  center[axes.second] += offsetSecond;
  return center;
}

/**
 * Center of the arc of radius `|radius|` through start and end.
 *
 * Of the two candidate centers, a positive radius selects the one giving a
 * sweep of at most 180 degrees in the commanded direction and a negative
 * radius the other one.
 *
 * @returns null when the chord is longer than the diameter, or when start and
 * end coincide in the plane (R cannot describe a full circle)
 */
export function centerFromRadius(
  start: Point3D,
  end: Point3D,
  radius: number,
  direction: ArcDirection,
  axes: PlaneAxes
): Point3D | null {
  const dx = end[axes.first] - start[axes.first];
  const dy = end[axes.second] - start[axes.second];
  const chordSquared = dx * dx + dy * dy;
  if (chordSquared === 0) return null;

  let heightSquared = 4 * radius * radius - chordSquared;
  if (heightSquared < 0) {
    // Rounding in the program text can put a half-circle a hair short
    if (heightSquared < -1e-9 * chordSquared) return null;
    heightSquared = 0;
  }

  let heightOverChord = -Math.sqrt(heightSquared) / Math.sqrt(chordSquared);
  if (direction === ArcDirection.CCW) heightOverChord = -heightOverChord;
  if (radius < 0) heightOverChord = -heightOverChord;

  const center = { ...start };
  center[axes.first] += 0.5 * (dx - dy * heightOverChord);
  center[axes.second] += 0.5 * (dy + dx * heightOverChord);
  return center;
}

/**
 * In-plane distance from the center to a point.
 */
export function planeRadius(
  point: Point3D,
  center: Point3D,
  axes: PlaneAxes
): number {
  return Math.hypot(
    point[axes.first] - center[axes.first],
    point[axes.second] - center[axes.second]
  );
}

/**
 * Signed angular travel from start to end around center: negative for
 * clockwise. Coincident start and end give a full turn.
 */
export function arcSweep(
  start: Point3D,
  end: Point3D,
  center: Point3D,
  direction: ArcDirection,
  axes: PlaneAxes
): number {
  const r0 = start[axes.first] - center[axes.first];
  const r1 = start[axes.second] - center[axes.second];
  const t0 = end[axes.first] - center[axes.first];
  const t1 = end[axes.second] - center[axes.second];

  let sweep = Math.atan2(r0 * t1 - r1 * t0, r0 * t0 + r1 * t1);
  if (direction === ArcDirection.CW) {
    if (sweep >= -ANGULAR_EPSILON) sweep -= 2 * Math.PI;
  } else if (sweep <= ANGULAR_EPSILON) {
    sweep += 2 * Math.PI;
  }
  return sweep;
}

/**
 * Fewest equal chords whose sagitta stays within `tolerance`.
 *
 * A chord spanning angle θ deviates from the arc by r·(1 − cos(θ/2)), so the
 * widest step allowed is 2·acos(1 − tolerance / r).
 */
export function arcChordCount(
  radius: number,
  sweep: number,
  tolerance: number
): number {
  const travel = Math.abs(sweep);
  if (radius <= 0 || travel === 0) return 1;

  const ratio = Math.min(1, Math.max(-1, 1 - tolerance / radius));
  const maxStep = 2 * Math.acos(ratio);
  return Math.max(1, Math.ceil(travel / maxStep));
}

/**
 * Points along the arc after its start, the last one being exactly its end.
 *
 * @param tolerance - Maximum distance between a chord and the true arc
 */
export function interpolateArc(arc: ArcSegment, tolerance: number): Point3D[] {
  const axes = planeAxes(arc.plane);
  const count = arcChordCount(arc.radius, arc.sweep, tolerance);

  const startAngle = Math.atan2(
    arc.start[axes.second] - arc.center[axes.second],
    arc.start[axes.first] - arc.center[axes.first]
  );
  const helixStart = arc.start[axes.normal];
  const helixDelta = arc.end[axes.normal] - helixStart;

  const points: Point3D[] = [];
  for (let i = 1; i < count; i++) {
    const t = i / count;
    const angle = startAngle + arc.sweep * t;
    const point = { ...arc.start };
    point[axes.first] = arc.center[axes.first] + arc.radius * Math.cos(angle);
    point[axes.second] = arc.center[axes.second] + arc.radius * Math.sin(angle);
    point[axes.normal] = helixStart + helixDelta * t;
    points.push(point);
  }
  points.push({ ...arc.end });

  return points;
}
