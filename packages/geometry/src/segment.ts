import { isApproxZero, type Space } from "@quantgeo/core";
import { line, point, segment, vector } from "./constructors.js";
import type { Line, Point, Segment, Vector } from "./types.js";

/** `end - start` */
export function segmentVector<S extends Space>(s: Segment<S>): Vector<S> {
  return vector(s.space, s.end.x - s.start.x, s.end.y - s.start.y);
}

export function segmentLength<S extends Space>(s: Segment<S>): number {
  return Math.hypot(s.end.x - s.start.x, s.end.y - s.start.y);
}

export function segmentLengthSquared<S extends Space>(s: Segment<S>): number {
  const dx = s.end.x - s.start.x;
  const dy = s.end.y - s.start.y;
  return dx * dx + dy * dy;
}

export function segmentMidpoint<S extends Space>(s: Segment<S>): Point<S> {
  return pointOnSegment(s, 0.5);
}

/** `start + t·(end - start)`; `t` in [0, 1] stays on the segment */
export function pointOnSegment<S extends Space>(s: Segment<S>, t: number): Point<S> {
  return point(
    s.space,
    s.start.x + t * (s.end.x - s.start.x),
    s.start.y + t * (s.end.y - s.start.y)
  );
}

export function segmentReversed<S extends Space>(s: Segment<S>): Segment<S> {
  return segment(s.end, s.start);
}

/** The supporting line, directed from start to end */
export function segmentLine<S extends Space>(s: Segment<S>): Line<S> {
  return line(s.start, segmentVector(s));
}

/** Parameter in [0, 1] of the segment point nearest to `p` */
function closestParameter<S extends Space>(s: Segment<S>, p: Point<S>): number {
  const dx = s.end.x - s.start.x;
  const dy = s.end.y - s.start.y;
  const lenSq = dx * dx + dy * dy;
  if (lenSq === 0) return 0;
  const t = ((p.x - s.start.x) * dx + (p.y - s.start.y) * dy) / lenSq;
  return Math.max(0, Math.min(1, t));
}

export function segmentClosestPoint<S extends Space>(s: Segment<S>, p: Point<S>): Point<S> {
  return pointOnSegment(s, closestParameter(s, p));
}

/** Distance from `p` to the nearest point of the segment */
export function segmentDistance<S extends Space>(s: Segment<S>, p: Point<S>): number {
  const t = closestParameter(s, p);
  const cx = s.start.x + t * (s.end.x - s.start.x);
  const cy = s.start.y + t * (s.end.y - s.start.y);
  return Math.hypot(p.x - cx, p.y - cy);
}

export function segmentContains<S extends Space>(s: Segment<S>, p: Point<S>): boolean {
  return isApproxZero(segmentDistance(s, p));
}
