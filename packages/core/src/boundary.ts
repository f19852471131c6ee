import type { CropRect, Point } from './types.js';
import type { Projection } from './projection.js';
import { sourceToBB } from './projection.js';
import { BOUNDARY_SAMPLES } from './bounding-box.js';
import { dot, rectCorners } from './geometry.js';

/** A corner resting this far outside an edge at t=0 still counts as inside. */
export const START_EPS = 1e-6;

const DEGENERATE_EDGE = 1e-12;
const MIN_OUTWARD_RATE = 1e-12;

export interface BoundaryEdge {
  a: Point;
  b: Point;
  /** Inward unit normal. */
  normal: Point;
}

export interface DragLimit {
  /** Largest safe fraction of the motion, 0..1. */
  t: number;
  /** Inward normal of the edge that limited the motion, or null when unconstrained. */
  normal: Point | null;
}

/** The warped image boundary as an 8-vertex polygon in BB-normalized space. */
export function boundaryPolygon(p: Projection): Point[] {
  return BOUNDARY_SAMPLES.map((s) => sourceToBB(p, s.x, s.y));
}

export function polygonCentroid(polygon: readonly Point[]): Point {
  let x = 0;
  let y = 0;
  for (const v of polygon) {
    x += v.x;
    y += v.y;
  }
  const n = Math.max(polygon.length, 1);
  return { x: x / n, y: y / n };
}

/** Edges with inward unit normals. Near-zero-length edges are dropped. */
export function polygonEdges(polygon: readonly Point[]): BoundaryEdge[] {
  const centroid = polygonCentroid(polygon);
  const edges: BoundaryEdge[] = [];
  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    if (!a || !b) continue;
    const ex = b.x - a.x;
    const ey = b.y - a.y;
    const len = Math.hypot(ex, ey);
    if (len < DEGENERATE_EDGE) continue;
    let normal = { x: -ey / len, y: ex / len };
    if (dot(normal, { x: centroid.x - a.x, y: centroid.y - a.y }) < 0) {
      normal = { x: -normal.x, y: -normal.y };
    }
    edges.push({ a, b, normal });
  }
  return edges;
}

/** Signed distance from an edge's line; positive on the inside. */
export function edgeDistance(edge: BoundaryEdge, p: Point): number {
  return (p.x - edge.a.x) * edge.normal.x + (p.y - edge.a.y) * edge.normal.y;
}

/**
 * Largest fraction t of the motion start → desired that keeps all four crop
 * corners inside the polygon.
 *
 * A corner is tested against an edge when it ends strictly outside while
 * moving outward. Starting inside (within START_EPS) the crossing is
 * `d0 / (d0 - d1)`; starting further out it is 0. The tolerance applies at the
 * start only, so a rect resting on the boundary can leave it but repeated small
 * steps cannot creep across.
 */
export function computeDragLimit(
  polygon: readonly Point[],
  start: CropRect,
  desired: CropRect,
): DragLimit {
  const edges = polygonEdges(polygon);
  const from = rectCorners(start);
  const to = rectCorners(desired);
  let t = 1;
  let normal: Point | null = null;

  for (const edge of edges) {
    for (let i = 0; i < 4; i++) {
      const c0 = from[i];
      const c1 = to[i];
      if (!c0 || !c1) continue;
      const d0 = edgeDistance(edge, c0);
      const d1 = edgeDistance(edge, c1);
      if (d1 >= 0) continue;
      const rate = d0 - d1;
      if (rate <= MIN_OUTWARD_RATE) continue;
      // Already outside and moving further out: no motion is allowed.
      const crossing = d0 < -START_EPS ? 0 : Math.max(d0, 0) / rate;
      if (crossing < t) {
        t = crossing;
        normal = edge.normal;
      }
    }
  }

  return { t: Math.max(0, Math.min(1, t)), normal };
}

/** True when all four corners are within tolerance of the inside of the polygon. */
export function isRectInsidePolygon(
  polygon: readonly Point[],
  rect: CropRect,
  eps: number = START_EPS,
): boolean {
  const edges = polygonEdges(polygon);
  return rectCorners(rect).every((c) => edges.every((e) => edgeDistance(e, c) >= -eps));
}

/** Remove the component of a delta along a normal, leaving the slide along the edge. */
export function projectOntoTangent(delta: Point, normal: Point): Point {
  const along = dot(delta, normal);
  return { x: delta.x - along * normal.x, y: delta.y - along * normal.y };
}
