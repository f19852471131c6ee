import { describe, it, expect } from 'vitest';
import {
  boundaryPolygon,
  computeDragLimit,
  createGeometryState,
  createProjection,
  defaultConfig,
  defaultTransform,
  isRectInside,
  isRectInsidePolygon,
  lerpRect,
  moveBy,
  polygonEdges,
  projectOntoTangent,
  rectCorners,
  resizeBy,
} from '../src/index.js';
import { edgeDistance } from '../src/boundary.js';

const src = { width: 400, height: 300 };
const flat = boundaryPolygon(createProjection(src, defaultTransform()));

describe('boundaryPolygon', () => {
  it('matches the unit box without a transform', () => {
    expect(flat).toHaveLength(8);
    expect(flat[0]?.x).toBeCloseTo(0, 12);
    expect(flat[4]?.x).toBeCloseTo(1, 12);
    expect(flat[4]?.y).toBeCloseTo(1, 12);
  });

  it('drops zero-length edges', () => {
    const edges = polygonEdges([
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
      { x: 0, y: 1 },
    ]);
    expect(edges).toHaveLength(4);
  });
});

describe('computeDragLimit', () => {
  it('allows motion that stays inside', () => {
    const start = { x: 0.2, y: 0.2, w: 0.2, h: 0.2 };
    const limit = computeDragLimit(flat, start, { ...start, x: 0.3 });
    expect(limit).toEqual({ t: 1, normal: null });
  });

  it('stops a move at the boundary', () => {
    const start = { x: 0.5, y: 0.2, w: 0.3, h: 0.3 };
    const desired = { ...start, x: 0.9 };
    const limit = computeDragLimit(flat, start, desired);
    expect(limit.t).toBeCloseTo(0.5, 9);
    expect(limit.normal).toEqual({ x: -1, y: 0 });

    const hit = lerpRect(start, desired, limit.t);
    expect(hit.x + hit.w).toBeCloseTo(1, 9);
    expect(isRectInsidePolygon(flat, lerpRect(start, desired, limit.t + 0.01), 0)).toBe(false);
  });

  it('lets a rect resting on the boundary move away but not further out', () => {
    const start = { x: 0.5, y: 0.2, w: 0.5, h: 0.3 };
    expect(computeDragLimit(flat, start, { ...start, x: 0.4 }).t).toBe(1);
    expect(computeDragLimit(flat, start, { ...start, x: 0.6 }).t).toBe(0);
  });

  it('stops a corner that starts outside from moving further out', () => {
    const start = { x: -0.01, y: 0.2, w: 0.5, h: 0.3 };
    expect(computeDragLimit(flat, start, { ...start, x: -0.1 }).t).toBe(0);
    expect(computeDragLimit(flat, start, { ...start, x: 0.05 }).t).toBe(1);
  });

  it('clamps a corner drag onto the warped boundary', () => {
    const proj = createProjection(src, { ...defaultTransform(), perspV: 20 });
    const polygon = boundaryPolygon(proj);
    const start = { x: 0.3, y: 0.3, w: 0.4, h: 0.4 };
    const desired = resizeBy('se', start, { x: 0.5, y: 0.5 });

    const limit = computeDragLimit(polygon, start, desired);
    expect(limit.t).toBeLessThan(1);

    const hit = lerpRect(start, desired, limit.t);
    const edges = polygonEdges(polygon);
    const distances = rectCorners(hit).flatMap((c) => edges.map((e) => edgeDistance(e, c)));
    expect(Math.min(...distances)).toBeCloseTo(0, 9);
    expect(isRectInside(proj, hit, 1e-9)).toBe(true);
  });
});

describe('containment after correction', () => {
  // Keystone plus a fine angle: the corrected full frame rests on the warped edges.
  const state = createGeometryState(
    src,
    { transform: { perspV: 45, perspH: 27, angle: 0.1 } },
    defaultConfig(),
  );
  const proj = createProjection(src, state.transform);
  const polygon = boundaryPolygon(proj);

  it('leaves the corrected crop inside with no tolerance', () => {
    expect(isRectInside(proj, state.crop, 0)).toBe(true);
  });

  it.each([
    [0.05, 0],
    [-0.05, 0],
    [0, 0.05],
    [0, -0.05],
  ])('keeps a move by (%f, %f) on the image', (dx, dy) => {
    const desired = moveBy(state.crop, { x: dx, y: dy });
    const limit = computeDragLimit(polygon, state.crop, desired);
    const moved = lerpRect(state.crop, desired, limit.t);
    expect(isRectInsidePolygon(polygon, moved, 1e-9)).toBe(true);
    expect(isRectInside(proj, moved, 1e-9)).toBe(true);
  });
});

describe('projectOntoTangent', () => {
  it('removes the normal component', () => {
    expect(projectOntoTangent({ x: 1, y: 1 }, { x: -1, y: 0 })).toEqual({ x: 0, y: 1 });
  });
});
