import type { BoundingBox, CropRect, Point, SourceSize, TransformParams } from './types.js';
import { type Warp, createWarp, rotationTrig } from './warp.js';
import { computeBB } from './bounding-box.js';
import { rectCorners } from './geometry.js';

/** Tolerance, in source UV, for a crop corner to count as inside the image. */
export const CONTAIN_EPS = 1e-6;

/** Precomputed mapping between source UV and BB-normalized coordinates. */
export interface Projection {
  readonly source: SourceSize;
  readonly transform: TransformParams;
  readonly warp: Warp;
  readonly bb: BoundingBox;
  readonly cos: number;
  readonly sin: number;
}

export function createProjection(source: SourceSize, transform: TransformParams): Projection {
  const { cos, sin } = rotationTrig(transform);
  return {
    source,
    transform,
    warp: createWarp(transform, source),
    bb: computeBB(source, transform),
    cos,
    sin,
  };
}

/** Source UV → BB-normalized: warp, centre in pixels, rotate, normalize. */
export function sourceToBB(p: Projection, u: number, v: number): Point {
  const w = p.warp.forward(u, v);
  const px = (w.x - 0.5) * p.source.width;
  const py = (w.y - 0.5) * p.source.height;
  const rx = px * p.cos - py * p.sin;
  const ry = px * p.sin + py * p.cos;
  return {
    x: (rx - p.bb.cx) / p.bb.width + 0.5,
    y: (ry - p.bb.cy) / p.bb.height + 0.5,
  };
}

/** BB-normalized → source UV: inverse rotation, then inverse warp. */
export function bbToSource(p: Projection, bx: number, by: number): Point {
  const rx = (bx - 0.5) * p.bb.width + p.bb.cx;
  const ry = (by - 0.5) * p.bb.height + p.bb.cy;
  const px = rx * p.cos + ry * p.sin;
  const py = -rx * p.sin + ry * p.cos;
  return p.warp.inverse(px / p.source.width + 0.5, py / p.source.height + 0.5);
}

/** True when every corner of the rect maps inside the source image. */
export function isRectInside(p: Projection, rect: CropRect, eps: number = CONTAIN_EPS): boolean {
  for (const c of rectCorners(rect)) {
    const uv = bbToSource(p, c.x, c.y);
    if (uv.x < -eps || uv.x > 1 + eps || uv.y < -eps || uv.y > 1 + eps) return false;
  }
  return true;
}

/** Output pixel dimensions of a crop. */
export function cropOutputSize(p: Projection, crop: CropRect): { width: number; height: number } {
  return {
    width: Math.max(1, Math.round(crop.w * p.bb.width)),
    height: Math.max(1, Math.round(crop.h * p.bb.height)),
  };
}

/** Source UV of the crop's corners (TL, TR, BR, BL), for quad-based export. */
export function cropSourceQuad(p: Projection, crop: CropRect): Point[] {
  return rectCorners(crop).map((c) => bbToSource(p, c.x, c.y));
}

/**
 * Source UV for a normalized output position (0..1 across the crop).
 * Needed with perspective, where bilinear quad interpolation is not exact.
 */
export function cropSourceUV(p: Projection, crop: CropRect, tx: number, ty: number): Point {
  return bbToSource(p, crop.x + tx * crop.w, crop.y + ty * crop.h);
}
