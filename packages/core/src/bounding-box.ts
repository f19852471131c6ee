import type { BoundingBox, CropRect, Point, SourceSize, TransformParams } from './types.js';
import { createWarp, hasPerspective, rotationTrig } from './warp.js';

/** Source-edge samples: 4 corners and 4 edge midpoints, clockwise from top-left. */
export const BOUNDARY_SAMPLES: readonly Point[] = [
  { x: 0, y: 0 },
  { x: 0.5, y: 0 },
  { x: 1, y: 0 },
  { x: 1, y: 0.5 },
  { x: 1, y: 1 },
  { x: 0.5, y: 1 },
  { x: 0, y: 1 },
  { x: 0, y: 0.5 },
];

/**
 * Bounding box of the rotated (and, with perspective, warped) image.
 *
 * Without perspective this is the closed form
 * `bbW = |cosθ|·srcW + |sinθ|·srcH`, `bbH = |sinθ|·srcW + |cosθ|·srcH`.
 * With perspective the warped boundary samples are rotated and measured,
 * and the box centre may drift off the image centre.
 */
export function computeBB(src: SourceSize, t: TransformParams): BoundingBox {
  const { cos, sin } = rotationTrig(t);

  if (!hasPerspective(t)) {
    const c = Math.abs(cos);
    const s = Math.abs(sin);
    return {
      width: c * src.width + s * src.height,
      height: s * src.width + c * src.height,
      cx: 0,
      cy: 0,
    };
  }

  const warp = createWarp(t, src);
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const p of BOUNDARY_SAMPLES) {
    const wp = warp.forward(p.x, p.y);
    const px = (wp.x - 0.5) * src.width;
    const py = (wp.y - 0.5) * src.height;
    const rx = px * cos - py * sin;
    const ry = px * sin + py * cos;
    minX = Math.min(minX, rx);
    maxX = Math.max(maxX, rx);
    minY = Math.min(minY, ry);
    maxY = Math.max(maxY, ry);
  }
  return {
    width: maxX - minX,
    height: maxY - minY,
    cx: (maxX + minX) / 2,
    cy: (maxY + minY) / 2,
  };
}

/** BB-normalized point → rotated pixel frame centred on the image. */
export function bbPointToPhysical(p: Point, bb: BoundingBox): Point {
  return { x: (p.x - 0.5) * bb.width + bb.cx, y: (p.y - 0.5) * bb.height + bb.cy };
}

/** Rotated pixel frame → BB-normalized point. */
export function physicalToBBPoint(p: Point, bb: BoundingBox): Point {
  return { x: (p.x - bb.cx) / bb.width + 0.5, y: (p.y - bb.cy) / bb.height + 0.5 };
}

/** Re-express a BB-normalized point against a new bounding box, keeping its pixel position. */
export function rescalePointForBBChange(p: Point, oldBB: BoundingBox, newBB: BoundingBox): Point {
  return physicalToBBPoint(bbPointToPhysical(p, oldBB), newBB);
}

/**
 * Rescale a crop across a bounding-box change so its pixel footprint and its
 * pixel offset from the image centre are preserved. Sizes scale by
 * `oldBB/newBB` per axis, and so does the offset of the rect centre from the
 * BB centre.
 */
export function rescaleCropForBBChange(
  crop: CropRect,
  oldBB: BoundingBox,
  newBB: BoundingBox,
): CropRect {
  const center = rescalePointForBBChange(
    { x: crop.x + crop.w / 2, y: crop.y + crop.h / 2 },
    oldBB,
    newBB,
  );
  const w = (crop.w * oldBB.width) / newBB.width;
  const h = (crop.h * oldBB.height) / newBB.height;
  return { x: center.x - w / 2, y: center.y - h / 2, w, h };
}
