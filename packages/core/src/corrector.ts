import type { CropRect, EditorConfig, Point } from './types.js';
import { type Projection, isRectInside, sourceToBB } from './projection.js';
import { hasPerspective } from './warp.js';
import { centeredRect, clamp, lerpRect, rectCenter } from './geometry.js';

const BUDGET_TOLERANCE = 1e-9;

/** Containment with no tolerance. */
function fits(p: Projection, rect: CropRect): boolean {
  return isRectInside(p, rect, 0);
}

/**
 * Pull a crop back inside the image after a non-drag parameter change.
 * Returns the input object itself when nothing needed to change.
 */
export function correctBounds(p: Projection, rect: CropRect, config: EditorConfig): CropRect {
  if (p.transform.angle === 0 && !hasPerspective(p.transform)) {
    return clampToUnit(rect, config.minCropSize);
  }
  if (!hasPerspective(p.transform)) {
    return correctRotated(p, rect, config.minCropSize);
  }
  return correctWarped(p, rect, config);
}

/** Axis-aligned case: the image fills the bounding box. */
function clampToUnit(rect: CropRect, minSize: number): CropRect {
  const w = clamp(rect.w, minSize, 1);
  const h = clamp(rect.h, minSize, 1);
  const x = clamp(rect.x, 0, 1 - w);
  const y = clamp(rect.y, 0, 1 - h);
  if (x === rect.x && y === rect.y && w === rect.w && h === rect.h) return rect;
  return { x, y, w, h };
}

/**
 * Rotation only: closed-form inscribed-rectangle budget.
 *
 * The crop is rotated into image pixel space, where its axis-aligned half
 * extents must fit inside the image's half extents. A negative budget shrinks
 * the crop uniformly; the centre is then clamped into the budget box and
 * rotated back.
 */
function correctRotated(p: Projection, rect: CropRect, minSize: number): CropRect {
  const { bb, cos, sin } = p;
  const imgHalfW = p.source.width / 2;
  const imgHalfH = p.source.height / 2;
  const c = Math.abs(cos);
  const s = Math.abs(sin);

  let hw = (rect.w * bb.width) / 2;
  let hh = (rect.h * bb.height) / 2;
  let ex = c * hw + s * hh;
  let ey = s * hw + c * hh;

  let shrunk = false;
  if (ex > imgHalfW + BUDGET_TOLERANCE || ey > imgHalfH + BUDGET_TOLERANCE) {
    const k = Math.min(imgHalfW / ex, imgHalfH / ey);
    hw *= k;
    hh *= k;
    ex = c * hw + s * hh;
    ey = s * hw + c * hh;
    shrunk = true;
  }
  const budgetX = Math.max(0, imgHalfW - ex);
  const budgetY = Math.max(0, imgHalfH - ey);

  // Crop centre: BB pixels → image pixels (inverse rotation).
  const px = (rect.x + rect.w / 2 - 0.5) * bb.width;
  const py = (rect.y + rect.h / 2 - 0.5) * bb.height;
  const ix = px * cos + py * sin;
  const iy = -px * sin + py * cos;
  const outside =
    Math.abs(ix) > budgetX + BUDGET_TOLERANCE || Math.abs(iy) > budgetY + BUDGET_TOLERANCE;

  if (!shrunk && !outside) return rect;

  const cx = clamp(ix, -budgetX, budgetX);
  const cy = clamp(iy, -budgetY, budgetY);
  const bx = cx * cos - cy * sin;
  const by = cx * sin + cy * cos;

  const w = Math.max((hw * 2) / bb.width, minSize);
  const h = Math.max((hh * 2) / bb.height, minSize);
  return centeredRect({ x: bx / bb.width + 0.5, y: by / bb.height + 0.5 }, w, h);
}

/**
 * Perspective: the boundary has no closed form here, so bisect.
 * Phase 1 slides the rect toward the image centre; phase 2 shrinks it about
 * its own centre, repositioning after every trial.
 */
function correctWarped(p: Projection, rect: CropRect, config: EditorConfig): CropRect {
  if (fits(p, rect)) return rect;

  const home = sourceToBB(p, 0.5, 0.5);
  const moved = reposition(p, rect, home, config.bisectionSteps);
  if (moved) return moved;

  const center = rectCenter(rect);
  const minScale = Math.min(1, Math.max(config.minCropSize / rect.w, config.minCropSize / rect.h));
  const trial = (k: number): CropRect | null =>
    reposition(p, centeredRect(center, rect.w * k, rect.h * k), home, config.bisectionSteps);

  let best = trial(minScale);
  if (!best) {
    // Nothing fits: recentre at the smallest size and accept it.
    return centeredRect(home, rect.w * minScale, rect.h * minScale);
  }

  let lo = minScale;
  let hi = 1;
  for (let i = 0; i < config.bisectionSteps; i++) {
    const mid = (lo + hi) / 2;
    const candidate = trial(mid);
    if (candidate) {
      lo = mid;
      best = candidate;
    } else {
      hi = mid;
    }
  }
  return best;
}

/**
 * Bisect the interpolation between a rect of the same size centred on `home`
 * (must be valid) and the given rect. Returns null when the centred rect itself
 * does not fit.
 */
function reposition(p: Projection, rect: CropRect, home: Point, steps: number): CropRect | null {
  if (fits(p, rect)) return rect;
  const centred = centeredRect(home, rect.w, rect.h);
  if (!fits(p, centred)) return null;

  let lo = 0;
  let hi = 1;
  for (let i = 0; i < steps; i++) {
    const mid = (lo + hi) / 2;
    if (fits(p, lerpRect(centred, rect, mid))) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return lerpRect(centred, rect, lo);
}
