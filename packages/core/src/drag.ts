import type {
  CropGeometryState,
  CropRect,
  DragMode,
  DragSession,
  EditorConfig,
  Point,
  TransformParams,
  ViewMetrics,
} from './types.js';
import { MAX_FINE_ANGLE, MAX_TILT_DEGREES } from './types.js';
import { clampTransform, focalDistance, rotationTrig } from './warp.js';
import { rescaleCropForBBChange, rescalePointForBBChange } from './bounding-box.js';
import { createProjection, isRectInside } from './projection.js';
import { boundaryPolygon, computeDragLimit, projectOntoTangent } from './boundary.js';
import { aspectBaseRatio, aspectPixelRatio, canFlipOrientation, enforceAspect, normalizedRatio } from './aspect.js';
import { bbToScreen, cropToScreenRect, screenDeltaToBB } from './viewport.js';
import { centeredRect, clamp, lerp, lerpRect, rectCenter, toDegrees, wrapAngle } from './geometry.js';
import { pushUndo, snapshot } from './history.js';
import { retransform } from './operations.js';

export type CornerHandle = 'nw' | 'ne' | 'se' | 'sw';
export type EdgeHandle = 'n' | 'e' | 's' | 'w';

const CORNERS: readonly CornerHandle[] = ['nw', 'ne', 'se', 'sw'];
const EDGES: readonly EdgeHandle[] = ['n', 'e', 's', 'w'];

export function isCornerHandle(mode: DragMode): mode is CornerHandle {
  return mode === 'nw' || mode === 'ne' || mode === 'se' || mode === 'sw';
}

export function isEdgeHandle(mode: DragMode): mode is EdgeHandle {
  return mode === 'n' || mode === 'e' || mode === 's' || mode === 'w';
}

/** CSS cursor for each drag mode. */
export function cursorForMode(mode: DragMode): string {
  switch (mode) {
    case 'nw': case 'se': return 'nwse-resize';
    case 'ne': case 'sw': return 'nesw-resize';
    case 'n': case 's': return 'ns-resize';
    case 'e': case 'w': return 'ew-resize';
    case 'move': return 'move';
    case 'perspective': return 'all-scroll';
    case 'rotate': return 'grab';
    default: return 'default';
  }
}

function cornerPoint(r: CropRect, corner: CornerHandle): Point {
  return {
    x: corner === 'nw' || corner === 'sw' ? r.x : r.x + r.w,
    y: corner === 'nw' || corner === 'ne' ? r.y : r.y + r.h,
  };
}

const OPPOSITE: Record<CornerHandle, CornerHandle> = { nw: 'se', ne: 'sw', se: 'nw', sw: 'ne' };

/**
 * Which drag a pointer-down at `point` (screen px) starts.
 * Priority: corners, edges, interior, then the rotate band around the image.
 */
export function hitTest(
  state: CropGeometryState,
  point: Point,
  view: ViewMetrics,
  modifier: boolean,
  config: EditorConfig,
): DragMode {
  const r = cropToScreenRect(state.crop, state.anchor, state.bb, view);
  const radius = config.handleHitRadius;

  let best: DragMode = 'none';
  let bestDist = Infinity;
  for (const corner of CORNERS) {
    const c = cornerPoint(r, corner);
    const dx = Math.abs(point.x - c.x);
    const dy = Math.abs(point.y - c.y);
    if (dx <= radius && dy <= radius && Math.hypot(dx, dy) < bestDist) {
      best = corner;
      bestDist = Math.hypot(dx, dy);
    }
  }
  if (best !== 'none') return best;

  const withinX = point.x >= r.x && point.x <= r.x + r.w;
  const withinY = point.y >= r.y && point.y <= r.y + r.h;
  const edgeDist: Record<EdgeHandle, number> = {
    n: withinX ? Math.abs(point.y - r.y) : Infinity,
    s: withinX ? Math.abs(point.y - (r.y + r.h)) : Infinity,
    w: withinY ? Math.abs(point.x - r.x) : Infinity,
    e: withinY ? Math.abs(point.x - (r.x + r.w)) : Infinity,
  };
  for (const edge of EDGES) {
    if (edgeDist[edge] <= radius && edgeDist[edge] < bestDist) {
      best = edge;
      bestDist = edgeDist[edge];
    }
  }
  if (best !== 'none') return best;

  if (withinX && withinY) return modifier ? 'perspective' : 'move';

  const tl = bbToScreen({ x: 0, y: 0 }, state.anchor, state.bb, view);
  const br = bbToScreen({ x: 1, y: 1 }, state.anchor, state.bb, view);
  const m = config.rotateMargin;
  if (point.x >= tl.x - m && point.x <= br.x + m && point.y >= tl.y - m && point.y <= br.y + m) {
    return 'rotate';
  }
  return 'none';
}

/** Start a drag. Pushes an undo entry; returns the same state when nothing was hit. */
export function beginDrag(
  state: CropGeometryState,
  point: Point,
  modifier: boolean,
  view: ViewMetrics,
  config: EditorConfig,
): CropGeometryState {
  if (!(view.scale > 0)) return state;
  const mode = hitTest(state, point, view, modifier, config);
  if (mode === 'none') return state;

  const pivot = bbToScreen(rectCenter(state.crop), state.anchor, state.bb, view);
  const drag: DragSession = {
    mode,
    startCrop: { ...state.crop },
    startTransform: { ...state.transform },
    startPointer: { ...point },
    startBB: { ...state.bb },
    startAnchor: { ...state.anchor },
    startLandscape: state.landscape,
    view,
    pivot,
    startPointerAngle: Math.atan2(point.y - pivot.y, point.x - pivot.x),
  };
  return {
    ...state,
    undo: pushUndo(state.undo, snapshot(state), config.undoLimit),
    drag,
  };
}

export function endDrag(state: CropGeometryState): CropGeometryState {
  if (!state.drag) return state;
  return { ...state, drag: null };
}

/** Translate a rect. */
export function moveBy(r: CropRect, d: Point): CropRect {
  return { x: r.x + d.x, y: r.y + d.y, w: r.w, h: r.h };
}

/** Move the edges a handle touches; the opposite edges stay put. */
export function resizeBy(mode: CornerHandle | EdgeHandle, r: CropRect, d: Point): CropRect {
  let { x, y, w, h } = r;
  if (mode.includes('w')) {
    x += d.x;
    w -= d.x;
  }
  if (mode.includes('e')) w += d.x;
  if (mode.includes('n')) {
    y += d.y;
    h -= d.y;
  }
  if (mode.includes('s')) h += d.y;
  return { x, y, w, h };
}

/** Limit a resize delta so neither dimension drops below `min`. */
export function clampResizeDelta(
  mode: CornerHandle | EdgeHandle,
  r: CropRect,
  d: Point,
  min: number,
): Point {
  let { x, y } = d;
  if (mode.includes('w')) x = Math.min(x, r.w - min);
  else if (mode.includes('e')) x = Math.max(x, min - r.w);
  else x = 0;
  if (mode.includes('n')) y = Math.min(y, r.h - min);
  else if (mode.includes('s')) y = Math.max(y, min - r.h);
  else y = 0;
  return { x, y };
}

/**
 * Two-pass clamp. The motion is cut at the first boundary crossing; with
 * `slide`, the unapplied part is projected onto the blocking edge and solved
 * again from the clamped position.
 */
export function clampAndSlide(
  polygon: readonly Point[],
  start: CropRect,
  delta: Point,
  apply: (r: CropRect, d: Point) => CropRect,
  slide: boolean,
): CropRect {
  const desired = apply(start, delta);
  const first = computeDragLimit(polygon, start, desired);
  const hit = lerpRect(start, desired, first.t);
  if (!slide || first.t >= 1 || !first.normal) return hit;

  const rest = { x: delta.x * (1 - first.t), y: delta.y * (1 - first.t) };
  const along = projectOntoTangent(rest, first.normal);
  const slid = apply(hit, along);
  const second = computeDragLimit(polygon, hit, slid);
  return lerpRect(hit, slid, second.t);
}

/**
 * Landscape/portrait decision for a locked-corner drag. `distX/distY` are the
 * anchor-to-pointer distances in pixels; the flag flips once the off-axis
 * share passes the hysteresis threshold.
 */
export function nextOrientation(
  landscape: boolean,
  distX: number,
  distY: number,
  baseRatio: number,
  hysteresis: number,
): boolean {
  const threshold = Math.max(hysteresis * baseRatio, 1 / hysteresis);
  const num = landscape ? distY : distX;
  const den = landscape ? distX : distY;
  const offAxis = den > 0 ? num / den : num > 0 ? Infinity : 0;
  return offAxis > threshold ? !landscape : landscape;
}

/** Advance the active drag to a new pointer position (screen px). */
export function updateDrag(
  state: CropGeometryState,
  point: Point,
  modifier: boolean,
  config: EditorConfig,
): CropGeometryState {
  const s = state.drag;
  if (!s) return state;

  switch (s.mode) {
    case 'move':
      return dragMove(state, s, point);
    case 'perspective':
      return dragPerspective(state, s, point, config);
    case 'rotate':
      return dragRotate(state, s, point, config);
    case 'none':
      return state;
    default:
      if (isCornerHandle(s.mode)) return dragCorner(state, s, s.mode, point, modifier, config);
      if (isEdgeHandle(s.mode)) return dragEdge(state, s, s.mode, point, config);
      return state;
  }
}

function pointerDelta(s: DragSession, point: Point): Point {
  return screenDeltaToBB(point.x - s.startPointer.x, point.y - s.startPointer.y, s.startBB, s.view);
}

function currentPolygon(state: CropGeometryState): Point[] {
  return boundaryPolygon(createProjection(state.source, state.transform));
}

function dragMove(state: CropGeometryState, s: DragSession, point: Point): CropGeometryState {
  const crop = clampAndSlide(currentPolygon(state), s.startCrop, pointerDelta(s, point), moveBy, true);
  const anchor = {
    x: s.startAnchor.x + (crop.x - s.startCrop.x),
    y: s.startAnchor.y + (crop.y - s.startCrop.y),
  };
  return { ...state, crop, anchor };
}

function dragEdge(
  state: CropGeometryState,
  s: DragSession,
  edge: EdgeHandle,
  point: Point,
  config: EditorConfig,
): CropGeometryState {
  const polygon = currentPolygon(state);
  const min = config.minCropSize;
  const d = clampResizeDelta(edge, s.startCrop, pointerDelta(s, point), min);
  const ratio = normalizedRatio(state.aspect, state.source, state.landscape, state.bb);

  if (ratio === null) {
    const crop = clampAndSlide(polygon, s.startCrop, d, (r, delta) => resizeBy(edge, r, delta), false);
    return { ...state, crop };
  }

  const start = s.startCrop;
  const center = rectCenter(start);
  const horizontal = edge === 'e' || edge === 'w';
  let w: number;
  let h: number;
  if (horizontal) {
    w = resizeBy(edge, start, d).w;
    h = w / ratio;
    const budget = Math.min(center.y, 1 - center.y) * 2;
    if (h > budget) {
      h = budget;
      w = h * ratio;
    }
  } else {
    h = resizeBy(edge, start, d).h;
    w = h * ratio;
    const budget = Math.min(center.x, 1 - center.x) * 2;
    if (w > budget) {
      w = budget;
      h = w / ratio;
    }
  }
  const grow = Math.max(1, min / w, min / h);
  w *= grow;
  h *= grow;

  const desired: CropRect = {
    x: edge === 'w' ? start.x + start.w - w : edge === 'e' ? start.x : center.x - w / 2,
    y: edge === 'n' ? start.y + start.h - h : edge === 's' ? start.y : center.y - h / 2,
    w,
    h,
  };
  const limit = computeDragLimit(polygon, start, desired);
  const hit = lerpRect(start, desired, limit.t);
  const pivot: Point = {
    x: edge === 'w' ? hit.x + hit.w : edge === 'e' ? hit.x : hit.x + hit.w / 2,
    y: edge === 'n' ? hit.y + hit.h : edge === 's' ? hit.y : hit.y + hit.h / 2,
  };
  return { ...state, crop: enforceAspect(hit, ratio, pivot) };
}

function dragCorner(
  state: CropGeometryState,
  s: DragSession,
  corner: CornerHandle,
  point: Point,
  modifier: boolean,
  config: EditorConfig,
): CropGeometryState {
  const polygon = currentPolygon(state);
  const min = config.minCropSize;
  const start = s.startCrop;
  const d = pointerDelta(s, point);

  if (modifier) return scaleFromCenter(state, polygon, start, corner, d, config);

  if (state.aspect === 'free') {
    const clamped = clampResizeDelta(corner, start, d, min);
    const crop = clampAndSlide(polygon, start, clamped, (r, delta) => {
      const limited = clampResizeDelta(corner, r, delta, min);
      return resizeBy(corner, r, limited);
    }, true);
    return { ...state, crop };
  }

  const { bb, source } = state;
  const anchor = cornerPoint(start, OPPOSITE[corner]);
  const dragged = cornerPoint(start, corner);
  const distX = Math.abs(dragged.x + d.x - anchor.x) * bb.width;
  const distY = Math.abs(dragged.y + d.y - anchor.y) * bb.height;

  let landscape = state.landscape;
  const base = aspectBaseRatio(state.aspect, source);
  if (base !== null && canFlipOrientation(state.aspect, source)) {
    landscape = nextOrientation(landscape, distX, distY, base, config.flipHysteresis);
  }
  const r = aspectPixelRatio(state.aspect, source, landscape);
  const ratio = normalizedRatio(state.aspect, source, landscape, bb);
  if (r === null || ratio === null) return state;

  // Crop height in pixels along the locked diagonal, floored so both sides stay at least `min`.
  const along = Math.max((distX * r + distY) / (r * r + 1), (min * bb.width) / r, min * bb.height);
  const w = (r * along) / bb.width;
  const h = along / bb.height;

  const west = corner === 'nw' || corner === 'sw';
  const north = corner === 'nw' || corner === 'ne';
  const desired: CropRect = {
    x: west ? anchor.x - w : anchor.x,
    y: north ? anchor.y - h : anchor.y,
    w,
    h,
  };
  const limit = computeDragLimit(polygon, start, desired);
  const hit = lerpRect(start, desired, limit.t);
  const pivot = cornerPoint(hit, OPPOSITE[corner]);
  return { ...state, landscape, crop: enforceAspect(hit, ratio, pivot) };
}

function scaleFromCenter(
  state: CropGeometryState,
  polygon: readonly Point[],
  start: CropRect,
  corner: CornerHandle,
  d: Point,
  config: EditorConfig,
): CropGeometryState {
  const center = rectCenter(start);
  const p = cornerPoint(start, corner);
  const ratio = normalizedRatio(state.aspect, state.source, state.landscape, state.bb);
  let baseW = start.w;
  let baseH = start.h;
  if (ratio !== null) {
    if (baseW / baseH > ratio) baseW = baseH * ratio;
    else baseH = baseW / ratio;
  }
  const min = config.minCropSize;
  const k = Math.max(
    Math.abs(p.x + d.x - center.x) / (start.w / 2),
    Math.abs(p.y + d.y - center.y) / (start.h / 2),
    min / baseW,
    min / baseH,
  );
  const w = baseW * k;
  const h = baseH * k;

  const desired = centeredRect(center, w, h);
  const limit = computeDragLimit(polygon, start, desired);
  const hit = lerpRect(start, desired, limit.t);
  return { ...state, crop: ratio === null ? hit : enforceAspect(hit, ratio, center) };
}

function dragRotate(
  state: CropGeometryState,
  s: DragSession,
  point: Point,
  config: EditorConfig,
): CropGeometryState {
  const a = Math.atan2(point.y - s.pivot.y, point.x - s.pivot.x);
  const angle = clamp(
    s.startTransform.angle + wrapAngle(a - s.startPointerAngle),
    -MAX_FINE_ANGLE,
    MAX_FINE_ANGLE,
  );
  if (angle === state.transform.angle) return state;
  const transform = clampTransform({ ...s.startTransform, angle }, config.defaultFocalLength);
  return retransform(
    state,
    { crop: s.startCrop, anchor: s.startAnchor, bb: s.startBB },
    transform,
    config,
  );
}

/**
 * Tilt the image by dragging inside the crop. The crop and the view anchor
 * keep their physical positions, so the crop stays still on screen while the
 * image warps beneath it. A tilt that would expose area outside the image is
 * cut back by bisection toward the last accepted tilt.
 */
function dragPerspective(
  state: CropGeometryState,
  s: DragSession,
  point: Point,
  config: EditorConfig,
): CropGeometryState {
  const dx = point.x - s.startPointer.x;
  const dy = point.y - s.startPointer.y;
  const { cos, sin } = rotationTrig(s.startTransform);
  const ix = dx * cos + dy * sin;
  const iy = -dx * sin + dy * cos;
  const long = Math.max(state.source.width, state.source.height) * s.view.scale;
  const dist = focalDistance(s.startTransform.focalLength);

  const target = clampTransform(
    {
      ...s.startTransform,
      perspV: clamp(
        s.startTransform.perspV + toDegrees(Math.atan(iy / long / dist)),
        -MAX_TILT_DEGREES,
        MAX_TILT_DEGREES,
      ),
      perspH: clamp(
        s.startTransform.perspH + toDegrees(Math.atan(ix / long / dist)),
        -MAX_TILT_DEGREES,
        MAX_TILT_DEGREES,
      ),
    },
    config.defaultFocalLength,
  );

  const attempt = (t: TransformParams): CropGeometryState | null => {
    const proj = createProjection(state.source, t);
    const crop = rescaleCropForBBChange(s.startCrop, s.startBB, proj.bb);
    if (!isRectInside(proj, crop)) return null;
    return {
      ...state,
      transform: t,
      bb: proj.bb,
      crop,
      anchor: rescalePointForBBChange(s.startAnchor, s.startBB, proj.bb),
    };
  };

  const direct = attempt(target);
  if (direct) return direct;

  const from = state.transform;
  let best: CropGeometryState | null = null;
  let lo = 0;
  let hi = 1;
  for (let i = 0; i < config.bisectionSteps; i++) {
    const mid = (lo + hi) / 2;
    const candidate = attempt({
      ...target,
      perspV: lerp(from.perspV, target.perspV, mid),
      perspH: lerp(from.perspH, target.perspH, mid),
    });
    if (candidate) {
      lo = mid;
      best = candidate;
    } else {
      hi = mid;
    }
  }
  return best ?? state;
}
