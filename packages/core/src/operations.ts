import type {
  BoundingBox,
  CropAspect,
  CropGeometryState,
  CropRect,
  EditorConfig,
  Point,
  SourceSize,
  TransformParams,
  UndoEntry,
} from './types.js';
import { FULL_CROP, defaultConfig, defaultTransform } from './types.js';
import { clampTransform } from './warp.js';
import { rescaleCropForBBChange, rescalePointForBBChange } from './bounding-box.js';
import { createProjection, sourceToBB } from './projection.js';
import { boundaryPolygon, computeDragLimit } from './boundary.js';
import { correctBounds } from './corrector.js';
import { enforceAspect, fitAspect, normalizedRatio } from './aspect.js';
import { centeredRect, clamp, lerpRect, rectCenter } from './geometry.js';

/** Initial values for a crop session. Missing fields fall back to defaults. */
export interface GeometryInit {
  crop?: CropRect;
  transform?: Partial<TransformParams>;
  aspect?: CropAspect;
  landscape?: boolean;
}

function sanitizeCrop(crop: CropRect, minSize: number): CropRect {
  const { x, y, w, h } = crop;
  if (![x, y, w, h].every((v) => isFinite(v))) return { ...FULL_CROP };
  return { x, y, w: clamp(w, minSize, 1), h: clamp(h, minSize, 1) };
}

/** Build the state for a new crop session; the seed crop is corrected into the image. */
export function createGeometryState(
  source: SourceSize,
  init: GeometryInit = {},
  config: EditorConfig = defaultConfig(),
): CropGeometryState {
  const src: SourceSize = { width: Math.max(1, source.width), height: Math.max(1, source.height) };
  const transform = clampTransform(
    { ...defaultTransform(config.defaultFocalLength), ...init.transform },
    config.defaultFocalLength,
  );
  const proj = createProjection(src, transform);
  const crop = correctBounds(proj, sanitizeCrop(init.crop ?? FULL_CROP, config.minCropSize), config);
  const landscape = init.landscape ?? crop.w * proj.bb.width >= crop.h * proj.bb.height;
  return {
    source: src,
    crop,
    transform,
    bb: proj.bb,
    anchor: rectCenter(crop),
    aspect: init.aspect ?? 'free',
    landscape,
    undo: [],
    drag: null,
  };
}

export function transformEquals(a: TransformParams, b: TransformParams): boolean {
  return (
    a.angle === b.angle &&
    a.rotate90 === b.rotate90 &&
    a.perspV === b.perspV &&
    a.perspH === b.perspH &&
    a.shear === b.shear &&
    a.focalLength === b.focalLength
  );
}

/**
 * Apply a new transform, carrying the base crop and anchor across the
 * bounding-box change at their physical positions, then correcting bounds.
 */
export function retransform(
  state: CropGeometryState,
  base: { crop: CropRect; anchor: Point; bb: BoundingBox },
  transform: TransformParams,
  config: EditorConfig,
): CropGeometryState {
  const proj = createProjection(state.source, transform);
  const crop = correctBounds(proj, rescaleCropForBBChange(base.crop, base.bb, proj.bb), config);
  return {
    ...state,
    transform,
    bb: proj.bb,
    crop,
    anchor: rescalePointForBBChange(base.anchor, base.bb, proj.bb),
  };
}

/** Merge and clamp transform fields; a no-op change returns the same state. */
export function setTransform(
  state: CropGeometryState,
  patch: Partial<TransformParams>,
  config: EditorConfig,
): CropGeometryState {
  const next = clampTransform({ ...state.transform, ...patch }, config.defaultFocalLength);
  if (transformEquals(next, state.transform)) return state;
  return retransform(state, state, next, config);
}

/** Fit the crop to the locked ratio of the current aspect and orientation. */
export function applyAspect(state: CropGeometryState, config: EditorConfig): CropGeometryState {
  const ratio = normalizedRatio(state.aspect, state.source, state.landscape, state.bb);
  if (ratio === null) return state;
  const proj = createProjection(state.source, state.transform);
  const crop = correctBounds(proj, fitAspect(state.crop, ratio), config);
  return { ...state, crop };
}

/**
 * Quarter-turn the image. Crop and anchor turn with it: a 90° step maps the
 * bounding box onto itself with width and height swapped, so the new
 * coordinates are an exact reflection of the old ones.
 */
export function rotateQuarter(state: CropGeometryState, direction: 1 | -1): CropGeometryState {
  const rotate90 = (state.transform.rotate90 + (direction > 0 ? 1 : 3)) % 4;
  const transform = { ...state.transform, rotate90 };
  const proj = createProjection(state.source, transform);
  const c = state.crop;
  const a = state.anchor;
  const crop =
    direction > 0
      ? { x: 1 - (c.y + c.h), y: c.x, w: c.h, h: c.w }
      : { x: c.y, y: 1 - (c.x + c.w), w: c.h, h: c.w };
  const anchor = direction > 0 ? { x: 1 - a.y, y: a.x } : { x: a.y, y: 1 - a.x };
  return { ...state, transform, bb: proj.bb, crop, anchor, landscape: !state.landscape };
}

/** Full frame, zero rotation and perspective. The focal length and aspect preset survive. */
export function resetGeometry(state: CropGeometryState, config: EditorConfig): CropGeometryState {
  const transform = defaultTransform(state.transform.focalLength);
  const proj = createProjection(state.source, transform);
  const next: CropGeometryState = {
    ...state,
    transform,
    bb: proj.bb,
    crop: { ...FULL_CROP },
    anchor: { x: 0.5, y: 0.5 },
    landscape: state.source.width >= state.source.height,
  };
  const fitted = applyAspect(next, config);
  return { ...fitted, anchor: rectCenter(fitted.crop) };
}

/** Centre the crop on the image centre and the view on the crop. */
export function centerize(state: CropGeometryState, config: EditorConfig): CropGeometryState {
  const proj = createProjection(state.source, state.transform);
  const home = sourceToBB(proj, 0.5, 0.5);
  const crop = correctBounds(proj, centeredRect(home, state.crop.w, state.crop.h), config);
  return { ...state, crop, anchor: rectCenter(crop) };
}

/**
 * Grow or shrink the crop about its centre (wheel). Positive delta shrinks.
 * Growth stops at the image boundary.
 */
export function scaleCrop(
  state: CropGeometryState,
  delta: number,
  config: EditorConfig,
): CropGeometryState {
  const factor = clamp(1 - delta * config.wheelStep, 0.8, 1.2);
  const { crop } = state;
  const center = rectCenter(crop);
  let w = Math.min(crop.w * factor, 1);
  let h = Math.min(crop.h * factor, 1);

  const ratio = normalizedRatio(state.aspect, state.source, state.landscape, state.bb);
  if (ratio !== null) {
    if (w / h > ratio) w = h * ratio;
    else h = w / ratio;
  }
  const grow = Math.max(1, config.minCropSize / w, config.minCropSize / h);
  w *= grow;
  h *= grow;

  const proj = createProjection(state.source, state.transform);
  const desired = centeredRect(center, w, h);
  const limit = computeDragLimit(boundaryPolygon(proj), crop, desired);
  let next = lerpRect(crop, desired, limit.t);
  if (ratio !== null) next = enforceAspect(next, ratio, center);
  return { ...state, crop: next };
}

/** Put back a snapshot taken by `snapshot()`. */
export function restoreEntry(state: CropGeometryState, entry: UndoEntry): CropGeometryState {
  const transform = { ...entry.transform };
  const proj = createProjection(state.source, transform);
  return {
    ...state,
    crop: { ...entry.crop },
    transform,
    bb: proj.bb,
    anchor: { ...entry.anchor },
    aspect: entry.aspect,
    landscape: entry.landscape,
    drag: null,
  };
}
