/** Crop rectangle in bounding-box-normalized coordinates (0..1, origin at BB top-left). */
export interface CropRect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface Point {
  x: number;
  y: number;
}

/** Source image dimensions in pixels. */
export interface SourceSize {
  width: number;
  height: number;
}

/** Rotation and perspective parameters applied to the source image. */
export interface TransformParams {
  /** Fine rotation in radians, ±π/4. */
  angle: number;
  /** Number of 90° steps, 0..3. */
  rotate90: number;
  /** Vertical tilt in degrees, ±45. */
  perspV: number;
  /** Horizontal tilt in degrees, ±45. */
  perspH: number;
  /** Horizontal shear, ±1. */
  shear: number;
  /** 35mm-equivalent focal length in mm. */
  focalLength: number;
}

/**
 * Axis-aligned extent of the rotated, warped image in the screen-horizontal frame.
 * cx/cy locate the box centre relative to the image centre (pixels, rotated frame).
 */
export interface BoundingBox {
  width: number;
  height: number;
  cx: number;
  cy: number;
}

/** Aspect ratio presets. */
export type CropAspect = 'original' | '16:9' | '4:3' | '3:2' | '1:1' | '5:4' | 'free';

/** Which handle, region or gesture a drag is operating on. */
export type DragMode =
  | 'none'
  | 'move'
  | 'perspective'
  | 'rotate'
  | 'nw' | 'ne' | 'sw' | 'se'
  | 'n' | 'e' | 's' | 'w';

/** Immutable snapshot restored by undo. */
export interface UndoEntry {
  readonly crop: Readonly<CropRect>;
  readonly transform: Readonly<TransformParams>;
  readonly anchor: Readonly<Point>;
  readonly aspect: CropAspect;
  readonly landscape: boolean;
}

/** Host-supplied display mapping: where the view anchor sits and how large a BB pixel is on screen. */
export interface ViewMetrics {
  /** Screen position of the view anchor. */
  center: Point;
  /** Screen pixels per bounding-box pixel. */
  scale: number;
}

/** Transient state between pointer-down and pointer-up. */
export interface DragSession {
  mode: DragMode;
  startCrop: CropRect;
  startTransform: TransformParams;
  startPointer: Point;
  startBB: BoundingBox;
  startAnchor: Point;
  startLandscape: boolean;
  view: ViewMetrics;
  /** Screen point rotation is measured around. */
  pivot: Point;
  /** Pointer angle about the pivot at drag start. */
  startPointerAngle: number;
}

/** Complete geometry state of one crop session. */
export interface CropGeometryState {
  source: SourceSize;
  crop: CropRect;
  transform: TransformParams;
  bb: BoundingBox;
  anchor: Point;
  aspect: CropAspect;
  /** true when the locked ratio is wider than tall. */
  landscape: boolean;
  undo: readonly UndoEntry[];
  drag: DragSession | null;
}

/** Tunables for the constraint engine and interaction. */
export interface EditorConfig {
  minCropSize: number;
  undoLimit: number;
  /** Hit radius around handles in screen pixels. */
  handleHitRadius: number;
  /** Band around the bounding box, in screen pixels, that starts a rotation. */
  rotateMargin: number;
  /** Orientation auto-flip hysteresis factor. */
  flipHysteresis: number;
  defaultFocalLength: number;
  bisectionSteps: number;
  /** Crop scale change per wheel unit. */
  wheelStep: number;
}

export const MIN_CROP_SIZE = 0.02;
export const MAX_FINE_ANGLE = Math.PI / 4;
export const MAX_TILT_DEGREES = 45;
export const MAX_SHEAR = 1;
export const DEFAULT_FOCAL_LENGTH = 28;
export const UNDO_LIMIT = 50;

export const FULL_CROP: Readonly<CropRect> = { x: 0, y: 0, w: 1, h: 1 };

export function defaultConfig(): EditorConfig {
  return {
    minCropSize: MIN_CROP_SIZE,
    undoLimit: UNDO_LIMIT,
    handleHitRadius: 12,
    rotateMargin: 48,
    flipHysteresis: 0.92,
    defaultFocalLength: DEFAULT_FOCAL_LENGTH,
    bisectionSteps: 16,
    wheelStep: 0.03,
  };
}

export function defaultTransform(focalLength: number = DEFAULT_FOCAL_LENGTH): TransformParams {
  return { angle: 0, rotate90: 0, perspV: 0, perspH: 0, shear: 0, focalLength };
}
