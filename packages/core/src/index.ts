// Types
export type {
  CropRect,
  Point,
  SourceSize,
  TransformParams,
  BoundingBox,
  CropAspect,
  DragMode,
  UndoEntry,
  ViewMetrics,
  DragSession,
  CropGeometryState,
  EditorConfig,
} from './types.js';

export {
  MIN_CROP_SIZE,
  MAX_FINE_ANGLE,
  MAX_TILT_DEGREES,
  MAX_SHEAR,
  DEFAULT_FOCAL_LENGTH,
  UNDO_LIMIT,
  FULL_CROP,
  defaultConfig,
  defaultTransform,
} from './types.js';

// Geometry
export { clamp, lerpRect, rectCorners, rectCenter, centeredRect, rectEquals, wrapAngle } from './geometry.js';

// Warp and bounding box
export type { Warp } from './warp.js';
export {
  FULL_FRAME_LONG_EDGE_MM,
  createWarp,
  clampTransform,
  hasPerspective,
  totalRotation,
  rotationTrig,
  focalDistance,
  keystoneCoefficients,
} from './warp.js';
export {
  BOUNDARY_SAMPLES,
  computeBB,
  rescaleCropForBBChange,
  rescalePointForBBChange,
  bbPointToPhysical,
  physicalToBBPoint,
} from './bounding-box.js';
export type { Projection } from './projection.js';
export {
  CONTAIN_EPS,
  createProjection,
  sourceToBB,
  bbToSource,
  isRectInside,
  cropOutputSize,
  cropSourceQuad,
  cropSourceUV,
} from './projection.js';

// Constraints
export type { BoundaryEdge, DragLimit } from './boundary.js';
export {
  START_EPS,
  boundaryPolygon,
  polygonEdges,
  computeDragLimit,
  isRectInsidePolygon,
  projectOntoTangent,
} from './boundary.js';
export { correctBounds } from './corrector.js';

// Aspect
export {
  CROP_ASPECTS,
  aspectLabel,
  parseAspect,
  aspectBaseRatio,
  aspectPixelRatio,
  normalizedRatio,
  canFlipOrientation,
  fitAspect,
  enforceAspect,
} from './aspect.js';

// Viewport
export type { ScreenRect } from './viewport.js';
export { bbToScreen, screenToBB, screenDeltaToBB, cropToScreenRect, fitScale, centeredView } from './viewport.js';

// Interaction
export type { CornerHandle, EdgeHandle } from './drag.js';
export {
  hitTest,
  beginDrag,
  updateDrag,
  endDrag,
  cursorForMode,
  isCornerHandle,
  isEdgeHandle,
  moveBy,
  resizeBy,
  clampAndSlide,
  nextOrientation,
} from './drag.js';
export type { GeometryInit } from './operations.js';
export {
  createGeometryState,
  retransform,
  setTransform,
  applyAspect,
  rotateQuarter,
  resetGeometry,
  centerize,
  scaleCrop,
  restoreEntry,
  transformEquals,
} from './operations.js';
export { snapshot, pushUndo, popUndo } from './history.js';

// State
export type { CropAction } from './state.js';
export { cropReducer } from './state.js';

// Editor
export type { CropEditorOptions, CropEditorListener } from './editor.js';
export { CropEditor } from './editor.js';

// Adapters
export type { PhotoRecord, PhotoRecordStore, RecordGeometry } from './adapters/types.js';
export { recordToGeometry, geometryToRecord } from './adapters/record.js';
export { MemoryRecordStore } from './adapters/memory.js';
