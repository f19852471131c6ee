export type { ViewProvider } from './pointer.js';
export { createCropPointerHandler, createCropWheelHandler } from './pointer.js';
export type { CropKeyboardAction } from './keyboard.js';
export { handleCropKeyboard, applyCropKeyboardAction } from './keyboard.js';

// Re-export core types for convenience
export type {
  CropRect,
  CropAspect,
  CropGeometryState,
  DragMode,
  TransformParams,
  ViewMetrics,
} from '@tiltcrop/core';

export { CropEditor, centeredView, cropToScreenRect, cursorForMode } from '@tiltcrop/core';
