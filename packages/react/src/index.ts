export {
  useCropEditor,
  useCropEditorState,
  useCropGestures,
  type UseCropEditorReturn,
} from './useCropEditor.js';

// Re-export core types
export type {
  CropRect,
  CropAspect,
  CropGeometryState,
  CropEditorOptions,
  TransformParams,
  ViewMetrics,
} from '@tiltcrop/core';
export { CropEditor } from '@tiltcrop/core';
