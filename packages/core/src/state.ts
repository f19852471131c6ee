import type {
  CropAspect,
  CropGeometryState,
  EditorConfig,
  Point,
  TransformParams,
  ViewMetrics,
} from './types.js';
import { beginDrag, endDrag, updateDrag } from './drag.js';
import { popUndo, pushUndo, snapshot } from './history.js';
import {
  applyAspect,
  centerize,
  resetGeometry,
  restoreEntry,
  rotateQuarter,
  scaleCrop,
  setTransform,
} from './operations.js';

export type CropAction =
  | { type: 'POINTER_DOWN'; point: Point; modifier: boolean; view: ViewMetrics }
  | { type: 'POINTER_MOVE'; point: Point; modifier: boolean }
  | { type: 'POINTER_UP' }
  | { type: 'SET_ASPECT'; aspect: CropAspect }
  | { type: 'SET_ORIENTATION'; landscape: boolean }
  | { type: 'SET_ANGLE'; angle: number }
  | { type: 'SET_PERSPECTIVE'; perspV?: number; perspH?: number; shear?: number }
  | { type: 'SET_FOCAL_LENGTH'; focalLength: number }
  | { type: 'ROTATE_90'; direction: 1 | -1 }
  | { type: 'RESET' }
  | { type: 'CENTERIZE' }
  | { type: 'SCALE'; delta: number }
  | { type: 'PUSH_UNDO' }
  | { type: 'UNDO' };

function withUndo(state: CropGeometryState, config: EditorConfig): CropGeometryState {
  return { ...state, undo: pushUndo(state.undo, snapshot(state), config.undoLimit) };
}

/**
 * Immutable state reducer for crop interactions.
 * Geometry is in BB-normalized coordinates; pointer positions are screen pixels.
 * Actions that change nothing return the same state object.
 */
export function cropReducer(
  state: CropGeometryState,
  action: CropAction,
  config: EditorConfig,
): CropGeometryState {
  switch (action.type) {
    case 'POINTER_DOWN':
      return beginDrag(state, action.point, action.modifier, action.view, config);

    case 'POINTER_MOVE':
      return updateDrag(state, action.point, action.modifier, config);

    case 'POINTER_UP':
      return endDrag(state);

    case 'SET_ASPECT': {
      if (action.aspect === state.aspect) return state;
      return applyAspect({ ...withUndo(state, config), aspect: action.aspect }, config);
    }

    case 'SET_ORIENTATION': {
      if (action.landscape === state.landscape) return state;
      return applyAspect({ ...withUndo(state, config), landscape: action.landscape }, config);
    }

    case 'SET_ANGLE':
      return setTransform(state, { angle: action.angle }, config);

    case 'SET_PERSPECTIVE': {
      const patch: Partial<TransformParams> = {};
      if (action.perspV !== undefined) patch.perspV = action.perspV;
      if (action.perspH !== undefined) patch.perspH = action.perspH;
      if (action.shear !== undefined) patch.shear = action.shear;
      return setTransform(state, patch, config);
    }

    case 'SET_FOCAL_LENGTH':
      return setTransform(state, { focalLength: action.focalLength }, config);

    case 'ROTATE_90':
      return rotateQuarter(withUndo(state, config), action.direction);

    case 'RESET':
      return resetGeometry(withUndo(state, config), config);

    case 'CENTERIZE':
      return centerize(withUndo(state, config), config);

    case 'SCALE':
      if (action.delta === 0) return state;
      return scaleCrop(withUndo(state, config), action.delta, config);

    case 'PUSH_UNDO':
      return withUndo(state, config);

    case 'UNDO': {
      const { entry, rest } = popUndo(state.undo);
      if (!entry) return state;
      return { ...restoreEntry(state, entry), undo: rest };
    }

    default:
      return state;
  }
}
