import { describe, it, expect } from 'vitest';
import {
  createGeometryState,
  createProjection,
  cropReducer,
  defaultConfig,
  isRectInside,
} from '../src/index.js';
import type { CropAction, CropGeometryState, EditorConfig } from '../src/index.js';

const src = { width: 400, height: 300 };
const config: EditorConfig = defaultConfig();

function run(state: CropGeometryState, ...actions: CropAction[]): CropGeometryState {
  return actions.reduce((s, a) => cropReducer(s, a, config), state);
}

describe('cropReducer ROTATE_90', () => {
  it('swaps the bounding box exactly and keeps a centred crop centred', () => {
    const state = createGeometryState(src, { crop: { x: 0.25, y: 0.25, w: 0.5, h: 0.5 } }, config);
    expect(state.landscape).toBe(true);

    const next = run(state, { type: 'ROTATE_90', direction: 1 });
    expect(next.transform.rotate90).toBe(1);
    expect(next.bb.width).toBe(300);
    expect(next.bb.height).toBe(400);
    expect(next.crop).toEqual({ x: 0.25, y: 0.25, w: 0.5, h: 0.5 });
    expect(next.landscape).toBe(false);
    expect(next.undo).toHaveLength(1);
  });

  it('reflects an off-centre crop and back', () => {
    const crop = { x: 0.125, y: 0.25, w: 0.375, h: 0.5 };
    const state = createGeometryState(src, { crop }, config);
    const left = run(state, { type: 'ROTATE_90', direction: -1 });
    expect(left.transform.rotate90).toBe(3);
    expect(left.crop).toEqual({ x: 0.25, y: 0.5, w: 0.5, h: 0.375 });

    const back = run(left, { type: 'ROTATE_90', direction: 1 });
    expect(back.crop).toEqual(crop);
    expect(back.bb).toEqual(state.bb);
  });

  it('returns to the start after four quarter turns', () => {
    const crop = { x: 0.125, y: 0.25, w: 0.375, h: 0.5 };
    const state = createGeometryState(src, { crop }, config);
    const turn: CropAction = { type: 'ROTATE_90', direction: 1 };
    const next = run(state, turn, turn, turn, turn);
    expect(next.transform.rotate90).toBe(0);
    expect(next.crop).toEqual(crop);
    expect(next.landscape).toBe(state.landscape);
  });
});

describe('cropReducer undo', () => {
  it('N pushes and N undos restore the starting state', () => {
    const state = createGeometryState(src, { crop: { x: 0.1, y: 0.1, w: 0.6, h: 0.6 } }, config);
    const changed = run(
      state,
      { type: 'PUSH_UNDO' },
      { type: 'SET_ANGLE', angle: 0.1 },
      { type: 'PUSH_UNDO' },
      { type: 'SET_PERSPECTIVE', perspV: 10 },
      { type: 'PUSH_UNDO' },
      { type: 'SET_ANGLE', angle: -0.2 },
    );
    expect(changed.undo).toHaveLength(3);

    const restored = run(changed, { type: 'UNDO' }, { type: 'UNDO' }, { type: 'UNDO' });
    expect(restored.crop).toEqual(state.crop);
    expect(restored.transform).toEqual(state.transform);
    expect(restored.anchor).toEqual(state.anchor);
    expect(restored.bb).toEqual(state.bb);
    expect(restored.undo).toHaveLength(0);
  });

  it('undo on an empty stack is a no-op', () => {
    const state = createGeometryState(src, {}, config);
    expect(cropReducer(state, { type: 'UNDO' }, config)).toBe(state);
  });

  it('drops the oldest entries beyond the limit', () => {
    const small = { ...config, undoLimit: 3 };
    let state = createGeometryState(src, {}, small);
    for (let i = 0; i < 5; i++) state = cropReducer(state, { type: 'PUSH_UNDO' }, small);
    expect(state.undo).toHaveLength(3);
  });
});

describe('cropReducer parameter setters', () => {
  it('SET_ANGLE corrects the crop without pushing undo', () => {
    const state = createGeometryState(src, {}, config);
    const next = run(state, { type: 'SET_ANGLE', angle: 0.2 });
    expect(next.transform.angle).toBe(0.2);
    expect(next.undo).toHaveLength(0);
    expect(isRectInside(createProjection(src, next.transform), next.crop, 1e-9)).toBe(true);
  });

  it('clamps the angle to ±45°', () => {
    const state = createGeometryState(src, {}, config);
    expect(run(state, { type: 'SET_ANGLE', angle: 2 }).transform.angle).toBe(Math.PI / 4);
  });

  it('returns the same state when nothing changes', () => {
    const state = createGeometryState(src, {}, config);
    expect(run(state, { type: 'SET_ANGLE', angle: 0 })).toBe(state);
    expect(run(state, { type: 'SET_ASPECT', aspect: 'free' })).toBe(state);
    expect(run(state, { type: 'SET_ORIENTATION', landscape: true })).toBe(state);
    expect(run(state, { type: 'POINTER_MOVE', point: { x: 1, y: 1 }, modifier: false })).toBe(state);
    expect(run(state, { type: 'POINTER_UP' })).toBe(state);
  });

  it('SET_PERSPECTIVE keeps the crop inside the warped image', () => {
    const state = createGeometryState(src, {}, config);
    const next = run(state, { type: 'SET_PERSPECTIVE', perspV: 25, shear: 0.3 });
    expect(next.transform.perspV).toBe(25);
    expect(next.transform.perspH).toBe(0);
    expect(next.transform.shear).toBe(0.3);
    expect(isRectInside(createProjection(src, next.transform), next.crop)).toBe(true);
  });

  it('SET_FOCAL_LENGTH falls back to the default for unknown values', () => {
    const state = createGeometryState(src, { transform: { focalLength: 50 } }, config);
    expect(state.transform.focalLength).toBe(50);
    expect(run(state, { type: 'SET_FOCAL_LENGTH', focalLength: -1 }).transform.focalLength).toBe(28);
  });

  it('SET_ORIENTATION re-applies a locked preset', () => {
    const state = createGeometryState(src, { aspect: '1:1' }, config);
    const portrait = run(state, { type: 'SET_ASPECT', aspect: '4:3' }, { type: 'SET_ORIENTATION', landscape: false });
    const pixelW = portrait.crop.w * portrait.bb.width;
    const pixelH = portrait.crop.h * portrait.bb.height;
    expect(pixelW / pixelH).toBeCloseTo(3 / 4, 9);
    expect(portrait.undo).toHaveLength(2);
  });
});

describe('cropReducer discrete operations', () => {
  it('RESET restores the full frame and keeps the focal length', () => {
    const state = createGeometryState(
      src,
      { crop: { x: 0.2, y: 0.2, w: 0.3, h: 0.3 }, transform: { angle: 0.3, perspV: 12, focalLength: 35 } },
      config,
    );
    const next = run(state, { type: 'RESET' });
    expect(next.crop).toEqual({ x: 0, y: 0, w: 1, h: 1 });
    expect(next.transform).toEqual({ angle: 0, rotate90: 0, perspV: 0, perspH: 0, shear: 0, focalLength: 35 });
    expect(next.bb).toEqual({ width: 400, height: 300, cx: 0, cy: 0 });
    expect(next.anchor).toEqual({ x: 0.5, y: 0.5 });
  });

  it('CENTERIZE moves the crop to the image centre', () => {
    const state = createGeometryState(src, { crop: { x: 0.1, y: 0.1, w: 0.2, h: 0.2 } }, config);
    const next = run(state, { type: 'CENTERIZE' });
    expect(next.crop.x).toBeCloseTo(0.4, 12);
    expect(next.crop.y).toBeCloseTo(0.4, 12);
    expect(next.anchor.x).toBeCloseTo(0.5, 12);
    expect(next.anchor.y).toBeCloseTo(0.5, 12);
  });

  it('SCALE grows and shrinks about the centre', () => {
    const state = createGeometryState(src, { crop: { x: 0.25, y: 0.25, w: 0.5, h: 0.5 } }, config);
    const smaller = run(state, { type: 'SCALE', delta: 1 });
    expect(smaller.crop.w).toBeCloseTo(0.485, 12);
    expect(smaller.crop.x + smaller.crop.w / 2).toBeCloseTo(0.5, 12);

    const larger = run(state, { type: 'SCALE', delta: -10 });
    expect(larger.crop.w).toBeCloseTo(0.6, 12);
  });

  it('SCALE stops growing at the image edge', () => {
    const state = createGeometryState(src, { crop: { x: 0.68, y: 0.4, w: 0.3, h: 0.2 } }, config);
    const next = run(state, { type: 'SCALE', delta: -10 });
    expect(next.crop.x + next.crop.w).toBeCloseTo(1, 9);
    expect(next.crop.w).toBeGreaterThan(0.3);
    expect(next.crop.w).toBeLessThan(0.36);
  });
});
