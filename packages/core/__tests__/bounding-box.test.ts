import { describe, it, expect } from 'vitest';
import {
  computeBB,
  defaultTransform,
  rescaleCropForBBChange,
  rescalePointForBBChange,
} from '../src/index.js';
import type { BoundingBox, TransformParams } from '../src/index.js';

const src = { width: 400, height: 300 };

function transform(patch: Partial<TransformParams>): TransformParams {
  return { ...defaultTransform(), ...patch };
}

describe('computeBB', () => {
  it('equals the source size without rotation', () => {
    expect(computeBB(src, defaultTransform())).toEqual({ width: 400, height: 300, cx: 0, cy: 0 });
  });

  it('follows the rotated-rectangle formula', () => {
    const angle = Math.PI / 8;
    const bb = computeBB(src, transform({ angle }));
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    expect(bb.width).toBeCloseTo(c * 400 + s * 300, 9);
    expect(bb.height).toBeCloseTo(s * 400 + c * 300, 9);
  });

  it('swaps width and height exactly on a quarter turn', () => {
    expect(computeBB(src, transform({ rotate90: 1 }))).toEqual({ width: 300, height: 400, cx: 0, cy: 0 });
    const a = computeBB(src, transform({ angle: 0.2 }));
    const b = computeBB(src, transform({ angle: 0.2, rotate90: 1 }));
    expect(b.width).toBe(a.height);
    expect(b.height).toBe(a.width);
  });

  it('measures the warped outline with perspective', () => {
    const bb = computeBB(src, transform({ perspV: 20 }));
    // The top edge widens, so the box gets wider and its centre moves up.
    expect(bb.width).toBeGreaterThan(400);
    expect(bb.cx).toBeCloseTo(0, 9);
    expect(bb.cy).toBeLessThan(0);
  });
});

describe('rescaleCropForBBChange', () => {
  const square: BoundingBox = { width: 100, height: 100, cx: 0, cy: 0 };

  it('keeps the pixel footprint of a centred rect', () => {
    const r = rescaleCropForBBChange(
      { x: 0.25, y: 0.25, w: 0.5, h: 0.5 },
      square,
      { width: 200, height: 50, cx: 0, cy: 0 },
    );
    expect(r).toEqual({ x: 0.375, y: 0, w: 0.25, h: 1 });
  });

  it('scales the offset from the box centre', () => {
    const r = rescaleCropForBBChange(
      { x: 0.7, y: 0.45, w: 0.1, h: 0.1 },
      square,
      { width: 200, height: 100, cx: 0, cy: 0 },
    );
    expect(r.x + r.w / 2).toBeCloseTo(0.625, 12);
    expect(r.w).toBeCloseTo(0.05, 12);
  });

  it('accounts for a shifted box centre', () => {
    const p = rescalePointForBBChange({ x: 0.5, y: 0.5 }, { ...square, cx: 10 }, square);
    expect(p.x).toBeCloseTo(0.6, 12);
    expect(p.y).toBe(0.5);
  });
});
