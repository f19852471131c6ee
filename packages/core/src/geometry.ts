import type { CropRect, Point } from './types.js';

/** Clamp a value between min and max. */
export function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Component-wise interpolation; corners move linearly in t. */
export function lerpRect(a: CropRect, b: CropRect, t: number): CropRect {
  if (t >= 1) return { ...b };
  if (t <= 0) return { ...a };
  return {
    x: lerp(a.x, b.x, t),
    y: lerp(a.y, b.y, t),
    w: lerp(a.w, b.w, t),
    h: lerp(a.h, b.h, t),
  };
}

/** Corners in TL, TR, BR, BL order. */
export function rectCorners(r: CropRect): Point[] {
  return [
    { x: r.x, y: r.y },
    { x: r.x + r.w, y: r.y },
    { x: r.x + r.w, y: r.y + r.h },
    { x: r.x, y: r.y + r.h },
  ];
}

export function rectCenter(r: CropRect): Point {
  return { x: r.x + r.w / 2, y: r.y + r.h / 2 };
}

export function centeredRect(center: Point, w: number, h: number): CropRect {
  return { x: center.x - w / 2, y: center.y - h / 2, w, h };
}

export function rectEquals(a: CropRect, b: CropRect): boolean {
  return a.x === b.x && a.y === b.y && a.w === b.w && a.h === b.h;
}

/** Wrap an angle into [-π, π]. */
export function wrapAngle(a: number): number {
  const tau = Math.PI * 2;
  let r = a % tau;
  if (r > Math.PI) r -= tau;
  if (r < -Math.PI) r += tau;
  return r;
}

export function dot(a: Point, b: Point): number {
  return a.x * b.x + a.y * b.y;
}

export function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function toDegrees(rad: number): number {
  return (rad * 180) / Math.PI;
}
