import type { Point, SourceSize, TransformParams } from './types.js';
import {
  DEFAULT_FOCAL_LENGTH,
  MAX_FINE_ANGLE,
  MAX_SHEAR,
  MAX_TILT_DEGREES,
} from './types.js';
import { clamp, toRadians } from './geometry.js';

/** Long edge of the 35mm frame, in mm. Focal lengths are expressed against it. */
export const FULL_FRAME_LONG_EDGE_MM = 36;

/** Smallest projective weight any image corner may reach. Keeps the image in front of the horizon. */
const MIN_KEYSTONE_WEIGHT = 0.25;

/** Bidirectional map between source UV and warped UV (both 0..1 on the source frame). */
export interface Warp {
  readonly identity: boolean;
  forward(u: number, v: number): Point;
  inverse(u: number, v: number): Point;
}

const IDENTITY_WARP: Warp = {
  identity: true,
  forward: (u, v) => ({ x: u, y: v }),
  inverse: (u, v) => ({ x: u, y: v }),
};

export function hasPerspective(t: TransformParams): boolean {
  return t.perspV !== 0 || t.perspH !== 0 || t.shear !== 0;
}

export function totalRotation(t: TransformParams): number {
  return t.rotate90 * (Math.PI / 2) + t.angle;
}

const COS_90 = [1, 0, -1, 0];
const SIN_90 = [0, 1, 0, -1];

/**
 * cos/sin of the total rotation. The quarter-turn part comes from a table so
 * 90° steps stay exact.
 */
export function rotationTrig(t: TransformParams): { cos: number; sin: number } {
  const q = ((t.rotate90 % 4) + 4) % 4;
  const c = Math.cos(t.angle);
  const s = Math.sin(t.angle);
  const c90 = COS_90[q] ?? 1;
  const s90 = SIN_90[q] ?? 0;
  if (t.angle === 0) return { cos: c90, sin: s90 };
  return { cos: c90 * c - s90 * s, sin: s90 * c + c90 * s };
}

/** Distance from the optical axis to the image plane, in 35mm long edges. */
export function focalDistance(focalLength: number): number {
  const f = focalLength > 0 && isFinite(focalLength) ? focalLength : DEFAULT_FOCAL_LENGTH;
  return f / FULL_FRAME_LONG_EDGE_MM;
}

function finiteOr(v: number, fallback: number): number {
  return isFinite(v) ? v : fallback;
}

/** Clamp every parameter into its legal range. */
export function clampTransform(
  t: TransformParams,
  defaultFocalLength: number = DEFAULT_FOCAL_LENGTH,
): TransformParams {
  const rot = Math.round(finiteOr(t.rotate90, 0));
  return {
    angle: clamp(finiteOr(t.angle, 0), -MAX_FINE_ANGLE, MAX_FINE_ANGLE),
    rotate90: ((rot % 4) + 4) % 4,
    perspV: clamp(finiteOr(t.perspV, 0), -MAX_TILT_DEGREES, MAX_TILT_DEGREES),
    perspH: clamp(finiteOr(t.perspH, 0), -MAX_TILT_DEGREES, MAX_TILT_DEGREES),
    shear: clamp(finiteOr(t.shear, 0), -MAX_SHEAR, MAX_SHEAR),
    focalLength: t.focalLength > 0 && isFinite(t.focalLength) ? t.focalLength : defaultFocalLength,
  };
}

/**
 * Keystone coefficients for the projective part of the warp.
 *
 * Coordinates are centred on the image and normalized by its long edge, so a
 * tilt of `a` degrees at focal distance `d` moves the projective weight by
 * `tan(a) / d` per unit of distance from the optical axis.
 */
export function keystoneCoefficients(
  t: TransformParams,
  src: SourceSize,
): { kv: number; kh: number } {
  const long = Math.max(src.width, src.height, 1);
  const ax = src.width / long;
  const ay = src.height / long;
  const d = focalDistance(t.focalLength);
  let kv = Math.tan(toRadians(t.perspV)) / d;
  let kh = Math.tan(toRadians(t.perspH)) / d;

  // Sheared u spans [-|shear|/2, 1 + |shear|/2].
  const worst = Math.abs(kv) * (ay / 2) + Math.abs(kh) * (ax / 2) * (1 + Math.abs(t.shear));
  const limit = 1 - MIN_KEYSTONE_WEIGHT;
  if (worst > limit) {
    const s = limit / worst;
    kv *= s;
    kh *= s;
  }
  return { kv, kh };
}

/**
 * Build the shear + keystone warp for a transform and source size.
 *
 * forward: u₂ = u + shear·(v − ½); X, Y centred; w = 1 + kv·Y + kh·X; (X/w, Y/w).
 * inverse: w = 1 / (1 − kv·Y′ − kh·X′); undo the shear.
 */
export function createWarp(t: TransformParams, src: SourceSize): Warp {
  if (!hasPerspective(t)) return IDENTITY_WARP;

  const long = Math.max(src.width, src.height, 1);
  const ax = src.width / long;
  const ay = src.height / long;
  const { kv, kh } = keystoneCoefficients(t, src);
  const shear = t.shear;

  return {
    identity: false,
    forward(u, v) {
      const u2 = u + shear * (v - 0.5);
      const X = (u2 - 0.5) * ax;
      const Y = (v - 0.5) * ay;
      const w = 1 + kv * Y + kh * X;
      return { x: X / w / ax + 0.5, y: Y / w / ay + 0.5 };
    },
    inverse(u, v) {
      const Xp = (u - 0.5) * ax;
      const Yp = (v - 0.5) * ay;
      // Beyond the horizon there is no preimage; pin to the far side.
      const den = Math.max(1 - kv * Yp - kh * Xp, 1e-9);
      const X = Xp / den;
      const Y = Yp / den;
      const sv = Y / ay + 0.5;
      const u2 = X / ax + 0.5;
      return { x: u2 - shear * (sv - 0.5), y: sv };
    },
  };
}
