import type { BoundingBox, CropAspect, CropRect, Point, SourceSize } from './types.js';

export const CROP_ASPECTS: readonly CropAspect[] = [
  'original', '16:9', '4:3', '3:2', '1:1', '5:4', 'free',
];

const ASPECT_LABELS: Record<CropAspect, string> = {
  original: 'Original',
  '16:9': '16:9',
  '4:3': '4:3',
  '3:2': '3:2',
  '1:1': '1:1',
  '5:4': '5:4',
  free: 'Free',
};

const PRESET_RATIOS: Record<Exclude<CropAspect, 'original' | 'free'>, number> = {
  '16:9': 16 / 9,
  '4:3': 4 / 3,
  '3:2': 3 / 2,
  '1:1': 1,
  '5:4': 5 / 4,
};

export function aspectLabel(aspect: CropAspect): string {
  return ASPECT_LABELS[aspect];
}

/** Parse a preset name or label ("16:9", "Original", "free"). Returns null if unknown. */
export function parseAspect(value: string): CropAspect | null {
  const v = value.trim().toLowerCase();
  return CROP_ASPECTS.find((a) => a === v || ASPECT_LABELS[a].toLowerCase() === v) ?? null;
}

/** Long-over-short ratio of a preset (≥ 1), or null for free. */
export function aspectBaseRatio(aspect: CropAspect, src: SourceSize): number | null {
  if (aspect === 'free') return null;
  if (aspect === 'original') {
    const long = Math.max(src.width, src.height);
    const short = Math.max(Math.min(src.width, src.height), 1);
    return long / short;
  }
  return PRESET_RATIOS[aspect];
}

/** Target width/height in pixels for the given orientation, or null for free. */
export function aspectPixelRatio(
  aspect: CropAspect,
  src: SourceSize,
  landscape: boolean,
): number | null {
  const r = aspectBaseRatio(aspect, src);
  if (r === null) return null;
  return landscape ? r : 1 / r;
}

/** Target w/h in BB-normalized units, or null for free. */
export function normalizedRatio(
  aspect: CropAspect,
  src: SourceSize,
  landscape: boolean,
  bb: BoundingBox,
): number | null {
  const r = aspectPixelRatio(aspect, src, landscape);
  if (r === null) return null;
  return (r * bb.height) / bb.width;
}

/** True when the preset can flip between landscape and portrait. */
export function canFlipOrientation(aspect: CropAspect, src: SourceSize): boolean {
  const r = aspectBaseRatio(aspect, src);
  return r !== null && r !== 1;
}

/**
 * Largest rect of the given normalized ratio that fits the unit box, scaled
 * down so its larger side does not exceed the current rect's larger side,
 * centred on the current rect.
 */
export function fitAspect(crop: CropRect, ratio: number): CropRect {
  let maxW: number;
  let maxH: number;
  if (ratio >= 1) {
    maxW = 1;
    maxH = 1 / ratio;
  } else {
    maxW = ratio;
    maxH = 1;
  }

  const currentMax = Math.max(crop.w, crop.h);
  const newMax = Math.max(maxW, maxH);
  if (newMax > currentMax) {
    const s = currentMax / newMax;
    maxW *= s;
    maxH *= s;
  }

  const cx = crop.x + crop.w / 2;
  const cy = crop.y + crop.h / 2;
  return {
    x: Math.max(0, Math.min(1 - maxW, cx - maxW / 2)),
    y: Math.max(0, Math.min(1 - maxH, cy - maxH / 2)),
    w: maxW,
    h: maxH,
  };
}

/**
 * Restore a locked ratio by shrinking the dimension that is too large,
 * keeping `pivot` (a point inside the rect) at the same relative position.
 * Shrinking keeps the result inside the original rect.
 */
export function enforceAspect(rect: CropRect, ratio: number, pivot: Point): CropRect {
  const current = rect.w / rect.h;
  if (Math.abs(current - ratio) <= 1e-12 * ratio) return rect;

  let w = rect.w;
  let h = rect.h;
  if (current > ratio) {
    w = h * ratio;
  } else {
    h = w / ratio;
  }
  const fx = rect.w > 0 ? (pivot.x - rect.x) / rect.w : 0.5;
  const fy = rect.h > 0 ? (pivot.y - rect.y) / rect.h : 0.5;
  return { x: pivot.x - fx * w, y: pivot.y - fy * h, w, h };
}
