import type { CropRect, TransformParams } from '../types.js';
import { DEFAULT_FOCAL_LENGTH, FULL_CROP } from '../types.js';
import { clampTransform } from '../warp.js';
import type { PhotoRecord, RecordGeometry } from './types.js';

function finite(v: unknown): v is number {
  return typeof v === 'number' && isFinite(v);
}

/**
 * Read crop and transform from a stored record. A crop with a non-finite or
 * non-positive field falls back to the full frame; transform fields fall
 * back one by one.
 */
export function recordToGeometry(
  record: PhotoRecord,
  defaultFocalLength: number = DEFAULT_FOCAL_LENGTH,
): RecordGeometry {
  const { cropX, cropY, cropW, cropH } = record;
  const validCrop =
    finite(cropX) && finite(cropY) && finite(cropW) && finite(cropH) && cropW > 0 && cropH > 0;
  const crop: CropRect = validCrop
    ? { x: cropX, y: cropY, w: cropW, h: cropH }
    : { ...FULL_CROP };

  const transform: TransformParams = clampTransform(
    {
      angle: finite(record.angle) ? record.angle : 0,
      rotate90: finite(record.rot90) ? record.rot90 : 0,
      perspV: finite(record.perspV) ? record.perspV : 0,
      perspH: finite(record.perspH) ? record.perspH : 0,
      shear: finite(record.shear) ? record.shear : 0,
      focalLength: finite(record.focalLength35mm) ? record.focalLength35mm : 0,
    },
    defaultFocalLength,
  );
  return { crop, transform };
}

export function geometryToRecord(crop: CropRect, transform: TransformParams): PhotoRecord {
  return {
    cropX: crop.x,
    cropY: crop.y,
    cropW: crop.w,
    cropH: crop.h,
    angle: transform.angle,
    rot90: transform.rotate90,
    perspV: transform.perspV,
    perspH: transform.perspH,
    shear: transform.shear,
    focalLength35mm: transform.focalLength,
  };
}
