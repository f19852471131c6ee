import type { CropRect, TransformParams } from '../types.js';

/** Persisted crop fields of one photo. The crop is BB-normalized; tilt is in degrees. */
export interface PhotoRecord {
  cropX: number;
  cropY: number;
  cropW: number;
  cropH: number;
  /** Fine rotation, radians. */
  angle: number;
  rot90: number;
  perspV: number;
  perspH: number;
  shear: number;
  /** 35mm-equivalent focal length; 0 when unknown. */
  focalLength35mm: number;
}

/** Host-side photo storage the editor reads on entry and writes on commit or cancel. */
export interface PhotoRecordStore {
  /** Returns null if the photo is unknown. */
  getRecord(photoId: string): PhotoRecord | null;
  setUserCrop(photoId: string, crop: CropRect): void;
  setUserRotation(photoId: string, angle: number, rotate90: number): void;
  setUserPerspective(photoId: string, perspV: number, perspH: number, shear: number): void;
}

/** Geometry seed extracted from a record. */
export interface RecordGeometry {
  crop: CropRect;
  transform: TransformParams;
}
