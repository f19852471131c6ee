import type { CropRect } from '../types.js';
import type { PhotoRecord, PhotoRecordStore } from './types.js';

function emptyRecord(): PhotoRecord {
  return {
    cropX: 0,
    cropY: 0,
    cropW: 1,
    cropH: 1,
    angle: 0,
    rot90: 0,
    perspV: 0,
    perspH: 0,
    shear: 0,
    focalLength35mm: 0,
  };
}

/** Map-backed record store, for tests and hosts without persistence. */
export class MemoryRecordStore implements PhotoRecordStore {
  private records = new Map<string, PhotoRecord>();

  constructor(initial: Record<string, Partial<PhotoRecord>> = {}) {
    for (const [id, record] of Object.entries(initial)) {
      this.records.set(id, { ...emptyRecord(), ...record });
    }
  }

  getRecord(photoId: string): PhotoRecord | null {
    const record = this.records.get(photoId);
    return record ? { ...record } : null;
  }

  setUserCrop(photoId: string, crop: CropRect): void {
    this.update(photoId, { cropX: crop.x, cropY: crop.y, cropW: crop.w, cropH: crop.h });
  }

  setUserRotation(photoId: string, angle: number, rotate90: number): void {
    this.update(photoId, { angle, rot90: rotate90 });
  }

  setUserPerspective(photoId: string, perspV: number, perspH: number, shear: number): void {
    this.update(photoId, { perspV, perspH, shear });
  }

  private update(photoId: string, patch: Partial<PhotoRecord>): void {
    this.records.set(photoId, { ...(this.records.get(photoId) ?? emptyRecord()), ...patch });
  }
}
