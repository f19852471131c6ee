import type {
  CropAspect,
  CropGeometryState,
  EditorConfig,
  Point,
  SourceSize,
  TransformParams,
  UndoEntry,
  ViewMetrics,
} from './types.js';
import { defaultConfig } from './types.js';
import type { CropAction } from './state.js';
import { cropReducer } from './state.js';
import { snapshot } from './history.js';
import { createGeometryState, restoreEntry, transformEquals } from './operations.js';
import type { Projection } from './projection.js';
import { cropOutputSize, cropSourceQuad, cropSourceUV, createProjection } from './projection.js';
import { rectEquals } from './geometry.js';
import type { PhotoRecordStore } from './adapters/types.js';
import { recordToGeometry } from './adapters/record.js';

export interface CropEditorOptions {
  source: SourceSize;
  /** Record store to seed from and write to. Without one, commit and cancel only touch local state. */
  store?: PhotoRecordStore;
  photoId?: string;
  config?: Partial<EditorConfig>;
  aspect?: CropAspect;
}

export type CropEditorListener = (state: CropGeometryState) => void;

/**
 * One crop session: owns the geometry state, applies actions through the
 * reducer and notifies subscribers after every actual change.
 */
export class CropEditor {
  readonly config: EditorConfig;
  #state: CropGeometryState;
  #entry: UndoEntry;
  #listeners = new Set<CropEditorListener>();
  #store: PhotoRecordStore | null;
  #photoId: string | null;

  constructor(options: CropEditorOptions) {
    this.config = { ...defaultConfig(), ...options.config };
    this.#store = options.store ?? null;
    this.#photoId = options.photoId ?? null;

    const record =
      this.#store && this.#photoId !== null ? this.#store.getRecord(this.#photoId) : null;
    const seed = record ? recordToGeometry(record, this.config.defaultFocalLength) : null;
    this.#state = createGeometryState(
      options.source,
      { crop: seed?.crop, transform: seed?.transform, aspect: options.aspect },
      this.config,
    );
    this.#entry = snapshot(this.#state);
  }

  getState(): CropGeometryState {
    return this.#state;
  }

  /** Returns the unsubscribe function. */
  subscribe(listener: CropEditorListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  dispatch(action: CropAction): void {
    this.#setState(cropReducer(this.#state, action, this.config));
  }

  #setState(next: CropGeometryState): void {
    if (next === this.#state) return;
    this.#state = next;
    for (const listener of [...this.#listeners]) listener(next);
  }

  pointerDown(point: Point, view: ViewMetrics, modifier = false): void {
    this.dispatch({ type: 'POINTER_DOWN', point, view, modifier });
  }

  pointerDrag(point: Point, modifier = false): void {
    this.dispatch({ type: 'POINTER_MOVE', point, modifier });
  }

  pointerUp(): void {
    this.dispatch({ type: 'POINTER_UP' });
  }

  get dragging(): boolean {
    return this.#state.drag !== null;
  }

  get aspect(): CropAspect {
    return this.#state.aspect;
  }

  setAspect(aspect: CropAspect): void {
    this.dispatch({ type: 'SET_ASPECT', aspect });
  }

  get landscape(): boolean {
    return this.#state.landscape;
  }

  setLandscape(landscape: boolean): void {
    this.dispatch({ type: 'SET_ORIENTATION', landscape });
  }

  toggleOrientation(): void {
    this.setLandscape(!this.#state.landscape);
  }

  get transform(): TransformParams {
    return this.#state.transform;
  }

  setAngle(angle: number): void {
    this.dispatch({ type: 'SET_ANGLE', angle });
  }

  setPerspective(values: { perspV?: number; perspH?: number; shear?: number }): void {
    this.dispatch({ type: 'SET_PERSPECTIVE', ...values });
  }

  setFocalLength(focalLength: number): void {
    this.dispatch({ type: 'SET_FOCAL_LENGTH', focalLength });
  }

  rotate90(direction: 1 | -1): void {
    this.dispatch({ type: 'ROTATE_90', direction });
  }

  reset(): void {
    this.dispatch({ type: 'RESET' });
  }

  centerize(): void {
    this.dispatch({ type: 'CENTERIZE' });
  }

  scale(delta: number): void {
    this.dispatch({ type: 'SCALE', delta });
  }

  /** Record the current state; call when a slider gesture begins. */
  pushUndo(): void {
    this.dispatch({ type: 'PUSH_UNDO' });
  }

  undo(): void {
    this.dispatch({ type: 'UNDO' });
  }

  get canUndo(): boolean {
    return this.#state.undo.length > 0;
  }

  /** True when crop or transform differ from the values the session started with. */
  hasChanges(): boolean {
    const { crop, transform } = this.#state;
    return !rectEquals(crop, this.#entry.crop) || !transformEquals(transform, this.#entry.transform);
  }

  /** Write the current crop, rotation and perspective to the record store. */
  commit(): void {
    this.#write();
  }

  /** Restore the state captured on entry and write it back to the store. */
  cancel(): void {
    this.#setState({ ...restoreEntry(this.#state, this.#entry), undo: [] });
    this.#write();
  }

  #write(): void {
    if (!this.#store || this.#photoId === null) return;
    const { crop, transform } = this.#state;
    this.#store.setUserCrop(this.#photoId, { ...crop });
    this.#store.setUserRotation(this.#photoId, transform.angle, transform.rotate90);
    this.#store.setUserPerspective(this.#photoId, transform.perspV, transform.perspH, transform.shear);
  }

  /** Pixel size of the cropped output. */
  outputSize(): { width: number; height: number } {
    return cropOutputSize(this.#projection(), this.#state.crop);
  }

  /** Source UV of the crop corners, TL, TR, BR, BL. */
  cropQuad(): Point[] {
    return cropSourceQuad(this.#projection(), this.#state.crop);
  }

  /** Source UV for a position across the crop (0..1 on each axis). */
  sourceUV(tx: number, ty: number): Point {
    return cropSourceUV(this.#projection(), this.#state.crop, tx, ty);
  }

  #projection(): Projection {
    return createProjection(this.#state.source, this.#state.transform);
  }
}
