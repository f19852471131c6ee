import type { CropGeometryState, UndoEntry } from './types.js';

/** Frozen copy of the parts of the state that undo restores. */
export function snapshot(state: CropGeometryState): UndoEntry {
  return Object.freeze({
    crop: Object.freeze({ ...state.crop }),
    transform: Object.freeze({ ...state.transform }),
    anchor: Object.freeze({ ...state.anchor }),
    aspect: state.aspect,
    landscape: state.landscape,
  });
}

/** Append an entry, discarding the oldest ones beyond `limit`. */
export function pushUndo(
  stack: readonly UndoEntry[],
  entry: UndoEntry,
  limit: number,
): readonly UndoEntry[] {
  const next = [...stack, entry];
  const cap = Math.max(1, Math.floor(limit));
  return next.length > cap ? next.slice(next.length - cap) : next;
}

/** Split off the newest entry. */
export function popUndo(
  stack: readonly UndoEntry[],
): { entry: UndoEntry | null; rest: readonly UndoEntry[] } {
  const entry = stack[stack.length - 1];
  if (!entry) return { entry: null, rest: stack };
  return { entry, rest: stack.slice(0, -1) };
}
