import { useCallback, useEffect, useRef, useState, useSyncExternalStore, type RefObject } from 'react';
import { CropEditor } from '@tiltcrop/core';
import type { CropEditorOptions, CropGeometryState, ViewMetrics } from '@tiltcrop/core';
import { createCropPointerHandler, createCropWheelHandler } from '@tiltcrop/ui';

/** Subscribe a component to an editor's state. */
export function useCropEditorState(editor: CropEditor): CropGeometryState {
  const subscribe = useCallback((onChange: () => void) => editor.subscribe(onChange), [editor]);
  const getSnapshot = useCallback(() => editor.getState(), [editor]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}

export interface UseCropEditorReturn {
  editor: CropEditor;
  state: CropGeometryState;
}

/**
 * One editor per component instance. Options are read on first render only;
 * remount (or change `key`) to start a session for another photo.
 */
export function useCropEditor(options: CropEditorOptions): UseCropEditorReturn {
  const [editor] = useState(() => new CropEditor(options));
  const state = useCropEditorState(editor);
  return { editor, state };
}

/**
 * Attach pointer and wheel handling to an element for the lifetime of the
 * component. `getView` and `disabled` are read on every event.
 */
export function useCropGestures(
  ref: RefObject<HTMLElement>,
  editor: CropEditor,
  getView: () => ViewMetrics,
  disabled = false,
): void {
  const viewRef = useRef(getView);
  viewRef.current = getView;
  const disabledRef = useRef(disabled);
  disabledRef.current = disabled;

  useEffect(() => {
    const el = ref.current;
    if (!el) return;
    const view = () => viewRef.current();
    const isDisabled = () => disabledRef.current;
    const cleanupPointer = createCropPointerHandler(el, editor, view, isDisabled);
    const cleanupWheel = createCropWheelHandler(el, editor, view, isDisabled);
    return () => {
      cleanupPointer();
      cleanupWheel();
    };
  }, [ref, editor]);
}
