import type { CropEditor, Point, ViewMetrics } from '@tiltcrop/core';
import { cropToScreenRect, cursorForMode, hitTest } from '@tiltcrop/core';

/** Supplies the current display mapping; called on every pointer-down. */
export type ViewProvider = () => ViewMetrics;

function localPoint(container: HTMLElement, e: MouseEvent): Point {
  const rect = container.getBoundingClientRect();
  return { x: e.clientX - rect.left, y: e.clientY - rect.top };
}

/**
 * Drive crop drags from a single pointer with pointer capture.
 * Alt/Option is the modifier (perspective drag, scale from centre).
 * While idle, the container cursor follows the handle under the pointer.
 * Returns a cleanup function.
 */
export function createCropPointerHandler(
  container: HTMLElement,
  editor: CropEditor,
  getView: ViewProvider,
  isDisabled: () => boolean,
): () => void {
  let pointerId: number | null = null;

  function onPointerDown(e: PointerEvent) {
    if (isDisabled()) return;
    if (pointerId !== null) return; // already tracking
    if (e.button !== 0) return; // left button only

    editor.pointerDown(localPoint(container, e), getView(), e.altKey);
    if (!editor.dragging) return;

    pointerId = e.pointerId;
    container.setPointerCapture(e.pointerId);
    container.classList.add('grabbing');
    container.addEventListener('pointerup', onPointerUp);
    container.addEventListener('pointercancel', onPointerUp);
    e.preventDefault();
  }

  function onPointerMove(e: PointerEvent) {
    if (pointerId === null) {
      if (isDisabled()) return;
      const mode = hitTest(editor.getState(), localPoint(container, e), getView(), e.altKey, editor.config);
      container.style.cursor = cursorForMode(mode);
      return;
    }
    if (e.pointerId !== pointerId) return;
    editor.pointerDrag(localPoint(container, e), e.altKey);
  }

  function onPointerUp(e: PointerEvent) {
    if (e.pointerId !== pointerId) return;
    container.releasePointerCapture(e.pointerId);
    container.classList.remove('grabbing');
    container.removeEventListener('pointerup', onPointerUp);
    container.removeEventListener('pointercancel', onPointerUp);
    pointerId = null;
    editor.pointerUp();
  }

  container.addEventListener('pointerdown', onPointerDown);
  container.addEventListener('pointermove', onPointerMove);

  return () => {
    container.removeEventListener('pointerdown', onPointerDown);
    container.removeEventListener('pointermove', onPointerMove);
    container.removeEventListener('pointerup', onPointerUp);
    container.removeEventListener('pointercancel', onPointerUp);
    if (pointerId !== null) {
      container.classList.remove('grabbing');
      pointerId = null;
      editor.pointerUp();
    }
  };
}

/**
 * Scroll-wheel scaling of the crop while the pointer is over it.
 * One notch (deltaY 100) is one scale step; scrolling down shrinks.
 * Returns a cleanup function.
 */
export function createCropWheelHandler(
  container: HTMLElement,
  editor: CropEditor,
  getView: ViewProvider,
  isDisabled: () => boolean,
): () => void {
  function onWheel(e: WheelEvent) {
    if (isDisabled() || editor.dragging) return;
    const p = localPoint(container, e);
    const { crop, anchor, bb } = editor.getState();
    const r = cropToScreenRect(crop, anchor, bb, getView());
    if (p.x < r.x || p.x > r.x + r.w || p.y < r.y || p.y > r.y + r.h) return;

    e.preventDefault();
    editor.scale(e.deltaY / 100);
  }

  container.addEventListener('wheel', onWheel, { passive: false });

  return () => {
    container.removeEventListener('wheel', onWheel);
  };
}
