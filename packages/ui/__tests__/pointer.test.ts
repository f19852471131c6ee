// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CropEditor, MemoryRecordStore } from '@tiltcrop/core';
import type { ViewMetrics } from '@tiltcrop/core';
import { createCropPointerHandler, createCropWheelHandler } from '../src/index.js';

// The crop spans screen x 100..300, y 75..225 with this view.
const view: ViewMetrics = { center: { x: 200, y: 150 }, scale: 1 };

function makeEditor(): CropEditor {
  return new CropEditor({
    source: { width: 400, height: 300 },
    store: new MemoryRecordStore({ p: { cropX: 0.25, cropY: 0.25, cropW: 0.5, cropH: 0.5 } }),
    photoId: 'p',
  });
}

function pointer(type: string, x: number, y: number, pointerId = 1, altKey = false): MouseEvent {
  const e = new MouseEvent(type, { clientX: x, clientY: y, button: 0, altKey, bubbles: true, cancelable: true });
  Object.defineProperty(e, 'pointerId', { value: pointerId });
  return e;
}

describe('createCropPointerHandler', () => {
  let container: HTMLDivElement;
  let editor: CropEditor;
  let disabled: boolean;
  let cleanup: () => void;

  beforeEach(() => {
    container = document.createElement('div');
    container.setPointerCapture = vi.fn();
    container.releasePointerCapture = vi.fn();
    document.body.appendChild(container);
    editor = makeEditor();
    disabled = false;
    cleanup = createCropPointerHandler(container, editor, () => view, () => disabled);
  });

  afterEach(() => {
    cleanup();
    container.remove();
  });

  it('moves the crop with a captured drag', () => {
    container.dispatchEvent(pointer('pointerdown', 200, 150));
    expect(container.setPointerCapture).toHaveBeenCalledWith(1);
    expect(container.classList.contains('grabbing')).toBe(true);

    container.dispatchEvent(pointer('pointermove', 240, 150));
    container.dispatchEvent(pointer('pointerup', 240, 150));

    expect(editor.getState().crop.x).toBeCloseTo(0.35, 12);
    expect(editor.dragging).toBe(false);
    expect(container.releasePointerCapture).toHaveBeenCalledWith(1);
    expect(container.classList.contains('grabbing')).toBe(false);
  });

  it('ignores other pointers during a drag', () => {
    container.dispatchEvent(pointer('pointerdown', 200, 150, 1));
    container.dispatchEvent(pointer('pointermove', 300, 150, 2));
    expect(editor.getState().crop.x).toBe(0.25);
  });

  it('does not capture when nothing is hit', () => {
    container.dispatchEvent(pointer('pointerdown', -100, 150));
    expect(container.setPointerCapture).not.toHaveBeenCalled();
    expect(editor.dragging).toBe(false);
  });

  it('does nothing while disabled', () => {
    disabled = true;
    container.dispatchEvent(pointer('pointerdown', 200, 150));
    expect(editor.dragging).toBe(false);
  });

  it('shows the handle cursor on hover', () => {
    container.dispatchEvent(pointer('pointermove', 100, 75));
    expect(container.style.cursor).toBe('nwse-resize');
    container.dispatchEvent(pointer('pointermove', 200, 150, 1, true));
    expect(container.style.cursor).toBe('all-scroll');
  });

  it('ends an active drag on cleanup', () => {
    container.dispatchEvent(pointer('pointerdown', 200, 150));
    cleanup();
    expect(editor.dragging).toBe(false);
  });
});

describe('createCropWheelHandler', () => {
  it('scales the crop when the wheel turns over it', () => {
    const container = document.createElement('div');
    const editor = makeEditor();
    const cleanup = createCropWheelHandler(container, editor, () => view, () => false);

    container.dispatchEvent(new WheelEvent('wheel', { deltaY: 100, clientX: 200, clientY: 150, cancelable: true }));
    expect(editor.getState().crop.w).toBeCloseTo(0.485, 12);

    container.dispatchEvent(new WheelEvent('wheel', { deltaY: 100, clientX: 20, clientY: 20, cancelable: true }));
    expect(editor.getState().crop.w).toBeCloseTo(0.485, 12);
    cleanup();
  });
});
