// @vitest-environment jsdom
import { describe, it, expect, vi } from 'vitest';
import { useRef } from 'react';
import { act, render, renderHook } from '@testing-library/react';
import { CropEditor, MemoryRecordStore } from '@tiltcrop/core';
import { useCropEditor, useCropEditorState, useCropGestures } from '../src/index.js';

const source = { width: 400, height: 300 };

describe('useCropEditorState', () => {
  it('re-renders when the editor changes', () => {
    const editor = new CropEditor({ source });
    const { result } = renderHook(() => useCropEditorState(editor));
    expect(result.current.transform.rotate90).toBe(0);

    act(() => editor.rotate90(1));
    expect(result.current.transform.rotate90).toBe(1);
    expect(result.current).toBe(editor.getState());
  });
});

describe('useCropEditor', () => {
  it('keeps one editor across renders', () => {
    const { result, rerender } = renderHook(() => useCropEditor({ source, aspect: '1:1' }));
    const first = result.current.editor;
    rerender();
    expect(result.current.editor).toBe(first);
    expect(result.current.state.aspect).toBe('1:1');
  });

  it('seeds from the record store', () => {
    const store = new MemoryRecordStore({ p: { cropX: 0.1, cropY: 0.2, cropW: 0.5, cropH: 0.4 } });
    const { result } = renderHook(() => useCropEditor({ source, store, photoId: 'p' }));
    expect(result.current.state.crop).toEqual({ x: 0.1, y: 0.2, w: 0.5, h: 0.4 });
  });
});

describe('useCropGestures', () => {
  it('routes pointer events on the element to the editor', () => {
    const store = new MemoryRecordStore({ p: { cropX: 0.25, cropY: 0.25, cropW: 0.5, cropH: 0.5 } });
    const editor = new CropEditor({ source, store, photoId: 'p' });
    const view = { center: { x: 200, y: 150 }, scale: 1 };

    function Surface() {
      const ref = useRef<HTMLDivElement>(null);
      useCropGestures(ref, editor, () => view);
      return <div ref={ref} data-testid="surface" />;
    }

    const { getByTestId } = render(<Surface />);
    const el = getByTestId('surface');
    el.setPointerCapture = vi.fn();
    el.releasePointerCapture = vi.fn();

    const fire = (type: string, x: number) => {
      const e = new MouseEvent(type, { clientX: x, clientY: 150, button: 0, bubbles: true });
      Object.defineProperty(e, 'pointerId', { value: 1 });
      el.dispatchEvent(e);
    };
    act(() => {
      fire('pointerdown', 200);
      fire('pointermove', 240);
      fire('pointerup', 240);
    });
    expect(editor.getState().crop.x).toBeCloseTo(0.35, 12);
  });
});
