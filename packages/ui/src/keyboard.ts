import type { CropEditor } from '@tiltcrop/core';

/** Result of keyboard input processing. */
export type CropKeyboardAction =
  | { type: 'undo' }
  | { type: 'commit' }
  | { type: 'cancel' }
  | { type: 'rotate90'; direction: 1 | -1 }
  | { type: 'toggleOrientation' }
  | { type: 'reset' };

/**
 * Process keyboard input for crop mode.
 * Returns a CropKeyboardAction or null if the key wasn't handled.
 *
 * - Cmd/Ctrl+Z : undo
 * - Enter : done
 * - Escape : cancel
 * - [ / ] : rotate 90° counter-clockwise / clockwise
 * - X : swap landscape and portrait
 * - R : reset
 */
export function handleCropKeyboard(e: KeyboardEvent): CropKeyboardAction | null {
  const command = e.metaKey || e.ctrlKey;

  if (command) {
    if (!e.shiftKey && !e.altKey && (e.key === 'z' || e.key === 'Z')) return { type: 'undo' };
    return null;
  }

  switch (e.key) {
    case 'Enter':
      return { type: 'commit' };
    case 'Escape':
      return { type: 'cancel' };
    case '[':
      return { type: 'rotate90', direction: -1 };
    case ']':
      return { type: 'rotate90', direction: 1 };
    case 'x':
    case 'X':
      return { type: 'toggleOrientation' };
    case 'r':
    case 'R':
      return { type: 'reset' };
    default:
      return null;
  }
}

export function applyCropKeyboardAction(editor: CropEditor, action: CropKeyboardAction): void {
  switch (action.type) {
    case 'undo':
      editor.undo();
      break;
    case 'commit':
      editor.commit();
      break;
    case 'cancel':
      editor.cancel();
      break;
    case 'rotate90':
      editor.rotate90(action.direction);
      break;
    case 'toggleOrientation':
      editor.toggleOrientation();
      break;
    case 'reset':
      editor.reset();
      break;
  }
}
