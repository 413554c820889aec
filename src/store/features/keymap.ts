/**
 * Keyboard mapping for the manuscript view.
 * Translates host key events into document actions. Clipboard shortcuts
 * are left to the host, which owns the clipboard.
 */

import type { DocumentAction } from '../../types/actions.ts';
import { DocumentActions } from './actions.ts';

/**
 * A key event as reported by the host toolkit.
 */
export interface KeyInput {
  /** Key name in the DOM `KeyboardEvent.key` vocabulary */
  readonly key: string;
  /** Text the key produces, if any */
  readonly text?: string;
  readonly shift?: boolean;
  readonly ctrl?: boolean;
  readonly alt?: boolean;
  readonly meta?: boolean;
}

/** Ideographic space, inserted for Tab */
export const IDEOGRAPHIC_SPACE = '　';

const CLIPBOARD_KEYS: ReadonlySet<string> = new Set(['c', 'x', 'v']);

/**
 * Visual deltas per arrow key. Columns advance right to left.
 */
const ARROW_DELTAS: ReadonlyMap<string, readonly [number, number]> = new Map<string, readonly [number, number]>([
  ['ArrowLeft', [1, 0]],
  ['ArrowRight', [-1, 0]],
  ['ArrowUp', [0, -1]],
  ['ArrowDown', [0, 1]],
]);

/**
 * Resolve a key event to an action, or null when the editor does not handle it.
 */
export function resolveKeyCommand(input: KeyInput): DocumentAction | null {
  const shift = input.shift ?? false;
  const ctrl = input.ctrl ?? false;

  if (ctrl) {
    switch (input.key.toLowerCase()) {
      case 'z':
        return shift ? null : DocumentActions.undo();
      case 'y':
        return DocumentActions.redo();
      case 'a':
        return DocumentActions.selectAll();
      default:
        break;
    }
    if (CLIPBOARD_KEYS.has(input.key.toLowerCase())) return null;
  }

  const delta = ARROW_DELTAS.get(input.key);
  if (delta !== undefined) {
    return DocumentActions.moveVisual(delta[0], delta[1], shift);
  }

  switch (input.key) {
    case 'Home':
      return DocumentActions.moveToStart(shift);
    case 'End':
      return DocumentActions.moveToEnd(shift);
    case 'Enter':
      return DocumentActions.insert('\n');
    case 'Backspace':
      return DocumentActions.deleteBackward();
    case 'Delete':
      return DocumentActions.deleteForward();
    case 'Tab':
      return DocumentActions.insert(IDEOGRAPHIC_SPACE);
    default:
      break;
  }

  const text = input.text ?? '';
  if (text.length > 0 && !ctrl && !(input.alt ?? false) && !(input.meta ?? false)) {
    return DocumentActions.insert(text);
  }

  return null;
}
