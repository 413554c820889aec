/**
 * Action creator functions for the manuscript editor.
 * Provides type-safe factory functions for creating document actions.
 */

import type { TextOffset } from '../../types/branded.ts';
import type {
  DocumentAction,
  LoadAction,
  InsertAction,
  ReplaceAction,
  DeleteAction,
  DeleteBackwardAction,
  DeleteForwardAction,
  SetSelectionAction,
  SelectAllAction,
  ClearSelectionAction,
  MoveVisualAction,
  MoveToStartAction,
  MoveToEndAction,
  ClickAction,
  UndoAction,
  RedoAction,
  MarkSavedAction,
  MarkModifiedAction,
  SetReadOnlyAction,
  SetGridAction,
  SetCellSizeAction,
  SetViewportAction,
  ScrollToAction,
  SetPreeditAction,
  ComposeAction,
} from '../../types/actions.ts';
import { isDocumentAction, validateAction } from '../../types/actions.ts';

/**
 * Action creators for document mutations.
 * All functions return serializable action objects.
 */
export const DocumentActions = {
  /**
   * Replace the whole buffer (open a file).
   */
  load(text: string): LoadAction {
    return Object.freeze({ type: 'LOAD', text });
  },

  /**
   * Insert text at the cursor, replacing the selection.
   */
  insert(text: string): InsertAction {
    return Object.freeze({ type: 'INSERT', text });
  },

  /**
   * Create a replace action.
   * @param start - Start of the range (inclusive, scalar offset)
   * @param end - End of the range (exclusive, scalar offset)
   */
  replace(start: TextOffset, end: TextOffset, text: string): ReplaceAction {
    return Object.freeze({ type: 'REPLACE', start, end, text });
  },

  delete(start: TextOffset, end: TextOffset): DeleteAction {
    return Object.freeze({ type: 'DELETE', start, end });
  },

  deleteBackward(): DeleteBackwardAction {
    return Object.freeze({ type: 'DELETE_BACKWARD' });
  },

  deleteForward(): DeleteForwardAction {
    return Object.freeze({ type: 'DELETE_FORWARD' });
  },

  /**
   * Create a set selection action.
   * @param cursor - Caret offset
   * @param anchor - Fixed end (defaults to the cursor)
   */
  setSelection(cursor: TextOffset, anchor: TextOffset = cursor): SetSelectionAction {
    return Object.freeze({ type: 'SET_SELECTION', cursor, anchor });
  },

  selectAll(): SelectAllAction {
    return Object.freeze({ type: 'SELECT_ALL' });
  },

  clearSelection(): ClearSelectionAction {
    return Object.freeze({ type: 'CLEAR_SELECTION' });
  },

  /**
   * Move the cursor by a grid delta.
   * @param deltaCol - Columns to advance (+1 is the next column, leftward)
   * @param deltaRow - Rows to advance (+1 is down)
   * @param extend - Keep the anchor in place
   */
  moveVisual(deltaCol: number, deltaRow: number, extend = false): MoveVisualAction {
    return Object.freeze({ type: 'MOVE_VISUAL', deltaCol, deltaRow, extend });
  },

  moveToStart(extend = false): MoveToStartAction {
    return Object.freeze({ type: 'MOVE_TO_START', extend });
  },

  moveToEnd(extend = false): MoveToEndAction {
    return Object.freeze({ type: 'MOVE_TO_END', extend });
  },

  /**
   * Place the cursor at a viewport point.
   */
  click(x: number, y: number, extend = false): ClickAction {
    return Object.freeze({ type: 'CLICK', x, y, extend });
  },

  undo(): UndoAction {
    return Object.freeze({ type: 'UNDO' });
  },

  redo(): RedoAction {
    return Object.freeze({ type: 'REDO' });
  },

  /**
   * Record the current text as saved.
   * @param timestamp - Save time (defaults to Date.now() in the reducer)
   */
  markSaved(timestamp?: number): MarkSavedAction {
    return timestamp === undefined
      ? Object.freeze({ type: 'MARK_SAVED' })
      : Object.freeze({ type: 'MARK_SAVED', timestamp });
  },

  markModified(): MarkModifiedAction {
    return Object.freeze({ type: 'MARK_MODIFIED' });
  },

  setReadOnly(readOnly: boolean): SetReadOnlyAction {
    return Object.freeze({ type: 'SET_READ_ONLY', readOnly });
  },

  setGrid(rows: number, cols: number): SetGridAction {
    return Object.freeze({ type: 'SET_GRID', rows, cols });
  },

  setCellSize(cellSize: number): SetCellSizeAction {
    return Object.freeze({ type: 'SET_CELL_SIZE', cellSize });
  },

  setViewport(width: number, height: number): SetViewportAction {
    return Object.freeze({ type: 'SET_VIEWPORT', width, height });
  },

  scrollTo(scrollX: number, scrollY: number): ScrollToAction {
    return Object.freeze({ type: 'SCROLL_TO', scrollX, scrollY });
  },

  setPreedit(text: string): SetPreeditAction {
    return Object.freeze({ type: 'SET_PREEDIT', text });
  },

  /**
   * An input method update.
   * @param preedit - Uncommitted text to show at the cursor
   * @param commit - Text to insert (may be empty)
   */
  compose(preedit: string, commit = ''): ComposeAction {
    return Object.freeze({ type: 'COMPOSE', preedit, commit });
  },
};

/**
 * Serialize an action to JSON string.
 * Useful for debugging and time-travel.
 */
export function serializeAction(action: DocumentAction): string {
  return JSON.stringify(action);
}

/**
 * Deserialize an action from JSON string.
 * Useful for replaying actions from logs.
 * @throws Error when the JSON is not a well-formed action
 */
export function deserializeAction(json: string): DocumentAction {
  const parsed: unknown = JSON.parse(json);
  if (!isDocumentAction(parsed)) {
    const { errors } = validateAction(parsed);
    throw new Error(`Invalid deserialized action: ${json} (${errors.join('; ')})`);
  }
  return Object.freeze(parsed);
}
