/**
 * Document reducer for the manuscript editor.
 * Pure reducer function for document state transitions.
 * No side effects - produces new state from old state + action.
 */

import type {
  DocumentMetadata,
  DocumentState,
  HistoryState,
  SelectionState,
  ViewportState,
} from '../../types/state.ts';
import type { DocumentAction } from '../../types/actions.ts';
import type { TextOffset } from '../../types/branded.ts';
import { isTextEditAction } from '../../types/actions.ts';
import {
  textOffset,
  clampTextOffset,
  minTextOffset,
  maxTextOffset,
  ZERO_TEXT_OFFSET,
} from '../../types/branded.ts';
import { withState, withText, withGrid, clampCellSize } from '../core/state.ts';
import { normalizeNewlines, scalarLength, scalarToCodeUnitOffset } from '../core/scalars.ts';
import {
  createHistoryState,
  createSnapshot,
  currentSnapshot,
  pushSnapshot,
  stepBack,
  stepForward,
} from '../core/history.ts';
import {
  createSelection,
  moveCursorTo,
  moveVisual,
  nearestOffset,
  selectAll,
  clearSelection,
  clampSelection,
  selectedRange,
  hasSelection,
  selectionsEqual,
} from './cursor.ts';
import { clampScroll, ensureCursorVisible, pointToGrid } from './geometry.ts';

// =============================================================================
// Position Validation
// =============================================================================

/**
 * Validate and clamp a range to the buffer.
 * If start > end, marks as invalid (caller should treat as no-op).
 */
function validateRange(
  start: number,
  end: number,
  length: number
): { start: TextOffset; end: TextOffset; valid: boolean } {
  const validStart = clampTextOffset(start, length);
  const validEnd = clampTextOffset(end, length);
  return { start: validStart, end: validEnd, valid: validStart <= validEnd };
}

function finiteOrWarn(label: string, ...values: number[]): boolean {
  if (values.every(Number.isFinite)) return true;
  console.warn(`Invalid ${label}: ${values.join(', ')}, ignoring`);
  return false;
}

// =============================================================================
// Metadata
// =============================================================================

function withDirty(metadata: DocumentMetadata, isDirty: boolean): DocumentMetadata {
  if (metadata.isDirty === isDirty) return metadata;
  return Object.freeze({ ...metadata, isDirty });
}

// =============================================================================
// Viewport
// =============================================================================

/**
 * Bump the version and scroll the cursor cell into view.
 */
function commit(next: DocumentState, version: number): DocumentState {
  return withState(next, { viewport: ensureCursorVisible(next), version });
}

// =============================================================================
// Edits
// =============================================================================

/**
 * Replace [start, end) with text.
 *
 * Both ends are clamped to the document and ordered first. Normalizes line breaks in the inserted text, collapses the selection after
 * it, clears any preedit, recomputes the dirty flag and records a history
 * entry unless the resulting snapshot equals the current one.
 */
export function replaceRange(
  state: DocumentState,
  start: TextOffset,
  end: TextOffset,
  insertText: string
): DocumentState {
  const a = clampTextOffset(start, state.length);
  const b = clampTextOffset(end, state.length);
  const lo = minTextOffset(a, b);
  const hi = maxTextOffset(a, b);
  const inserted = normalizeNewlines(insertText);
  const from = scalarToCodeUnitOffset(state.text, lo);
  const to = scalarToCodeUnitOffset(state.text, hi);
  const text = state.text.slice(0, from) + inserted + state.text.slice(to);
  const cursor = textOffset(lo + scalarLength(inserted));

  const next = withText(state, text, {
    selection: createSelection(cursor),
    history: pushSnapshot(state.history, createSnapshot(text, cursor, cursor)),
    metadata: withDirty(state.metadata, text !== state.metadata.savedText),
    preedit: '',
  });
  return commit(next, state.version + 1);
}

function replaceSelection(state: DocumentState, text: string): DocumentState {
  const { start, end } = selectedRange(state.selection);
  return replaceRange(state, start, end, text);
}

function deleteAround(state: DocumentState, direction: 'backward' | 'forward'): DocumentState {
  if (hasSelection(state.selection)) return replaceSelection(state, '');
  const { cursor } = state.selection;
  if (direction === 'backward') {
    if (cursor <= 0) return state;
    return replaceRange(state, textOffset(cursor - 1), cursor, '');
  }
  if (cursor >= state.length) return state;
  return replaceRange(state, cursor, textOffset(cursor + 1), '');
}

/**
 * Replace the whole buffer, keeping the cursor where it still fits.
 * History restarts with the loaded text and the saved snapshot is reset.
 */
function loadText(state: DocumentState, rawText: string): DocumentState {
  const text = normalizeNewlines(rawText);
  const cursor = clampTextOffset(state.selection.cursor, scalarLength(text));
  const next = withText(state, text, {
    selection: createSelection(cursor),
    history: createHistoryState(createSnapshot(text, cursor, cursor)),
    metadata: Object.freeze({ ...state.metadata, isDirty: false, savedText: text }),
    preedit: '',
  });
  return commit(next, state.version + 1);
}

// =============================================================================
// History
// =============================================================================

/**
 * Restore the snapshot at the history's current index.
 */
function restoreSnapshot(state: DocumentState, history: HistoryState): DocumentState {
  if (history === state.history) return state;
  const snapshot = currentSnapshot(history);
  const restored = withText(state, snapshot.text, { history, preedit: '' });
  const next = withState(restored, {
    selection: clampSelection(createSelection(snapshot.cursor, snapshot.anchor), restored.length),
    metadata: withDirty(state.metadata, snapshot.text !== state.metadata.savedText),
  });
  return commit(next, state.version + 1);
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Apply a new selection. With `reveal`, the view scrolls to the cursor.
 * Returns the same state when neither the selection nor the scroll moves.
 */
function applySelection(state: DocumentState, selection: SelectionState, reveal: boolean): DocumentState {
  const moved = selectionsEqual(selection, state.selection) ? state : withState(state, { selection });
  const viewport = reveal ? ensureCursorVisible(moved) : moved.viewport;
  if (moved === state && viewport === state.viewport) return state;
  return withState(moved, { viewport, version: state.version + 1 });
}

// =============================================================================
// View
// =============================================================================

function applyViewport(state: DocumentState, viewport: ViewportState): DocumentState {
  if (viewport === state.viewport) return state;
  return withState(state, { viewport, version: state.version + 1 });
}

function resizeViewport(state: DocumentState, width: number, height: number): DocumentState {
  if (!finiteOrWarn('viewport size', width, height)) return state;
  const w = Math.max(1, width);
  const h = Math.max(1, height);
  if (w === state.viewport.width && h === state.viewport.height) return state;
  const resized: ViewportState = Object.freeze({ ...state.viewport, width: w, height: h });
  const clamped = clampScroll({ layout: state.layout, viewport: resized }, resized.scrollX, resized.scrollY);
  const next = withState(state, { viewport: clamped });
  return withState(next, { viewport: ensureCursorVisible(next), version: state.version + 1 });
}

// =============================================================================
// Main Reducer
// =============================================================================

/**
 * Pure reducer for document state.
 * Returns the same reference when an action changes nothing.
 * Read-only documents ignore text edits and input method updates.
 */
export function documentReducer(
  state: DocumentState,
  action: DocumentAction
): DocumentState {
  if (state.metadata.readOnly && (isTextEditAction(action) || action.type === 'SET_PREEDIT')) {
    return state;
  }

  switch (action.type) {
    case 'LOAD':
      return loadText(state, action.text);

    case 'INSERT': {
      if (action.text.length === 0) return state;
      return replaceSelection(state, action.text);
    }

    case 'REPLACE': {
      const { start, end, valid } = validateRange(action.start, action.end, state.length);
      if (!valid) return state;
      return replaceRange(state, start, end, action.text);
    }

    case 'DELETE': {
      const { start, end, valid } = validateRange(action.start, action.end, state.length);
      if (!valid || start === end) return state;
      return replaceRange(state, start, end, '');
    }

    case 'DELETE_BACKWARD':
      return deleteAround(state, 'backward');

    case 'DELETE_FORWARD':
      return deleteAround(state, 'forward');

    case 'SET_SELECTION': {
      const selection = createSelection(
        clampTextOffset(action.cursor, state.length),
        clampTextOffset(action.anchor, state.length)
      );
      return applySelection(state, selection, true);
    }

    case 'SELECT_ALL':
      return applySelection(state, selectAll(state.length), false);

    case 'CLEAR_SELECTION':
      return applySelection(state, clearSelection(state.selection), false);

    case 'MOVE_VISUAL': {
      if (!finiteOrWarn('move delta', action.deltaCol, action.deltaRow)) return state;
      const selection = moveVisual(
        state.layout,
        state.selection,
        Math.trunc(action.deltaCol),
        Math.trunc(action.deltaRow),
        action.extend
      );
      return applySelection(state, selection, true);
    }

    case 'MOVE_TO_START':
      return applySelection(state, moveCursorTo(state.selection, ZERO_TEXT_OFFSET, action.extend), true);

    case 'MOVE_TO_END':
      return applySelection(
        state,
        moveCursorTo(state.selection, textOffset(state.length), action.extend),
        true
      );

    case 'CLICK': {
      if (!finiteOrWarn('point', action.x, action.y)) return state;
      const target = pointToGrid(state, { x: action.x, y: action.y });
      const offset = nearestOffset(state.layout, target);
      return applySelection(state, moveCursorTo(state.selection, offset, action.extend), true);
    }

    case 'UNDO':
      return restoreSnapshot(state, stepBack(state.history));

    case 'REDO':
      return restoreSnapshot(state, stepForward(state.history));

    case 'MARK_SAVED': {
      return withState(state, {
        metadata: Object.freeze({
          ...state.metadata,
          isDirty: false,
          savedText: state.text,
          lastSaved: action.timestamp ?? Date.now(),
        }),
        version: state.version + 1,
      });
    }

    case 'MARK_MODIFIED': {
      if (state.metadata.isDirty) return state;
      return withState(state, {
        metadata: withDirty(state.metadata, true),
        version: state.version + 1,
      });
    }

    case 'SET_READ_ONLY': {
      if (state.metadata.readOnly === action.readOnly) return state;
      return withState(state, {
        metadata: Object.freeze({ ...state.metadata, readOnly: action.readOnly }),
        version: state.version + 1,
      });
    }

    case 'SET_GRID': {
      const relaid = withGrid(state, { rows: action.rows, cols: action.cols });
      const { grid } = relaid.layout;
      if (grid.rows === state.layout.grid.rows && grid.cols === state.layout.grid.cols) return state;
      return commit(relaid, state.version + 1);
    }

    case 'SET_CELL_SIZE': {
      const cellSize = clampCellSize(action.cellSize);
      if (cellSize === state.viewport.cellSize) return state;
      const resized = withState(state, { viewport: Object.freeze({ ...state.viewport, cellSize }) });
      return commit(resized, state.version + 1);
    }

    case 'SET_VIEWPORT':
      return resizeViewport(state, action.width, action.height);

    case 'SCROLL_TO':
      return applyViewport(state, clampScroll(state, action.scrollX, action.scrollY));

    case 'SET_PREEDIT': {
      if (action.text === state.preedit) return state;
      return withState(state, { preedit: action.text, version: state.version + 1 });
    }

    case 'COMPOSE': {
      const committed = action.commit.length > 0 ? replaceSelection(state, action.commit) : state;
      if (action.preedit === committed.preedit) return committed;
      return withState(committed, { preedit: action.preedit, version: state.version + 1 });
    }

    default: {
      // Exhaustive check - TypeScript will error if we miss an action type
      const exhaustiveCheck: never = action;
      return exhaustiveCheck;
    }
  }
}
