/**
 * Query namespace: O(1) and bounded operations.
 * Functions here are read-only selectors over immutable document state.
 */

import { getSlot, pageOfColumn } from '../store/core/layout.ts';
import { canUndo, canRedo, getUndoCount, getRedoCount } from '../store/core/history.ts';
import { pageColumnCell, selectedRange, hasSelection } from '../store/features/cursor.ts';
import { getPageMetrics, pageOriginX, pageRect, cellRect, offsetRect } from '../store/features/geometry.ts';
import { getGridLines, getPreeditCells, getOffsetRect, getCaretRect } from '../store/features/rendering.ts';
import { glyphFor, verticalForm } from '../store/features/glyphs.ts';

export const query = {
  /** @complexity O(1): slot table index */
  getSlot,
  /** @complexity O(1) */
  pageOfColumn,
  /** @complexity O(1): slot lookup plus arithmetic */
  pageColumnCell,
  /** @complexity O(1) */
  selectedRange,
  /** @complexity O(1) */
  hasSelection,
  /** @complexity O(1): history index check */
  canUndo,
  /** @complexity O(1): history index check */
  canRedo,
  /** @complexity O(1) */
  getUndoCount,
  /** @complexity O(1) */
  getRedoCount,
  /** @complexity O(1): cached page count on the layout */
  getPageMetrics,
  /** @complexity O(1) */
  pageOriginX,
  /** @complexity O(1) */
  pageRect,
  /** @complexity O(1) */
  cellRect,
  /** @complexity O(1): slot lookup */
  offsetRect,
  /** @complexity O(1): slot lookup, viewport coordinates */
  getOffsetRect,
  /** @complexity O(1): cursor slot, viewport coordinates */
  getCaretRect,
  /** @complexity O(rows + cols) */
  getGridLines,
  /** @complexity O(k): k preedit scalars */
  getPreeditCells,
  /** @complexity O(1): map lookup */
  glyphFor,
  /** @complexity O(1): map lookup */
  verticalForm,
} as const;
