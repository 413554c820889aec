/**
 * Cursor and selection model.
 *
 * The cursor and anchor are scalar offsets into the buffer. Visual movement
 * and hit testing work in grid coordinates and resolve back to an offset
 * through the slot table.
 */

import type {
  GridPosition,
  LayoutResult,
  ManuscriptPosition,
  SelectionState,
  TextRange,
} from '../../types/state.ts';
import type { TextOffset } from '../../types/branded.ts';
import {
  textOffset,
  clampTextOffset,
  minTextOffset,
  maxTextOffset,
  ZERO_TEXT_OFFSET,
} from '../../types/branded.ts';
import { getSlot } from '../core/layout.ts';
import { sliceScalars } from '../core/scalars.ts';

// =============================================================================
// Offset Resolution
// =============================================================================

/**
 * Offset whose slot is closest to a target cell.
 *
 * Distance is `|Δgcol| * rows + |Δrow|`, so any column change outweighs any
 * row change. Ties go to the lowest offset.
 *
 * @complexity O(n) in buffer length
 */
export function nearestOffset(layout: LayoutResult, target: GridPosition): TextOffset {
  const { rows } = layout.grid;
  let best = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  layout.slots.forEach((slot, index) => {
    const distance = Math.abs(slot.gcol - target.gcol) * rows + Math.abs(slot.row - target.row);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = index;
    }
  });
  return textOffset(best);
}

/**
 * Target cell of a visual move from an offset. The row is clamped to the
 * grid and the column floored at 0.
 */
export function visualMoveTarget(
  layout: LayoutResult,
  from: TextOffset,
  deltaCol: number,
  deltaRow: number
): GridPosition {
  const slot = getSlot(layout, from);
  return {
    gcol: Math.max(0, slot.gcol + deltaCol),
    row: Math.max(0, Math.min(layout.grid.rows - 1, slot.row + deltaRow)),
  };
}

// =============================================================================
// Selection Construction
// =============================================================================

export function createSelection(cursor: TextOffset, anchor: TextOffset = cursor): SelectionState {
  return Object.freeze({ cursor, anchor });
}

/**
 * Move the cursor to an offset, optionally keeping the anchor in place.
 */
export function moveCursorTo(
  selection: SelectionState,
  offset: TextOffset,
  keepAnchor: boolean
): SelectionState {
  return createSelection(offset, keepAnchor ? selection.anchor : offset);
}

/**
 * Move the cursor by a visual delta in grid space.
 */
export function moveVisual(
  layout: LayoutResult,
  selection: SelectionState,
  deltaCol: number,
  deltaRow: number,
  keepAnchor: boolean
): SelectionState {
  const target = visualMoveTarget(layout, selection.cursor, deltaCol, deltaRow);
  return moveCursorTo(selection, nearestOffset(layout, target), keepAnchor);
}

/**
 * Clamp both ends of a selection into [0, length].
 */
export function clampSelection(selection: SelectionState, length: number): SelectionState {
  const cursor = clampTextOffset(selection.cursor, length);
  const anchor = clampTextOffset(selection.anchor, length);
  if (cursor === selection.cursor && anchor === selection.anchor) return selection;
  return createSelection(cursor, anchor);
}

export function selectAll(length: number): SelectionState {
  return createSelection(textOffset(length), ZERO_TEXT_OFFSET);
}

/**
 * Collapse the selection onto the cursor.
 */
export function clearSelection(selection: SelectionState): SelectionState {
  if (selection.anchor === selection.cursor) return selection;
  return createSelection(selection.cursor);
}

export function selectionsEqual(a: SelectionState, b: SelectionState): boolean {
  return a.cursor === b.cursor && a.anchor === b.anchor;
}

// =============================================================================
// Selection Queries
// =============================================================================

/**
 * Active range [min, max).
 */
export function selectedRange(selection: SelectionState): TextRange {
  return {
    start: minTextOffset(selection.cursor, selection.anchor),
    end: maxTextOffset(selection.cursor, selection.anchor),
  };
}

export function hasSelection(selection: SelectionState): boolean {
  return selection.cursor !== selection.anchor;
}

export function selectedText(text: string, selection: SelectionState): string {
  if (!hasSelection(selection)) return '';
  const { start, end } = selectedRange(selection);
  return sliceScalars(text, start, end);
}

/**
 * 1-based page, column and cell of an offset.
 */
export function pageColumnCell(layout: LayoutResult, offset: TextOffset): ManuscriptPosition {
  const { gcol, row } = getSlot(layout, offset);
  const { cols } = layout.grid;
  return {
    page: Math.floor(gcol / cols) + 1,
    column: (gcol % cols) + 1,
    cell: row + 1,
  };
}

export function positionsEqual(a: ManuscriptPosition, b: ManuscriptPosition): boolean {
  return a.page === b.page && a.column === b.column && a.cell === b.cell;
}
