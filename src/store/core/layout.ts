/**
 * Vertical manuscript layout engine.
 *
 * A pure function of (text, rows, cols): places every non-newline token in a
 * cell of the manuscript grid, columns running top-to-bottom and advancing
 * one global column (gcol) per wrap or line break, and records the cell of
 * every buffer offset in the cursor slot table. The interactive view and the
 * export path both call this module; there is no second implementation.
 */

import type {
  Token,
  CharToken,
  TcyToken,
  GridSize,
  GridPosition,
  LayoutUnit,
  LayoutResult,
} from '../../types/state.ts';
import { tokenizeScalars } from './tokenizer.ts';
import { toScalars } from './scalars.ts';
import { isLineEndProhibited, isLineHeadProhibited } from './kinsoku.ts';

// =============================================================================
// Grid Bounds
// =============================================================================

export const MIN_GRID_SIZE = 8;
export const MAX_GRID_SIZE = 80;
export const DEFAULT_GRID_SIZE = 40;

/**
 * Clamp one grid dimension to [8, 80]. Non-finite input yields the default.
 */
export function clampGridDimension(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_GRID_SIZE;
  return Math.max(MIN_GRID_SIZE, Math.min(MAX_GRID_SIZE, Math.trunc(value)));
}

/**
 * Clamp both dimensions of a grid to [8, 80].
 * The store applies this to configured grids before laying out.
 */
export function clampGrid(grid: GridSize): GridSize {
  return Object.freeze({
    rows: clampGridDimension(grid.rows),
    cols: clampGridDimension(grid.cols),
  });
}

/**
 * Grid the engine actually runs on: integral, at least two rows and one
 * column. The engine does not impose the [8, 80] range itself.
 */
function engineGrid(grid: GridSize): GridSize {
  const rows = Number.isFinite(grid.rows) ? Math.max(2, Math.trunc(grid.rows)) : DEFAULT_GRID_SIZE;
  const cols = Number.isFinite(grid.cols) ? Math.max(1, Math.trunc(grid.cols)) : DEFAULT_GRID_SIZE;
  return Object.freeze({ rows, cols });
}

// =============================================================================
// Helpers
// =============================================================================

const ORIGIN: GridPosition = Object.freeze({ gcol: 0, row: 0 });

function position(gcol: number, row: number): GridPosition {
  return gcol === 0 && row === 0 ? ORIGIN : Object.freeze({ gcol, row });
}

function placeUnit(source: CharToken | TcyToken | LayoutUnit, gcol: number, row: number): LayoutUnit {
  return Object.freeze({
    kind: source.kind,
    start: source.start,
    end: source.end,
    text: source.text,
    gcol,
    row,
  });
}

/**
 * Zero-based page index of a global column.
 */
export function pageOfColumn(gcol: number, cols: number): number {
  return Math.floor(gcol / cols);
}

/**
 * Cell of an offset, clamped to the slot table.
 */
export function getSlot(layout: LayoutResult, offset: number): GridPosition {
  const index = Math.max(0, Math.min(layout.slots.length - 1, Math.trunc(offset)));
  return layout.slots[index] ?? ORIGIN;
}

// =============================================================================
// Layout
// =============================================================================

/**
 * Lay out a token sequence covering a buffer of `length` scalars.
 *
 * Single forward pass with a one-unit lookbehind:
 * - the slot of a token's start is recorded before the token is placed;
 * - a newline advances to row 0 of the next column;
 * - an opening bracket that would land on the last row wraps first;
 * - a closing mark that would open a column pulls the previous unit (sitting
 *   on the last row of the previous column) down to row 0 and takes row 1.
 *   Slots already recorded for the pulled unit are left as they are.
 */
export function layoutTokens(
  tokens: readonly Token[],
  length: number,
  grid: GridSize
): LayoutResult {
  const { rows, cols } = engineGrid(grid);
  const slots: GridPosition[] = new Array<GridPosition>(length + 1).fill(ORIGIN);
  const units: LayoutUnit[] = [];

  let gcol = 0;
  let row = 0;

  for (const token of tokens) {
    slots[token.start] = position(gcol, row);

    if (token.kind === 'newline') {
      gcol += 1;
      row = 0;
      slots[token.end] = position(gcol, row);
      continue;
    }

    if (row === rows - 1 && isLineEndProhibited(token.text)) {
      gcol += 1;
      row = 0;
    }

    if (row === 0 && units.length > 0 && isLineHeadProhibited(token.text)) {
      const previous = units[units.length - 1];
      if (previous.gcol === gcol - 1 && previous.row === rows - 1) {
        units[units.length - 1] = placeUnit(previous, gcol, 0);
        row = 1;
      }
    }

    for (let mid = token.start + 1; mid < token.end; mid++) {
      slots[mid] = position(gcol, row);
    }

    units.push(placeUnit(token, gcol, row));

    row += 1;
    if (row >= rows) {
      row = 0;
      gcol += 1;
    }

    slots[token.end] = position(gcol, row);
  }

  let maxColumn = 0;
  for (const unit of units) {
    if (unit.gcol > maxColumn) maxColumn = unit.gcol;
  }
  for (const slot of slots) {
    if (slot.gcol > maxColumn) maxColumn = slot.gcol;
  }

  return Object.freeze({
    grid: Object.freeze({ rows, cols }),
    tokens: Object.freeze([...tokens]),
    units: Object.freeze(units),
    slots: Object.freeze(slots),
    maxColumn,
    totalPages: Math.max(1, pageOfColumn(maxColumn, cols) + 1),
  });
}

/**
 * Tokenize and lay out text in one call.
 */
export function layoutText(text: string, grid: GridSize): LayoutResult {
  const scalars = toScalars(text);
  return layoutTokens(tokenizeScalars(scalars), scalars.length, grid);
}
