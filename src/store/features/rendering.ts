/**
 * Rendering selectors for the interactive manuscript view.
 * Everything returned here is in viewport coordinates (scroll applied), in
 * the order a renderer should paint it.
 */

import type { DocumentState, LayoutUnit, Rect } from '../../types/state.ts';
import { getSlot } from '../core/layout.ts';
import { toScalars } from '../core/scalars.ts';
import {
  getPageMetrics,
  pageRect,
  cellRect,
  offsetRect,
  toViewportRect,
  intersectsViewport,
} from './geometry.ts';
import { glyphFor, type Glyph } from './glyphs.ts';
import { selectedRange, hasSelection } from './cursor.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * A visible page of the manuscript strip.
 */
export interface VisiblePage {
  readonly pageIndex: number;
  readonly rect: Rect;
}

/**
 * A ruled line, from (x1, y1) to (x2, y2).
 */
export interface GridLine {
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
}

/**
 * A placed unit ready to draw.
 */
export interface RenderCell {
  readonly unit: LayoutUnit;
  readonly rect: Rect;
  readonly glyph: Glyph;
  /** Whether the unit overlaps the active selection */
  readonly selected: boolean;
}

/**
 * One scalar of uncommitted composition text.
 */
export interface PreeditCell {
  /** Index of the scalar within the preedit string */
  readonly index: number;
  readonly rect: Rect;
  readonly glyph: Glyph;
}

// =============================================================================
// Pages
// =============================================================================

/**
 * Pages that overlap the viewport, in page order.
 */
export function getVisiblePages(state: DocumentState): VisiblePage[] {
  const { totalPages } = getPageMetrics(state);
  const pages: VisiblePage[] = [];
  for (let pageIndex = 0; pageIndex < totalPages; pageIndex++) {
    const rect = toViewportRect(state.viewport, pageRect(state, pageIndex));
    if (intersectsViewport(state.viewport, rect)) {
      pages.push({ pageIndex, rect });
    }
  }
  return pages;
}

/**
 * Ruling for one page: rows + 1 horizontal lines, then cols + 1 vertical.
 */
export function getGridLines(rect: Rect, rows: number, cols: number): GridLine[] {
  const cellWidth = rect.width / cols;
  const cellHeight = rect.height / rows;
  const lines: GridLine[] = [];
  for (let r = 0; r <= rows; r++) {
    const y = rect.y + r * cellHeight;
    lines.push({ x1: rect.x, y1: y, x2: rect.x + rect.width, y2: y });
  }
  for (let c = 0; c <= cols; c++) {
    const x = rect.x + c * cellWidth;
    lines.push({ x1: x, y1: rect.y, x2: x, y2: rect.y + rect.height });
  }
  return lines;
}

// =============================================================================
// Cells
// =============================================================================

/**
 * Units that overlap the viewport, in layout order.
 *
 * @complexity O(n) in unit count
 */
export function getRenderCells(state: DocumentState): RenderCell[] {
  const range = selectedRange(state.selection);
  const anySelected = hasSelection(state.selection);
  const cells: RenderCell[] = [];

  for (const unit of state.layout.units) {
    const rect = toViewportRect(state.viewport, cellRect(state, unit.gcol, unit.row));
    if (!intersectsViewport(state.viewport, rect)) continue;
    cells.push({
      unit,
      rect,
      glyph: glyphFor(unit),
      selected: anySelected && unit.start < range.end && unit.end > range.start,
    });
  }

  return cells;
}

/**
 * Composition text cells, running down from the cursor cell and wrapping at
 * the last row. Kinsoku does not apply to uncommitted text.
 */
export function getPreeditCells(state: DocumentState): PreeditCell[] {
  if (state.preedit.length === 0) return [];

  const { rows } = state.layout.grid;
  let { gcol, row } = getSlot(state.layout, state.selection.cursor);
  const cells: PreeditCell[] = [];

  toScalars(state.preedit).forEach((text, index) => {
    cells.push({
      index,
      rect: toViewportRect(state.viewport, cellRect(state, gcol, row)),
      glyph: glyphFor({ kind: 'char', text }),
    });
    row += 1;
    if (row >= rows) {
      row = 0;
      gcol += 1;
    }
  });

  return cells;
}

// =============================================================================
// Offsets
// =============================================================================

/**
 * Viewport rectangle of the cell an offset resolves to.
 */
export function getOffsetRect(state: DocumentState, offset: number): Rect {
  return toViewportRect(state.viewport, offsetRect(state, offset));
}

/**
 * Viewport rectangle of the cursor cell. Input methods anchor their
 * candidate window here.
 */
export function getCaretRect(state: DocumentState): Rect {
  return getOffsetRect(state, state.selection.cursor);
}
