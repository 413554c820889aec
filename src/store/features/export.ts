/**
 * Export adapter.
 *
 * Runs the layout engine at a fixed grid, independent of the live view's
 * configuration, and partitions the placed units by page. Printed output is
 * cell-identical to the interactive grid at the same rows and columns.
 */

import type { GridSize, LayoutUnit } from '../../types/state.ts';
import { layoutText, pageOfColumn } from '../core/layout.ts';
import { normalizeNewlines, countCharacters } from '../core/scalars.ts';

/**
 * Reference export grid: 40 x 40 manuscript paper.
 */
export const EXPORT_GRID: GridSize = Object.freeze({ rows: 40, cols: 40 });

export interface ExportPage {
  readonly pageIndex: number;
  readonly units: readonly LayoutUnit[];
}

export interface ExportDocument {
  readonly grid: GridSize;
  readonly totalPages: number;
  readonly characterCount: number;
  readonly pages: readonly ExportPage[];
}

/**
 * Lay out text for export and split it into pages.
 *
 * The printed page count comes from the placed units alone: a trailing
 * empty column (a final line break, or a column filled exactly to its last
 * row) does not start a new sheet.
 */
export function paginateForExport(text: string, grid: GridSize = EXPORT_GRID): ExportDocument {
  const normalized = normalizeNewlines(text);
  const layout = layoutText(normalized, grid);
  const { cols } = layout.grid;

  let maxColumn = 0;
  for (const unit of layout.units) {
    if (unit.gcol > maxColumn) maxColumn = unit.gcol;
  }
  const totalPages = Math.max(1, pageOfColumn(maxColumn, cols) + 1);

  const buckets: LayoutUnit[][] = Array.from({ length: totalPages }, () => []);
  for (const unit of layout.units) {
    const pageIndex = Math.max(0, Math.min(totalPages - 1, pageOfColumn(unit.gcol, cols)));
    buckets[pageIndex].push(unit);
  }

  return Object.freeze({
    grid: layout.grid,
    totalPages,
    characterCount: countCharacters(normalized),
    pages: Object.freeze(
      buckets.map((units, pageIndex) => Object.freeze({ pageIndex, units: Object.freeze(units) }))
    ),
  });
}

/**
 * Join several documents into one export, separating them with a line
 * break unless one is already there.
 */
export function joinForExport(texts: readonly string[]): string {
  let merged = '';
  texts.forEach((chunk, index) => {
    if (index === 0 || /[\r\n]$/.test(merged) || /^[\r\n]/.test(chunk)) {
      merged += chunk;
    } else {
      merged += '\n' + chunk;
    }
  });
  return merged;
}
