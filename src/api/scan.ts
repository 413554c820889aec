/**
 * Scan namespace: O(n) operations.
 * All functions in this namespace perform full or partial document traversals.
 * Use `query.*` for efficient lookups when possible.
 */

import { tokenize } from '../store/core/tokenizer.ts';
import { layoutText, layoutTokens } from '../store/core/layout.ts';
import { countCharacters } from '../store/core/scalars.ts';
import { nearestOffset, selectedText } from '../store/features/cursor.ts';
import { pointToGrid } from '../store/features/geometry.ts';
import { findInText } from '../store/features/search.ts';
import { getVisiblePages, getRenderCells } from '../store/features/rendering.ts';
import { paginateForExport } from '../store/features/export.ts';
import { renderExportSvg } from '../store/features/svg-export.ts';

export const scan = {
  /** @complexity O(n): single pass over the scalars */
  tokenize,
  /** @complexity O(n): tokenize plus one layout pass */
  layoutText,
  /** @complexity O(n): one layout pass with one-unit lookbehind */
  layoutTokens,
  /** @complexity O(n) */
  countCharacters,
  /** @complexity O(n): every slot is a candidate */
  nearestOffset,
  /** @complexity O(n): scalar slicing from the buffer start */
  selectedText,
  /** @complexity O(pages): nearest page by horizontal distance */
  pointToGrid,
  /** @complexity O(n): regex or substring search with one wrap */
  findInText,
  /** @complexity O(pages) */
  getVisiblePages,
  /** @complexity O(units): culls every unit against the viewport */
  getRenderCells,
  /** @complexity O(n): full layout at the export grid */
  paginateForExport,
  /** @complexity O(units): one SVG document per page */
  renderExportSvg,
} as const;
