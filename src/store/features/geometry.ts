/**
 * Pixel geometry of the interactive manuscript view.
 *
 * World coordinates place page 0 at the right edge of the page strip and each
 * later page to its left. Viewport coordinates are world coordinates minus
 * the scroll offsets.
 */

import type {
  DocumentState,
  GridPosition,
  Point,
  Rect,
  ViewportState,
} from '../../types/state.ts';
import { getSlot, pageOfColumn } from '../core/layout.ts';

/**
 * The parts of document state geometry depends on.
 */
export type GeometrySource = Pick<DocumentState, 'layout' | 'viewport'>;

/**
 * Page and content extents for the current layout.
 */
export interface PageMetrics {
  readonly pageWidth: number;
  readonly pageHeight: number;
  readonly totalPages: number;
  readonly contentWidth: number;
  readonly contentHeight: number;
  readonly maxScrollX: number;
  readonly maxScrollY: number;
}

/** Inner band the cursor cell must stay inside of */
const VISIBILITY_INSET = 4;
/** Slack left past the cell when scrolling toward the origin */
const SCROLL_LEAD = 8;
/** Slack left past the cell when scrolling away from the origin */
const SCROLL_TRAIL = 12;

// =============================================================================
// Pages
// =============================================================================

export function getPageMetrics(source: GeometrySource): PageMetrics {
  const { grid, totalPages } = source.layout;
  const { cellSize, pageGap, outerMargin, width, height } = source.viewport;
  const pageWidth = grid.cols * cellSize;
  const pageHeight = grid.rows * cellSize;
  const contentWidth = outerMargin * 2 + totalPages * pageWidth + Math.max(0, totalPages - 1) * pageGap;
  const contentHeight = outerMargin * 2 + pageHeight;

  return {
    pageWidth,
    pageHeight,
    totalPages,
    contentWidth,
    contentHeight,
    maxScrollX: Math.max(0, contentWidth - width),
    maxScrollY: Math.max(0, contentHeight - height),
  };
}

/**
 * Left edge of a page in world coordinates. Page 0 is the rightmost.
 */
export function pageOriginX(source: GeometrySource, page: number): number {
  const { cellSize, pageGap, outerMargin } = source.viewport;
  const pageWidth = source.layout.grid.cols * cellSize;
  return outerMargin + (source.layout.totalPages - 1 - page) * (pageWidth + pageGap);
}

export function pageRect(source: GeometrySource, page: number): Rect {
  const { pageWidth, pageHeight } = getPageMetrics(source);
  return {
    x: pageOriginX(source, page),
    y: source.viewport.outerMargin,
    width: pageWidth,
    height: pageHeight,
  };
}

// =============================================================================
// Cells
// =============================================================================

/**
 * World rectangle of a cell. Columns count right to left within a page.
 */
export function cellRect(source: GeometrySource, gcol: number, row: number): Rect {
  const { cols } = source.layout.grid;
  const { cellSize, outerMargin } = source.viewport;
  const page = pageOfColumn(gcol, cols);
  const colInPage = gcol % cols;
  return {
    x: pageOriginX(source, page) + (cols - 1 - colInPage) * cellSize,
    y: outerMargin + row * cellSize,
    width: cellSize,
    height: cellSize,
  };
}

/**
 * World rectangle of the slot an offset resolves to.
 */
export function offsetRect(source: GeometrySource, offset: number): Rect {
  const slot = getSlot(source.layout, offset);
  return cellRect(source, slot.gcol, slot.row);
}

/**
 * Shift a world rectangle into viewport coordinates.
 */
export function toViewportRect(viewport: ViewportState, rect: Rect): Rect {
  return { ...rect, x: rect.x - viewport.scrollX, y: rect.y - viewport.scrollY };
}

/**
 * Whether a viewport rectangle overlaps the viewport at all.
 */
export function intersectsViewport(viewport: ViewportState, rect: Rect): boolean {
  return (
    rect.x + rect.width >= 0 &&
    rect.x <= viewport.width &&
    rect.y + rect.height >= 0 &&
    rect.y <= viewport.height
  );
}

// =============================================================================
// Hit Testing
// =============================================================================

/**
 * Map a viewport point to a grid coordinate.
 *
 * The page is the one horizontally closest to the point (earliest page on a
 * tie). Points outside a page clamp to its nearest column; points above or
 * below the grid clamp to the first or last row.
 */
export function pointToGrid(source: GeometrySource, point: Point): GridPosition {
  const { pageWidth, pageHeight, totalPages } = getPageMetrics(source);
  const { cellSize, outerMargin, scrollX, scrollY } = source.viewport;
  const { cols } = source.layout.grid;

  const worldX = point.x + scrollX;
  const worldY = point.y + scrollY - outerMargin;

  const row = worldY >= 0 ? Math.floor(Math.min(pageHeight - 1, worldY) / cellSize) : 0;

  let bestPage = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (let page = 0; page < totalPages; page++) {
    const left = pageOriginX(source, page);
    const right = left + pageWidth;
    const distance = worldX < left ? left - worldX : worldX > right ? worldX - right : 0;
    if (distance < bestDistance) {
      bestDistance = distance;
      bestPage = page;
    }
  }

  const withinX = Math.max(0, Math.min(pageWidth - 1, worldX - pageOriginX(source, bestPage)));
  const colFromLeft = Math.floor(withinX / cellSize);
  const colInPage = Math.max(0, Math.min(cols - 1, cols - 1 - colFromLeft));

  return { gcol: bestPage * cols + colInPage, row };
}

// =============================================================================
// Scrolling
// =============================================================================

/**
 * Clamp scroll offsets into the scrollable range.
 */
export function clampScroll(source: GeometrySource, scrollX: number, scrollY: number): ViewportState {
  const { maxScrollX, maxScrollY } = getPageMetrics(source);
  const x = Number.isFinite(scrollX) ? Math.max(0, Math.min(maxScrollX, scrollX)) : 0;
  const y = Number.isFinite(scrollY) ? Math.max(0, Math.min(maxScrollY, scrollY)) : 0;
  if (x === source.viewport.scrollX && y === source.viewport.scrollY) return source.viewport;
  return Object.freeze({ ...source.viewport, scrollX: x, scrollY: y });
}

function revealAxis(
  start: number,
  end: number,
  scroll: number,
  extent: number
): number {
  if (start < scroll + VISIBILITY_INSET) {
    return Math.trunc(start) - SCROLL_LEAD;
  }
  if (end > scroll + extent - VISIBILITY_INSET) {
    return Math.trunc(end - extent + SCROLL_TRAIL);
  }
  return scroll;
}

/**
 * Scroll just enough for a world rectangle to sit inside the viewport,
 * leaving a few pixels of slack. Returns the same viewport when nothing moves.
 */
export function scrollToReveal(source: GeometrySource, rect: Rect): ViewportState {
  const { scrollX, scrollY, width, height } = source.viewport;
  return clampScroll(
    source,
    revealAxis(rect.x, rect.x + rect.width, scrollX, width),
    revealAxis(rect.y, rect.y + rect.height, scrollY, height)
  );
}

/**
 * Viewport scrolled so the cursor cell is visible.
 */
export function ensureCursorVisible(state: DocumentState): ViewportState {
  return scrollToReveal(state, offsetRect(state, state.selection.cursor));
}
