/**
 * Core immutable state types for the Genko manuscript editor.
 * All state structures are read-only; layout is derived state that is
 * recomputed wholesale from (text, rows, cols) after every mutation.
 */

import type { TextOffset } from './branded.ts';

// =============================================================================
// Token Types
// =============================================================================

/**
 * A single scalar value that occupies one cell.
 * Part of the Token discriminated union.
 */
export interface CharToken {
  readonly kind: 'char';
  readonly start: TextOffset;
  readonly end: TextOffset;
  readonly text: string;
}

/**
 * A line break. Occupies no cell; it advances to the next manuscript column.
 */
export interface NewlineToken {
  readonly kind: 'newline';
  readonly start: TextOffset;
  readonly end: TextOffset;
  readonly text: '\n';
}

/**
 * Tate-chu-yoko: an isolated pair of ASCII digits set horizontally in one cell.
 */
export interface TcyToken {
  readonly kind: 'tcy';
  readonly start: TextOffset;
  readonly end: TextOffset;
  readonly text: string;
}

/**
 * Discriminated union of tokens.
 * Use `kind` to distinguish; tokens partition the buffer without gaps.
 */
export type Token = CharToken | NewlineToken | TcyToken;

/**
 * Token kind tag.
 */
export type TokenKind = Token['kind'];

// =============================================================================
// Layout Types
// =============================================================================

/**
 * Manuscript grid size: cells per column (rows) and columns per page (cols).
 */
export interface GridSize {
  readonly rows: number;
  readonly cols: number;
}

/**
 * A cell coordinate.
 * gcol: global manuscript column, counted across the whole document
 * row: vertical cell index within the column, in [0, rows)
 */
export interface GridPosition {
  readonly gcol: number;
  readonly row: number;
}

/**
 * A placed, non-newline token.
 */
export interface LayoutUnit extends GridPosition {
  readonly kind: 'char' | 'tcy';
  readonly start: TextOffset;
  readonly end: TextOffset;
  readonly text: string;
}

/**
 * Output of one layout pass.
 */
export interface LayoutResult {
  /** Grid the pass ran on: integral, at least two rows and one column */
  readonly grid: GridSize;
  /** Tokens of the buffer, in order */
  readonly tokens: readonly Token[];
  /** One unit per non-newline token, in buffer order */
  readonly units: readonly LayoutUnit[];
  /** Offset -> cell table, length = buffer length + 1 */
  readonly slots: readonly GridPosition[];
  /** Largest gcol observed among units and slots */
  readonly maxColumn: number;
  /** max(1, floor(maxColumn / cols) + 1) */
  readonly totalPages: number;
}

// =============================================================================
// Selection Types
// =============================================================================

/**
 * Cursor and anchor offsets. The active range is [min, max).
 */
export interface SelectionState {
  /** Caret position (the moving end) */
  readonly cursor: TextOffset;
  /** Fixed end of the selection */
  readonly anchor: TextOffset;
}

/**
 * Half-open offset range [start, end).
 */
export interface TextRange {
  readonly start: TextOffset;
  readonly end: TextOffset;
}

// =============================================================================
// History Types
// =============================================================================

/**
 * Immutable snapshot recorded after each edit.
 */
export interface HistorySnapshot {
  readonly text: string;
  readonly cursor: TextOffset;
  readonly anchor: TextOffset;
}

/**
 * Linear history: an arena of snapshots plus the index of the current one.
 * Index 0 is the state at creation or load.
 */
export interface HistoryState {
  readonly entries: readonly HistorySnapshot[];
  readonly index: number;
}

// =============================================================================
// Viewport Types
// =============================================================================

/**
 * Pixel geometry of the interactive view.
 */
export interface ViewportState {
  /** Viewport width in pixels */
  readonly width: number;
  /** Viewport height in pixels */
  readonly height: number;
  /** Horizontal scroll offset */
  readonly scrollX: number;
  /** Vertical scroll offset */
  readonly scrollY: number;
  /** Square cell edge in pixels */
  readonly cellSize: number;
  /** Gap between adjacent pages */
  readonly pageGap: number;
  /** Margin around the page strip */
  readonly outerMargin: number;
}

// =============================================================================
// Geometry Types
// =============================================================================

/**
 * A point in pixels.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * An axis-aligned pixel rectangle. `x + width` is the right edge.
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * 1-based cursor position as shown in a status bar.
 */
export interface ManuscriptPosition {
  readonly page: number;
  readonly column: number;
  readonly cell: number;
}

// =============================================================================
// Document Metadata Types
// =============================================================================

/**
 * Document metadata that doesn't affect layout.
 */
export interface DocumentMetadata {
  /** Whether the text differs from the last saved text (or was forced dirty) */
  readonly isDirty: boolean;
  /** Text at the last save or load */
  readonly savedText: string;
  /** Whether text edits are ignored */
  readonly readOnly: boolean;
  /** Last save timestamp */
  readonly lastSaved?: number;
}

// =============================================================================
// Main Document State
// =============================================================================

/**
 * Immutable document state snapshot.
 */
export interface DocumentState {
  /** Monotonically increasing version number for change detection */
  readonly version: number;
  /** Buffer content, newline-normalized */
  readonly text: string;
  /** Buffer length in scalar values */
  readonly length: number;
  /** Scalars other than line breaks */
  readonly characterCount: number;
  /** Derived layout for the current grid */
  readonly layout: LayoutResult;
  /** Current selection */
  readonly selection: SelectionState;
  /** Undo/redo history */
  readonly history: HistoryState;
  /** Document metadata */
  readonly metadata: DocumentMetadata;
  /** Interactive view geometry */
  readonly viewport: ViewportState;
  /** Uncommitted input-method composition text, drawn at the cursor */
  readonly preedit: string;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Configuration options for creating a document store.
 */
export interface DocumentStoreConfig {
  /** Initial document content */
  content: string;
  /** Cells per column (default: 40, clamped to [8, 80]) */
  rows: number;
  /** Columns per page (default: 40, clamped to [8, 80]) */
  cols: number;
  /** Cell edge in pixels (default: 36, at least 16) */
  cellSize: number;
  /** Gap between pages in pixels (default: 12) */
  pageGap: number;
  /** Margin around the page strip in pixels (default: 6) */
  outerMargin: number;
  /** Initial viewport width in pixels (default: 800) */
  viewportWidth: number;
  /** Initial viewport height in pixels (default: 600) */
  viewportHeight: number;
  /** Start in read-only mode (default: false) */
  readOnly: boolean;
}
