/**
 * State factory functions for the manuscript document.
 * Creates initial immutable state structures and rebuilds derived layout.
 */

import type {
  DocumentState,
  DocumentStoreConfig,
  DocumentMetadata,
  GridSize,
  SelectionState,
  ViewportState,
} from '../../types/state.ts';
import { ZERO_TEXT_OFFSET } from '../../types/branded.ts';
import { clampGrid, layoutText, DEFAULT_GRID_SIZE } from './layout.ts';
import { normalizeNewlines, scalarLength, countCharacters } from './scalars.ts';
import { createHistoryState, createSnapshot } from './history.ts';

// =============================================================================
// Defaults
// =============================================================================

export const MIN_CELL_SIZE = 16;
export const DEFAULT_CELL_SIZE = 36;
export const DEFAULT_PAGE_GAP = 12;
export const DEFAULT_OUTER_MARGIN = 6;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Readonly<DocumentStoreConfig> = Object.freeze({
  content: '',
  rows: DEFAULT_GRID_SIZE,
  cols: DEFAULT_GRID_SIZE,
  cellSize: DEFAULT_CELL_SIZE,
  pageGap: DEFAULT_PAGE_GAP,
  outerMargin: DEFAULT_OUTER_MARGIN,
  viewportWidth: 800,
  viewportHeight: 600,
  readOnly: false,
});

/**
 * Cell edges below 16px are raised to 16. Non-finite input yields the default.
 */
export function clampCellSize(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_CELL_SIZE;
  return Math.max(MIN_CELL_SIZE, Math.trunc(value));
}

function nonNegative(value: number, fallback: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : fallback;
}

function positive(value: number, fallback: number): number {
  return Number.isFinite(value) ? Math.max(1, value) : fallback;
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Collapsed selection at offset 0.
 */
export function createInitialSelectionState(): SelectionState {
  return Object.freeze({ cursor: ZERO_TEXT_OFFSET, anchor: ZERO_TEXT_OFFSET });
}

/**
 * Clean metadata with the given text as the saved snapshot.
 */
export function createInitialMetadata(savedText: string, readOnly = false): DocumentMetadata {
  return Object.freeze({
    isDirty: false,
    savedText,
    readOnly,
    lastSaved: undefined,
  });
}

/**
 * Viewport scrolled to the origin.
 */
export function createInitialViewport(config: Partial<DocumentStoreConfig> = {}): ViewportState {
  return Object.freeze({
    width: positive(config.viewportWidth ?? DEFAULT_CONFIG.viewportWidth, DEFAULT_CONFIG.viewportWidth),
    height: positive(config.viewportHeight ?? DEFAULT_CONFIG.viewportHeight, DEFAULT_CONFIG.viewportHeight),
    scrollX: 0,
    scrollY: 0,
    cellSize: clampCellSize(config.cellSize ?? DEFAULT_CONFIG.cellSize),
    pageGap: nonNegative(config.pageGap ?? DEFAULT_CONFIG.pageGap, DEFAULT_PAGE_GAP),
    outerMargin: nonNegative(config.outerMargin ?? DEFAULT_CONFIG.outerMargin, DEFAULT_OUTER_MARGIN),
  });
}

/**
 * Create initial document state from configuration.
 */
export function createInitialState(config: Partial<DocumentStoreConfig> = {}): DocumentState {
  const merged = { ...DEFAULT_CONFIG, ...config };
  const text = normalizeNewlines(merged.content);
  const grid = clampGrid({ rows: merged.rows, cols: merged.cols });
  const selection = createInitialSelectionState();

  return Object.freeze({
    version: 0,
    text,
    length: scalarLength(text),
    characterCount: countCharacters(text),
    layout: layoutText(text, grid),
    selection,
    history: createHistoryState(createSnapshot(text, selection.cursor, selection.anchor)),
    metadata: createInitialMetadata(text, merged.readOnly),
    viewport: createInitialViewport(merged),
    preedit: '',
  });
}

// =============================================================================
// Structural Updates
// =============================================================================

/**
 * Helper to create modified state with structural sharing.
 * Only creates new objects for changed properties.
 */
export function withState(state: DocumentState, changes: Partial<DocumentState>): DocumentState {
  return Object.freeze({ ...state, ...changes });
}

/**
 * Replace the buffer and rebuild everything derived from it.
 * The caller is responsible for keeping the selection within the new length.
 */
export function withText(
  state: DocumentState,
  text: string,
  changes: Partial<DocumentState> = {}
): DocumentState {
  return withState(state, {
    text,
    length: scalarLength(text),
    characterCount: countCharacters(text),
    layout: layoutText(text, state.layout.grid),
    ...changes,
  });
}

/**
 * Lay the current buffer out on a new grid (clamped to [8, 80]).
 */
export function withGrid(state: DocumentState, grid: GridSize): DocumentState {
  return withState(state, { layout: layoutText(state.text, clampGrid(grid)) });
}
