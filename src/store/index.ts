/**
 * Store exports for the manuscript editor.
 */

// Store factory
export { createDocumentStore, createDocumentStoreWithEvents, isDocumentStore } from './features/store.ts';

// Action creators
export { DocumentActions, serializeAction, deserializeAction } from './features/actions.ts';

// State factories
export {
  MIN_CELL_SIZE,
  DEFAULT_CELL_SIZE,
  DEFAULT_PAGE_GAP,
  DEFAULT_OUTER_MARGIN,
  DEFAULT_CONFIG,
  clampCellSize,
  createInitialState,
  createInitialSelectionState,
  createInitialMetadata,
  createInitialViewport,
  withState,
  withText,
  withGrid,
} from './core/state.ts';

// Reducer
export { documentReducer, replaceRange } from './features/reducer.ts';

// Scalar offsets
export {
  toScalars,
  scalarLength,
  scalarToCodeUnitOffset,
  codeUnitToScalarOffset,
  sliceScalars,
  normalizeNewlines,
  countCharacters,
} from './core/scalars.ts';

// Tokenizer and layout
export { isAsciiDigit, tokenize, tokenizeScalars } from './core/tokenizer.ts';
export {
  LINE_HEAD_PROHIBITED,
  LINE_END_PROHIBITED,
  isLineHeadProhibited,
  isLineEndProhibited,
} from './core/kinsoku.ts';
export {
  MIN_GRID_SIZE,
  MAX_GRID_SIZE,
  DEFAULT_GRID_SIZE,
  clampGridDimension,
  clampGrid,
  pageOfColumn,
  getSlot,
  layoutTokens,
  layoutText,
} from './core/layout.ts';

// History helpers
export {
  createSnapshot,
  snapshotsEqual,
  createHistoryState,
  currentSnapshot,
  pushSnapshot,
  stepBack,
  stepForward,
  canUndo,
  canRedo,
  getUndoCount,
  getRedoCount,
  isHistoryEmpty,
} from './core/history.ts';

// Cursor and selection
export {
  nearestOffset,
  visualMoveTarget,
  createSelection,
  moveCursorTo,
  moveVisual,
  clampSelection,
  selectAll,
  clearSelection,
  selectionsEqual,
  selectedRange,
  hasSelection,
  selectedText,
  pageColumnCell,
  positionsEqual,
} from './features/cursor.ts';

// Geometry
export {
  getPageMetrics,
  pageOriginX,
  pageRect,
  cellRect,
  offsetRect,
  toViewportRect,
  intersectsViewport,
  pointToGrid,
  clampScroll,
  scrollToReveal,
  ensureCursorVisible,
} from './features/geometry.ts';
export type { GeometrySource, PageMetrics } from './features/geometry.ts';

// Search
export { compilePattern, foldCase, findInText } from './features/search.ts';
export type {
  SearchOptions,
  SearchFound,
  SearchNotFound,
  SearchInvalidPattern,
  SearchResult,
} from './features/search.ts';

// Glyphs
export {
  VERTICAL_GLYPH_MAP,
  LIVE_GLYPH_METRICS,
  EXPORT_GLYPH_METRICS,
  verticalForm,
  isRotatedAlphanumeric,
  glyphFor,
} from './features/glyphs.ts';
export type { GlyphOrientation, GlyphMetrics, Glyph } from './features/glyphs.ts';

// Rendering utilities
export {
  getVisiblePages,
  getGridLines,
  getRenderCells,
  getPreeditCells,
  getOffsetRect,
  getCaretRect,
} from './features/rendering.ts';
export type { VisiblePage, GridLine, RenderCell, PreeditCell } from './features/rendering.ts';

// Export
export { EXPORT_GRID, paginateForExport, joinForExport } from './features/export.ts';
export type { ExportPage, ExportDocument } from './features/export.ts';
export { renderExportPageSvg, renderExportSvg } from './features/svg-export.ts';
export type { SvgExportOptions } from './features/svg-export.ts';

// Settings
export {
  MIN_FONT_SIZE,
  MAX_FONT_SIZE,
  DEFAULT_FONT_SIZE,
  cellSizeForFontSize,
  editorSettingsSchema,
  parseEditorSettings,
  DEFAULT_SETTINGS,
  settingsToStoreConfig,
  exportGridOf,
} from './features/settings.ts';
export type { EditorSettings } from './features/settings.ts';

// Keymap
export { IDEOGRAPHIC_SPACE, resolveKeyCommand } from './features/keymap.ts';
export type { KeyInput } from './features/keymap.ts';

// Event system
export {
  createEventEmitter,
  createContentChangeEvent,
  createSelectionChangeEvent,
  createHistoryChangeEvent,
  createSaveEvent,
  createDirtyChangeEvent,
  createCharacterCountChangeEvent,
  createCursorPositionChangeEvent,
  createViewportChangeEvent,
  getAffectedRange,
} from './features/events.ts';
export type {
  DocumentEvent,
  ContentChangeEvent,
  SelectionChangeEvent,
  HistoryChangeEvent,
  SaveEvent,
  DirtyChangeEvent,
  CharacterCountChangeEvent,
  CursorPositionChangeEvent,
  ViewportChangeEvent,
  AnyDocumentEvent,
  DocumentEventMap,
  EventHandler,
  DocumentEventEmitter,
} from './features/events.ts';
