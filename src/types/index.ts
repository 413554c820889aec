/**
 * Type exports for the manuscript editor.
 */

// State types
export type {
  CharToken,
  NewlineToken,
  TcyToken,
  Token,
  TokenKind,
  GridSize,
  GridPosition,
  LayoutUnit,
  LayoutResult,
  SelectionState,
  TextRange,
  HistorySnapshot,
  HistoryState,
  ViewportState,
  Point,
  Rect,
  ManuscriptPosition,
  DocumentMetadata,
  DocumentState,
  DocumentStoreConfig,
} from './state.ts';

// Action types
export type {
  LoadAction,
  InsertAction,
  ReplaceAction,
  DeleteAction,
  DeleteBackwardAction,
  DeleteForwardAction,
  SetSelectionAction,
  SelectAllAction,
  ClearSelectionAction,
  MoveVisualAction,
  MoveToStartAction,
  MoveToEndAction,
  ClickAction,
  UndoAction,
  RedoAction,
  MarkSavedAction,
  MarkModifiedAction,
  SetReadOnlyAction,
  SetGridAction,
  SetCellSizeAction,
  SetViewportAction,
  ScrollToAction,
  SetPreeditAction,
  ComposeAction,
  DocumentAction,
  DocumentActionType,
  ActionValidationResult,
} from './actions.ts';

export {
  isTextEditAction,
  isHistoryAction,
  isSelectionAction,
  isDocumentAction,
  validateAction,
} from './actions.ts';

// Store types
export type {
  StoreListener,
  Unsubscribe,
  DocumentStore,
  DocumentStoreWithEvents,
  ReadonlyDocumentStore,
  DocumentReducer,
} from './store.ts';

// Branded position types
export type { TextOffset } from './branded.ts';

export {
  textOffset,
  isValidOffset,
  addTextOffset,
  diffTextOffset,
  minTextOffset,
  maxTextOffset,
  clampTextOffset,
  ZERO_TEXT_OFFSET,
} from './branded.ts';
