/**
 * Document action types for the manuscript editor.
 * All document mutations are expressed as serializable actions.
 * Actions are serializable for debugging, replay and testing.
 */

import type { TextOffset } from './branded.ts';

// =============================================================================
// Document Actions
// =============================================================================

/**
 * Replace the whole buffer, as when a file is opened.
 * Resets history and the saved snapshot.
 */
export interface LoadAction {
  readonly type: 'LOAD';
  readonly text: string;
}

// =============================================================================
// Text Editing Actions
// =============================================================================

/**
 * Insert text at the cursor, replacing the selection.
 */
export interface InsertAction {
  readonly type: 'INSERT';
  readonly text: string;
}

/**
 * Replace the range [start, end) with new text.
 */
export interface ReplaceAction {
  readonly type: 'REPLACE';
  /** Start of the range (inclusive, scalar offset) */
  readonly start: TextOffset;
  /** End of the range (exclusive, scalar offset) */
  readonly end: TextOffset;
  readonly text: string;
}

/**
 * Delete the range [start, end).
 */
export interface DeleteAction {
  readonly type: 'DELETE';
  readonly start: TextOffset;
  readonly end: TextOffset;
}

/**
 * Delete the selection, or the scalar before the cursor.
 */
export interface DeleteBackwardAction {
  readonly type: 'DELETE_BACKWARD';
}

/**
 * Delete the selection, or the scalar after the cursor.
 */
export interface DeleteForwardAction {
  readonly type: 'DELETE_FORWARD';
}

// =============================================================================
// Selection Actions
// =============================================================================

/**
 * Set the cursor and anchor directly.
 */
export interface SetSelectionAction {
  readonly type: 'SET_SELECTION';
  readonly cursor: TextOffset;
  readonly anchor: TextOffset;
}

export interface SelectAllAction {
  readonly type: 'SELECT_ALL';
}

/**
 * Collapse the selection onto the cursor.
 */
export interface ClearSelectionAction {
  readonly type: 'CLEAR_SELECTION';
}

/**
 * Move the cursor by a grid delta. Positive deltaCol moves to later columns
 * (leftward on screen), positive deltaRow moves down.
 */
export interface MoveVisualAction {
  readonly type: 'MOVE_VISUAL';
  readonly deltaCol: number;
  readonly deltaRow: number;
  /** Keep the anchor in place (extend the selection) */
  readonly extend: boolean;
}

export interface MoveToStartAction {
  readonly type: 'MOVE_TO_START';
  readonly extend: boolean;
}

export interface MoveToEndAction {
  readonly type: 'MOVE_TO_END';
  readonly extend: boolean;
}

/**
 * Place the cursor at a viewport point.
 */
export interface ClickAction {
  readonly type: 'CLICK';
  readonly x: number;
  readonly y: number;
  readonly extend: boolean;
}

// =============================================================================
// History Actions
// =============================================================================

export interface UndoAction {
  readonly type: 'UNDO';
}

export interface RedoAction {
  readonly type: 'REDO';
}

// =============================================================================
// Save State Actions
// =============================================================================

/**
 * Record the current text as saved.
 */
export interface MarkSavedAction {
  readonly type: 'MARK_SAVED';
  /** Save time in ms since the epoch (defaults to Date.now()) */
  readonly timestamp?: number;
}

/**
 * Force the dirty flag on without touching the saved snapshot.
 */
export interface MarkModifiedAction {
  readonly type: 'MARK_MODIFIED';
}

export interface SetReadOnlyAction {
  readonly type: 'SET_READ_ONLY';
  readonly readOnly: boolean;
}

// =============================================================================
// View Actions
// =============================================================================

/**
 * Change the manuscript grid. Dimensions are clamped to [8, 80].
 */
export interface SetGridAction {
  readonly type: 'SET_GRID';
  readonly rows: number;
  readonly cols: number;
}

export interface SetCellSizeAction {
  readonly type: 'SET_CELL_SIZE';
  readonly cellSize: number;
}

export interface SetViewportAction {
  readonly type: 'SET_VIEWPORT';
  readonly width: number;
  readonly height: number;
}

export interface ScrollToAction {
  readonly type: 'SCROLL_TO';
  readonly scrollX: number;
  readonly scrollY: number;
}

// =============================================================================
// Input Method Actions
// =============================================================================

/**
 * Replace the uncommitted composition text.
 */
export interface SetPreeditAction {
  readonly type: 'SET_PREEDIT';
  readonly text: string;
}

/**
 * An input method update: new preedit text plus any committed text.
 */
export interface ComposeAction {
  readonly type: 'COMPOSE';
  readonly preedit: string;
  readonly commit: string;
}

// =============================================================================
// Union Type
// =============================================================================

/**
 * All possible document actions.
 * This union type ensures type safety when dispatching actions.
 */
export type DocumentAction =
  | LoadAction
  | InsertAction
  | ReplaceAction
  | DeleteAction
  | DeleteBackwardAction
  | DeleteForwardAction
  | SetSelectionAction
  | SelectAllAction
  | ClearSelectionAction
  | MoveVisualAction
  | MoveToStartAction
  | MoveToEndAction
  | ClickAction
  | UndoAction
  | RedoAction
  | MarkSavedAction
  | MarkModifiedAction
  | SetReadOnlyAction
  | SetGridAction
  | SetCellSizeAction
  | SetViewportAction
  | ScrollToAction
  | SetPreeditAction
  | ComposeAction;

/**
 * Extract the action type string from an action.
 */
export type DocumentActionType = DocumentAction['type'];

// =============================================================================
// Action Type Guards
// =============================================================================

/**
 * Check if an action edits the buffer text.
 * Read-only documents ignore these.
 */
export function isTextEditAction(
  action: DocumentAction
): action is
  | InsertAction
  | ReplaceAction
  | DeleteAction
  | DeleteBackwardAction
  | DeleteForwardAction
  | ComposeAction {
  return (
    action.type === 'INSERT' ||
    action.type === 'REPLACE' ||
    action.type === 'DELETE' ||
    action.type === 'DELETE_BACKWARD' ||
    action.type === 'DELETE_FORWARD' ||
    action.type === 'COMPOSE'
  );
}

/**
 * Check if an action is a history action.
 */
export function isHistoryAction(action: DocumentAction): action is UndoAction | RedoAction {
  return action.type === 'UNDO' || action.type === 'REDO';
}

/**
 * Check if an action moves the cursor or changes the selection.
 */
export function isSelectionAction(
  action: DocumentAction
): action is
  | SetSelectionAction
  | SelectAllAction
  | ClearSelectionAction
  | MoveVisualAction
  | MoveToStartAction
  | MoveToEndAction
  | ClickAction {
  return (
    action.type === 'SET_SELECTION' ||
    action.type === 'SELECT_ALL' ||
    action.type === 'CLEAR_SELECTION' ||
    action.type === 'MOVE_VISUAL' ||
    action.type === 'MOVE_TO_START' ||
    action.type === 'MOVE_TO_END' ||
    action.type === 'CLICK'
  );
}

// =============================================================================
// Structural Checks
// =============================================================================

type FieldKind = 'number' | 'string' | 'boolean';

/**
 * Required fields and their primitive types, per action type.
 */
const ACTION_FIELDS: { readonly [K in DocumentActionType]: Readonly<Record<string, FieldKind>> } = {
  LOAD: { text: 'string' },
  INSERT: { text: 'string' },
  REPLACE: { start: 'number', end: 'number', text: 'string' },
  DELETE: { start: 'number', end: 'number' },
  DELETE_BACKWARD: {},
  DELETE_FORWARD: {},
  SET_SELECTION: { cursor: 'number', anchor: 'number' },
  SELECT_ALL: {},
  CLEAR_SELECTION: {},
  MOVE_VISUAL: { deltaCol: 'number', deltaRow: 'number', extend: 'boolean' },
  MOVE_TO_START: { extend: 'boolean' },
  MOVE_TO_END: { extend: 'boolean' },
  CLICK: { x: 'number', y: 'number', extend: 'boolean' },
  UNDO: {},
  REDO: {},
  MARK_SAVED: {},
  MARK_MODIFIED: {},
  SET_READ_ONLY: { readOnly: 'boolean' },
  SET_GRID: { rows: 'number', cols: 'number' },
  SET_CELL_SIZE: { cellSize: 'number' },
  SET_VIEWPORT: { width: 'number', height: 'number' },
  SCROLL_TO: { scrollX: 'number', scrollY: 'number' },
  SET_PREEDIT: { text: 'string' },
  COMPOSE: { preedit: 'string', commit: 'string' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isActionType(value: unknown): value is DocumentActionType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ACTION_FIELDS, value);
}

/**
 * Check if an unknown value is a valid DocumentAction.
 * Useful for validating actions from external sources.
 */
export function isDocumentAction(value: unknown): value is DocumentAction {
  return validateAction(value).valid;
}

// =============================================================================
// Action Validation
// =============================================================================

/**
 * Result of validating an action.
 */
export interface ActionValidationResult {
  /** Whether the action is valid */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}

function checkOffset(type: string, name: string, value: unknown, documentLength: number | undefined, errors: string[]): void {
  if (typeof value !== 'number') return;
  if (value < 0) {
    errors.push(`${type} ${name} cannot be negative: ${value}`);
  } else if (documentLength !== undefined && value > documentLength) {
    errors.push(`${type} ${name} ${value} exceeds document length ${documentLength}`);
  }
}

/**
 * Validate an action with detailed error messages.
 * Optionally validates offset bounds against document length.
 *
 * @example
 * ```typescript
 * const result = validateAction(action, 100); // documentLength = 100
 * if (!result.valid) {
 *   console.error('Invalid action:', result.errors);
 * }
 * ```
 */
export function validateAction(value: unknown, documentLength?: number): ActionValidationResult {
  const errors: string[] = [];

  if (!isRecord(value)) {
    errors.push('Action must be a non-null object');
    return { valid: false, errors };
  }

  if (typeof value.type !== 'string') {
    errors.push('Action must have a string "type" property');
    return { valid: false, errors };
  }

  const type = value.type;
  if (!isActionType(type)) {
    errors.push(`Unknown action type: "${type}"`);
    return { valid: false, errors };
  }

  for (const [field, kind] of Object.entries(ACTION_FIELDS[type])) {
    const fieldValue = value[field];
    if (typeof fieldValue !== kind) {
      const article = kind === 'number' ? 'a numeric' : `a ${kind}`;
      errors.push(`${type} action requires ${article} "${field}" property`);
    } else if (typeof fieldValue === 'number' && !Number.isFinite(fieldValue)) {
      errors.push(`${type} ${field} must be finite: ${fieldValue}`);
    }
  }

  switch (type) {
    case 'REPLACE':
    case 'DELETE': {
      checkOffset(type, 'start', value.start, documentLength, errors);
      checkOffset(type, 'end', value.end, documentLength, errors);
      if (typeof value.start === 'number' && typeof value.end === 'number' && value.start > value.end) {
        errors.push(`${type} start (${value.start}) cannot be greater than end (${value.end})`);
      }
      break;
    }
    case 'SET_SELECTION': {
      checkOffset(type, 'cursor', value.cursor, documentLength, errors);
      checkOffset(type, 'anchor', value.anchor, documentLength, errors);
      break;
    }
    case 'MARK_SAVED': {
      if (value.timestamp !== undefined && typeof value.timestamp !== 'number') {
        errors.push('MARK_SAVED timestamp must be a number when present');
      }
      break;
    }
    default:
      break;
  }

  return { valid: errors.length === 0, errors };
}
