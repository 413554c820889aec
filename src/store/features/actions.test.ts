/**
 * Tests for action creators, guards and validation.
 */

import { describe, it, expect } from 'vitest';
import { DocumentActions, serializeAction, deserializeAction } from './actions.ts';
import {
  isDocumentAction,
  isTextEditAction,
  isHistoryAction,
  isSelectionAction,
  validateAction,
} from '../../types/actions.ts';
import { textOffset } from '../../types/branded.ts';

describe('DocumentActions', () => {
  it('should create frozen actions', () => {
    const action = DocumentActions.replace(textOffset(1), textOffset(3), '原稿');
    expect(action).toEqual({ type: 'REPLACE', start: 1, end: 3, text: '原稿' });
    expect(Object.isFrozen(action)).toBe(true);
  });

  it('should default optional arguments', () => {
    expect(DocumentActions.setSelection(textOffset(4))).toEqual({ type: 'SET_SELECTION', cursor: 4, anchor: 4 });
    expect(DocumentActions.moveVisual(1, 0)).toEqual({ type: 'MOVE_VISUAL', deltaCol: 1, deltaRow: 0, extend: false });
    expect(DocumentActions.compose('にほ')).toEqual({ type: 'COMPOSE', preedit: 'にほ', commit: '' });
    expect(DocumentActions.markSaved()).toEqual({ type: 'MARK_SAVED' });
    expect(DocumentActions.markSaved(1000)).toEqual({ type: 'MARK_SAVED', timestamp: 1000 });
  });
});

describe('action guards', () => {
  it('should classify text edits', () => {
    expect(isTextEditAction(DocumentActions.insert('a'))).toBe(true);
    expect(isTextEditAction(DocumentActions.deleteBackward())).toBe(true);
    expect(isTextEditAction(DocumentActions.compose('', 'a'))).toBe(true);
    expect(isTextEditAction(DocumentActions.load('a'))).toBe(false);
    expect(isTextEditAction(DocumentActions.undo())).toBe(false);
  });

  it('should classify history and selection actions', () => {
    expect(isHistoryAction(DocumentActions.redo())).toBe(true);
    expect(isHistoryAction(DocumentActions.selectAll())).toBe(false);
    expect(isSelectionAction(DocumentActions.click(1, 2))).toBe(true);
    expect(isSelectionAction(DocumentActions.scrollTo(0, 0))).toBe(false);
  });

  it('should recognise well-formed actions from unknown values', () => {
    expect(isDocumentAction({ type: 'UNDO' })).toBe(true);
    expect(isDocumentAction({ type: 'SET_GRID', rows: 20, cols: 20 })).toBe(true);
    expect(isDocumentAction({ type: 'SET_GRID', rows: '20', cols: 20 })).toBe(false);
    expect(isDocumentAction({ type: 'NOPE' })).toBe(false);
    expect(isDocumentAction(null)).toBe(false);
    expect(isDocumentAction([])).toBe(false);
  });
});

describe('validateAction', () => {
  it('should report structural errors', () => {
    expect(validateAction('x')).toEqual({ valid: false, errors: ['Action must be a non-null object'] });
    expect(validateAction({})).toEqual({ valid: false, errors: ['Action must have a string "type" property'] });
    expect(validateAction({ type: 'FOO' })).toEqual({ valid: false, errors: ['Unknown action type: "FOO"'] });
    expect(validateAction({ type: 'INSERT' })).toEqual({
      valid: false,
      errors: ['INSERT action requires a string "text" property'],
    });
    expect(validateAction({ type: 'MOVE_TO_END', extend: 1 })).toEqual({
      valid: false,
      errors: ['MOVE_TO_END action requires a boolean "extend" property'],
    });
  });

  it('should reject non-finite numbers', () => {
    expect(validateAction({ type: 'SCROLL_TO', scrollX: Number.NaN, scrollY: 0 })).toEqual({
      valid: false,
      errors: ['SCROLL_TO scrollX must be finite: NaN'],
    });
  });

  it('should check ranges against the document length', () => {
    expect(validateAction({ type: 'REPLACE', start: 3, end: 1, text: '' }).errors).toEqual([
      'REPLACE start (3) cannot be greater than end (1)',
    ]);
    expect(validateAction({ type: 'DELETE', start: -1, end: 2 }).errors).toEqual([
      'DELETE start cannot be negative: -1',
    ]);
    expect(validateAction({ type: 'SET_SELECTION', cursor: 9, anchor: 0 }, 5).errors).toEqual([
      'SET_SELECTION cursor 9 exceeds document length 5',
    ]);
    expect(validateAction({ type: 'SET_SELECTION', cursor: 5, anchor: 0 }, 5).valid).toBe(true);
  });

  it('should check the optional save timestamp', () => {
    expect(validateAction({ type: 'MARK_SAVED', timestamp: 'now' }).errors).toEqual([
      'MARK_SAVED timestamp must be a number when present',
    ]);
  });
});

describe('serialization', () => {
  it('should round-trip an action through JSON', () => {
    const action = DocumentActions.moveVisual(-1, 0, true);
    const json = serializeAction(action);
    expect(json).toBe('{"type":"MOVE_VISUAL","deltaCol":-1,"deltaRow":0,"extend":true}');
    expect(deserializeAction(json)).toEqual(action);
  });

  it('should throw on malformed actions', () => {
    expect(() => deserializeAction('{"type":"INSERT"}')).toThrow(
      'Invalid deserialized action: {"type":"INSERT"} (INSERT action requires a string "text" property)'
    );
    expect(() => deserializeAction('not json')).toThrow(SyntaxError);
  });
});
