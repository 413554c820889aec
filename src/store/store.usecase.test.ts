/**
 * Editor use case tests for the manuscript document store.
 * Tests simulate real-world editing scenarios and workflows.
 */

import { describe, it, expect } from 'vitest';
import { createDocumentStore } from './features/store.ts';
import { DocumentActions } from './features/actions.ts';
import { resolveKeyCommand } from './features/keymap.ts';
import { paginateForExport } from './features/export.ts';
import { pageColumnCell } from './features/cursor.ts';
import { canRedo, canUndo } from './core/history.ts';
import { textOffset } from '../types/branded.ts';
import type { KeyInput } from './features/keymap.ts';
import type { DocumentStore } from '../types/store.ts';

function press(store: DocumentStore, input: KeyInput): void {
  const action = resolveKeyCommand(input);
  if (action !== null) store.dispatch(action);
}

describe('Editor Use Cases', () => {
  describe('Basic Text Editing', () => {
    it('should handle typing a sentence character by character', () => {
      const store = createDocumentStore();
      for (const ch of 'こんにちは') {
        press(store, { key: ch, text: ch });
      }

      const state = store.getSnapshot();
      expect(state.text).toBe('こんにちは');
      expect(state.characterCount).toBe(5);
      expect(state.version).toBe(5);
      expect(state.metadata.isDirty).toBe(true);
    });

    it('should handle line breaks, tabs and backspace from the keyboard', () => {
      const store = createDocumentStore();
      press(store, { key: 'Tab' });
      press(store, { key: 'あ', text: 'あ' });
      press(store, { key: 'Enter' });
      press(store, { key: 'い', text: 'い' });
      press(store, { key: 'Backspace' });

      const state = store.getSnapshot();
      expect(state.text).toBe('　あ\n');
      expect(state.characterCount).toBe(2);
      expect(pageColumnCell(state.layout, state.selection.cursor)).toEqual({ page: 1, column: 2, cell: 1 });
    });

    it('should replace a selection made with shift-arrows', () => {
      const store = createDocumentStore({ content: '春はあけぼの' });
      press(store, { key: 'ArrowDown', shift: true });
      press(store, { key: 'ArrowDown', shift: true });
      press(store, { key: '夏', text: '夏' });
      expect(store.getSnapshot().text).toBe('夏あけぼの');
    });
  });

  describe('Undo/Redo Workflows', () => {
    it('should restore the exact text and selection after replace and undo', () => {
      const store = createDocumentStore();
      store.dispatch(DocumentActions.insert('原稿用紙'));
      const before = store.getSnapshot();

      store.dispatch(DocumentActions.replace(textOffset(2), textOffset(4), '原稿'));
      expect(store.getSnapshot().text).toBe('原稿原稿');

      store.dispatch(DocumentActions.undo());
      const after = store.getSnapshot();
      expect(after.text).toBe(before.text);
      expect(after.selection).toEqual(before.selection);
      expect(canRedo(after)).toBe(true);
    });

    it('should clear dirty when undoing back to the saved text', () => {
      const store = createDocumentStore({ content: '吾輩は猫である' });
      press(store, { key: 'End' });
      press(store, { key: '。', text: '。' });
      expect(store.getSnapshot().metadata.isDirty).toBe(true);

      press(store, { key: 'z', ctrl: true });
      expect(store.getSnapshot().metadata.isDirty).toBe(false);

      press(store, { key: 'y', ctrl: true });
      expect(store.getSnapshot().text).toBe('吾輩は猫である。');
    });

    it('should start fresh history on load', () => {
      const store = createDocumentStore();
      store.dispatch(DocumentActions.insert('draft'));
      store.dispatch(DocumentActions.load('opened file'));
      const state = store.getSnapshot();
      expect(canUndo(state)).toBe(false);
      expect(state.metadata.isDirty).toBe(false);
    });
  });

  describe('Search', () => {
    it('should wrap around to find a match before the cursor', () => {
      const store = createDocumentStore({ content: '原稿用紙に書く' });
      store.dispatch(DocumentActions.moveToEnd());

      const result = store.find('原稿', { forward: true });

      expect(result).toEqual({ status: 'found', start: 0, end: 2 });
      expect(store.getSnapshot().selection).toEqual({ cursor: 2, anchor: 0 });
    });

    it('should step through successive matches', () => {
      const store = createDocumentStore({ content: 'abcABCabc' });
      expect(store.find('abc')).toEqual({ status: 'found', start: 0, end: 3 });
      expect(store.find('abc')).toEqual({ status: 'found', start: 3, end: 6 });
      expect(store.find('abc', { caseSensitive: true })).toEqual({ status: 'found', start: 6, end: 9 });
    });

    it('should report invalid patterns without moving the selection', () => {
      const store = createDocumentStore({ content: 'abc' });
      const before = store.getSnapshot();
      const result = store.find('(', { regex: true });
      expect(result.status).toBe('invalid-pattern');
      expect(store.getSnapshot()).toBe(before);
    });

    it('should fail on an empty pattern', () => {
      const store = createDocumentStore({ content: 'abc' });
      expect(store.find('')).toEqual({ status: 'not-found' });
    });
  });

  describe('Read-only Documents', () => {
    it('should allow reading and searching but not editing', () => {
      const store = createDocumentStore({ content: 'abc', readOnly: true });
      const before = store.getSnapshot();
      press(store, { key: 'x', text: 'x' });
      press(store, { key: 'Delete' });
      expect(store.getSnapshot()).toBe(before);

      expect(store.find('c')).toEqual({ status: 'found', start: 2, end: 3 });
    });
  });

  describe('Export', () => {
    it('should export at the fixed grid regardless of the live grid', () => {
      const store = createDocumentStore({ rows: 8, cols: 8, content: 'あ'.repeat(100) });
      expect(store.getSnapshot().layout.totalPages).toBe(2);

      const exported = paginateForExport(store.getSnapshot().text);
      expect(exported.totalPages).toBe(1);
      expect(exported.pages[0].units).toHaveLength(100);
    });
  });

  describe('Viewport', () => {
    it('should open scrolled to the first page on the right', () => {
      // 40 x 40 at 36px: one 1440px page, content 1452px in an 800px viewport
      const store = createDocumentStore();
      expect(store.getSnapshot().viewport.scrollX).toBe(652);
      expect(store.getSnapshot().viewport.scrollY).toBe(0);
    });
  });
});
