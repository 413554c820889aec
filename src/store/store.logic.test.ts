/**
 * Store contract and event emission tests.
 */

import { describe, it, expect, vi } from 'vitest';
import { createDocumentStore, createDocumentStoreWithEvents, isDocumentStore } from './features/store.ts';
import { DocumentActions } from './features/actions.ts';
import { textOffset } from '../types/branded.ts';
import type { DocumentStoreConfig } from '../types/state.ts';

// One 128px page inside a 200px viewport
const SMALL: Partial<DocumentStoreConfig> = {
  rows: 8,
  cols: 8,
  cellSize: 16,
  viewportWidth: 200,
  viewportHeight: 200,
};

describe('createDocumentStore', () => {
  it('should return the same snapshot until something changes', () => {
    const store = createDocumentStore({ content: 'abc' });
    const first = store.getSnapshot();
    expect(store.getSnapshot()).toBe(first);
    expect(store.getServerSnapshot?.()).toBe(first);
    expect(store.dispatch(DocumentActions.undo())).toBe(first);
  });

  it('should notify subscribers only on change', () => {
    const store = createDocumentStore();
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    store.dispatch(DocumentActions.insert('a'));
    store.dispatch(DocumentActions.insert(''));
    expect(listener).toHaveBeenCalledTimes(1);

    unsubscribe();
    store.dispatch(DocumentActions.insert('b'));
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should keep notifying when a listener throws', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const store = createDocumentStore();
    const failure = new Error('listener failed');
    const good = vi.fn();
    store.subscribe(() => {
      throw failure;
    });
    store.subscribe(good);

    store.dispatch(DocumentActions.insert('a'));

    expect(good).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('Store listener threw an error:', failure);
    error.mockRestore();
  });

  it('should notify once for a batch', () => {
    const store = createDocumentStore();
    const listener = vi.fn();
    store.subscribe(listener);

    const state = store.batch([
      DocumentActions.insert('a'),
      DocumentActions.insert('b'),
      DocumentActions.selectAll(),
    ]);

    expect(state.text).toBe('ab');
    expect(state.selection).toEqual({ cursor: 2, anchor: 0 });
    expect(state.history.entries).toHaveLength(3);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should not notify for an empty batch', () => {
    const store = createDocumentStore();
    const listener = vi.fn();
    store.subscribe(listener);
    store.batch([]);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('isDocumentStore', () => {
  it('should recognise stores', () => {
    expect(isDocumentStore(createDocumentStore())).toBe(true);
    expect(isDocumentStore(createDocumentStoreWithEvents())).toBe(true);
    expect(isDocumentStore({ subscribe: () => undefined })).toBe(false);
    expect(isDocumentStore(null)).toBe(false);
  });
});

describe('createDocumentStoreWithEvents', () => {
  it('should emit content, count, dirty and position events for an edit', () => {
    const store = createDocumentStoreWithEvents(SMALL);
    const content = vi.fn();
    const count = vi.fn();
    const dirty = vi.fn();
    const position = vi.fn();
    store.addEventListener('content-change', content);
    store.addEventListener('character-count-change', count);
    store.addEventListener('dirty-change', dirty);
    store.addEventListener('cursor-position-change', position);

    store.dispatch(DocumentActions.insert('あい'));

    expect(content).toHaveBeenCalledTimes(1);
    expect(content.mock.calls[0][0].affectedRange).toEqual([0, 2]);
    expect(count.mock.calls[0][0].count).toBe(2);
    expect(dirty.mock.calls[0][0].isDirty).toBe(true);
    expect(position.mock.calls[0][0].position).toEqual({ page: 1, column: 1, cell: 3 });
  });

  it('should emit dirty-change only when the flag flips', () => {
    const store = createDocumentStoreWithEvents(SMALL);
    const dirty = vi.fn();
    store.addEventListener('dirty-change', dirty);

    store.dispatch(DocumentActions.insert('a'));
    store.dispatch(DocumentActions.insert('b'));
    expect(dirty).toHaveBeenCalledTimes(1);

    store.dispatch(DocumentActions.markSaved(1));
    expect(dirty).toHaveBeenCalledTimes(2);
    expect(dirty.mock.calls[1][0].isDirty).toBe(false);
  });

  it('should emit save and history events', () => {
    const store = createDocumentStoreWithEvents(SMALL);
    const save = vi.fn();
    const history = vi.fn();
    store.addEventListener('save', save);
    store.addEventListener('history-change', history);

    store.dispatch(DocumentActions.insert('a'));
    store.dispatch(DocumentActions.markSaved(42));
    store.dispatch(DocumentActions.undo());
    store.dispatch(DocumentActions.redo());

    expect(save).toHaveBeenCalledTimes(1);
    expect(save.mock.calls[0][0].state.metadata.lastSaved).toBe(42);
    expect(history.mock.calls.map(([event]) => event.direction)).toEqual(['undo', 'redo']);
  });

  it('should emit selection-change only when the selection moves', () => {
    const store = createDocumentStoreWithEvents({ ...SMALL, content: 'abc' });
    const selection = vi.fn();
    store.addEventListener('selection-change', selection);

    store.dispatch(DocumentActions.setSelection(textOffset(2)));
    store.dispatch(DocumentActions.setSelection(textOffset(2)));
    store.find('a');

    expect(selection).toHaveBeenCalledTimes(2);
    expect(selection.mock.calls[1][0].nextState.selection).toEqual({ cursor: 1, anchor: 0 });
  });

  it('should not emit a position event when the cell stays the same', () => {
    const store = createDocumentStoreWithEvents({ ...SMALL, content: 'abc' });
    const position = vi.fn();
    store.addEventListener('cursor-position-change', position);

    store.dispatch(DocumentActions.selectAll());
    store.dispatch(DocumentActions.clearSelection());
    expect(position).toHaveBeenCalledTimes(1);
    expect(position.mock.calls[0][0].position).toEqual({ page: 1, column: 1, cell: 4 });
  });

  it('should emit viewport-change on scroll', () => {
    const store = createDocumentStoreWithEvents({ ...SMALL, content: '\n'.repeat(16), viewportHeight: 100 });
    const viewport = vi.fn();
    store.addEventListener('viewport-change', viewport);

    store.dispatch(DocumentActions.scrollTo(10, 10));
    store.dispatch(DocumentActions.scrollTo(10, 10));

    expect(viewport).toHaveBeenCalledTimes(1);
    expect(viewport.mock.calls[0][0].viewport).toMatchObject({ scrollX: 10, scrollY: 10 });
  });

  it('should emit events for each action in a batch', () => {
    const store = createDocumentStoreWithEvents(SMALL);
    const content = vi.fn();
    store.addEventListener('content-change', content);

    store.batch([DocumentActions.insert('a'), DocumentActions.insert('b')]);

    expect(content).toHaveBeenCalledTimes(2);
    expect(content.mock.calls[1][0].affectedRange).toEqual([1, 2]);
  });

  it('should stop delivering after removeEventListener', () => {
    const store = createDocumentStoreWithEvents(SMALL);
    const handler = vi.fn();
    store.addEventListener('content-change', handler);
    store.removeEventListener('content-change', handler);
    store.dispatch(DocumentActions.insert('a'));
    expect(handler).not.toHaveBeenCalled();
  });
});
