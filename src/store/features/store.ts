/**
 * Document store implementation for the manuscript editor.
 * Factory function that creates a DocumentStore with encapsulated state.
 */

import type { DocumentState, DocumentStoreConfig } from '../../types/state.ts';
import type { DocumentAction } from '../../types/actions.ts';
import type {
  DocumentStore,
  DocumentStoreWithEvents,
  StoreListener,
  Unsubscribe,
} from '../../types/store.ts';
import type { SearchOptions, SearchResult } from './search.ts';
import { isTextEditAction, isSelectionAction } from '../../types/actions.ts';
import { createInitialState, withState } from '../core/state.ts';
import { documentReducer } from './reducer.ts';
import { DocumentActions } from './actions.ts';
import { findInText } from './search.ts';
import { ensureCursorVisible } from './geometry.ts';
import { pageColumnCell, positionsEqual, selectionsEqual } from './cursor.ts';
import {
  createEventEmitter,
  createContentChangeEvent,
  createSelectionChangeEvent,
  createHistoryChangeEvent,
  createSaveEvent,
  createDirtyChangeEvent,
  createCharacterCountChangeEvent,
  createCursorPositionChangeEvent,
  createViewportChangeEvent,
} from './events.ts';

/**
 * Initial state with the cursor cell scrolled into view.
 */
function createRevealedState(config: Partial<DocumentStoreConfig>): DocumentState {
  const state = createInitialState(config);
  const viewport = ensureCursorVisible(state);
  return viewport === state.viewport ? state : withState(state, { viewport });
}

/**
 * Search from the store's selection and select the match.
 */
function findWith(
  getSnapshot: () => DocumentState,
  dispatch: (action: DocumentAction) => DocumentState,
  pattern: string,
  options: SearchOptions
): SearchResult {
  const { text, selection } = getSnapshot();
  const result = findInText(text, selection, pattern, options);
  if (result.status === 'found') {
    dispatch(DocumentActions.setSelection(result.end, result.start));
  }
  return result;
}

/**
 * Factory function to create a DocumentStore.
 * Encapsulates internal mutable state (the current snapshot and listeners).
 *
 * Note: We use a factory function rather than exporting a class directly.
 * This provides encapsulation while maintaining the pure functions + store pattern.
 */
export function createDocumentStore(
  config: Partial<DocumentStoreConfig> = {}
): DocumentStore {
  // Internal mutable state
  let state = createRevealedState(config);
  const listeners = new Set<StoreListener>();

  /**
   * Notify all listeners of state change.
   */
  function notifyListeners(): void {
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        // Don't let one listener's error affect others
        console.error('Store listener threw an error:', error);
      }
    }
  }

  function subscribe(listener: StoreListener): Unsubscribe {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  /**
   * Get current immutable state snapshot.
   * Must return the same reference if state hasn't changed.
   */
  function getSnapshot(): DocumentState {
    return state;
  }

  function getServerSnapshot(): DocumentState {
    return state;
  }

  function dispatch(action: DocumentAction): DocumentState {
    const newState = documentReducer(state, action);

    // Only update if state actually changed (referential equality)
    if (newState !== state) {
      state = newState;
      notifyListeners();
    }

    return state;
  }

  function batch(actions: readonly DocumentAction[]): DocumentState {
    const newState = actions.reduce(documentReducer, state);
    if (newState !== state) {
      state = newState;
      notifyListeners();
    }
    return state;
  }

  function find(pattern: string, options: SearchOptions = {}): SearchResult {
    return findWith(getSnapshot, dispatch, pattern, options);
  }

  return {
    subscribe,
    getSnapshot,
    getServerSnapshot,
    dispatch,
    batch,
    find,
  };
}

/**
 * Create a DocumentStore with integrated event emission.
 * Wraps a base store to automatically emit typed events on dispatch.
 *
 * Events are emitted after state changes:
 * - 'content-change': when an edit or load changes the text
 * - 'selection-change': when a selection action moves the cursor or anchor
 * - 'history-change': on UNDO, REDO
 * - 'save': on MARK_SAVED
 * - 'dirty-change', 'character-count-change', 'cursor-position-change',
 *   'viewport-change': whenever their value changes
 *
 * @example
 * ```typescript
 * const store = createDocumentStoreWithEvents({ content: '春は' });
 *
 * store.addEventListener('character-count-change', (event) => {
 *   console.log('Characters:', event.count);
 * });
 *
 * store.dispatch(DocumentActions.insert('あけぼの'));
 * // Event fires with count: 6
 * ```
 */
export function createDocumentStoreWithEvents(
  config: Partial<DocumentStoreConfig> = {}
): DocumentStoreWithEvents {
  const baseStore = createDocumentStore(config);
  const emitter = createEventEmitter();

  /**
   * Emit appropriate events based on action type and state changes.
   */
  function emitEventsForAction(
    action: DocumentAction,
    prevState: DocumentState,
    nextState: DocumentState
  ): void {
    if ((isTextEditAction(action) || action.type === 'LOAD') && prevState.text !== nextState.text) {
      emitter.emit('content-change', createContentChangeEvent(action, prevState, nextState));
    }

    if (isSelectionAction(action) && !selectionsEqual(prevState.selection, nextState.selection)) {
      emitter.emit('selection-change', createSelectionChangeEvent(prevState, nextState));
    }

    if (action.type === 'UNDO' || action.type === 'REDO') {
      emitter.emit(
        'history-change',
        createHistoryChangeEvent(action.type === 'UNDO' ? 'undo' : 'redo', prevState, nextState)
      );
    }

    if (action.type === 'MARK_SAVED') {
      emitter.emit('save', createSaveEvent(nextState));
    }

    emitDerivedEvents(prevState, nextState);
  }

  /**
   * Events for values derived from state, fired only when they change.
   */
  function emitDerivedEvents(prevState: DocumentState, nextState: DocumentState): void {
    if (prevState.metadata.isDirty !== nextState.metadata.isDirty) {
      emitter.emit('dirty-change', createDirtyChangeEvent(nextState.metadata.isDirty, nextState));
    }

    if (prevState.characterCount !== nextState.characterCount) {
      emitter.emit('character-count-change', createCharacterCountChangeEvent(nextState));
    }

    const prevPosition = pageColumnCell(prevState.layout, prevState.selection.cursor);
    const nextPosition = pageColumnCell(nextState.layout, nextState.selection.cursor);
    if (!positionsEqual(prevPosition, nextPosition)) {
      emitter.emit('cursor-position-change', createCursorPositionChangeEvent(nextPosition, nextState));
    }

    if (prevState.viewport !== nextState.viewport) {
      emitter.emit('viewport-change', createViewportChangeEvent(nextState));
    }
  }

  /**
   * Enhanced dispatch that emits events after state changes.
   */
  function dispatch(action: DocumentAction): DocumentState {
    const prevState = baseStore.getSnapshot();
    const nextState = baseStore.dispatch(action);

    // Only emit events if state actually changed
    if (nextState !== prevState) {
      emitEventsForAction(action, prevState, nextState);
    }

    return nextState;
  }

  /**
   * Enhanced batch that emits events after all actions complete.
   */
  function batch(actions: readonly DocumentAction[]): DocumentState {
    const prevState = baseStore.getSnapshot();
    const nextState = baseStore.batch(actions);

    if (nextState !== prevState) {
      // Replay through reducer to capture intermediate states for accurate events
      let intermediateState = prevState;
      for (const action of actions) {
        const afterAction = documentReducer(intermediateState, action);
        if (afterAction !== intermediateState) {
          emitEventsForAction(action, intermediateState, afterAction);
        }
        intermediateState = afterAction;
      }
    }

    return nextState;
  }

  function find(pattern: string, options: SearchOptions = {}): SearchResult {
    return findWith(baseStore.getSnapshot, dispatch, pattern, options);
  }

  return {
    // Pass through base store methods
    subscribe: baseStore.subscribe,
    getSnapshot: baseStore.getSnapshot,
    getServerSnapshot: baseStore.getServerSnapshot,

    // Enhanced methods with event emission
    dispatch,
    batch,
    find,

    // Event emitter methods
    addEventListener: emitter.addEventListener.bind(emitter),
    removeEventListener: emitter.removeEventListener.bind(emitter),
    events: emitter,
  };
}

/**
 * Check if a value is a DocumentStore.
 * Useful for type narrowing.
 */
export function isDocumentStore(value: unknown): value is DocumentStore {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'subscribe' in value &&
    typeof value.subscribe === 'function' &&
    'getSnapshot' in value &&
    typeof value.getSnapshot === 'function' &&
    'dispatch' in value &&
    typeof value.dispatch === 'function' &&
    'batch' in value &&
    typeof value.batch === 'function' &&
    'find' in value &&
    typeof value.find === 'function'
  );
}
