/**
 * DocumentStore interface for the manuscript editor.
 * Framework-agnostic store interface compatible with React's useSyncExternalStore,
 * Redux, Zustand, Vue, Svelte, and vanilla JavaScript.
 */

import type { DocumentState } from './state.ts';
import type { DocumentAction } from './actions.ts';
import type {
  DocumentEventEmitter,
  DocumentEventMap,
  EventHandler,
} from '../store/features/events.ts';
import type { SearchOptions, SearchResult } from '../store/features/search.ts';

/**
 * Listener function type for store subscriptions.
 */
export type StoreListener = () => void;

/**
 * Unsubscribe function returned by subscribe.
 */
export type Unsubscribe = () => void;

/**
 * Core framework-agnostic store interface.
 * Compatible with React's useSyncExternalStore, Redux, Zustand, etc.
 */
export interface DocumentStore {
  /**
   * Subscribe to state changes.
   * The listener is called whenever the state changes.
   * @returns Unsubscribe function to remove the listener
   */
  subscribe(listener: StoreListener): Unsubscribe;

  /**
   * Get current immutable state snapshot.
   * Must return the same reference if state hasn't changed.
   * This enables React's useSyncExternalStore to work correctly.
   */
  getSnapshot(): DocumentState;

  /**
   * Get server-side snapshot (for SSR/hydration).
   * Returns the same as getSnapshot() by default.
   */
  getServerSnapshot?(): DocumentState;

  /**
   * Dispatch an action to modify state.
   * Returns the new state after the action is applied.
   */
  dispatch(action: DocumentAction): DocumentState;

  /**
   * Apply several actions as one state update.
   * Listeners are notified only once after all actions complete.
   * Each edit still records its own history entry.
   */
  batch(actions: readonly DocumentAction[]): DocumentState;

  /**
   * Search from the current selection, wrapping around once.
   * A match becomes the selection (anchor at its start, cursor at its end)
   * and is scrolled into view.
   *
   * @example
   * ```typescript
   * const result = store.find('原稿', { forward: true });
   * if (result.status === 'invalid-pattern') showError(result.message);
   * ```
   */
  find(pattern: string, options?: SearchOptions): SearchResult;
}

/**
 * Read-only subset of DocumentStore for consumers that only need to read state.
 * Useful for selectors and derived state.
 */
export interface ReadonlyDocumentStore {
  subscribe(listener: StoreListener): Unsubscribe;
  getSnapshot(): DocumentState;
  getServerSnapshot?(): DocumentState;
}

/**
 * Type for the document reducer function.
 * Pure function that produces new state from old state + action.
 */
export type DocumentReducer = (
  state: DocumentState,
  action: DocumentAction
) => DocumentState;

/**
 * Extended store interface that combines state management with event emission.
 *
 * Use this when you need to react to specific document changes
 * (content, dirty flag, character count, cursor position) rather than
 * just knowing that "something changed".
 */
export interface DocumentStoreWithEvents extends DocumentStore {
  /**
   * Subscribe to typed document events.
   *
   * @example
   * ```typescript
   * store.addEventListener('cursor-position-change', (event) => {
   *   status.textContent = `${event.position.page}枚 ${event.position.column}行 ${event.position.cell}字`;
   * });
   * ```
   */
  addEventListener<K extends keyof DocumentEventMap>(
    type: K,
    handler: EventHandler<DocumentEventMap[K]>
  ): Unsubscribe;

  /**
   * Remove a previously registered event listener.
   */
  removeEventListener<K extends keyof DocumentEventMap>(
    type: K,
    handler: EventHandler<DocumentEventMap[K]>
  ): void;

  /**
   * Access the underlying event emitter for advanced use cases.
   * Prefer addEventListener/removeEventListener for typical usage.
   */
  readonly events: DocumentEventEmitter;
}
