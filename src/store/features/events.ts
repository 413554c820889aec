/**
 * Event system for the manuscript editor.
 * Provides a pub/sub mechanism for document changes and editor events.
 */

import type { DocumentState, ManuscriptPosition, ViewportState } from '../../types/state.ts';
import type { DocumentAction } from '../../types/actions.ts';
import { toScalars } from '../core/scalars.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface DocumentEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired when document content changes.
 */
export interface ContentChangeEvent extends DocumentEvent {
  readonly type: 'content-change';
  /** The action that caused the change */
  readonly action: DocumentAction;
  /** Document state before the change */
  readonly prevState: DocumentState;
  /** Document state after the change */
  readonly nextState: DocumentState;
  /** Range of the new text that differs from the old, in scalar offsets [start, end) */
  readonly affectedRange: readonly [number, number];
}

/**
 * Fired when the cursor or anchor moves.
 */
export interface SelectionChangeEvent extends DocumentEvent {
  readonly type: 'selection-change';
  readonly prevState: DocumentState;
  readonly nextState: DocumentState;
}

/**
 * Fired when undo/redo occurs.
 */
export interface HistoryChangeEvent extends DocumentEvent {
  readonly type: 'history-change';
  readonly direction: 'undo' | 'redo';
  readonly prevState: DocumentState;
  readonly nextState: DocumentState;
}

/**
 * Fired when document is saved.
 */
export interface SaveEvent extends DocumentEvent {
  readonly type: 'save';
  readonly state: DocumentState;
}

/**
 * Fired when document dirty state changes.
 */
export interface DirtyChangeEvent extends DocumentEvent {
  readonly type: 'dirty-change';
  readonly isDirty: boolean;
  readonly state: DocumentState;
}

/**
 * Fired when the number of non-break characters changes.
 */
export interface CharacterCountChangeEvent extends DocumentEvent {
  readonly type: 'character-count-change';
  readonly count: number;
  readonly state: DocumentState;
}

/**
 * Fired when the 1-based page/column/cell of the cursor changes.
 */
export interface CursorPositionChangeEvent extends DocumentEvent {
  readonly type: 'cursor-position-change';
  readonly position: ManuscriptPosition;
  readonly state: DocumentState;
}

/**
 * Fired when the viewport scrolls, resizes or changes cell size.
 */
export interface ViewportChangeEvent extends DocumentEvent {
  readonly type: 'viewport-change';
  readonly viewport: ViewportState;
  readonly state: DocumentState;
}

/**
 * Union of all document events.
 */
export type AnyDocumentEvent =
  | ContentChangeEvent
  | SelectionChangeEvent
  | HistoryChangeEvent
  | SaveEvent
  | DirtyChangeEvent
  | CharacterCountChangeEvent
  | CursorPositionChangeEvent
  | ViewportChangeEvent;

/**
 * Event type to handler mapping.
 */
export interface DocumentEventMap {
  'content-change': ContentChangeEvent;
  'selection-change': SelectionChangeEvent;
  'history-change': HistoryChangeEvent;
  'save': SaveEvent;
  'dirty-change': DirtyChangeEvent;
  'character-count-change': CharacterCountChangeEvent;
  'cursor-position-change': CursorPositionChangeEvent;
  'viewport-change': ViewportChangeEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

/**
 * Handler function for a specific event type.
 */
export type EventHandler<T extends AnyDocumentEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Event emitter for document events.
 * Provides type-safe pub/sub for all document events.
 */
export interface DocumentEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof DocumentEventMap>(
    type: K,
    handler: EventHandler<DocumentEventMap[K]>
  ): Unsubscribe;

  /**
   * Remove an event listener.
   */
  removeEventListener<K extends keyof DocumentEventMap>(
    type: K,
    handler: EventHandler<DocumentEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   */
  emit<K extends keyof DocumentEventMap>(
    type: K,
    event: DocumentEventMap[K]
  ): void;

  /**
   * Whether any handler is registered for an event type.
   */
  hasListeners(type: keyof DocumentEventMap): boolean;

  /**
   * Remove all event listeners.
   */
  removeAllListeners(): void;
}

type HandlerSets = {
  readonly [K in keyof DocumentEventMap]: Set<EventHandler<DocumentEventMap[K]>>;
};

/**
 * Create a new document event emitter.
 */
export function createEventEmitter(): DocumentEventEmitter {
  const handlers: HandlerSets = {
    'content-change': new Set(),
    'selection-change': new Set(),
    'history-change': new Set(),
    'save': new Set(),
    'dirty-change': new Set(),
    'character-count-change': new Set(),
    'cursor-position-change': new Set(),
    'viewport-change': new Set(),
  };

  return {
    addEventListener<K extends keyof DocumentEventMap>(
      type: K,
      handler: EventHandler<DocumentEventMap[K]>
    ): Unsubscribe {
      const typeHandlers: Set<EventHandler<DocumentEventMap[K]>> = handlers[type];
      typeHandlers.add(handler);
      return () => {
        typeHandlers.delete(handler);
      };
    },

    removeEventListener<K extends keyof DocumentEventMap>(
      type: K,
      handler: EventHandler<DocumentEventMap[K]>
    ): void {
      const typeHandlers: Set<EventHandler<DocumentEventMap[K]>> = handlers[type];
      typeHandlers.delete(handler);
    },

    emit<K extends keyof DocumentEventMap>(
      type: K,
      event: DocumentEventMap[K]
    ): void {
      const typeHandlers: Set<EventHandler<DocumentEventMap[K]>> = handlers[type];
      for (const handler of [...typeHandlers]) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    hasListeners(type: keyof DocumentEventMap): boolean {
      return handlers[type].size > 0;
    },

    removeAllListeners(): void {
      for (const typeHandlers of Object.values(handlers)) {
        typeHandlers.clear();
      }
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

/**
 * Create a content change event.
 */
export function createContentChangeEvent(
  action: DocumentAction,
  prevState: DocumentState,
  nextState: DocumentState,
  affectedRange: readonly [number, number] = getAffectedRange(prevState.text, nextState.text)
): ContentChangeEvent {
  return Object.freeze({
    type: 'content-change' as const,
    timestamp: Date.now(),
    action,
    prevState,
    nextState,
    affectedRange,
  });
}

/**
 * Create a selection change event.
 */
export function createSelectionChangeEvent(
  prevState: DocumentState,
  nextState: DocumentState
): SelectionChangeEvent {
  return Object.freeze({
    type: 'selection-change' as const,
    timestamp: Date.now(),
    prevState,
    nextState,
  });
}

/**
 * Create a history change event.
 */
export function createHistoryChangeEvent(
  direction: 'undo' | 'redo',
  prevState: DocumentState,
  nextState: DocumentState
): HistoryChangeEvent {
  return Object.freeze({
    type: 'history-change' as const,
    timestamp: Date.now(),
    direction,
    prevState,
    nextState,
  });
}

/**
 * Create a save event.
 */
export function createSaveEvent(state: DocumentState): SaveEvent {
  return Object.freeze({
    type: 'save' as const,
    timestamp: Date.now(),
    state,
  });
}

/**
 * Create a dirty change event.
 */
export function createDirtyChangeEvent(
  isDirty: boolean,
  state: DocumentState
): DirtyChangeEvent {
  return Object.freeze({
    type: 'dirty-change' as const,
    timestamp: Date.now(),
    isDirty,
    state,
  });
}

export function createCharacterCountChangeEvent(state: DocumentState): CharacterCountChangeEvent {
  return Object.freeze({
    type: 'character-count-change' as const,
    timestamp: Date.now(),
    count: state.characterCount,
    state,
  });
}

export function createCursorPositionChangeEvent(
  position: ManuscriptPosition,
  state: DocumentState
): CursorPositionChangeEvent {
  return Object.freeze({
    type: 'cursor-position-change' as const,
    timestamp: Date.now(),
    position,
    state,
  });
}

export function createViewportChangeEvent(state: DocumentState): ViewportChangeEvent {
  return Object.freeze({
    type: 'viewport-change' as const,
    timestamp: Date.now(),
    viewport: state.viewport,
    state,
  });
}

/**
 * Range of `next` that differs from `prev`, in scalar offsets.
 * Found by trimming the common prefix and suffix; [n, n) when equal.
 *
 * @complexity O(n) in text length
 */
export function getAffectedRange(prev: string, next: string): readonly [number, number] {
  const a = toScalars(prev);
  const b = toScalars(next);
  let start = 0;
  while (start < a.length && start < b.length && a[start] === b[start]) {
    start++;
  }
  let endA = a.length;
  let endB = b.length;
  while (endA > start && endB > start && a[endA - 1] === b[endB - 1]) {
    endA--;
    endB--;
  }
  return [start, endB];
}
