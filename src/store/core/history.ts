/**
 * Linear undo/redo history.
 *
 * History is an arena of immutable snapshots plus the index of the current
 * one. Entry 0 is the state at creation or load. Pushing while not at the end
 * truncates every entry past the index; there is no branching.
 */

import type { DocumentState, HistoryState, HistorySnapshot } from '../../types/state.ts';
import type { TextOffset } from '../../types/branded.ts';

// =============================================================================
// Snapshots
// =============================================================================

export function createSnapshot(text: string, cursor: TextOffset, anchor: TextOffset): HistorySnapshot {
  return Object.freeze({ text, cursor, anchor });
}

export function snapshotsEqual(a: HistorySnapshot, b: HistorySnapshot): boolean {
  return a.text === b.text && a.cursor === b.cursor && a.anchor === b.anchor;
}

// =============================================================================
// Arena Operations
// =============================================================================

/**
 * History holding a single entry at index 0.
 */
export function createHistoryState(initial: HistorySnapshot): HistoryState {
  return Object.freeze({
    entries: Object.freeze([initial]),
    index: 0,
  });
}

/**
 * Snapshot at the current index.
 */
export function currentSnapshot(history: HistoryState): HistorySnapshot {
  return history.entries[history.index];
}

/**
 * Append a snapshot after the current index, dropping any redo entries.
 * Returns the same history when the snapshot equals the current entry.
 */
export function pushSnapshot(history: HistoryState, snapshot: HistorySnapshot): HistoryState {
  if (snapshotsEqual(currentSnapshot(history), snapshot)) return history;
  const entries = [...history.entries.slice(0, history.index + 1), snapshot];
  return Object.freeze({
    entries: Object.freeze(entries),
    index: entries.length - 1,
  });
}

/**
 * Move the index back one entry. Returns the same history at index 0.
 */
export function stepBack(history: HistoryState): HistoryState {
  if (history.index <= 0) return history;
  return Object.freeze({ entries: history.entries, index: history.index - 1 });
}

/**
 * Move the index forward one entry. Returns the same history at the end.
 */
export function stepForward(history: HistoryState): HistoryState {
  if (history.index >= history.entries.length - 1) return history;
  return Object.freeze({ entries: history.entries, index: history.index + 1 });
}

// =============================================================================
// Queries
// =============================================================================

function historyOf(state: DocumentState | HistoryState): HistoryState {
  return 'history' in state ? state.history : state;
}

/**
 * Check if undo is available.
 */
export function canUndo(state: DocumentState | HistoryState): boolean {
  return historyOf(state).index > 0;
}

/**
 * Check if redo is available.
 */
export function canRedo(state: DocumentState | HistoryState): boolean {
  const history = historyOf(state);
  return history.index < history.entries.length - 1;
}

/**
 * Number of available undo steps.
 */
export function getUndoCount(state: DocumentState | HistoryState): number {
  return historyOf(state).index;
}

/**
 * Number of available redo steps.
 */
export function getRedoCount(state: DocumentState | HistoryState): number {
  const history = historyOf(state);
  return history.entries.length - 1 - history.index;
}

/**
 * True when only the load snapshot is recorded.
 */
export function isHistoryEmpty(state: DocumentState | HistoryState): boolean {
  return historyOf(state).entries.length === 1;
}
