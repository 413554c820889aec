/**
 * Genko - vertical manuscript layout and editing core
 *
 * Main entry point exporting core types, store, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type * from './types/index.ts';

// =============================================================================
// Type Guards and Offsets
// =============================================================================

export {
  isTextEditAction,
  isHistoryAction,
  isSelectionAction,
  isDocumentAction,
  validateAction,
  textOffset,
  isValidOffset,
  addTextOffset,
  diffTextOffset,
  minTextOffset,
  maxTextOffset,
  clampTextOffset,
  ZERO_TEXT_OFFSET,
} from './types/index.ts';

// =============================================================================
// Store, Layout, Export and Events
// =============================================================================

export * from './store/index.ts';

// =============================================================================
// Complexity-stratified Namespaces
// =============================================================================

export { query, scan } from './api/index.ts';
