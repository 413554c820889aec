/**
 * Branded types for type-safe position handling.
 *
 * Branded types (also called "opaque types" or "nominal types") prevent
 * accidentally mixing up different kinds of numeric values. A buffer offset
 * counts Unicode scalar values, while JavaScript string indices count UTF-16
 * code units; the two diverge as soon as the text holds astral characters
 * (rare kanji from the supplementary planes, emoji).
 *
 * Usage:
 * ```typescript
 * const cursor = textOffset(10);
 *
 * // Type error: a raw string index is not a buffer offset
 * const wrong: TextOffset = 'abc'.indexOf('b');
 *
 * // OK: explicit conversion
 * const converted: TextOffset = textOffset(codeUnitToScalarOffset(text, index));
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

/**
 * Generic brand interface.
 * The brand is a phantom type that only exists in the type system.
 */
interface Brand<B> {
  readonly [brand]: B;
}

/**
 * Create a branded type from a base type.
 * The brand only exists at compile time - no runtime overhead.
 */
type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Position Types
// =============================================================================

/**
 * Offset into the document buffer, counted in Unicode scalar values.
 * Valid offsets lie in [0, length] (the end of the buffer is addressable).
 *
 * Use when:
 * - Placing the cursor or the selection anchor
 * - Describing token and layout unit spans
 * - Indexing the cursor slot table
 */
export type TextOffset = Branded<number, 'TextOffset'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a TextOffset from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function textOffset(value: number): TextOffset {
  return value as TextOffset;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a valid offset (non-negative integer).
 */
export function isValidOffset(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Add a delta to a TextOffset.
 * Preserves the brand type.
 */
export function addTextOffset(offset: TextOffset, delta: number): TextOffset {
  return (offset + delta) as TextOffset;
}

/**
 * Subtract two TextOffsets to get a numeric difference.
 */
export function diffTextOffset(a: TextOffset, b: TextOffset): number {
  return a - b;
}

/**
 * Smaller of two offsets.
 */
export function minTextOffset(a: TextOffset, b: TextOffset): TextOffset {
  return a <= b ? a : b;
}

/**
 * Larger of two offsets.
 */
export function maxTextOffset(a: TextOffset, b: TextOffset): TextOffset {
  return a >= b ? a : b;
}

/**
 * Clamp a raw number into the buffer range [0, length].
 * Non-integers are truncated; non-finite values fall back to 0.
 */
export function clampTextOffset(value: number, length: number): TextOffset {
  if (!Number.isFinite(value)) {
    console.warn(`Invalid offset: ${value}, defaulting to 0`);
    return ZERO_TEXT_OFFSET;
  }
  return Math.max(0, Math.min(length, Math.trunc(value))) as TextOffset;
}

// =============================================================================
// Zero Constants
// =============================================================================

/**
 * Zero offset - the start of the buffer.
 */
export const ZERO_TEXT_OFFSET: TextOffset = 0 as TextOffset;
