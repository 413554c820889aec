/**
 * Unicode scalar value helpers.
 *
 * Buffer offsets count scalar values, JavaScript strings index UTF-16 code
 * units. Everything that crosses that boundary (slicing, regex match indices,
 * length) goes through this module.
 */

/**
 * Split text into scalar values.
 */
export function toScalars(text: string): string[] {
  return Array.from(text);
}

/**
 * Length of text in scalar values.
 */
export function scalarLength(text: string): number {
  let length = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    // Skip the low half of a well-formed surrogate pair
    if (code >= 0xd800 && code <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
      }
    }
    length++;
  }
  return length;
}

/**
 * Convert a scalar offset to a string index.
 *
 * @example
 * ```typescript
 * scalarToCodeUnitOffset('a𠮷b', 2); // Returns 3 (𠮷 is two code units)
 * ```
 */
export function scalarToCodeUnitOffset(text: string, offset: number): number {
  if (offset <= 0) return 0;
  let scalars = 0;
  let index = 0;
  while (index < text.length && scalars < offset) {
    const codePoint = text.codePointAt(index) ?? 0;
    index += codePoint > 0xffff ? 2 : 1;
    scalars++;
  }
  return index;
}

/**
 * Convert a string index to a scalar offset.
 * An index inside a surrogate pair maps to the start of that scalar.
 */
export function codeUnitToScalarOffset(text: string, index: number): number {
  if (index <= 0) return 0;
  let scalars = 0;
  let position = 0;
  while (position < text.length) {
    const codePoint = text.codePointAt(position) ?? 0;
    const width = codePoint > 0xffff ? 2 : 1;
    if (position + width > index) break;
    position += width;
    scalars++;
  }
  return scalars;
}

/**
 * Slice text by scalar offsets [start, end).
 */
export function sliceScalars(text: string, start: number, end?: number): string {
  const from = scalarToCodeUnitOffset(text, start);
  const to = end === undefined ? text.length : scalarToCodeUnitOffset(text, end);
  return text.slice(from, Math.max(from, to));
}

/**
 * Convert CRLF and lone CR line breaks to LF.
 */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Number of scalars that are not line breaks.
 */
export function countCharacters(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch !== '\n' && ch !== '\r') count++;
  }
  return count;
}
