/**
 * Find within the buffer.
 *
 * Literal or regular-expression search, optionally case-insensitive, forward
 * or backward from the selection edge, wrapping around the buffer once.
 * Offsets in and out are scalar offsets; JavaScript match indices are
 * converted at the boundary.
 */

import type { SelectionState } from '../../types/state.ts';
import type { TextOffset } from '../../types/branded.ts';
import { textOffset, minTextOffset, maxTextOffset } from '../../types/branded.ts';
import { scalarToCodeUnitOffset, codeUnitToScalarOffset, scalarLength } from '../core/scalars.ts';

// =============================================================================
// Types
// =============================================================================

export interface SearchOptions {
  /** Search toward the end of the buffer (default: true) */
  readonly forward?: boolean;
  /** Treat the pattern as a regular expression (default: false) */
  readonly regex?: boolean;
  /** Match case exactly (default: false) */
  readonly caseSensitive?: boolean;
}

export interface SearchFound {
  readonly status: 'found';
  readonly start: TextOffset;
  readonly end: TextOffset;
}

export interface SearchNotFound {
  readonly status: 'not-found';
}

export interface SearchInvalidPattern {
  readonly status: 'invalid-pattern';
  readonly message: string;
}

/**
 * Outcome of a search. An invalid pattern is reported separately from a miss.
 */
export type SearchResult = SearchFound | SearchNotFound | SearchInvalidPattern;

const NOT_FOUND: SearchNotFound = Object.freeze<SearchNotFound>({ status: 'not-found' });

/** Code-unit span of a match */
interface Span {
  readonly start: number;
  readonly end: number;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Compile a search pattern in unicode mode, retrying without it so identity
 * escapes such as `\-` still compile. Returns the unicode-mode error message
 * when neither compiles.
 */
export function compilePattern(pattern: string, caseSensitive: boolean): RegExp | string {
  const flags = caseSensitive ? 'gm' : 'gim';
  try {
    return new RegExp(pattern, `${flags}u`);
  } catch (error) {
    try {
      return new RegExp(pattern, flags);
    } catch {
      return error instanceof Error ? error.message : String(error);
    }
  }
}

/**
 * Lower-case each scalar on its own so scalar offsets line up with the source.
 */
export function foldCase(text: string): string {
  let folded = '';
  for (const ch of text) {
    const lower = ch.toLowerCase();
    folded += scalarLength(lower) === 1 ? lower : ch;
  }
  return folded;
}

function firstMatch(regex: RegExp, text: string, from: number): Span | null {
  regex.lastIndex = from;
  const match = regex.exec(text);
  return match === null ? null : { start: match.index, end: match.index + match[0].length };
}

function lastMatch(regex: RegExp, text: string, from: number): Span | null {
  // matchAll copies lastIndex into its private clone
  regex.lastIndex = from;
  let last: Span | null = null;
  for (const match of text.matchAll(regex)) {
    const index = match.index ?? 0;
    last = { start: index, end: index + match[0].length };
  }
  return last;
}

function regexSpan(regex: RegExp, text: string, start: number, forward: boolean): Span | null {
  const before = text.slice(0, start);
  if (forward) {
    return firstMatch(regex, text, start) ?? firstMatch(regex, before, 0);
  }
  return lastMatch(regex, before, 0) ?? lastMatch(regex, text, start);
}

function literalSpan(source: string, needle: string, start: number, forward: boolean): Span | null {
  const before = source.slice(0, start);
  let index: number;
  if (forward) {
    index = source.indexOf(needle, start);
    if (index < 0) index = before.indexOf(needle);
  } else {
    index = before.lastIndexOf(needle);
    if (index < 0) {
      const last = source.lastIndexOf(needle);
      index = last >= start ? last : -1;
    }
  }
  return index < 0 ? null : { start: index, end: index + needle.length };
}

// =============================================================================
// Search
// =============================================================================

/**
 * Search `text` starting at the selection edge in the search direction
 * (the selection end going forward, its start going backward). When nothing
 * matches before the buffer boundary, the rest of the buffer on the other
 * side of the edge is searched once.
 *
 * An empty pattern or an empty buffer never matches.
 *
 * @example
 * ```typescript
 * findInText('abcabc', { cursor: 4, anchor: 4 }, 'a'); // { status: 'found', start: 0, end: 1 }
 * ```
 */
export function findInText(
  text: string,
  selection: SelectionState,
  pattern: string,
  options: SearchOptions = {}
): SearchResult {
  const forward = options.forward ?? true;
  const caseSensitive = options.caseSensitive ?? false;

  if (pattern.length === 0 || text.length === 0) return NOT_FOUND;

  const edge = forward
    ? maxTextOffset(selection.cursor, selection.anchor)
    : minTextOffset(selection.cursor, selection.anchor);

  let span: Span | null;
  let haystack: string;

  if (options.regex ?? false) {
    const compiled = compilePattern(pattern, caseSensitive);
    if (typeof compiled === 'string') {
      const invalid: SearchInvalidPattern = { status: 'invalid-pattern', message: compiled };
      return Object.freeze(invalid);
    }
    haystack = text;
    span = regexSpan(compiled, haystack, scalarToCodeUnitOffset(haystack, edge), forward);
  } else {
    haystack = caseSensitive ? text : foldCase(text);
    const needle = caseSensitive ? pattern : foldCase(pattern);
    span = literalSpan(haystack, needle, scalarToCodeUnitOffset(haystack, edge), forward);
  }

  if (span === null) return NOT_FOUND;

  const found: SearchFound = {
    status: 'found',
    start: textOffset(codeUnitToScalarOffset(haystack, span.start)),
    end: textOffset(codeUnitToScalarOffset(haystack, span.end)),
  };
  return Object.freeze(found);
}
