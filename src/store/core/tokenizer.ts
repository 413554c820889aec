/**
 * Tokenizer for the manuscript layout engine.
 * Splits a buffer into an ordered, gap-free token sequence.
 */

import type { Token, CharToken, NewlineToken, TcyToken } from '../../types/state.ts';
import { textOffset } from '../../types/branded.ts';
import { toScalars } from './scalars.ts';

/**
 * ASCII decimal digit test. Full-width and other Unicode digits do not pair.
 */
export function isAsciiDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch.length === 1 && ch >= '0' && ch <= '9';
}

/**
 * Tokenize text into `newline`, `tcy` and `char` tokens.
 *
 * Rules, in priority order:
 * 1. `\n` is a newline token.
 * 2. Exactly two ASCII digits with no digit on either side form one tcy token.
 * 3. Anything else is a single-scalar char token.
 *
 * A run of three or more digits is not split into pairs: every digit of such
 * a run becomes its own char token.
 */
export function tokenize(text: string): Token[] {
  return tokenizeScalars(toScalars(text));
}

/**
 * Tokenize an already-split scalar array. Offsets are scalar indices.
 */
export function tokenizeScalars(scalars: readonly string[]): Token[] {
  const tokens: Token[] = [];
  const length = scalars.length;
  let i = 0;

  while (i < length) {
    const ch = scalars[i];

    if (ch === '\n') {
      const token: NewlineToken = { kind: 'newline', start: textOffset(i), end: textOffset(i + 1), text: '\n' };
      tokens.push(Object.freeze(token));
      i += 1;
      continue;
    }

    if (
      isAsciiDigit(ch) &&
      isAsciiDigit(scalars[i + 1]) &&
      !isAsciiDigit(scalars[i - 1]) &&
      !isAsciiDigit(scalars[i + 2])
    ) {
      const token: TcyToken = { kind: 'tcy', start: textOffset(i), end: textOffset(i + 2), text: ch + scalars[i + 1] };
      tokens.push(Object.freeze(token));
      i += 2;
      continue;
    }

    const token: CharToken = { kind: 'char', start: textOffset(i), end: textOffset(i + 1), text: ch };
    tokens.push(Object.freeze(token));
    i += 1;
  }

  return tokens;
}
