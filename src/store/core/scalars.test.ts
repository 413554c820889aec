/**
 * Tests for scalar value helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  toScalars,
  scalarLength,
  scalarToCodeUnitOffset,
  codeUnitToScalarOffset,
  sliceScalars,
  normalizeNewlines,
  countCharacters,
} from './scalars.ts';

// U+20BB7, outside the BMP: two UTF-16 code units, one scalar
const ASTRAL = '\u{20BB7}';

describe('scalarLength', () => {
  it('should count BMP text like string length', () => {
    expect(scalarLength('原稿用紙')).toBe(4);
    expect(scalarLength('')).toBe(0);
  });

  it('should count a surrogate pair once', () => {
    expect(`a${ASTRAL}b`.length).toBe(4);
    expect(scalarLength(`a${ASTRAL}b`)).toBe(3);
    expect(toScalars(`a${ASTRAL}b`)).toEqual(['a', ASTRAL, 'b']);
  });
});

describe('offset conversion', () => {
  const text = `a${ASTRAL}b`;

  it('should convert scalar offsets to string indices', () => {
    expect(scalarToCodeUnitOffset(text, 0)).toBe(0);
    expect(scalarToCodeUnitOffset(text, 1)).toBe(1);
    expect(scalarToCodeUnitOffset(text, 2)).toBe(3);
    expect(scalarToCodeUnitOffset(text, 3)).toBe(4);
    expect(scalarToCodeUnitOffset(text, 99)).toBe(4);
  });

  it('should convert string indices to scalar offsets', () => {
    expect(codeUnitToScalarOffset(text, 0)).toBe(0);
    expect(codeUnitToScalarOffset(text, 1)).toBe(1);
    expect(codeUnitToScalarOffset(text, 2)).toBe(1); // inside the pair
    expect(codeUnitToScalarOffset(text, 3)).toBe(2);
    expect(codeUnitToScalarOffset(text, 4)).toBe(3);
  });
});

describe('sliceScalars', () => {
  it('should slice by scalar offsets', () => {
    const text = `a${ASTRAL}bc`;
    expect(sliceScalars(text, 1, 2)).toBe(ASTRAL);
    expect(sliceScalars(text, 2)).toBe('bc');
    expect(sliceScalars(text, 0, 0)).toBe('');
  });
});

describe('normalizeNewlines', () => {
  it('should convert CRLF and CR to LF', () => {
    expect(normalizeNewlines('a\r\nb\rc\nd')).toBe('a\nb\nc\nd');
  });
});

describe('countCharacters', () => {
  it('should exclude line breaks', () => {
    expect(countCharacters('春は\nあけぼの')).toBe(6);
    expect(countCharacters('\n\n')).toBe(0);
    expect(countCharacters(ASTRAL)).toBe(1);
  });
});
