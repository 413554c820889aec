/**
 * Tests for vertical glyph selection.
 */

import { describe, it, expect } from 'vitest';
import {
  verticalForm,
  isRotatedAlphanumeric,
  glyphFor,
  LIVE_GLYPH_METRICS,
  EXPORT_GLYPH_METRICS,
} from './glyphs.ts';

describe('verticalForm', () => {
  it('should swap punctuation to presentation forms', () => {
    expect(verticalForm('。')).toBe('︒');
    expect(verticalForm('「')).toBe('﹁');
    expect(verticalForm('ー')).toBe('｜');
  });

  it('should pass other text through', () => {
    expect(verticalForm('あ')).toBe('あ');
    expect(verticalForm('(')).toBe('(');
  });
});

describe('isRotatedAlphanumeric', () => {
  it('should accept single ASCII letters and digits only', () => {
    expect(isRotatedAlphanumeric('a')).toBe(true);
    expect(isRotatedAlphanumeric('Z')).toBe(true);
    expect(isRotatedAlphanumeric('7')).toBe(true);
    expect(isRotatedAlphanumeric('ab')).toBe(false);
    expect(isRotatedAlphanumeric('ａ')).toBe(false);
    expect(isRotatedAlphanumeric('-')).toBe(false);
  });
});

describe('glyphFor', () => {
  it('should draw tcy pairs horizontally at the tcy scale', () => {
    expect(glyphFor({ kind: 'tcy', text: '12' })).toEqual({
      text: '12',
      orientation: 'horizontal',
      fontScale: LIVE_GLYPH_METRICS.tcy,
    });
  });

  it('should rotate ASCII and keep kana upright', () => {
    expect(glyphFor({ kind: 'char', text: 'A' }).orientation).toBe('rotated');
    expect(glyphFor({ kind: 'char', text: 'あ' }).orientation).toBe('upright');
  });

  it('should use the export metrics when given', () => {
    expect(glyphFor({ kind: 'char', text: '、' }, EXPORT_GLYPH_METRICS)).toEqual({
      text: '︑',
      orientation: 'upright',
      fontScale: 0.88,
    });
  });
});
