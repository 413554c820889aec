/**
 * Glyph selection for vertical text.
 * Punctuation and brackets swap to their vertical presentation forms, single
 * ASCII letters and digits are drawn rotated a quarter turn, and tate-chu-yoko
 * pairs are drawn upright and horizontal at a reduced size.
 */

import type { LayoutUnit } from '../../types/state.ts';

/**
 * Horizontal form -> vertical presentation form.
 */
export const VERTICAL_GLYPH_MAP: ReadonlyMap<string, string> = new Map([
  ['、', '︑'],
  ['。', '︒'],
  ['「', '﹁'],
  ['」', '﹂'],
  ['『', '﹃'],
  ['』', '﹄'],
  ['（', '︵'],
  ['）', '︶'],
  ['［', '﹇'],
  ['］', '﹈'],
  ['｛', '︷'],
  ['｝', '︸'],
  ['〈', '︿'],
  ['〉', '﹀'],
  ['《', '︽'],
  ['》', '︾'],
  ['【', '︻'],
  ['】', '︼'],
  ['ー', '｜'],
]);

/**
 * How a glyph sits in its cell.
 * - upright: drawn as is, centred
 * - rotated: turned 90° clockwise about the cell centre
 * - horizontal: a tate-chu-yoko pair set left to right
 */
export type GlyphOrientation = 'upright' | 'rotated' | 'horizontal';

/**
 * Font size of body text and tcy pairs, as a fraction of the cell edge.
 */
export interface GlyphMetrics {
  readonly base: number;
  readonly tcy: number;
}

export const LIVE_GLYPH_METRICS: GlyphMetrics = Object.freeze({ base: 0.72, tcy: 0.58 });

/** Export pages set body text larger; tcy is 80% of body */
export const EXPORT_GLYPH_METRICS: GlyphMetrics = Object.freeze({ base: 0.88, tcy: 0.88 * 0.8 });

export interface Glyph {
  readonly text: string;
  readonly orientation: GlyphOrientation;
  /** Font size as a fraction of the cell edge */
  readonly fontScale: number;
}

export function verticalForm(text: string): string {
  return VERTICAL_GLYPH_MAP.get(text) ?? text;
}

/**
 * Single ASCII letter or digit.
 */
export function isRotatedAlphanumeric(text: string): boolean {
  return /^[A-Za-z0-9]$/.test(text);
}

/**
 * Glyph to draw for a placed unit (or a preedit scalar treated as a char).
 */
export function glyphFor(
  unit: Pick<LayoutUnit, 'kind' | 'text'>,
  metrics: GlyphMetrics = LIVE_GLYPH_METRICS
): Glyph {
  if (unit.kind === 'tcy') {
    return { text: unit.text, orientation: 'horizontal', fontScale: metrics.tcy };
  }
  const text = verticalForm(unit.text);
  return {
    text,
    orientation: isRotatedAlphanumeric(text) ? 'rotated' : 'upright',
    fontScale: metrics.base,
  };
}
