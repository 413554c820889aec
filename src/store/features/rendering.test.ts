/**
 * Tests for rendering selectors.
 */

import { describe, it, expect } from 'vitest';
import {
  getVisiblePages,
  getGridLines,
  getRenderCells,
  getPreeditCells,
  getOffsetRect,
  getCaretRect,
} from './rendering.ts';
import { createInitialState, withState } from '../core/state.ts';
import { createSelection } from './cursor.ts';
import { textOffset } from '../../types/branded.ts';
import type { DocumentState } from '../../types/state.ts';

// One 8x8 page at cell 36: page origin x = 6, column 0 at x = 6 + 7 * 36 = 258
function stateWith(content: string, cursor: number, anchor = cursor, preedit = ''): DocumentState {
  const state = createInitialState({ content, rows: 8, cols: 8 });
  return withState(state, {
    selection: createSelection(textOffset(cursor), textOffset(anchor)),
    preedit,
  });
}

describe('getVisiblePages', () => {
  it('should list pages in viewport coordinates', () => {
    expect(getVisiblePages(stateWith('', 0))).toEqual([
      { pageIndex: 0, rect: { x: 6, y: 6, width: 288, height: 288 } },
    ]);
  });
});

describe('getGridLines', () => {
  it('should rule rows then columns', () => {
    expect(getGridLines({ x: 0, y: 0, width: 10, height: 20 }, 2, 2)).toEqual([
      { x1: 0, y1: 0, x2: 10, y2: 0 },
      { x1: 0, y1: 10, x2: 10, y2: 10 },
      { x1: 0, y1: 20, x2: 10, y2: 20 },
      { x1: 0, y1: 0, x2: 0, y2: 20 },
      { x1: 5, y1: 0, x2: 5, y2: 20 },
      { x1: 10, y1: 0, x2: 10, y2: 20 },
    ]);
  });
});

describe('getRenderCells', () => {
  it('should place units with glyphs and selection flags', () => {
    const cells = getRenderCells(stateWith('ab「c', 2, 1));
    expect(cells.map((c) => [c.unit.text, c.rect.x, c.rect.y, c.glyph.text, c.glyph.orientation, c.selected])).toEqual([
      ['a', 258, 6, 'a', 'rotated', false],
      ['b', 258, 42, 'b', 'rotated', true],
      ['「', 258, 78, '﹁', 'upright', false],
      ['c', 258, 114, 'c', 'rotated', false],
    ]);
  });

  it('should mark nothing when the selection is collapsed', () => {
    expect(getRenderCells(stateWith('ab', 1)).some((c) => c.selected)).toBe(false);
  });

  it('should skip cells outside the viewport', () => {
    const base = stateWith('ab', 0);
    const narrow = withState(base, { viewport: { ...base.viewport, width: 100 } });
    expect(getRenderCells(narrow)).toEqual([]);
    const scrolled = withState(narrow, { viewport: { ...narrow.viewport, scrollX: 200 } });
    expect(getRenderCells(scrolled).map((c) => c.rect.x)).toEqual([58, 58]);
  });
});

describe('getPreeditCells', () => {
  it('should return nothing without composition text', () => {
    expect(getPreeditCells(stateWith('ab', 2))).toEqual([]);
  });

  it('should run down from the cursor and wrap at the last row', () => {
    const cells = getPreeditCells(stateWith('abcdefg', 7, 7, 'xy'));
    expect(cells.map((c) => [c.index, c.rect.x, c.rect.y, c.glyph.orientation])).toEqual([
      [0, 258, 258, 'rotated'],
      [1, 222, 6, 'rotated'],
    ]);
  });
});

describe('offset rectangles', () => {
  it('should resolve offsets and the caret to cells', () => {
    const state = stateWith('abcd', 4);
    expect(getOffsetRect(state, 1)).toEqual({ x: 258, y: 42, width: 36, height: 36 });
    expect(getCaretRect(state)).toEqual({ x: 258, y: 150, width: 36, height: 36 });
  });
});
