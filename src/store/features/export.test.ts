/**
 * Tests for the export adapter.
 */

import { describe, it, expect } from 'vitest';
import { paginateForExport, joinForExport, EXPORT_GRID } from './export.ts';
import { layoutText } from '../core/layout.ts';

describe('paginateForExport', () => {
  it('should default to a 40 x 40 grid', () => {
    expect(paginateForExport('a').grid).toEqual(EXPORT_GRID);
  });

  it('should produce one empty page for empty text', () => {
    expect(paginateForExport('')).toEqual({
      grid: { rows: 40, cols: 40 },
      totalPages: 1,
      characterCount: 0,
      pages: [{ pageIndex: 0, units: [] }],
    });
  });

  it('should match the interactive layout cell for cell', () => {
    const text = '「吾輩は猫である。」\n名前はまだ無い。12月、どこで生れたか頓と見当がつかぬ。';
    const grid = { rows: 8, cols: 8 };
    const exported = paginateForExport(text, grid);
    expect(exported.pages.flatMap((page) => page.units)).toEqual(layoutText(text, grid).units);
  });

  it('should not print a page for a trailing empty column', () => {
    // 64 cells fill page 0 exactly; the end slot moves on to gcol 8
    const text = 'あ'.repeat(64);
    expect(layoutText(text, { rows: 8, cols: 8 }).totalPages).toBe(2);
    expect(paginateForExport(text, { rows: 8, cols: 8 }).totalPages).toBe(1);
  });

  it('should partition units by page', () => {
    const exported = paginateForExport('あ'.repeat(65), { rows: 8, cols: 8 });
    expect(exported.totalPages).toBe(2);
    expect(exported.pages[0].units).toHaveLength(64);
    expect(exported.pages[1].units.map((u) => [u.gcol, u.row])).toEqual([[8, 0]]);
  });

  it('should normalize line breaks and count characters', () => {
    const exported = paginateForExport('a\r\nb\rc', { rows: 8, cols: 8 });
    expect(exported.characterCount).toBe(3);
    expect(exported.pages[0].units.map((u) => [u.text, u.gcol])).toEqual([
      ['a', 0],
      ['b', 1],
      ['c', 2],
    ]);
  });
});

describe('joinForExport', () => {
  it('should insert a break only where none exists', () => {
    expect(joinForExport(['a', 'b\n', 'c', '\nd'])).toBe('a\nb\nc\nd');
  });

  it('should handle empty input', () => {
    expect(joinForExport([])).toBe('');
    expect(joinForExport(['only'])).toBe('only');
  });
});
