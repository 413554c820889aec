/**
 * SVG rendering of exported manuscript pages.
 * Produces one standalone SVG document per page: white sheet, optional
 * ruling, and one glyph centred in each occupied cell.
 */

import type { ExportDocument, ExportPage } from './export.ts';
import { glyphFor, EXPORT_GLYPH_METRICS } from './glyphs.ts';
import { getGridLines } from './rendering.ts';

export interface SvgExportOptions {
  /** Sheet width in px (default: A4 landscape at 96dpi) */
  readonly pageWidth?: number;
  /** Sheet height in px (default: A4 landscape at 96dpi) */
  readonly pageHeight?: number;
  /** Draw the manuscript ruling (default: true) */
  readonly showGrid?: boolean;
  readonly fontFamily?: string;
  readonly textColor?: string;
  readonly gridColor?: string;
  readonly background?: string;
}

const DEFAULT_SVG_OPTIONS: Required<SvgExportOptions> = {
  pageWidth: 1123,
  pageHeight: 794,
  showGrid: true,
  fontFamily: 'serif',
  textColor: '#111111',
  gridColor: '#c7ced8',
  background: '#ffffff',
};

/**
 * Render one page.
 */
export function renderExportPageSvg(
  doc: ExportDocument,
  page: ExportPage,
  options: SvgExportOptions = {}
): string {
  const opts = { ...DEFAULT_SVG_OPTIONS, ...options };
  const { rows, cols } = doc.grid;
  const cellWidth = opts.pageWidth / cols;
  const cellHeight = opts.pageHeight / rows;
  const cellEdge = Math.min(cellWidth, cellHeight);

  const elements: string[] = [
    `  <rect x="0" y="0" width="${round(opts.pageWidth)}" height="${round(opts.pageHeight)}" fill="${escapeXml(opts.background)}"/>`,
  ];

  if (opts.showGrid) {
    elements.push(`  <g stroke="${escapeXml(opts.gridColor)}" stroke-width="1">`);
    const sheet = { x: 0, y: 0, width: opts.pageWidth, height: opts.pageHeight };
    for (const line of getGridLines(sheet, rows, cols)) {
      elements.push(
        `    <line x1="${round(line.x1)}" y1="${round(line.y1)}" x2="${round(line.x2)}" y2="${round(line.y2)}"/>`
      );
    }
    elements.push(`  </g>`);
  }

  if (page.units.length > 0) {
    elements.push(
      `  <g fill="${escapeXml(opts.textColor)}" font-family="${escapeXml(opts.fontFamily)}" text-anchor="middle" dominant-baseline="central">`
    );
    for (const unit of page.units) {
      const colInPage = unit.gcol % cols;
      const cx = round((cols - 1 - colInPage) * cellWidth + cellWidth / 2);
      const cy = round(unit.row * cellHeight + cellHeight / 2);
      const glyph = glyphFor(unit, EXPORT_GLYPH_METRICS);
      const attrs = [`x="${cx}"`, `y="${cy}"`, `font-size="${round(cellEdge * glyph.fontScale)}"`];
      if (glyph.orientation === 'rotated') {
        attrs.push(`transform="rotate(90 ${cx} ${cy})"`);
      }
      elements.push(`    <text ${attrs.join(' ')}>${escapeXml(glyph.text)}</text>`);
    }
    elements.push(`  </g>`);
  }

  return buildSvg(opts.pageWidth, opts.pageHeight, elements);
}

/**
 * Render every page of an export, in page order.
 */
export function renderExportSvg(doc: ExportDocument, options: SvgExportOptions = {}): string[] {
  return doc.pages.map((page) => renderExportPageSvg(doc, page, options));
}

function buildSvg(width: number, height: number, elements: string[]): string {
  const lines: string[] = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${round(width)} ${round(height)}" width="${round(width)}" height="${round(height)}">`,
    ...elements,
    `</svg>`,
  ];
  return lines.join('\n');
}

function round(n: number): string {
  return (Math.round(n * 100) / 100).toString();
}

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
