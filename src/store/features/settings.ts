/**
 * Editor settings parsing.
 *
 * Settings arrive from the configuration collaborator as untrusted JSON.
 * Every field coerces, clamps, and falls back to its default on its own, so
 * one bad value never discards the others.
 */

import { z } from 'zod';
import type { DocumentStoreConfig, GridSize } from '../../types/state.ts';
import { clampGridDimension, DEFAULT_GRID_SIZE } from '../core/layout.ts';
import { clampCellSize } from '../core/state.ts';

export const MIN_FONT_SIZE = 8;
export const MAX_FONT_SIZE = 64;
export const DEFAULT_FONT_SIZE = 16;

const TRUTHY_STRINGS: ReadonlySet<string> = new Set(['1', 'true', 'yes', 'on']);

/**
 * Cell edge for a point size: the font's pixel height (1.3 line height at
 * 96dpi) plus 8px of padding, never below 16.
 *
 * @example
 * ```typescript
 * cellSizeForFontSize(16); // 36
 * ```
 */
export function cellSizeForFontSize(fontSize: number): number {
  return clampCellSize(Math.round(((fontSize * 4) / 3) * 1.3) + 8);
}

const gridDimension = z.coerce
  .number()
  .finite()
  .catch(DEFAULT_GRID_SIZE)
  .transform(clampGridDimension);

const fontSize = z.coerce
  .number()
  .finite()
  .catch(DEFAULT_FONT_SIZE)
  .transform((value) => Math.max(MIN_FONT_SIZE, Math.min(MAX_FONT_SIZE, Math.trunc(value))));

const optionalCellSize = z.coerce
  .number()
  .finite()
  .transform(clampCellSize)
  .optional()
  .catch(undefined);

const flag = (defaultValue: boolean) =>
  z
    .union([z.boolean(), z.number(), z.string()])
    .transform((value) =>
      typeof value === 'string' ? TRUTHY_STRINGS.has(value.trim().toLowerCase()) : Boolean(value)
    )
    .catch(defaultValue);

/**
 * Schema for persisted editor settings.
 */
export const editorSettingsSchema = z.object({
  rows: gridDimension,
  cols: gridDimension,
  fontSize,
  cellSize: optionalCellSize,
  showGrid: flag(true),
  exportRows: gridDimension,
  exportCols: gridDimension,
});

/**
 * Settings after parsing. `cellSize` is always resolved.
 */
export interface EditorSettings {
  readonly rows: number;
  readonly cols: number;
  readonly fontSize: number;
  readonly cellSize: number;
  readonly showGrid: boolean;
  readonly exportRows: number;
  readonly exportCols: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse untrusted settings. Never throws; anything unusable takes its default.
 * A missing `cellSize` is derived from `fontSize`.
 */
export function parseEditorSettings(raw: unknown): EditorSettings {
  const parsed = editorSettingsSchema.parse(isRecord(raw) ? raw : {});
  return Object.freeze({
    ...parsed,
    cellSize: parsed.cellSize ?? cellSizeForFontSize(parsed.fontSize),
  });
}

/**
 * Default settings.
 */
export const DEFAULT_SETTINGS: EditorSettings = parseEditorSettings({});

/**
 * Store configuration fields carried by settings.
 */
export function settingsToStoreConfig(
  settings: EditorSettings
): Pick<DocumentStoreConfig, 'rows' | 'cols' | 'cellSize'> {
  return { rows: settings.rows, cols: settings.cols, cellSize: settings.cellSize };
}

/**
 * Fixed grid used by the export path.
 */
export function exportGridOf(settings: EditorSettings): GridSize {
  return Object.freeze({ rows: settings.exportRows, cols: settings.exportCols });
}
