/**
 * Bitmap Font
 *
 * Fixed-width column font used to rasterize frames. Each glyph is a list of
 * column bytes, least significant bit at the top row.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export interface BitmapFont {
  name: string;
  /** Glyph columns */
  width: number;
  /** Glyph rows */
  height: number;
  /** Horizontal distance between character origins */
  advance: number;
  /** Columns for a character; unknown characters map to the fallback glyph */
  glyphFor(char: string): readonly number[];
}

export const DEFAULT_FONT_PATH = fileURLToPath(new URL('../../../assets/font-5x7.json', import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validates parsed font JSON and builds the glyph lookup
 */
export function parseBitmapFont(raw: unknown): BitmapFont {
  if (!isRecord(raw)) {
    throw new Error('Font data must be an object');
  }
  const { name, width, height, advance, fallback, glyphs } = raw;
  if (!isPositiveInteger(width) || !isPositiveInteger(height) || !isPositiveInteger(advance)) {
    throw new Error('Font width, height and advance must be positive integers');
  }
  if (height > 8) {
    throw new Error(`Font height ${height} does not fit a column byte`);
  }
  if (!isRecord(glyphs)) {
    throw new Error('Font glyphs must be an object keyed by character');
  }

  const table = new Map<string, readonly number[]>();
  for (const [char, columns] of Object.entries(glyphs)) {
    if (!Array.isArray(columns) || columns.length !== width) {
      throw new Error(`Glyph "${char}" must have ${width} columns`);
    }
    const bytes: number[] = [];
    for (const column of columns) {
      if (typeof column !== 'number' || !Number.isInteger(column) || column < 0 || column > 0xff) {
        throw new Error(`Glyph "${char}" has a column outside 0-255`);
      }
      bytes.push(column);
    }
    table.set(char, bytes);
  }

  const fallbackChar = typeof fallback === 'string' ? fallback : '?';
  const fallbackGlyph = table.get(fallbackChar) ?? new Array<number>(width).fill(0);

  return {
    name: typeof name === 'string' ? name : 'unnamed',
    width,
    height,
    advance,
    glyphFor: (char) => table.get(char) ?? fallbackGlyph,
  };
}

let defaultFont: BitmapFont | undefined;

/**
 * Loads the bundled 5x8 font once per process
 */
export function loadDefaultFont(): BitmapFont {
  if (!defaultFont) {
    defaultFont = parseBitmapFont(JSON.parse(readFileSync(DEFAULT_FONT_PATH, 'utf8')));
  }
  return defaultFont;
}
