/**
 * Unit Tests for MonoFramebuffer and the bundled bitmap font
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { loadDefaultFont, parseBitmapFont, type BitmapFont } from './bitmap-font.js';
import { MonoFramebuffer } from './framebuffer.js';

describe('bitmap font', () => {
  const font = loadDefaultFont();

  it('should load the bundled 5x8 font', () => {
    expect(font.width).toBe(5);
    expect(font.height).toBe(8);
    expect(font.advance).toBe(6);
    expect(font.glyphFor('A')).toEqual([124, 18, 17, 18, 124]);
  });

  it('should cover printable ASCII', () => {
    for (let code = 32; code <= 126; code++) {
      expect(font.glyphFor(String.fromCharCode(code))).toHaveLength(5);
    }
  });

  it('should draw unknown characters with the fallback glyph', () => {
    expect(font.glyphFor('é')).toEqual(font.glyphFor('?'));
  });

  it('should return the same instance on every load', () => {
    expect(loadDefaultFont()).toBe(font);
  });

  it('should reject malformed font data', () => {
    expect(() => parseBitmapFont(null)).toThrow('Font data must be an object');
    expect(() => parseBitmapFont({ width: 5, height: 16, advance: 6, glyphs: {} }))
      .toThrow('Font height 16 does not fit a column byte');
    expect(() => parseBitmapFont({ width: 2, height: 8, advance: 3, glyphs: { x: [1] } }))
      .toThrow('Glyph "x" must have 2 columns');
    expect(() => parseBitmapFont({ width: 1, height: 8, advance: 2, glyphs: { x: [256] } }))
      .toThrow('Glyph "x" has a column outside 0-255');
  });

  it('should fall back to a blank glyph when the fallback character is missing', () => {
    const tiny = parseBitmapFont({ width: 2, height: 8, advance: 3, glyphs: { x: [1, 2] } });

    expect(tiny.name).toBe('unnamed');
    expect(tiny.glyphFor('y')).toEqual([0, 0]);
  });
});

describe('MonoFramebuffer', () => {
  let font: BitmapFont;
  let framebuffer: MonoFramebuffer;

  beforeEach(() => {
    font = loadDefaultFont();
    framebuffer = new MonoFramebuffer();
  });

  it('should require a height made of whole pages', () => {
    expect(() => new MonoFramebuffer(128, 60)).toThrow('Framebuffer height must be a multiple of 8, got 60');
  });

  it('should clip pixels outside the panel', () => {
    framebuffer.setPixel(-1, 0);
    framebuffer.setPixel(128, 10);
    framebuffer.setPixel(5, 64);

    expect(framebuffer.toPages().every(byte => byte === 0)).toBe(true);
    expect(framebuffer.getPixel(128, 10)).toBe(false);
  });

  it('should pack rows into pages with the top row in the lowest bit', () => {
    framebuffer.drawText('L', 0, 0, font);
    const pages = framebuffer.toPages();

    expect(pages).toHaveLength(1024);
    expect([...pages.subarray(0, 6)]).toEqual([127, 64, 64, 64, 64, 0]);
  });

  it('should split glyphs that straddle a page boundary', () => {
    framebuffer.drawText('L', 0, 10, font);
    const pages = framebuffer.toPages();

    expect(pages[0]).toBe(0);
    expect(pages[128]).toBe(252);
    expect(pages[256]).toBe(1);
    expect(pages[257]).toBe(1);
  });

  it('should advance six pixels per character and clip at the right edge', () => {
    framebuffer.drawText('A'.repeat(25), 0, 0, font);

    expect(framebuffer.getPixel(6, 2)).toBe(true);
    expect(framebuffer.getPixel(5, 2)).toBe(false);
    expect(framebuffer.getPixel(126, 2)).toBe(true);
    expect(framebuffer.getPixel(127, 1)).toBe(true);
  });

  it('should clear the canvas before drawing a frame', () => {
    framebuffer.drawText('L', 0, 40, font);
    framebuffer.drawFrame([{ text: 'L', x: 0, y: 0 }], font);

    expect(framebuffer.getPixel(0, 40)).toBe(false);
    expect(framebuffer.getPixel(0, 0)).toBe(true);
  });

  it('should render the canvas as text rows', () => {
    framebuffer.setPixel(1, 0);
    const rows = framebuffer.toAscii();

    expect(rows).toHaveLength(64);
    expect(rows[0]).toBe(`.#${'.'.repeat(126)}`);
    expect(rows[1]).toBe('.'.repeat(128));
  });
});
