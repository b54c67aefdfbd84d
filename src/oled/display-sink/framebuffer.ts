/**
 * Monochrome Framebuffer
 *
 * One bit per pixel canvas for 128x64 class panels. Drawing outside the
 * panel is clipped.
 */

import type { Frame } from '../types/index.js';
import type { BitmapFont } from './bitmap-font.js';

export class MonoFramebuffer {
  readonly width: number;
  readonly height: number;
  private pixels: Uint8Array;

  constructor(width = 128, height = 64) {
    if (height % 8 !== 0) {
      throw new Error(`Framebuffer height must be a multiple of 8, got ${height}`);
    }
    this.width = width;
    this.height = height;
    this.pixels = new Uint8Array(width * height);
  }

  clear(): void {
    this.pixels.fill(0);
  }

  setPixel(x: number, y: number, on = true): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return;
    }
    this.pixels[y * this.width + x] = on ? 1 : 0;
  }

  getPixel(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return false;
    }
    return this.pixels[y * this.width + x] === 1;
  }

  /**
   * Draws text with its top-left corner at (x, y)
   */
  drawText(text: string, x: number, y: number, font: BitmapFont): void {
    let originX = x;
    for (const char of text) {
      if (originX >= this.width) {
        return;
      }
      const columns = font.glyphFor(char);
      columns.forEach((bits, column) => {
        for (let row = 0; row < font.height; row++) {
          if ((bits >> row) & 1) {
            this.setPixel(originX + column, y + row);
          }
        }
      });
      originX += font.advance;
    }
  }

  /**
   * Clears the canvas and draws every instruction of a frame
   */
  drawFrame(frame: Frame, font: BitmapFont): void {
    this.clear();
    for (const line of frame) {
      this.drawText(line.text, line.x, line.y, font);
    }
  }

  /**
   * SSD1306 page layout: one byte per column per 8-row page, LSB on top
   */
  toPages(): Buffer {
    const pages = this.height / 8;
    const buffer = Buffer.alloc(this.width * pages);
    for (let page = 0; page < pages; page++) {
      for (let x = 0; x < this.width; x++) {
        let byte = 0;
        for (let bit = 0; bit < 8; bit++) {
          if (this.pixels[(page * 8 + bit) * this.width + x] === 1) {
            byte |= 1 << bit;
          }
        }
        buffer[page * this.width + x] = byte;
      }
    }
    return buffer;
  }

  /**
   * Text rendering of the canvas, one string per pixel row
   */
  toAscii(on = '#', off = '.'): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = '';
      for (let x = 0; x < this.width; x++) {
        row += this.pixels[y * this.width + x] === 1 ? on : off;
      }
      rows.push(row);
    }
    return rows;
  }
}
