/**
 * SSD1306 Display Sink
 *
 * Rasterizes frames into the panel's page layout and pushes the whole
 * buffer on every update.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { DisplaySink, Frame } from '../types/index.js';
import { loadDefaultFont, type BitmapFont } from './bitmap-font.js';
import type { DisplayBus } from './display-bus.js';
import { MonoFramebuffer } from './framebuffer.js';

const log = createSubsystemLogger('oled/ssd1306');

export const SSD1306 = {
  DISPLAY_OFF: 0xae,
  DISPLAY_ON: 0xaf,
  SET_CLOCK_DIV: 0xd5,
  SET_MULTIPLEX: 0xa8,
  SET_DISPLAY_OFFSET: 0xd3,
  SET_START_LINE: 0x40,
  CHARGE_PUMP: 0x8d,
  MEMORY_MODE: 0x20,
  SEGMENT_REMAP: 0xa1,
  COM_SCAN_DEC: 0xc8,
  SET_COM_PINS: 0xda,
  SET_CONTRAST: 0x81,
  SET_PRECHARGE: 0xd9,
  SET_VCOM_DETECT: 0xdb,
  RESUME_RAM: 0xa4,
  NORMAL_DISPLAY: 0xa6,
  COLUMN_ADDR: 0x21,
  PAGE_ADDR: 0x22,
} as const;

/**
 * Power-up sequence for an internally pumped panel of the given height
 */
export function initSequence(height: number): number[] {
  return [
    SSD1306.DISPLAY_OFF,
    SSD1306.SET_CLOCK_DIV, 0x80,
    SSD1306.SET_MULTIPLEX, height - 1,
    SSD1306.SET_DISPLAY_OFFSET, 0x00,
    SSD1306.SET_START_LINE,
    SSD1306.CHARGE_PUMP, 0x14,
    SSD1306.MEMORY_MODE, 0x00, // horizontal addressing
    SSD1306.SEGMENT_REMAP,
    SSD1306.COM_SCAN_DEC,
    SSD1306.SET_COM_PINS, height === 64 ? 0x12 : 0x02,
    SSD1306.SET_CONTRAST, 0xcf,
    SSD1306.SET_PRECHARGE, 0xf1,
    SSD1306.SET_VCOM_DETECT, 0x40,
    SSD1306.RESUME_RAM,
    SSD1306.NORMAL_DISPLAY,
    SSD1306.DISPLAY_ON,
  ];
}

export class Ssd1306DisplaySink implements DisplaySink {
  private bus: DisplayBus;
  private framebuffer: MonoFramebuffer;
  private font: BitmapFont;
  private isOpen = false;
  private isClosed = false;

  constructor(bus: DisplayBus, width = 128, height = 64, font: BitmapFont = loadDefaultFont()) {
    this.bus = bus;
    this.framebuffer = new MonoFramebuffer(width, height);
    this.font = font;
  }

  async open(): Promise<void> {
    if (this.isOpen) {
      return;
    }
    if (this.isClosed) {
      throw new Error('SSD1306 sink has been closed');
    }
    await this.bus.writeCommands(initSequence(this.framebuffer.height));
    this.isOpen = true;
    log.info('SSD1306 panel initialized', {
      width: this.framebuffer.width,
      height: this.framebuffer.height,
    });
  }

  async show(frame: Frame): Promise<void> {
    if (!this.isOpen) {
      throw new Error('SSD1306 sink is not open');
    }
    this.framebuffer.drawFrame(frame, this.font);
    await this.bus.writeCommands([
      SSD1306.COLUMN_ADDR, 0, this.framebuffer.width - 1,
      SSD1306.PAGE_ADDR, 0, this.framebuffer.height / 8 - 1,
    ]);
    await this.bus.writeData(this.framebuffer.toPages());
  }

  /**
   * Switches the panel off and releases the bus
   */
  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this.isClosed = true;
    try {
      if (wasOpen) {
        await this.bus.writeCommands([SSD1306.DISPLAY_OFF]);
      }
    } finally {
      await this.bus.close();
    }
    log.info('SSD1306 panel released', { switchedOff: wasOpen });
  }
}
