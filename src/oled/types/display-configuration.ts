/**
 * DisplayConfig Interface
 *
 * Runtime settings for the I/O collaborators around the display loop. Layout
 * constants are fixed and live with the renderer.
 */

import type { LogLevel, LogStyle } from '../../logging/subsystem.js';

export type SinkKind = 'ssd1306' | 'preview';

export interface DisplayConfig {
  /** Local Ollama server used for LUNA messages */
  ollama: {
    baseUrl: string;
    model: string;
    temperature: number;
    /** Output token budget (num_predict) */
    maxTokens: number;
    /** Request timeout in milliseconds */
    timeoutMs: number;
  };

  /** SSD1306 panel wiring */
  panel: {
    /** I2C bus number, /dev/i2c-<n> */
    busNumber: number;
    /** 7-bit I2C address */
    address: number;
    width: number;
    height: number;
  };

  loop: {
    /** Pause between display cycles in milliseconds */
    intervalMs: number;
  };

  /** ssd1306 drives the panel and refuses to start without it; preview logs frames */
  sink: SinkKind;

  logging: {
    level: LogLevel;
    style: LogStyle;
  };
}

export type DisplayConfigOverrides = {
  [Section in keyof DisplayConfig]?: DisplayConfig[Section] extends object
    ? Partial<DisplayConfig[Section]>
    : DisplayConfig[Section];
};
