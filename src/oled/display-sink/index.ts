/**
 * Display Sink Component
 *
 * Rasterization and transport of frames to the SSD1306 panel, and a log
 * preview for hosts without one.
 */

export * from './bitmap-font.js';
export * from './framebuffer.js';
export * from './display-bus.js';
export * from './ssd1306-sink.js';
export * from './preview-sink.js';
