/**
 * Display Configuration
 *
 * Defaults for the display process and merging of caller overrides.
 */

import type { DisplayConfig, DisplayConfigOverrides } from './types/index.js';

export const DEFAULT_DISPLAY_CONFIG: DisplayConfig = {
  ollama: {
    baseUrl: 'http://localhost:11434',
    model: 'llama3.1:8b-instruct-q4_K_M',
    temperature: 0.9,
    maxTokens: 50,
    timeoutMs: 30000, // 30 seconds
  },
  panel: {
    busNumber: 1,
    address: 0x3c,
    width: 128,
    height: 64,
  },
  loop: {
    intervalMs: 1000,
  },
  sink: 'ssd1306',
  logging: {
    level: 'info',
    style: 'pretty',
  },
};

/**
 * Merges overrides into the defaults one section at a time
 */
export function resolveDisplayConfig(overrides: DisplayConfigOverrides = {}): DisplayConfig {
  const config: DisplayConfig = {
    ollama: { ...DEFAULT_DISPLAY_CONFIG.ollama, ...overrides.ollama },
    panel: { ...DEFAULT_DISPLAY_CONFIG.panel, ...overrides.panel },
    loop: { ...DEFAULT_DISPLAY_CONFIG.loop, ...overrides.loop },
    sink: overrides.sink ?? DEFAULT_DISPLAY_CONFIG.sink,
    logging: { ...DEFAULT_DISPLAY_CONFIG.logging, ...overrides.logging },
  };

  validateDisplayConfig(config);
  return config;
}

/**
 * Rejects settings the loop or the panel cannot work with
 */
export function validateDisplayConfig(config: DisplayConfig): void {
  const problems: string[] = [];

  if (!/^https?:\/\//.test(config.ollama.baseUrl)) {
    problems.push(`ollama.baseUrl must be an http(s) URL, got "${config.ollama.baseUrl}"`);
  }
  if (config.ollama.model.trim().length === 0) {
    problems.push('ollama.model must not be empty');
  }
  if (!(config.ollama.timeoutMs > 0)) {
    problems.push('ollama.timeoutMs must be positive');
  }
  if (!Number.isInteger(config.ollama.maxTokens) || config.ollama.maxTokens <= 0) {
    problems.push('ollama.maxTokens must be a positive integer');
  }
  if (!Number.isInteger(config.panel.busNumber) || config.panel.busNumber < 0) {
    problems.push('panel.busNumber must be a non-negative integer');
  }
  if (!Number.isInteger(config.panel.address) || config.panel.address < 0x03 || config.panel.address > 0x77) {
    problems.push('panel.address must be a 7-bit I2C address');
  }
  if (config.panel.height % 8 !== 0 || config.panel.height <= 0 || config.panel.width <= 0) {
    problems.push('panel dimensions must be positive and the height a multiple of 8');
  }
  if (!(config.loop.intervalMs >= 0)) {
    problems.push('loop.intervalMs must not be negative');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid display configuration: ${problems.join('; ')}`);
  }
}
