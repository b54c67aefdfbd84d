/**
 * Display Hardware Detection
 *
 * Capability probing for the GPIO and I2C support the panel needs.
 */

export * from './detection.js';
