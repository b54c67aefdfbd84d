/**
 * LUNA OLED - Type Definitions
 *
 * This module exports all TypeScript interfaces and types for the display.
 */

export * from './snapshot.js';
export * from './message.js';
export * from './frame.js';
export * from './display-configuration.js';
