/**
 * Metrics Source Component
 *
 * Host status sampling (IP address, CPU and RAM load) for the display.
 */

export * from './metrics-source.js';
