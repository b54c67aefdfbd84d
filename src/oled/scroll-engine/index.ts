export * from './scroll-engine.js';
