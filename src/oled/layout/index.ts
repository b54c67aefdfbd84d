export * from './layout-renderer.js';
