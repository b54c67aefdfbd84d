/**
 * Message Provider Component
 *
 * Language-model clients that produce LUNA messages.
 */

export * from './ollama-provider.js';
