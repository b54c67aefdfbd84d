/**
 * Message Scheduler Component
 *
 * Refresh timing, prompt rotation and fallback selection for the LUNA message.
 */

export * from './message-scheduler.js';
