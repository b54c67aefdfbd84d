/**
 * Scroll Engine
 *
 * Owns the marquee offset for long messages and moves it between frames.
 */

import { needsScrolling } from '../layout/layout-renderer.js';

/** Characters the marquee moves per frame */
export const SCROLL_STEP = 6;

/**
 * Next offset for `message`. Short messages do not scroll and reset to 0;
 * long ones move by SCROLL_STEP modulo the message length.
 */
export function advance(message: string, offset: number): number {
  if (!needsScrolling(message)) {
    return 0;
  }
  return (offset + SCROLL_STEP) % message.length;
}

export interface ScrollState {
  offset: number;
}

export class ScrollEngine {
  private state: ScrollState = { offset: 0 };

  current(): number {
    return this.state.offset;
  }

  /**
   * Brings the offset back inside `message` after the text changed and
   * returns it
   */
  align(message: string): number {
    const offset = needsScrolling(message) ? this.state.offset % message.length : 0;
    this.state = { offset };
    return offset;
  }

  /**
   * Advances past the frame just shown for `message` and returns the new offset
   */
  tick(message: string): number {
    this.state = { offset: advance(message, this.state.offset) };
    return this.state.offset;
  }

  reset(): void {
    this.state = { offset: 0 };
  }
}
