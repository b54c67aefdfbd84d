/**
 * Preview Display Sink
 *
 * Stands in for the panel on hosts without one: frames go to the log, as
 * text lines or as a rasterized pixel dump at trace level.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { DisplaySink, Frame } from '../types/index.js';
import { loadDefaultFont } from './bitmap-font.js';
import { MonoFramebuffer } from './framebuffer.js';

const log = createSubsystemLogger('oled/preview');

/**
 * One log line per instruction, e.g. `@0,20 Ready.`
 */
export function describeFrame(frame: Frame): string[] {
  return frame.map(line => `@${line.x},${line.y} ${line.text}`);
}

export class PreviewDisplaySink implements DisplaySink {
  private lastFrame: string[] = [];
  private framesShown = 0;

  async open(): Promise<void> {
    log.info('Preview sink active, frames are written to the log');
  }

  async show(frame: Frame): Promise<void> {
    const lines = describeFrame(frame);
    this.framesShown++;

    if (lines.join('\n') === this.lastFrame.join('\n')) {
      return;
    }
    this.lastFrame = lines;
    log.info(`Frame ${this.framesShown}\n${lines.join('\n')}`);

    if (log.isEnabled('trace')) {
      const framebuffer = new MonoFramebuffer();
      framebuffer.drawFrame(frame, loadDefaultFont());
      log.trace(framebuffer.toAscii().join('\n'));
    }
  }

  async close(): Promise<void> {
    log.info('Preview sink closed', { framesShown: this.framesShown });
  }

  getFramesShown(): number {
    return this.framesShown;
  }

  getLastFrame(): string[] {
    return [...this.lastFrame];
  }
}
