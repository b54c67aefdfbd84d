/**
 * Layout Renderer
 *
 * Turns a snapshot and the current message into the draw instructions for one
 * frame. Widths are counted in characters, not measured in pixels.
 */

import type { DrawInstruction, Frame, Snapshot } from '../types/index.js';

export const LAYOUT = {
  /** Characters that fit on one message line */
  maxCharsPerLine: 25,
  statusY: 0,
  ipY: 10,
  messageY: 20,
  lineSpacing: 8,
  /** Lowest baseline a message line may use */
  maxMessageY: 60,
} as const;

export function formatStatusLine(snapshot: Snapshot): string {
  return `LUNA: CPU: ${snapshot.cpuPercent}% RAM: ${snapshot.ramPercent}%`;
}

export function formatIpLine(snapshot: Snapshot): string {
  return `IP: ${snapshot.ip}`;
}

/**
 * Messages longer than a line are shown as a marquee instead of wrapped
 */
export function needsScrolling(message: string): boolean {
  return message.length > LAYOUT.maxCharsPerLine;
}

/**
 * Window of up to one line over `message + " " + message`, starting at
 * `offset mod message.length`. The doubled string lets the window run past
 * the end of the message and continue with its start.
 */
export function scrollWindow(message: string, offset: number): string {
  if (message.length === 0) {
    return '';
  }
  const looped = `${message} ${message}`;
  const start = ((offset % message.length) + message.length) % message.length;
  return looped.slice(start, start + LAYOUT.maxCharsPerLine);
}

/**
 * Greedy word packing. Lines go 8px apart from y=20; words that would land
 * below y=60 are dropped. A word longer than a line keeps a line to itself.
 */
export function wrapWords(message: string): DrawInstruction[] {
  const lines: DrawInstruction[] = [];
  let line = '';
  let y: number = LAYOUT.messageY;

  for (const word of message.split(' ')) {
    const candidate = line.length === 0 ? word : `${line} ${word}`;
    if (candidate.length > LAYOUT.maxCharsPerLine && line.length > 0) {
      lines.push({ text: line, x: 0, y });
      y += LAYOUT.lineSpacing;
      line = word;
      if (y > LAYOUT.maxMessageY) {
        return lines;
      }
    } else {
      line = candidate;
    }
  }

  if (line.length > 0) {
    lines.push({ text: line, x: 0, y });
  }
  return lines;
}

/**
 * Builds the frame: status line, IP line, then the message as a marquee
 * window or as wrapped lines.
 */
export function render(snapshot: Snapshot, message: string, scrollOffset: number): Frame {
  const frame: DrawInstruction[] = [
    { text: formatStatusLine(snapshot), x: 0, y: LAYOUT.statusY },
    { text: formatIpLine(snapshot), x: 0, y: LAYOUT.ipY },
  ];

  if (needsScrolling(message)) {
    frame.push({ text: scrollWindow(message, scrollOffset), x: 0, y: LAYOUT.messageY });
  } else {
    frame.push(...wrapWords(message));
  }

  return frame;
}
