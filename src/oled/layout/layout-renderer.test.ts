/**
 * Unit Tests for the layout renderer
 */

import { describe, it, expect } from 'vitest';
import {
  formatIpLine,
  formatStatusLine,
  needsScrolling,
  render,
  scrollWindow,
  wrapWords,
} from './layout-renderer.js';
import type { Snapshot } from '../types/index.js';

const snapshot: Snapshot = { ip: '192.168.1.5', cpuPercent: 42, ramPercent: 17 };

describe('Layout renderer', () => {
  describe('render', () => {
    it('should lay out status, IP and a short message on three lines', () => {
      expect(render(snapshot, 'Ready.', 0)).toEqual([
        { text: 'LUNA: CPU: 42% RAM: 17%', x: 0, y: 0 },
        { text: 'IP: 192.168.1.5', x: 0, y: 10 },
        { text: 'Ready.', x: 0, y: 20 },
      ]);
    });

    it('should print metric values exactly as received', () => {
      const frame = render({ ip: 'N/A', cpuPercent: 150, ramPercent: -3 }, 'Ready.', 0);

      expect(frame[0].text).toBe('LUNA: CPU: 150% RAM: -3%');
      expect(frame[1].text).toBe('IP: N/A');
    });

    it('should show a message of exactly one line without scrolling', () => {
      const frame = render(snapshot, 'THE QUICK BROWN FOX JUMPS', 18);

      expect(frame[2]).toEqual({ text: 'THE QUICK BROWN FOX JUMPS', x: 0, y: 20 });
    });

    it('should show a marquee window for a long message', () => {
      const frame = render(snapshot, 'THE QUICK BROWN FOX JUMPS!', 20);

      expect(frame).toHaveLength(3);
      expect(frame[2]).toEqual({ text: 'JUMPS! THE QUICK BROWN FO', x: 0, y: 20 });
    });

    it('should wrap the scroll offset around the message length', () => {
      const message = 'THE QUICK BROWN FOX JUMPS!';

      expect(render(snapshot, message, 46)).toEqual(render(snapshot, message, 20));
    });

    it('should leave the message area empty for an empty message', () => {
      expect(render(snapshot, '', 0)).toHaveLength(2);
    });
  });

  describe('formatting', () => {
    it('should format the status and IP lines', () => {
      expect(formatStatusLine({ ip: '10.0.0.2', cpuPercent: 0, ramPercent: 100 })).toBe('LUNA: CPU: 0% RAM: 100%');
      expect(formatIpLine({ ip: '10.0.0.2', cpuPercent: 0, ramPercent: 100 })).toBe('IP: 10.0.0.2');
    });

    it('should scroll only messages longer than 25 characters', () => {
      expect(needsScrolling('x'.repeat(25))).toBe(false);
      expect(needsScrolling('x'.repeat(26))).toBe(true);
    });
  });

  describe('scrollWindow', () => {
    const message = 'THE QUICK BROWN FOX JUMPS';
    const looped = `${message} ${message}`;

    it('should start with the first 25 characters of the looped message', () => {
      expect(scrollWindow(message, 0)).toBe(looped.slice(0, 25));
      expect(scrollWindow(message, 0)).toBe('THE QUICK BROWN FOX JUMPS');
    });

    it('should repeat after one message length', () => {
      expect(scrollWindow(message, message.length)).toBe(scrollWindow(message, 0));
    });

    it('should continue into the repeated copy past the end', () => {
      expect(scrollWindow(message, 16)).toBe('FOX JUMPS THE QUICK BROWN');
    });

    it('should return nothing for an empty message', () => {
      expect(scrollWindow('', 7)).toBe('');
    });
  });

  describe('wrapWords', () => {
    it('should pack words greedily into lines of at most 25 characters', () => {
      expect(wrapWords('HELLO WORLD THIS IS A TEST MESSAGE')).toEqual([
        { text: 'HELLO WORLD THIS IS A', x: 0, y: 20 },
        { text: 'TEST MESSAGE', x: 0, y: 28 },
      ]);
    });

    it('should drop words that would land below y=60', () => {
      const words = Array.from({ length: 7 }, (_, i) => String.fromCharCode(65 + i).repeat(20));

      const lines = wrapWords(words.join(' '));

      expect(lines.map(line => line.y)).toEqual([20, 28, 36, 44, 52, 60]);
      expect(lines.map(line => line.text)).toEqual(words.slice(0, 6));
    });

    it('should keep an overlong word whole on its own line', () => {
      expect(wrapWords('ok SUPERCALIFRAGILISTICEXPIALIDOCIOUS')).toEqual([
        { text: 'ok', x: 0, y: 20 },
        { text: 'SUPERCALIFRAGILISTICEXPIALIDOCIOUS', x: 0, y: 28 },
      ]);
    });

    it('should produce no lines for an empty message', () => {
      expect(wrapWords('')).toEqual([]);
    });
  });
});
