/**
 * Display Loop Tests
 *
 * Drives the full cycle with in-memory metrics, provider and sink.
 */

import { describe, it, expect, vi, beforeAll, beforeEach, type Mock } from 'vitest';
import { configureLogging } from '../logging/subsystem.js';
import { DisplayLoop, type CycleReport } from './display-loop.js';
import { MessageScheduler } from './message-scheduler/message-scheduler.js';
import type { MetricsSource } from './metrics-source/metrics-source.js';
import type { DisplaySink, Frame, MessageProvider, Snapshot } from './types/index.js';

interface FakeSink extends DisplaySink {
  open: Mock<DisplaySink['open']>;
  show: Mock<DisplaySink['show']>;
  close: Mock<DisplaySink['close']>;
}

const SNAPSHOT: Snapshot = { ip: '192.168.1.5', cpuPercent: 42, ramPercent: 17 };

describe('DisplayLoop', () => {
  let now: Date;
  let sample: Mock<MetricsSource['sample']>;
  let generate: Mock<MessageProvider['generate']>;
  let sink: FakeSink;
  let scheduler: MessageScheduler;
  let loop: DisplayLoop;

  beforeAll(() => {
    configureLogging({ style: 'hidden' });
  });

  beforeEach(() => {
    now = new Date(2025, 5, 14, 10, 0, 0);
    sample = vi.fn<MetricsSource['sample']>().mockResolvedValue(SNAPSHOT);
    generate = vi.fn<MessageProvider['generate']>().mockResolvedValue('Ready.');
    sink = {
      open: vi.fn<DisplaySink['open']>().mockResolvedValue(undefined),
      show: vi.fn<DisplaySink['show']>().mockResolvedValue(undefined),
      close: vi.fn<DisplaySink['close']>().mockResolvedValue(undefined),
    };
    scheduler = new MessageScheduler({ generate }, { clock: () => now });
    loop = new DisplayLoop({
      metrics: { sample },
      scheduler,
      sink,
      clock: () => now,
      intervalMs: 0,
    });
  });

  describe('tick', () => {
    it('should render metrics and the first message', async () => {
      const report = await loop.tick();

      const expected: Frame = [
        { text: 'LUNA: CPU: 42% RAM: 17%', x: 0, y: 0 },
        { text: 'IP: 192.168.1.5', x: 0, y: 10 },
        { text: 'Ready.', x: 0, y: 20 },
      ];
      expect(report.frame).toEqual(expected);
      expect(sink.show).toHaveBeenCalledWith(expected);
      expect(report.outcome).toMatchObject({ origin: 'provider', text: 'Ready.' });
      expect(report.renderedOffset).toBe(0);
      expect(report.nextOffset).toBe(0);
      expect(report.delivered).toBe(true);
    });

    it('should scroll long messages between frames', async () => {
      generate.mockResolvedValue('THE QUICK BROWN FOX JUMPS!');

      const first = await loop.tick();
      const second = await loop.tick();

      expect(first.frame[2]).toEqual({ text: 'THE QUICK BROWN FOX JUMPS', x: 0, y: 20 });
      expect(first.nextOffset).toBe(6);
      expect(second.renderedOffset).toBe(6);
      expect(second.frame[2]).toEqual({ text: 'ICK BROWN FOX JUMPS! THE ', x: 0, y: 20 });
      expect(second.nextOffset).toBe(12);
    });

    it('should show a fallback phrase when the provider fails', async () => {
      generate.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:11434'));

      const report = await loop.tick();

      expect(report.outcome).toMatchObject({ origin: 'fallback', text: 'Monitoring systems...' });
      expect(report.frame[2]).toEqual({ text: 'Monitoring systems...', x: 0, y: 20 });
    });

    it('should show the fallback for the minute the provider gave up in', async () => {
      now = new Date(2025, 5, 14, 10, 0, 50);
      generate.mockImplementation(async () => {
        now = new Date(2025, 5, 14, 10, 1, 20);
        throw new Error('Ollama did not answer within 30000ms');
      });

      const report = await loop.tick();

      expect(report.frame[2]).toEqual({ text: 'All systems nominal.', x: 0, y: 20 });
      expect(scheduler.getState().lastRefreshedAt).toEqual(new Date(2025, 5, 14, 10, 1, 20));
    });

    it('should keep the offset inside a shorter replacement message', async () => {
      generate.mockResolvedValue('The quick brown fox jumps over the lazy dog');
      for (let i = 0; i < 6; i++) {
        await loop.tick();
      }
      expect(loop.getStatus().scrollOffset).toBe(36);

      now = new Date(2025, 5, 14, 10, 5, 0);
      generate.mockResolvedValue('Standing by for new orders.');
      const report = await loop.tick();

      expect(report.renderedOffset).toBe(9);
      expect(report.frame[2]).toEqual({ text: 'by for new orders. Standi', x: 0, y: 20 });
      expect(report.nextOffset).toBe(15);
    });

    it('should only ask for a new message every five minutes', async () => {
      await loop.tick();
      now = new Date(2025, 5, 14, 10, 4, 59);
      const early = await loop.tick();
      now = new Date(2025, 5, 14, 10, 5, 0);
      const due = await loop.tick();

      expect(early.outcome).toBeNull();
      expect(due.outcome).not.toBeNull();
      expect(generate).toHaveBeenCalledTimes(2);
    });

    it('should keep going when the sink rejects a frame', async () => {
      const errors: Array<{ stage: string; error: unknown }> = [];
      loop.on('cycleError', event => errors.push(event));
      sink.show.mockRejectedValueOnce(new Error('Remote I/O error'));

      const failed = await loop.tick();
      const recovered = await loop.tick();

      expect(failed.delivered).toBe(false);
      expect(recovered.delivered).toBe(true);
      expect(errors).toHaveLength(1);
      expect(errors[0].stage).toBe('sink');
      expect(loop.getStatus()).toMatchObject({ cycles: 2, errors: 1 });
    });

    it('should emit a report for every frame', async () => {
      const reports: CycleReport[] = [];
      loop.on('frameRendered', report => reports.push(report));

      await loop.tick();

      expect(reports).toHaveLength(1);
      expect(reports[0].snapshot).toEqual(SNAPSHOT);
    });
  });

  describe('run', () => {
    it('should cycle until stopped', async () => {
      const events: string[] = [];
      loop.on('loopStarted', () => events.push('started'));
      loop.on('loopStopped', () => events.push('stopped'));
      loop.on('frameRendered', () => {
        if (loop.getStatus().cycles === 3) {
          loop.stop();
        }
      });

      await loop.run();

      expect(events).toEqual(['started', 'stopped']);
      expect(sink.show).toHaveBeenCalledTimes(3);
      expect(loop.isRunning()).toBe(false);
      expect(loop.getStatus()).toMatchObject({ running: false, cycles: 3, errors: 0, message: 'Ready.' });
    });

    it('should survive a failing cycle', async () => {
      const stages: string[] = [];
      loop.on('cycleError', event => stages.push(event.stage));
      loop.on('frameRendered', () => loop.stop());
      sample.mockRejectedValueOnce(new Error('/proc/stat unreadable'));

      await loop.run();

      expect(stages).toEqual(['cycle']);
      expect(loop.getStatus()).toMatchObject({ cycles: 1, errors: 1 });
    });

    it('should not start a second run while one is active', async () => {
      loop.on('frameRendered', () => loop.stop());

      const first = loop.run();
      await loop.run();
      await first;

      expect(sink.show).toHaveBeenCalledTimes(1);
    });

    it('should cut a pending sleep short on stop', async () => {
      const slow = new DisplayLoop({ metrics: { sample }, scheduler, sink, clock: () => now, intervalMs: 60000 });
      slow.on('frameRendered', () => {
        setImmediate(() => slow.stop());
      });

      await slow.run();

      expect(slow.getStatus().cycles).toBe(1);
    });
  });
});
