/**
 * Display Loop
 *
 * The single sequential update cycle: sample host metrics, refresh the LUNA
 * message when due, render, push to the panel, advance the marquee, sleep.
 * Iterations never overlap; a failing cycle is logged and the next one runs.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as sleep } from 'node:timers/promises';
import { createSubsystemLogger, describeError } from '../logging/subsystem.js';
import { render } from './layout/layout-renderer.js';
import type { MessageScheduler } from './message-scheduler/message-scheduler.js';
import type { MetricsSource } from './metrics-source/metrics-source.js';
import { ScrollEngine } from './scroll-engine/scroll-engine.js';
import type { DisplaySink, Frame, MessageOutcome, Snapshot } from './types/index.js';

export interface DisplayLoopDependencies {
  metrics: MetricsSource;
  scheduler: MessageScheduler;
  sink: DisplaySink;
  scroll?: ScrollEngine;
  /** Wall clock; replaced in tests */
  clock?: () => Date;
  /** Pause between cycles in milliseconds */
  intervalMs?: number;
}

export interface CycleReport {
  snapshot: Snapshot;
  frame: Frame;
  /** Refresh result, or null when no refresh was due */
  outcome: MessageOutcome | null;
  /** Offset the frame was rendered with */
  renderedOffset: number;
  /** Offset for the next frame */
  nextOffset: number;
  /** False when the sink rejected the frame */
  delivered: boolean;
}

export interface DisplayLoopStatus {
  running: boolean;
  cycles: number;
  errors: number;
  startedAt?: Date;
  lastCycleAt?: Date;
  message: string;
  scrollOffset: number;
}

export class DisplayLoop extends EventEmitter {
  private logger = createSubsystemLogger('oled/loop');
  private metrics: MetricsSource;
  private scheduler: MessageScheduler;
  private sink: DisplaySink;
  private scroll: ScrollEngine;
  private clock: () => Date;
  private intervalMs: number;

  private running = false;
  private abortController?: AbortController;
  private cycles = 0;
  private errors = 0;
  private startedAt?: Date;
  private lastCycleAt?: Date;

  constructor(deps: DisplayLoopDependencies) {
    super();
    this.metrics = deps.metrics;
    this.scheduler = deps.scheduler;
    this.sink = deps.sink;
    this.scroll = deps.scroll ?? new ScrollEngine();
    this.clock = deps.clock ?? (() => new Date());
    this.intervalMs = deps.intervalMs ?? 1000;
  }

  /**
   * Runs one full cycle without sleeping
   */
  async tick(): Promise<CycleReport> {
    const snapshot = await this.metrics.sample();
    const outcome = await this.scheduler.refreshIfDue(this.clock());
    const message = this.scheduler.getCurrentText();

    const renderedOffset = this.scroll.align(message);
    const frame = render(snapshot, message, renderedOffset);

    let delivered = true;
    try {
      await this.sink.show(frame);
    } catch (error) {
      delivered = false;
      this.recordError('sink', error);
    }

    const nextOffset = this.scroll.tick(message);
    this.cycles++;
    this.lastCycleAt = this.clock();

    const report: CycleReport = { snapshot, frame, outcome, renderedOffset, nextOffset, delivered };
    this.emit('frameRendered', report);
    return report;
  }

  /**
   * Repeats tick() every intervalMs until stop() is called
   */
  async run(): Promise<void> {
    if (this.running) {
      this.logger.warn('Display loop already running');
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.running = true;
    this.startedAt = this.clock();
    this.logger.info('Display loop started', { intervalMs: this.intervalMs });
    this.emit('loopStarted', { startedAt: this.startedAt });

    try {
      while (!controller.signal.aborted) {
        try {
          await this.tick();
        } catch (error) {
          this.recordError('cycle', error);
        }

        if (controller.signal.aborted) {
          break;
        }
        await this.pause(controller.signal);
      }
    } finally {
      this.running = false;
      this.abortController = undefined;
      this.logger.info('Display loop stopped', { cycles: this.cycles, errors: this.errors });
      this.emit('loopStopped', { cycles: this.cycles });
    }
  }

  /**
   * Ends run() after the current cycle; a pending sleep is cut short
   */
  stop(): void {
    this.abortController?.abort();
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): DisplayLoopStatus {
    return {
      running: this.running,
      cycles: this.cycles,
      errors: this.errors,
      startedAt: this.startedAt,
      lastCycleAt: this.lastCycleAt,
      message: this.scheduler.getCurrentText(),
      scrollOffset: this.scroll.current(),
    };
  }

  private async pause(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.intervalMs, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    }
  }

  private recordError(stage: 'sink' | 'cycle', error: unknown): void {
    this.errors++;
    this.logger.error(`Display ${stage} failed`, { error: describeError(error) });
    this.emit('cycleError', { stage, error });
  }
}
