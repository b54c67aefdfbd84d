/**
 * LUNA OLED Entry Point
 *
 * Builds the display collaborators from configuration, starts the display
 * loop and shuts it down again.
 */

import { configureLogging, createSubsystemLogger, describeError } from '../logging/subsystem.js';
import { resolveDisplayConfig } from './configuration.js';
import { DisplayLoop } from './display-loop.js';
import { openI2cDisplayBus } from './display-sink/display-bus.js';
import { PreviewDisplaySink } from './display-sink/preview-sink.js';
import { Ssd1306DisplaySink } from './display-sink/ssd1306-sink.js';
import {
  assertDisplayHardware,
  HardwareUnavailableError,
  probeDisplayHardware,
} from './hardware/detection.js';
import { OllamaMessageProvider } from './message-provider/ollama-provider.js';
import { MessageScheduler } from './message-scheduler/message-scheduler.js';
import { SystemMetricsSource, type MetricsSource } from './metrics-source/metrics-source.js';
import type {
  DisplayConfig,
  DisplayConfigOverrides,
  DisplaySink,
  MessageProvider,
} from './types/index.js';

const log = createSubsystemLogger('oled/index');

export interface DisplayCollaborators {
  metrics: MetricsSource;
  provider: MessageProvider;
  sink: DisplaySink;
}

export interface DisplayRuntime {
  config: DisplayConfig;
  loop: DisplayLoop;
  sink: DisplaySink;
  /** Settles when the loop has stopped */
  done: Promise<void>;
}

let runtime: DisplayRuntime | null = null;

/**
 * Opens the sink selected by the configuration. The SSD1306 sink refuses to
 * start on hosts without GPIO and I2C.
 */
export async function createDisplaySink(config: DisplayConfig): Promise<DisplaySink> {
  if (config.sink === 'preview') {
    return new PreviewDisplaySink();
  }

  const probe = probeDisplayHardware(config.panel.busNumber);
  assertDisplayHardware(probe);
  log.info('Display hardware detected', { model: probe.model, busNumber: probe.busNumber });

  try {
    const bus = await openI2cDisplayBus(config.panel.busNumber, config.panel.address);
    return new Ssd1306DisplaySink(bus, config.panel.width, config.panel.height);
  } catch (error) {
    throw new HardwareUnavailableError(
      'bus',
      `Failed to open I2C bus ${config.panel.busNumber}: ${describeError(error)}`,
    );
  }
}

/**
 * Starts the LUNA display. Collaborators not passed in are built from the
 * configuration.
 */
export async function startLunaDisplay(
  overrides: DisplayConfigOverrides = {},
  collaborators: Partial<DisplayCollaborators> = {},
): Promise<DisplayRuntime> {
  if (runtime) {
    log.warn('LUNA display already started');
    return runtime;
  }

  const config = resolveDisplayConfig(overrides);
  configureLogging(config.logging);
  log.info('Starting LUNA display...', { sink: config.sink, model: config.ollama.model });

  const sink = collaborators.sink ?? await createDisplaySink(config);
  try {
    await sink.open();
  } catch (error) {
    await sink.close();
    throw error;
  }

  const scheduler = new MessageScheduler(
    collaborators.provider ?? new OllamaMessageProvider(config.ollama),
    { temperature: config.ollama.temperature, maxTokens: config.ollama.maxTokens },
  );
  const loop = new DisplayLoop({
    metrics: collaborators.metrics ?? new SystemMetricsSource(),
    scheduler,
    sink,
    intervalMs: config.loop.intervalMs,
  });

  const done = loop.run();
  runtime = { config, loop, sink, done };
  log.info('LUNA display started');
  return runtime;
}

/**
 * Stops the loop after its current cycle and switches the panel off
 */
export async function stopLunaDisplay(): Promise<void> {
  if (!runtime) {
    return;
  }
  const { loop, sink, done } = runtime;
  runtime = null;

  try {
    log.info('Stopping LUNA display...');
    loop.stop();
    await done;
    await sink.close();
    log.info('LUNA display stopped');
  } catch (error) {
    log.error('Error during LUNA display shutdown', { error: describeError(error) });
  }
}

export function getLunaDisplayRuntime(): DisplayRuntime | null {
  return runtime;
}

/**
 * Stops the display on SIGINT and SIGTERM
 */
export function installSignalHandlers(): void {
  const shutdown = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, shutting down LUNA display...`);
    stopLunaDisplay().catch((error: unknown) => {
      log.error('Shutdown failed', { error: describeError(error) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

export type {
  DisplayConfig,
  DisplayConfigOverrides,
  DisplaySink,
  Frame,
  MessageOutcome,
  MessageProvider,
  Snapshot,
} from './types/index.js';
export { PromptCategory } from './types/index.js';

export { DEFAULT_DISPLAY_CONFIG, resolveDisplayConfig } from './configuration.js';
export { DisplayLoop, type CycleReport, type DisplayLoopStatus } from './display-loop.js';
export { render, scrollWindow, wrapWords, LAYOUT } from './layout/layout-renderer.js';
export { advance, ScrollEngine, SCROLL_STEP } from './scroll-engine/scroll-engine.js';
export {
  MessageScheduler,
  shouldRefresh,
  promptCategory,
  selectFallback,
  FALLBACK_MESSAGES,
} from './message-scheduler/message-scheduler.js';
export { SystemMetricsSource, type MetricsSource } from './metrics-source/metrics-source.js';
export { OllamaMessageProvider, MessageProviderError } from './message-provider/ollama-provider.js';
export { Ssd1306DisplaySink, PreviewDisplaySink, MonoFramebuffer } from './display-sink/index.js';
export { HardwareUnavailableError, probeDisplayHardware } from './hardware/detection.js';
