/**
 * Display Hardware Detection
 *
 * Probes for the GPIO and I2C support the panel needs before the display
 * loop starts, and names the board it runs on.
 */

import { readFileSync, existsSync } from 'node:fs';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';

const log = createSubsystemLogger('oled/hardware');

export interface DisplayHardwareProbe {
  /** Board model, e.g. "Raspberry Pi 4 Model B Rev 1.4" */
  model: string;
  /** A GPIO character device or /dev/gpiomem is present */
  gpio: boolean;
  /** /dev/i2c-<bus> is present */
  i2c: boolean;
  busNumber: number;
}

export type HardwareCapability = 'gpio' | 'i2c' | 'bus';

export class HardwareUnavailableError extends Error {
  readonly capability: HardwareCapability;

  constructor(capability: HardwareCapability, message: string) {
    super(message);
    this.name = 'HardwareUnavailableError';
    this.capability = capability;
  }
}

const GPIO_DEVICES = ['/dev/gpiomem', '/dev/gpiochip0'];
export const UNKNOWN_MODEL = 'Unknown board';

/**
 * Reads the board model from the device tree, then /proc/cpuinfo
 */
export function detectBoardModel(): string {
  try {
    const treePath = '/proc/device-tree/model';
    if (existsSync(treePath)) {
      // device tree strings are NUL terminated
      const model = readFileSync(treePath, 'utf8').replace(/\0/g, '').trim();
      if (model) {
        return model;
      }
    }

    if (!existsSync('/proc/cpuinfo')) {
      return UNKNOWN_MODEL;
    }
    const modelLine = readFileSync('/proc/cpuinfo', 'utf8')
      .split('\n')
      .find(line => line.startsWith('Model'));

    return modelLine?.split(':')[1]?.trim() || UNKNOWN_MODEL;
  } catch (error) {
    log.warn('Failed to detect board model', { error: describeError(error) });
    return UNKNOWN_MODEL;
  }
}

export function detectGpioSupport(): boolean {
  return GPIO_DEVICES.some(path => existsSync(path));
}

export function detectI2cSupport(busNumber: number): boolean {
  return existsSync(`/dev/i2c-${busNumber}`);
}

export function probeDisplayHardware(busNumber: number): DisplayHardwareProbe {
  const probe: DisplayHardwareProbe = {
    model: detectBoardModel(),
    gpio: detectGpioSupport(),
    i2c: detectI2cSupport(busNumber),
    busNumber,
  };
  log.debug('Display hardware probed', { ...probe });
  return probe;
}

/**
 * Throws when the panel cannot be driven on this host
 */
export function assertDisplayHardware(probe: DisplayHardwareProbe): void {
  if (!probe.gpio) {
    throw new HardwareUnavailableError(
      'gpio',
      `GPIO is not supported on this system (${probe.model}); the display needs a Raspberry Pi class board`,
    );
  }
  if (!probe.i2c) {
    throw new HardwareUnavailableError(
      'i2c',
      `I2C bus ${probe.busNumber} is not available; enable I2C in raspi-config or /boot/firmware/config.txt`,
    );
  }
}
