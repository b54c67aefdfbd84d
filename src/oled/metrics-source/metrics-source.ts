/**
 * Metrics Source Implementation
 *
 * Samples the host status shown on the first two display lines: the primary
 * IPv4 address, CPU load and RAM usage. Percentages are clamped here, at
 * parse time; every read failure degrades to 0 or "N/A" instead of throwing.
 */

import { readFileSync, existsSync } from 'node:fs';
import { networkInterfaces } from 'node:os';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import { IP_UNAVAILABLE, type Snapshot } from '../types/index.js';

const log = createSubsystemLogger('oled/metrics');

export interface MetricsSource {
  sample(): Promise<Snapshot>;
}

export interface CpuTimes {
  user: number;
  nice: number;
  system: number;
  idle: number;
  iowait: number;
  irq: number;
  softirq: number;
  steal: number;
}

/** Minimal shape of an os.networkInterfaces() entry */
export interface InterfaceAddress {
  address: string;
  family: string | number;
  internal: boolean;
}

export interface SystemMetricsSourceOptions {
  /** Gap between the two /proc/stat reads */
  cpuSampleMs: number;
  statPath: string;
  meminfoPath: string;
}

const DEFAULT_OPTIONS: SystemMetricsSourceOptions = {
  cpuSampleMs: 100,
  statPath: '/proc/stat',
  meminfoPath: '/proc/meminfo',
};

/**
 * Clamps to an integer percentage in [0, 100]; anything non-finite is 0
 */
export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(100, Math.trunc(value)));
}

/**
 * Reads the aggregate "cpu" line of /proc/stat
 */
export function parseCpuStat(content: string): CpuTimes | null {
  const cpuLine = content.split('\n').find(line => /^cpu\s/.test(line));
  if (!cpuLine) {
    return null;
  }
  const values = cpuLine.trim().split(/\s+/).slice(1).map(Number);

  return {
    user: values[0] || 0,
    nice: values[1] || 0,
    system: values[2] || 0,
    idle: values[3] || 0,
    iowait: values[4] || 0,
    irq: values[5] || 0,
    softirq: values[6] || 0,
    steal: values[7] || 0,
  };
}

/**
 * Busy share of the jiffies elapsed between two samples
 */
export function computeCpuPercent(before: CpuTimes, after: CpuTimes): number {
  const total = (t: CpuTimes) => t.user + t.nice + t.system + t.idle + t.iowait + t.irq + t.softirq + t.steal;
  const idle = (t: CpuTimes) => t.idle + t.iowait;

  const totalDiff = total(after) - total(before);
  const idleDiff = idle(after) - idle(before);
  if (totalDiff <= 0) {
    return 0;
  }
  return clampPercent(((totalDiff - idleDiff) / totalDiff) * 100);
}

/**
 * Used share of RAM from /proc/meminfo, counting MemAvailable as free
 */
export function computeRamPercent(meminfo: string): number {
  const lines = meminfo.split('\n');
  const getKb = (key: string): number | null => {
    const line = lines.find(l => l.startsWith(key));
    const match = line?.match(/(\d+)/);
    return match ? parseInt(match[1], 10) : null;
  };

  const total = getKb('MemTotal:');
  const available = getKb('MemAvailable:');
  if (total === null || available === null || total === 0) {
    return 0;
  }
  return clampPercent(((total - available) / total) * 100);
}

/**
 * First external IPv4 address, skipping 100.x addresses (CGNAT and overlay
 * VPNs such as Tailscale), or "N/A"
 */
export function selectIpAddress(
  interfaces: Record<string, InterfaceAddress[] | undefined>,
): string {
  for (const addresses of Object.values(interfaces)) {
    for (const entry of addresses ?? []) {
      const isIPv4 = entry.family === 'IPv4' || entry.family === 4;
      if (isIPv4 && !entry.internal && !entry.address.startsWith('100.')) {
        return entry.address;
      }
    }
  }
  return IP_UNAVAILABLE;
}

export class SystemMetricsSource implements MetricsSource {
  private options: SystemMetricsSourceOptions;

  constructor(options: Partial<SystemMetricsSourceOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Samples IP, CPU and RAM for one display cycle
   */
  async sample(): Promise<Snapshot> {
    const cpuPercent = await this.getCpuPercent();

    return {
      ip: this.getIpAddress(),
      cpuPercent,
      ramPercent: this.getRamPercent(),
    };
  }

  private getIpAddress(): string {
    try {
      return selectIpAddress(networkInterfaces());
    } catch (error) {
      log.debug('Failed to list network interfaces', { error: describeError(error) });
      return IP_UNAVAILABLE;
    }
  }

  private async getCpuPercent(): Promise<number> {
    try {
      if (!existsSync(this.options.statPath)) {
        return 0;
      }

      const before = parseCpuStat(readFileSync(this.options.statPath, 'utf8'));
      await new Promise(resolve => setTimeout(resolve, this.options.cpuSampleMs));
      const after = parseCpuStat(readFileSync(this.options.statPath, 'utf8'));

      if (!before || !after) {
        return 0;
      }
      return computeCpuPercent(before, after);
    } catch (error) {
      log.debug('Failed to read CPU usage', { error: describeError(error) });
      return 0;
    }
  }

  private getRamPercent(): number {
    try {
      if (!existsSync(this.options.meminfoPath)) {
        return 0;
      }
      return computeRamPercent(readFileSync(this.options.meminfoPath, 'utf8'));
    } catch (error) {
      log.debug('Failed to read memory usage', { error: describeError(error) });
      return 0;
    }
  }
}
