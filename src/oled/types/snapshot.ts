/**
 * Snapshot Interface
 *
 * Host status sampled once per display cycle.
 */

export interface Snapshot {
  /** Non-loopback IPv4 address, or "N/A" when none is up */
  ip: string;
  /** CPU load as an integer percentage (0-100) */
  cpuPercent: number;
  /** RAM usage as an integer percentage (0-100) */
  ramPercent: number;
}

/** Shown in place of an address when no usable interface is up */
export const IP_UNAVAILABLE = 'N/A';
