/**
 * Link configuration: defaults, speed tables and clock periods.
 */

import { ConfigurationError } from './errors';
import type { InterfaceMode, LinkSpeed, QueueLimits } from './types';

export const LINK_DEFAULTS = {
  /** Inter-frame gap in byte-times */
  ifg: 12,
  /** Minimum frame length before FCS */
  minFrameLength: 60,
  resetActiveLevel: true,
  enableDic: true,
  forceOffsetStart: false,
  /** RMII reference clock, 50 MHz */
  rmiiRefClockPs: 20_000,
  /** XGMII clock, 156.25 MHz */
  xgmiiClockPs: 6_400,
} as const;

export const MODE_SPEEDS: Readonly<Record<InterfaceMode, readonly LinkSpeed[]>> = {
  gmii: [10, 100, 1000],
  mii: [10, 100],
  rgmii: [10, 100, 1000],
  rmii: [10, 100],
  xgmii: [10000],
};

export function isLinkSpeed(mode: InterfaceMode, speed: number): speed is LinkSpeed {
  return MODE_SPEEDS[mode].some(s => s === speed);
}

export function assertSpeed(mode: InterfaceMode, speed: number): LinkSpeed {
  if (!isLinkSpeed(mode, speed)) {
    throw new ConfigurationError(
      `invalid ${mode.toUpperCase()} speed ${speed} Mb/s (expected one of ${MODE_SPEEDS[mode].join(', ')})`,
    );
  }
  return speed;
}

/**
 * Clock period in picoseconds for a mode and speed.
 *
 * GMII/RGMII at 1000 Mb/s run 125 MHz; below that the nibble-wide
 * interfaces run at speed/4 (25 MHz, 2.5 MHz). RMII always uses its 50 MHz
 * reference clock and divides down instead.
 */
export function clockPeriodPs(mode: InterfaceMode, speed: number): number {
  const checked = assertSpeed(mode, speed);
  switch (mode) {
    case 'rmii':
      return LINK_DEFAULTS.rmiiRefClockPs;
    case 'xgmii':
      return LINK_DEFAULTS.xgmiiClockPs;
    default:
      return checked === 1000 ? 8_000 : (4_000_000 / checked);
  }
}

/** RMII transfers 2 bits per enabled reference clock; 10 Mb/s enables every tenth */
export function rmiiDivider(speed: number): number {
  return assertSpeed('rmii', speed) === 10 ? 10 : 1;
}

export function assertIfg(ifg: number, source?: string): number {
  if (!Number.isInteger(ifg) || ifg < 0) {
    throw new ConfigurationError(`inter-frame gap must be a non-negative integer, got ${ifg}`, source);
  }
  return ifg;
}

export function resolveQueueLimits(limits: QueueLimits = {}, source?: string): QueueLimits {
  for (const [key, value] of Object.entries(limits)) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new ConfigurationError(`queue limit "${key}" must be a non-negative integer, got ${value}`, source);
    }
  }
  return { ...limits };
}
