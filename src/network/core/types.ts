/**
 * Shared types for the link layer
 */

export type InterfaceMode = 'gmii' | 'mii' | 'rgmii' | 'rmii' | 'xgmii';

/** Link speeds in Mb/s (IEEE 802.3 naming) */
export const VALID_LINK_SPEEDS = [10, 100, 1000, 10000] as const;
export type LinkSpeed = typeof VALID_LINK_SPEEDS[number];

/**
 * One lane-level unit on the bus: a byte, nibble or 2-bit chunk plus the
 * flag bit that travels with it (er for the GMII family, c for XGMII).
 */
export interface LaneUnit {
  value: number;
  flag: number;
}

/** One sampled bus beat as seen by a receiver */
export interface RxSample {
  units: LaneUnit[];
  /** Out-of-band valid (dv / ctl); always true for in-band framed modes */
  valid: boolean;
}

/** Occupancy limits; an absent field means unlimited */
export interface QueueLimits {
  bytes?: number;
  frames?: number;
}

export interface QueueStats {
  frames: number;
  bytes: number;
}
