/**
 * Transport codec tables
 *
 * Preamble/SFD bytes, XGMII control characters and the 10GBASE-R control,
 * O-code, sync-header and block-type encodings (IEEE 802.3 clauses 46/49).
 * The BASE-R tables map between the XGMII control vector and 64b/66b
 * control blocks; the XGMII engines consult them, they never re-derive them.
 */

import { ConfigurationError } from './errors';

// ─── Preamble ───────────────────────────────────────────────────────

export const EthPre = {
  PRE: 0x55,
  SFD: 0xd5,
} as const;

/** 7 preamble bytes followed by the start-of-frame delimiter */
export const ETH_PREAMBLE: readonly number[] = [...Array<number>(7).fill(EthPre.PRE), EthPre.SFD];

export const FCS_LENGTH = 4;

// ─── XGMII (clause 46) ──────────────────────────────────────────────

export const XgmiiCtrl = {
  IDLE: 0x07,
  LPI: 0x06,
  START: 0xfb,
  TERM: 0xfd,
  ERROR: 0xfe,
  SEQ_OS: 0x9c,
  RES_0: 0x1c,
  RES_1: 0x3c,
  RES_2: 0x7c,
  RES_3: 0xbc,
  RES_4: 0xdc,
  RES_5: 0xf7,
  SIG_OS: 0x5c,
} as const;

export type XgmiiCtrlName = keyof typeof XgmiiCtrl;
export type XgmiiCtrlCode = typeof XgmiiCtrl[XgmiiCtrlName];

// ─── 10GBASE-R (clause 49) ──────────────────────────────────────────

export const BaseRCtrl = {
  IDLE: 0x00,
  LPI: 0x06,
  ERROR: 0x1e,
  RES_0: 0x2d,
  RES_1: 0x33,
  RES_2: 0x4b,
  RES_3: 0x55,
  RES_4: 0x66,
  RES_5: 0x78,
} as const;

export type BaseRCtrlName = keyof typeof BaseRCtrl;

export const BaseRO = {
  SEQ_OS: 0x0,
  SIG_OS: 0xf,
} as const;

export const BaseRSync = {
  DATA: 0b10,
  CTRL: 0b01,
} as const;

export const BaseRBlockType = {
  CTRL: 0x1e,      // C7 C6 C5 C4 C3 C2 C1 C0
  OS_4: 0x2d,      // D7 D6 D5 O4 C3 C2 C1 C0
  START_4: 0x33,   // D7 D6 D5    C3 C2 C1 C0
  OS_START: 0x66,  // D7 D6 D5    O0 D3 D2 D1
  OS_04: 0x55,     // D7 D6 D5 O4 O0 D3 D2 D1
  START_0: 0x78,   // D7 D6 D5 D4 D3 D2 D1
  OS_0: 0x4b,      // C7 C6 C5 C4 O0 D3 D2 D1
  TERM_0: 0x87,    // C7 C6 C5 C4 C3 C2 C1
  TERM_1: 0x99,    // C7 C6 C5 C4 C3 C2    D0
  TERM_2: 0xaa,    // C7 C6 C5 C4 C3    D1 D0
  TERM_3: 0xb4,    // C7 C6 C5 C4    D2 D1 D0
  TERM_4: 0xcc,    // C7 C6 C5    D3 D2 D1 D0
  TERM_5: 0xd2,    // C7 C6    D4 D3 D2 D1 D0
  TERM_6: 0xe1,    // C7    D5 D4 D3 D2 D1 D0
  TERM_7: 0xff,    //    D6 D5 D4 D3 D2 D1 D0
} as const;

/** Control characters shared by both encodings */
const SHARED_CTRL = ['IDLE', 'LPI', 'ERROR', 'RES_0', 'RES_1', 'RES_2', 'RES_3', 'RES_4', 'RES_5'] as const;

export const XGMII_TO_BASER_CTRL: ReadonlyMap<number, number> = new Map(
  SHARED_CTRL.map((name): [number, number] => [XgmiiCtrl[name], BaseRCtrl[name]]),
);

export const BASER_TO_XGMII_CTRL: ReadonlyMap<number, number> = new Map(
  SHARED_CTRL.map((name): [number, number] => [BaseRCtrl[name], XgmiiCtrl[name]]),
);

/** Terminate block type → lane carrying TERM */
export const BLOCK_TYPE_TERM_LANE: ReadonlyMap<number, number> = new Map<number, number>([
  [BaseRBlockType.TERM_0, 0],
  [BaseRBlockType.TERM_1, 1],
  [BaseRBlockType.TERM_2, 2],
  [BaseRBlockType.TERM_3, 3],
  [BaseRBlockType.TERM_4, 4],
  [BaseRBlockType.TERM_5, 5],
  [BaseRBlockType.TERM_6, 6],
  [BaseRBlockType.TERM_7, 7],
]);

export function xgmiiToBaseR(code: number): number | undefined {
  return XGMII_TO_BASER_CTRL.get(code);
}

export function baseRToXgmii(code: number): number | undefined {
  return BASER_TO_XGMII_CTRL.get(code);
}

export function termLaneForBlockType(blockType: number): number | undefined {
  return BLOCK_TYPE_TERM_LANE.get(blockType);
}

// ─── Derivation rules ───────────────────────────────────────────────

/** Number of byte lanes carried by a data vector of `width` bits */
export function laneCount(width: number): number {
  if (!Number.isInteger(width) || width <= 0 || width % 8 !== 0) {
    throw new ConfigurationError(`bus width ${width} is not a multiple of 8`);
  }
  return width / 8;
}

/** IDLE in every lane, control bit set on every lane */
export function xgmiiIdlePattern(lanes: number): { d: bigint; c: bigint } {
  let d = 0n;
  for (let lane = 0; lane < lanes; lane++) {
    d |= BigInt(XgmiiCtrl.IDLE) << BigInt(lane * 8);
  }
  return { d, c: (1n << BigInt(lanes)) - 1n };
}

/** Split a byte into 8/unitBits units, least-significant unit first */
export function splitByte(byte: number, unitBits: number): number[] {
  const mask = (1 << unitBits) - 1;
  const units: number[] = [];
  for (let shift = 0; shift < 8; shift += unitBits) {
    units.push((byte >> shift) & mask);
  }
  return units;
}
