/**
 * LaneCodec - per-mode mapping between frame bytes and bus units
 *
 * A codec answers every mode-specific question the generic engines ask:
 * how many units go out per phase (lanes), how a byte splits into units,
 * which unit marks the SFD, what fills unused lanes, and how a frame's
 * start and end are recognised on the receive side.
 *
 *   SubByteCodec(8)  GMII, RGMII at 1000 Mb/s
 *   SubByteCodec(4)  MII, GMII/RGMII in MII mode (low nibble first)
 *   SubByteCodec(2)  RMII (least-significant pair first)
 *   XgmiiCodec(n)    XGMII, n byte lanes with in-band START/TERM
 */

import { EthPre, XgmiiCtrl, splitByte } from '../core/constants';
import { ConfigurationError, ContractViolationError } from '../core/errors';
import type { LaneUnit } from '../core/types';
import type { Frame } from '../frame/Frame';

export type FramingStyle = 'envelope' | 'in-band';

export interface ReassembledBytes {
  data: number[];
  flags: number[];
}

export interface LaneCodec {
  readonly name: string;
  readonly framing: FramingStyle;
  /** Units driven per clock phase */
  readonly laneCount: number;
  readonly unitBits: number;
  readonly unitsPerByte: number;
  /** The unit that completes the SFD on the bus */
  readonly sfdUnit: number;
  /** Filler for lanes past the end of a frame, null where lanes never go unused */
  readonly idleUnit: LaneUnit | null;

  /** Unit stream for a normalized frame */
  encode(frame: Frame): LaneUnit[];
  /** Unit recorded when `unit` opens a frame, or null when it does not */
  frameStart(unit: LaneUnit, valid: boolean): LaneUnit | null;
  isFrameEnd(unit: LaneUnit, valid: boolean): boolean;
  /** Unit kept at the tail of a frame closed by `unit` */
  frameTail(unit: LaneUnit): LaneUnit | null;
  /** Fold received units back into bytes */
  reassemble(units: readonly LaneUnit[]): ReassembledBytes;
}

/**
 * Fold sub-byte units into bytes. Until the SFD has been seen the byte
 * boundary is unknown, so the shift register is compared against the SFD
 * after every unit and the first match realigns the stream.
 */
function foldUnits(units: readonly LaneUnit[], unitBits: number): ReassembledBytes {
  const perByte = 8 / unitBits;
  const mask = (1 << unitBits) - 1;
  const data: number[] = [];
  const flags: number[] = [];
  let shift = 0;
  let flag = 0;
  let position = 0;
  let sync = false;

  for (const unit of units) {
    shift = ((unit.value & mask) << (8 - unitBits)) | (shift >> unitBits);
    flag |= unit.flag;
    position++;
    if (!sync && shift === EthPre.SFD) {
      sync = true;
      position = perByte;
    }
    if (position === perByte) {
      data.push(shift);
      flags.push(flag);
      flag = 0;
      position = 0;
    }
  }
  return { data, flags };
}

export class SubByteCodec implements LaneCodec {
  readonly name: string;
  readonly framing = 'envelope';
  readonly laneCount = 1;
  readonly unitBits: number;
  readonly unitsPerByte: number;
  readonly sfdUnit: number;
  readonly idleUnit = null;

  constructor(unitBits: 8 | 4 | 2) {
    this.unitBits = unitBits;
    this.unitsPerByte = 8 / unitBits;
    this.sfdUnit = EthPre.SFD >> (8 - unitBits);
    this.name = unitBits === 8 ? 'byte' : unitBits === 4 ? 'nibble' : 'dibit';
  }

  encode(frame: Frame): LaneUnit[] {
    const flags = frame.flags ?? [];
    const units: LaneUnit[] = [];
    frame.data.forEach((byte, i) => {
      const flag = flags[i] ?? 0;
      for (const value of splitByte(byte, this.unitBits)) units.push({ value, flag });
    });
    return units;
  }

  frameStart(unit: LaneUnit, valid: boolean): LaneUnit | null {
    return valid ? unit : null;
  }

  isFrameEnd(_unit: LaneUnit, valid: boolean): boolean {
    return !valid;
  }

  frameTail(): LaneUnit | null {
    return null;
  }

  reassemble(units: readonly LaneUnit[]): ReassembledBytes {
    return foldUnits(units, this.unitBits);
  }
}

export class XgmiiCodec implements LaneCodec {
  readonly name = 'xgmii';
  readonly framing = 'in-band';
  readonly laneCount: number;
  readonly unitBits = 8;
  readonly unitsPerByte = 1;
  readonly sfdUnit = EthPre.SFD;
  readonly idleUnit: LaneUnit = { value: XgmiiCtrl.IDLE, flag: 1 };

  constructor(lanes: number) {
    if (!Number.isInteger(lanes) || lanes < 1) {
      throw new ConfigurationError(`XGMII lane count must be a positive integer, got ${lanes}`);
    }
    this.laneCount = lanes;
  }

  /**
   * START replaces the first preamble byte and TERM follows the FCS.
   * The first byte must be a plain preamble byte.
   */
  encode(frame: Frame): LaneUnit[] {
    const flags = frame.flags ?? [];
    if (frame.data[0] !== EthPre.PRE || (flags[0] ?? 0) !== 0) {
      throw new ContractViolationError('frame does not begin with a preamble byte, cannot substitute START');
    }
    const units: LaneUnit[] = [{ value: XgmiiCtrl.START, flag: 1 }];
    for (let i = 1; i < frame.data.length; i++) {
      units.push({ value: frame.data[i], flag: flags[i] ?? 0 });
    }
    units.push({ value: XgmiiCtrl.TERM, flag: 1 });
    return units;
  }

  frameStart(unit: LaneUnit): LaneUnit | null {
    return unit.flag && unit.value === XgmiiCtrl.START ? { value: EthPre.PRE, flag: 0 } : null;
  }

  isFrameEnd(unit: LaneUnit): boolean {
    return unit.flag !== 0;
  }

  frameTail(unit: LaneUnit): LaneUnit | null {
    return unit.value === XgmiiCtrl.TERM ? null : unit;
  }

  reassemble(units: readonly LaneUnit[]): ReassembledBytes {
    return { data: units.map(u => u.value), flags: units.map(u => u.flag) };
  }
}

export const BYTE_CODEC = new SubByteCodec(8);
export const NIBBLE_CODEC = new SubByteCodec(4);
export const DIBIT_CODEC = new SubByteCodec(2);
