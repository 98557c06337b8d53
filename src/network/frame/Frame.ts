/**
 * Frame - one Ethernet frame as it travels over a PHY-facing interface
 *
 * `data` holds the bytes exactly as they are clocked onto the bus:
 * preamble + SFD + payload + FCS. `flags` runs parallel to `data` and carries
 * the per-byte error bit (GMII family) or control bit (XGMII); `null` is
 * shorthand for all zero.
 *
 * Lifecycle:
 *   Frame.fromPayload(payload) → LinkTransmitter.send(frame)
 *     → engine stamps simTimeStart / simTimeSfd / simTimeEnd → txComplete resolves
 *   LinkReceiver builds a new Frame from sampled units → recv()
 */

import { Buffer } from 'node:buffer';
import { ETH_PREAMBLE, EthPre, FCS_LENGTH } from '../core/constants';
import { LINK_DEFAULTS } from '../core/config';
import { crc32 } from '../core/crc32';
import type { Completion } from './Completion';

export type FrameBytes = Uint8Array | readonly number[];

export interface FrameOptions {
  flags?: readonly number[] | null;
  /** Resolved when the last unit leaves the transmit engine, or on flush */
  txComplete?: Completion<Frame> | null;
}

export interface FromPayloadOptions {
  /** Payload is zero-padded to this length before the FCS is appended */
  minLength?: number;
  txComplete?: Completion<Frame> | null;
}

export class Frame {
  data: Buffer;
  flags: number[] | null;

  // ─── Lifecycle timestamps (ps), set by the owning engine ─────────
  simTimeStart: number | null = null;
  simTimeSfd: number | null = null;
  simTimeEnd: number | null = null;

  /** XGMII lane on which START was seen (receive direction only) */
  rxStartLane: number | null = null;

  readonly txComplete: Completion<Frame> | null;

  constructor(data: FrameBytes = [], options: FrameOptions = {}) {
    this.data = Buffer.from(data);
    this.flags = options.flags ? [...options.flags] : null;
    this.txComplete = options.txComplete ?? null;
  }

  // ─── Constructors ───────────────────────────────────────────────

  /** Pad to the minimum length, append the FCS and prepend the preamble */
  static fromPayload(payload: FrameBytes, options: FromPayloadOptions = {}): Frame {
    const minLength = options.minLength ?? LINK_DEFAULTS.minFrameLength;
    const body = Buffer.alloc(Math.max(payload.length, minLength));
    Buffer.from(payload).copy(body);
    const fcs = Buffer.alloc(FCS_LENGTH);
    fcs.writeUInt32LE(crc32(body), 0);
    return Frame.fromRawPayload(Buffer.concat([body, fcs]), { txComplete: options.txComplete });
  }

  /** Prepend the preamble to bytes that already carry their FCS (or none) */
  static fromRawPayload(bytes: FrameBytes, options: FrameOptions = {}): Frame {
    return new Frame(Buffer.concat([Buffer.from(ETH_PREAMBLE), Buffer.from(bytes)]), options);
  }

  static from(other: Frame): Frame {
    const copy = new Frame(other.data, { flags: other.flags, txComplete: other.txComplete });
    copy.simTimeStart = other.simTimeStart;
    copy.simTimeSfd = other.simTimeSfd;
    copy.simTimeEnd = other.simTimeEnd;
    copy.rxStartLane = other.rxStartLane;
    return copy;
  }

  // ─── Accessors ──────────────────────────────────────────────────

  get length(): number { return this.data.length; }

  /** Bytes up to and including the SFD; 0 when no SFD is present */
  getPreambleLength(): number {
    return this.data.indexOf(EthPre.SFD) + 1;
  }

  getPreamble(): Buffer {
    return Buffer.from(this.data.subarray(0, this.getPreambleLength()));
  }

  getPayload(stripFcs: boolean = true): Buffer {
    const start = this.getPreambleLength();
    const end = stripFcs ? this.data.length - FCS_LENGTH : this.data.length;
    return Buffer.from(this.data.subarray(start, end));
  }

  getFcs(): Buffer {
    return Buffer.from(this.data.subarray(this.data.length - FCS_LENGTH));
  }

  /** Recompute the CRC-32 over the payload and compare with the trailing FCS */
  checkFcs(): boolean {
    return crc32(this.getPayload(true)) === this.getFcs().readUInt32LE(0);
  }

  // ─── Flags ──────────────────────────────────────────────────────

  /** Make flags exactly as long as data, repeating the last flag */
  normalize(): void {
    const n = this.data.length;
    if (this.flags && this.flags.length > 0) {
      const last = this.flags[this.flags.length - 1];
      const flags = this.flags.slice(0, n);
      while (flags.length < n) flags.push(last);
      this.flags = flags;
    } else {
      this.flags = new Array<number>(n).fill(0);
    }
  }

  /** Collapse an all-zero flag array to null */
  compact(): void {
    if (this.flags && this.flags.every(f => f === 0)) {
      this.flags = null;
    }
  }

  hasFlags(): boolean {
    return this.flags !== null && this.flags.some(f => f !== 0);
  }

  handleTxComplete(): void {
    this.txComplete?.resolve(this);
  }

  /** Frames compare on data only */
  equals(other: Frame): boolean {
    return this.data.equals(other.data);
  }

  toString(): string {
    const flags = this.flags ? ` flags=[${this.flags.join(',')}]` : '';
    return `Frame(${this.data.length}B data=${this.data.toString('hex')}${flags}`
      + ` start=${this.simTimeStart} sfd=${this.simTimeSfd} end=${this.simTimeEnd})`;
  }
}
