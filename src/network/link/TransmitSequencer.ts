/**
 * TransmitSequencer - the transmit state machine without the bus
 *
 * One call to step() is one enabled clock phase. The sequencer decides
 * whether the phase is spent in the inter-frame gap, pulls the next frame
 * when the gap has expired, and hands back the lane units to drive.
 *
 *   IDLE/IFG ──frame available──► ACTIVE ──last unit──► IDLE/IFG
 *
 * Keeping this free of signals lets the gap and codec rules be exercised
 * over thousands of frames without a simulator.
 */

import type { LaneUnit } from '../core/types';
import type { GapControl } from '../codec/GapControl';
import type { LaneCodec } from '../codec/LaneCodec';
import type { Frame } from '../frame/Frame';

/** XGMII offset start moves the frame to lane 4 */
const OFFSET_START_LANES = 4;

export interface TxCycle {
  /** Units to drive this phase, null when the bus idles */
  units: LaneUnit[] | null;
  /** Frame pulled from the queue this phase */
  started: Frame | null;
  /** The SFD went out this phase */
  sfd: boolean;
  /** Frame whose last unit went out this phase */
  finished: Frame | null;
  /** The gap had expired and no frame was waiting */
  drained: boolean;
}

interface InFlight {
  frame: Frame;
  codec: LaneCodec;
  units: LaneUnit[];
  offset: number;
  sfdSeen: boolean;
}

export interface TransmitSequencerOptions {
  gap: GapControl;
  /** Codec for the next frame; sampled when a frame starts */
  codec: () => LaneCodec;
}

export class TransmitSequencer {
  readonly gap: GapControl;
  private readonly resolveCodec: () => LaneCodec;
  private current: InFlight | null = null;

  constructor(options: TransmitSequencerOptions) {
    this.gap = options.gap;
    this.resolveCodec = options.codec;
  }

  isBusy(): boolean { return this.current !== null; }

  getCurrentFrame(): Frame | null { return this.current?.frame ?? null; }

  step(next: () => Frame | undefined): TxCycle {
    const cycle: TxCycle = { units: null, started: null, sfd: false, finished: null, drained: false };

    if (!this.current) {
      if (this.gap.inGap()) return cycle;
      const frame = next();
      if (!frame) {
        this.gap.idle();
        cycle.drained = true;
        return cycle;
      }
      frame.normalize();
      const codec = this.resolveCodec();
      let units = codec.encode(frame);
      cycle.started = frame;
      if (units.length === 0) {
        // nothing to drive; complete it without leaving idle
        this.gap.endFrame(codec.laneCount, codec.unitsPerByte);
        cycle.finished = frame;
        return cycle;
      }
      if (this.gap.beginFrame() && codec.idleUnit) {
        units = [...new Array<LaneUnit>(OFFSET_START_LANES).fill(codec.idleUnit), ...units];
      }
      this.current = { frame, codec, units, offset: 0, sfdSeen: false };
    }

    const cur = this.current;
    const lanes = cur.codec.laneCount;
    const out: LaneUnit[] = [];
    for (let lane = 0; lane < lanes; lane++) {
      if (cur.offset < cur.units.length) {
        const unit = cur.units[cur.offset++];
        out.push(unit);
        if (!cur.sfdSeen && unit.flag === 0 && unit.value === cur.codec.sfdUnit) {
          cur.sfdSeen = true;
          cycle.sfd = true;
        }
        if (cur.offset === cur.units.length) {
          this.gap.endFrame(lanes - lane, cur.codec.unitsPerByte);
          cycle.finished = cur.frame;
        }
      } else if (cur.codec.idleUnit) {
        out.push(cur.codec.idleUnit);
      }
    }
    if (cycle.finished) this.current = null;
    cycle.units = out;
    return cycle;
  }

  /** Drop the in-flight frame and gap state; returns the dropped frame */
  reset(): Frame | null {
    const frame = this.current?.frame ?? null;
    this.current = null;
    this.gap.reset();
    return frame;
  }
}
