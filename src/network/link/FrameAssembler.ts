/**
 * FrameAssembler - the receive state machine without the bus
 *
 * Fed one sampled beat at a time; returns the frames that closed in it.
 *
 *   IDLE ──start (valid / START lane)──► ACTIVE ──end (!valid / ctrl lane)──► IDLE
 *
 * In-band framing can close a frame and open the next inside one beat, so a
 * beat may complete more than one frame.
 */

import type { LaneUnit, RxSample } from '../core/types';
import type { LaneCodec } from '../codec/LaneCodec';
import { Frame } from '../frame/Frame';

interface Pending {
  units: LaneUnit[];
  start: number;
  sfd: number | null;
  startLane: number;
}

export class FrameAssembler {
  /** Codec used for detection and reassembly; swapped between frames on mode change */
  codec: LaneCodec;
  private pending: Pending | null = null;

  constructor(codec: LaneCodec) {
    this.codec = codec;
  }

  isInFrame(): boolean { return this.pending !== null; }

  push(sample: RxSample, time: number): Frame[] {
    const done: Frame[] = [];
    sample.units.forEach((unit, lane) => {
      if (!this.pending) {
        const seed = this.codec.frameStart(unit, sample.valid);
        if (seed) {
          this.pending = { units: [], start: time, sfd: null, startLane: lane };
          this.append(seed, time);
        }
        return;
      }
      if (this.codec.isFrameEnd(unit, sample.valid)) {
        const pending = this.pending;
        const tail = this.codec.frameTail(unit);
        if (tail) pending.units.push(tail);
        this.pending = null;
        done.push(this.close(pending, time));
        return;
      }
      this.append(unit, time);
    });
    return done;
  }

  /** Discard a partial frame */
  reset(): void {
    this.pending = null;
  }

  private append(unit: LaneUnit, time: number): void {
    if (!this.pending) return;
    if (this.pending.sfd === null && unit.flag === 0 && unit.value === this.codec.sfdUnit) {
      this.pending.sfd = time;
    }
    this.pending.units.push(unit);
  }

  private close(pending: Pending, time: number): Frame {
    const { data, flags } = this.codec.reassemble(pending.units);
    const frame = new Frame(data, { flags });
    frame.compact();
    frame.simTimeStart = pending.start;
    frame.simTimeSfd = pending.sfd;
    frame.simTimeEnd = time;
    if (this.codec.framing === 'in-band') frame.rxStartLane = pending.startLane;
    return frame;
  }
}
