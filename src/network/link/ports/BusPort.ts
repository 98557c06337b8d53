/**
 * Bus ports - the signal side of a link engine
 *
 * A port owns the clocking of one interface (single edge, divided edge,
 * double data rate) and the mapping between lane units and signal vectors.
 * The generic engines only ever talk to these interfaces.
 */

import type { LaneUnit, RxSample } from '../../core/types';
import type { Signal } from '../../sim/SignalBus';
import type { Task } from '../../sim/Simulator';

export interface TxPort {
  /** Suspend until the next phase at which a beat may be presented */
  nextCycle(task: Task): Promise<void>;
  isEnabled(): boolean;
  /** Called on a phase where enable is low; resumes when driving may continue */
  hold(task: Task): Promise<void>;
  /** Present one beat, null for the idle/no-valid state */
  drive(task: Task, units: LaneUnit[] | null): Promise<void>;
  /** Return the outputs to idle at once (reset) */
  quiesce(): void;
}

export interface RxPort {
  /** Suspend until a complete beat has been captured */
  nextCycle(task: Task): Promise<void>;
  isEnabled(): boolean;
  hold(task: Task): Promise<void>;
  sample(): RxSample;
  /** Between frames, suspend until the bus shows activity */
  awaitActivity?(task: Task): Promise<void>;
}

export interface PortClocking {
  clock: Signal;
  enable?: Signal | null;
}

/** Passes one of every `divider` clock edges */
export class EdgeDivider {
  private divider: number;
  private counter = 0;

  constructor(divider: number = 1) {
    this.divider = divider;
  }

  getDivider(): number { return this.divider; }

  setDivider(divider: number): void {
    this.divider = divider;
    this.counter = 0;
  }

  tick(): boolean {
    if (this.divider <= 1) return true;
    this.counter++;
    if (this.counter < this.divider) return false;
    this.counter = 0;
    return true;
  }
}
