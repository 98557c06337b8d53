/**
 * RGMII ports - 4-bit double data rate
 *
 * Each beat is a byte: the low nibble goes out on the falling edge with
 * ctl = en, the high nibble on the following rising edge with
 * ctl = en ^ er. In MII mode (10/100 Mb/s) only the falling-edge nibble is
 * driven and each beat carries one nibble.
 *
 *   rising k   : high nibble of beat k-1, next beat computed
 *   falling k  : low nibble of beat k
 */

import type { LaneUnit, RxSample } from '../../core/types';
import type { Signal } from '../../sim/SignalBus';
import type { Task } from '../../sim/Simulator';
import type { PortClocking, RxPort, TxPort } from './BusPort';

export interface RgmiiSignals {
  data: Signal;
  ctl: Signal;
}

interface HeldBeat {
  value: number;
  er: number;
  en: number;
}

const IDLE_BEAT: HeldBeat = { value: 0, er: 0, en: 0 };

export class RgmiiTxPort implements TxPort {
  readonly signals: RgmiiSignals;
  clock: Signal;
  readonly enable: Signal | null;
  miiMode = false;
  private held: HeldBeat = IDLE_BEAT;

  constructor(signals: RgmiiSignals, clocking: PortClocking) {
    this.signals = signals;
    this.clock = clocking.clock;
    this.enable = clocking.enable ?? null;
  }

  async nextCycle(task: Task): Promise<void> {
    await task.risingEdge(this.clock);
  }

  isEnabled(): boolean {
    return this.enable === null || this.enable.isHigh();
  }

  /** Enable low: the held beat is driven again on both edges */
  async hold(task: Task): Promise<void> {
    this.driveHigh();
    await task.fallingEdge(this.clock);
    if (task.isAlive()) this.driveLow();
  }

  async drive(task: Task, units: LaneUnit[] | null): Promise<void> {
    this.driveHigh();
    const unit = units?.[0];
    this.held = unit ? { value: unit.value, er: unit.flag, en: 1 } : IDLE_BEAT;
    await task.fallingEdge(this.clock);
    if (task.isAlive()) this.driveLow();
  }

  quiesce(): void {
    this.held = IDLE_BEAT;
    this.signals.data.drive(0);
    this.signals.ctl.drive(0);
  }

  private driveHigh(): void {
    if (this.miiMode) return;
    this.signals.data.drive((this.held.value >> 4) & 0xf);
    this.signals.ctl.drive(this.held.en ^ this.held.er);
  }

  private driveLow(): void {
    this.signals.data.drive(this.held.value & 0xf);
    this.signals.ctl.drive(this.held.en);
  }
}

export class RgmiiRxPort implements RxPort {
  readonly signals: RgmiiSignals;
  clock: Signal;
  readonly enable: Signal | null;
  miiMode = false;
  private low = 0;
  private high = 0;
  private dv = 0;
  private er = 0;

  constructor(signals: RgmiiSignals, clocking: PortClocking) {
    this.signals = signals;
    this.clock = clocking.clock;
    this.enable = clocking.enable ?? null;
  }

  /** Low nibble and dv on the rising edge, high nibble and er on the falling edge */
  async nextCycle(task: Task): Promise<void> {
    await task.risingEdge(this.clock);
    if (!task.isAlive()) return;
    this.low = this.signals.data.toNumber();
    this.dv = this.signals.ctl.toNumber();
    await task.fallingEdge(this.clock);
    this.high = this.signals.data.toNumber();
    this.er = this.dv ^ this.signals.ctl.toNumber();
  }

  isEnabled(): boolean {
    return this.enable === null || this.enable.isHigh();
  }

  // capture continues every cycle; a disabled beat is simply not processed
  async hold(): Promise<void> {}

  sample(): RxSample {
    return {
      units: [{ value: this.miiMode ? this.low : this.low | (this.high << 4), flag: this.er }],
      valid: this.dv !== 0,
    };
  }
}
