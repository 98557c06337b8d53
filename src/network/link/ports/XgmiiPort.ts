/**
 * XGMII ports - `lanes` bytes on `data` with one control bit per lane on `ctrl`
 *
 * Lane n occupies data bits [8n+7:8n] and ctrl bit n. The receiver samples
 * in the read-only phase after each rising edge, so it sees the beat driven
 * on that same edge.
 */

import { xgmiiIdlePattern } from '../../core/constants';
import type { LaneUnit, RxSample } from '../../core/types';
import type { Signal } from '../../sim/SignalBus';
import type { Task } from '../../sim/Simulator';
import type { PortClocking, RxPort, TxPort } from './BusPort';

export interface XgmiiSignals {
  data: Signal;
  ctrl: Signal;
}

export function packLanes(units: readonly LaneUnit[]): { d: bigint; c: bigint } {
  let d = 0n;
  let c = 0n;
  units.forEach((unit, lane) => {
    d |= BigInt(unit.value & 0xff) << BigInt(lane * 8);
    if (unit.flag) c |= 1n << BigInt(lane);
  });
  return { d, c };
}

export function unpackLanes(d: bigint, c: bigint, lanes: number): LaneUnit[] {
  const units: LaneUnit[] = [];
  for (let lane = 0; lane < lanes; lane++) {
    units.push({
      value: Number((d >> BigInt(lane * 8)) & 0xffn),
      flag: Number((c >> BigInt(lane)) & 1n),
    });
  }
  return units;
}

export class XgmiiTxPort implements TxPort {
  readonly signals: XgmiiSignals;
  readonly lanes: number;
  clock: Signal;
  readonly enable: Signal | null;
  private readonly idle: { d: bigint; c: bigint };

  constructor(signals: XgmiiSignals, lanes: number, clocking: PortClocking) {
    this.signals = signals;
    this.lanes = lanes;
    this.clock = clocking.clock;
    this.enable = clocking.enable ?? null;
    this.idle = xgmiiIdlePattern(lanes);
  }

  async nextCycle(task: Task): Promise<void> {
    await task.risingEdge(this.clock);
  }

  isEnabled(): boolean {
    return this.enable === null || this.enable.isHigh();
  }

  async hold(task: Task): Promise<void> {
    if (this.enable) await task.risingEdge(this.enable);
  }

  async drive(_task: Task, units: LaneUnit[] | null): Promise<void> {
    const { d, c } = units ? packLanes(units) : this.idle;
    this.signals.data.drive(d);
    this.signals.ctrl.drive(c);
  }

  quiesce(): void {
    this.signals.data.drive(this.idle.d);
    this.signals.ctrl.drive(this.idle.c);
  }
}

export class XgmiiRxPort implements RxPort {
  readonly signals: XgmiiSignals;
  readonly lanes: number;
  clock: Signal;
  readonly enable: Signal | null;

  constructor(signals: XgmiiSignals, lanes: number, clocking: PortClocking) {
    this.signals = signals;
    this.lanes = lanes;
    this.clock = clocking.clock;
    this.enable = clocking.enable ?? null;
  }

  async nextCycle(task: Task): Promise<void> {
    await task.risingEdge(this.clock);
    await task.readOnly();
  }

  isEnabled(): boolean {
    return this.enable === null || this.enable.isHigh();
  }

  // sampled after every edge; enable only decides whether the beat counts
  async hold(): Promise<void> {}

  sample(): RxSample {
    return { units: unpackLanes(this.signals.data.value, this.signals.ctrl.value, this.lanes), valid: true };
  }
}
