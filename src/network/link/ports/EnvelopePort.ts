/**
 * Envelope ports - GMII, MII and RMII
 *
 * One unit per enabled rising edge on `data`, framed by the `valid` signal
 * (tx_en / rx_dv / crs_dv) with an optional error signal. RMII enables one
 * edge in `divider` of its reference clock.
 */

import type { LaneUnit, RxSample } from '../../core/types';
import type { Signal } from '../../sim/SignalBus';
import type { Task } from '../../sim/Simulator';
import { EdgeDivider, type PortClocking, type RxPort, type TxPort } from './BusPort';

export interface EnvelopeSignals {
  data: Signal;
  er?: Signal | null;
  valid: Signal;
}

export interface EnvelopeClocking extends PortClocking {
  divider?: number;
}

abstract class EnvelopePort {
  readonly signals: EnvelopeSignals;
  /** Sampling clock; the GMII Phy swaps it on speed changes */
  clock: Signal;
  readonly enable: Signal | null;
  readonly divider: EdgeDivider;

  constructor(signals: EnvelopeSignals, clocking: EnvelopeClocking) {
    this.signals = signals;
    this.clock = clocking.clock;
    this.enable = clocking.enable ?? null;
    this.divider = new EdgeDivider(clocking.divider ?? 1);
  }

  async nextCycle(task: Task): Promise<void> {
    do {
      await task.risingEdge(this.clock);
    } while (task.isAlive() && !this.divider.tick());
  }

  isEnabled(): boolean {
    return this.enable === null || this.enable.isHigh();
  }

  async hold(task: Task): Promise<void> {
    if (this.enable) await task.risingEdge(this.enable);
  }
}

export class EnvelopeTxPort extends EnvelopePort implements TxPort {
  async drive(_task: Task, units: LaneUnit[] | null): Promise<void> {
    const unit = units?.[0];
    if (!unit) {
      this.quiesce();
      return;
    }
    this.signals.data.drive(unit.value);
    this.signals.er?.drive(unit.flag);
    this.signals.valid.drive(1);
  }

  quiesce(): void {
    this.signals.data.drive(0);
    this.signals.er?.drive(0);
    this.signals.valid.drive(0);
  }
}

export class EnvelopeRxPort extends EnvelopePort implements RxPort {
  sample(): RxSample {
    return {
      units: [{ value: this.signals.data.toNumber(), flag: this.signals.er?.toNumber() ?? 0 }],
      valid: this.signals.valid.isHigh(),
    };
  }

  async awaitActivity(task: Task): Promise<void> {
    if (!this.signals.valid.isHigh()) await task.risingEdge(this.signals.valid);
  }
}
