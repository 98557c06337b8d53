/**
 * Clock - square-wave generator driving one or more signals in phase.
 *
 * The first rising edge comes half a period after start(). stop() cancels
 * the pending toggle; a restart begins a fresh waveform.
 */

import { ConfigurationError } from '../core/errors';
import type { Signal } from './SignalBus';
import type { Simulator } from './Simulator';

export class Clock {
  private readonly sim: Simulator;
  private readonly signals: Signal[];
  private period: number;
  private generation = 0;
  private active = false;

  constructor(sim: Simulator, signals: Signal | Signal[], period: number) {
    this.sim = sim;
    this.signals = Array.isArray(signals) ? signals : [signals];
    this.period = Clock.checkPeriod(period);
  }

  getPeriod(): number { return this.period; }
  isRunning(): boolean { return this.active; }

  start(period: number = this.period): void {
    this.period = Clock.checkPeriod(period);
    const generation = ++this.generation;
    this.active = true;
    const high = Math.floor(this.period / 2);
    const low = this.period - high;

    const toggle = (level: 0 | 1): void => {
      if (generation !== this.generation) return;
      for (const signal of this.signals) signal.drive(level);
      this.sim.schedule(level ? high : low, () => toggle(level ? 0 : 1));
    };

    for (const signal of this.signals) signal.drive(0);
    this.sim.schedule(low, () => toggle(1));
  }

  stop(): void {
    this.generation++;
    this.active = false;
  }

  private static checkPeriod(period: number): number {
    if (!Number.isInteger(period) || period < 2) {
      throw new ConfigurationError(`clock period must be an integer of at least 2 ps, got ${period}`);
    }
    return period;
  }
}
