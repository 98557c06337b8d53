/**
 * MiiPhy - MII PHY model at 10/100 Mb/s
 *
 * Both tx_clk and rx_clk come from the PHY: 25 MHz at 100 Mb/s,
 * 2.5 MHz at 10 Mb/s.
 */

import { clockPeriodPs } from '../core/config';
import type { LinkSpeed } from '../core/types';
import { Clock } from '../sim/Clock';
import type { Signal } from '../sim/SignalBus';
import type { Simulator } from '../sim/Simulator';
import { MiiReceiver, MiiTransmitter } from './Mii';
import { Phy } from './Phy';
import type { PhyOptions } from './types';

export interface MiiPhySignals {
  txd: Signal;
  txEr?: Signal | null;
  txEn: Signal;
  txClk: Signal;
  rxd: Signal;
  rxEr?: Signal | null;
  rxDv: Signal;
  rxClk: Signal;
}

export class MiiPhy extends Phy<MiiReceiver, MiiTransmitter> {
  readonly tx: MiiReceiver;
  readonly rx: MiiTransmitter;

  constructor(sim: Simulator, signals: MiiPhySignals, options: PhyOptions = {}) {
    const name = options.name ?? 'mii-phy';
    super(sim, 'mii', name, new Clock(sim, [signals.rxClk, signals.txClk], clockPeriodPs('mii', 100)), 100, options.logger);
    const common = {
      sim,
      reset: options.reset,
      resetActiveLevel: options.resetActiveLevel,
      logger: options.logger,
    };
    this.tx = new MiiReceiver({
      ...common,
      name: `${name}-tx`,
      signals: { data: signals.txd, er: signals.txEr, valid: signals.txEn },
      clock: signals.txClk,
    });
    this.rx = new MiiTransmitter({
      ...common,
      name: `${name}-rx`,
      signals: { data: signals.rxd, er: signals.rxEr, valid: signals.rxDv },
      clock: signals.rxClk,
      ifg: options.ifg,
    });
    this.setSpeed(options.speed ?? 100);
  }

  // the clock period is all that changes
  protected applySpeed(_speed: LinkSpeed): void {}
}
