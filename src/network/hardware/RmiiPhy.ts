/**
 * RmiiPhy - RMII PHY model at 10/100 Mb/s
 *
 * A single 50 MHz ref_clk serves both directions at every speed; 10 Mb/s
 * is reached by holding each dibit for ten clocks.
 */

import { clockPeriodPs } from '../core/config';
import type { LinkSpeed } from '../core/types';
import { Clock } from '../sim/Clock';
import type { Signal } from '../sim/SignalBus';
import type { Simulator } from '../sim/Simulator';
import { Phy } from './Phy';
import { RmiiReceiver, RmiiTransmitter } from './Rmii';
import type { PhyOptions } from './types';

export interface RmiiPhySignals {
  txd: Signal;
  txEn: Signal;
  rxd: Signal;
  rxEr?: Signal | null;
  crsDv: Signal;
  refClk: Signal;
}

export class RmiiPhy extends Phy<RmiiReceiver, RmiiTransmitter> {
  readonly tx: RmiiReceiver;
  readonly rx: RmiiTransmitter;

  constructor(sim: Simulator, signals: RmiiPhySignals, options: PhyOptions = {}) {
    const name = options.name ?? 'rmii-phy';
    super(sim, 'rmii', name, new Clock(sim, [signals.refClk], clockPeriodPs('rmii', 100)), 100, options.logger);
    const common = {
      sim,
      clock: signals.refClk,
      reset: options.reset,
      resetActiveLevel: options.resetActiveLevel,
      logger: options.logger,
    };
    this.tx = new RmiiReceiver({
      ...common,
      name: `${name}-tx`,
      signals: { data: signals.txd, valid: signals.txEn },
    });
    this.rx = new RmiiTransmitter({
      ...common,
      name: `${name}-rx`,
      signals: { data: signals.rxd, er: signals.rxEr, valid: signals.crsDv },
      ifg: options.ifg,
    });
    this.setSpeed(options.speed ?? 100);
  }

  protected applySpeed(speed: LinkSpeed): void {
    this.tx.setSpeed(speed);
    this.rx.setSpeed(speed);
  }
}
