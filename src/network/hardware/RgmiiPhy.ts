/**
 * RgmiiPhy - RGMII PHY model at 10/100/1000 Mb/s
 *
 * The PHY drives rx_clk only; tx_clk belongs to the MAC. Below 1000 Mb/s
 * both directions carry one nibble per clock.
 */

import { clockPeriodPs } from '../core/config';
import type { LinkSpeed } from '../core/types';
import { Clock } from '../sim/Clock';
import type { Signal } from '../sim/SignalBus';
import type { Simulator } from '../sim/Simulator';
import { Phy } from './Phy';
import { RgmiiReceiver, RgmiiTransmitter } from './Rgmii';
import type { PhyOptions } from './types';

export interface RgmiiPhySignals {
  txd: Signal;
  txCtl: Signal;
  txClk: Signal;
  rxd: Signal;
  rxCtl: Signal;
  rxClk: Signal;
}

export class RgmiiPhy extends Phy<RgmiiReceiver, RgmiiTransmitter> {
  readonly tx: RgmiiReceiver;
  readonly rx: RgmiiTransmitter;

  constructor(sim: Simulator, signals: RgmiiPhySignals, options: PhyOptions = {}) {
    const name = options.name ?? 'rgmii-phy';
    super(sim, 'rgmii', name, new Clock(sim, [signals.rxClk], clockPeriodPs('rgmii', 1000)), 1000, options.logger);
    const common = {
      sim,
      reset: options.reset,
      resetActiveLevel: options.resetActiveLevel,
      logger: options.logger,
    };
    this.tx = new RgmiiReceiver({
      ...common,
      name: `${name}-tx`,
      signals: { data: signals.txd, ctl: signals.txCtl },
      clock: signals.txClk,
    });
    this.rx = new RgmiiTransmitter({
      ...common,
      name: `${name}-rx`,
      signals: { data: signals.rxd, ctl: signals.rxCtl },
      clock: signals.rxClk,
      ifg: options.ifg,
    });
    this.setSpeed(options.speed ?? 1000);
  }

  protected applySpeed(speed: LinkSpeed): void {
    this.tx.miiMode = speed !== 1000;
    this.rx.miiMode = speed !== 1000;
  }
}
