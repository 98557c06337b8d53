/**
 * GmiiPhy - GMII PHY model at 10/100/1000 Mb/s
 *
 * The PHY generates rx_clk and tx_clk: 125 MHz at 1000 Mb/s, 25 / 2.5 MHz
 * below that. At 1000 Mb/s the MAC transmits on its own gtx_clk, so the
 * transmit-side receiver samples gtx_clk; below that it samples tx_clk and
 * both directions switch to nibble mode.
 */

import { clockPeriodPs } from '../core/config';
import type { LinkSpeed } from '../core/types';
import { Clock } from '../sim/Clock';
import type { Signal } from '../sim/SignalBus';
import type { Simulator } from '../sim/Simulator';
import { GmiiReceiver, GmiiTransmitter } from './Gmii';
import { Phy } from './Phy';
import type { PhyOptions } from './types';

export interface GmiiPhySignals {
  txd: Signal;
  txEr?: Signal | null;
  txEn: Signal;
  txClk: Signal;
  gtxClk: Signal;
  rxd: Signal;
  rxEr?: Signal | null;
  rxDv: Signal;
  rxClk: Signal;
}

export class GmiiPhy extends Phy<GmiiReceiver, GmiiTransmitter> {
  readonly tx: GmiiReceiver;
  readonly rx: GmiiTransmitter;
  private readonly signals: GmiiPhySignals;

  constructor(sim: Simulator, signals: GmiiPhySignals, options: PhyOptions = {}) {
    const name = options.name ?? 'gmii-phy';
    super(sim, 'gmii', name, new Clock(sim, [signals.rxClk, signals.txClk], clockPeriodPs('gmii', 1000)), 1000, options.logger);
    this.signals = signals;
    const common = {
      sim,
      reset: options.reset,
      resetActiveLevel: options.resetActiveLevel,
      logger: options.logger,
    };
    this.tx = new GmiiReceiver({
      ...common,
      name: `${name}-tx`,
      signals: { data: signals.txd, er: signals.txEr, valid: signals.txEn },
      clock: signals.gtxClk,
    });
    this.rx = new GmiiTransmitter({
      ...common,
      name: `${name}-rx`,
      signals: { data: signals.rxd, er: signals.rxEr, valid: signals.rxDv },
      clock: signals.rxClk,
      ifg: options.ifg,
    });
    this.setSpeed(options.speed ?? 1000);
  }

  protected applySpeed(speed: LinkSpeed): void {
    const gigabit = speed === 1000;
    this.tx.miiMode = !gigabit;
    this.rx.miiMode = !gigabit;
    this.tx.setClock(gigabit ? this.signals.gtxClk : this.signals.txClk);
  }
}
