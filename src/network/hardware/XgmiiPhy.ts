/**
 * XgmiiPhy - XGMII PHY model at 10 Gb/s
 *
 * rx_clk is generated at 156.25 MHz; tx_clk comes from the MAC.
 */

import { clockPeriodPs } from '../core/config';
import type { LinkSpeed } from '../core/types';
import { Clock } from '../sim/Clock';
import type { Signal } from '../sim/SignalBus';
import type { Simulator } from '../sim/Simulator';
import { Phy } from './Phy';
import { XgmiiReceiver, XgmiiTransmitter } from './Xgmii';
import type { PhyOptions } from './types';

export interface XgmiiPhySignals {
  txd: Signal;
  txc: Signal;
  txClk: Signal;
  rxd: Signal;
  rxc: Signal;
  rxClk: Signal;
}

export interface XgmiiPhyOptions extends PhyOptions {
  enableDic?: boolean;
  forceOffsetStart?: boolean;
}

export class XgmiiPhy extends Phy<XgmiiReceiver, XgmiiTransmitter> {
  readonly tx: XgmiiReceiver;
  readonly rx: XgmiiTransmitter;

  constructor(sim: Simulator, signals: XgmiiPhySignals, options: XgmiiPhyOptions = {}) {
    const name = options.name ?? 'xgmii-phy';
    super(sim, 'xgmii', name, new Clock(sim, [signals.rxClk], clockPeriodPs('xgmii', 10000)), 10000, options.logger);
    const common = {
      sim,
      reset: options.reset,
      resetActiveLevel: options.resetActiveLevel,
      logger: options.logger,
    };
    this.tx = new XgmiiReceiver({
      ...common,
      name: `${name}-tx`,
      signals: { data: signals.txd, ctrl: signals.txc },
      clock: signals.txClk,
    });
    this.rx = new XgmiiTransmitter({
      ...common,
      name: `${name}-rx`,
      signals: { data: signals.rxd, ctrl: signals.rxc },
      clock: signals.rxClk,
      ifg: options.ifg,
      enableDic: options.enableDic,
      forceOffsetStart: options.forceOffsetStart,
    });
    this.setSpeed(options.speed ?? 10000);
  }

  protected applySpeed(_speed: LinkSpeed): void {}
}
