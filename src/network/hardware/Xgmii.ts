/**
 * XGMII - `lanes` byte lanes per rising edge with a control bit per lane
 *
 * Frames start with START on lane 0 (or lane 4 on 8-lane buses when the
 * deficit idle counter allows it) and end with TERM. Idle lanes carry
 * IDLE with the control bit set.
 */

import { LINK_DEFAULTS } from '../core/config';
import { laneCount } from '../core/constants';
import { ConfigurationError } from '../core/errors';
import { DeficitIdleGap } from '../codec/GapControl';
import { XgmiiCodec } from '../codec/LaneCodec';
import { LinkReceiver } from '../link/LinkReceiver';
import { LinkTransmitter } from '../link/LinkTransmitter';
import { XgmiiRxPort, XgmiiTxPort, type XgmiiSignals } from '../link/ports/XgmiiPort';
import type { EngineOptions, TransmitterOptions } from './types';

export interface XgmiiTransmitterOptions extends TransmitterOptions {
  signals: XgmiiSignals;
  enableDic?: boolean;
  forceOffsetStart?: boolean;
}

export interface XgmiiReceiverOptions extends EngineOptions {
  signals: XgmiiSignals;
}

/** Lane count from the data width; the control vector must have one bit per lane */
export function xgmiiLanes(signals: XgmiiSignals, source: string): number {
  const lanes = laneCount(signals.data.width);
  if (signals.ctrl.width !== lanes) {
    throw new ConfigurationError(
      `data width ${signals.data.width} needs a ${lanes}-bit control vector, got ${signals.ctrl.width}`,
      source,
    );
  }
  return lanes;
}

export class XgmiiTransmitter extends LinkTransmitter {
  readonly lanes: number;
  private readonly dic: DeficitIdleGap;

  constructor(options: XgmiiTransmitterOptions) {
    const name = options.name ?? 'xgmii-tx';
    const lanes = xgmiiLanes(options.signals, name);
    const gap = new DeficitIdleGap(lanes, options.ifg ?? LINK_DEFAULTS.ifg, {
      enableDic: options.enableDic ?? LINK_DEFAULTS.enableDic,
      forceOffsetStart: options.forceOffsetStart ?? LINK_DEFAULTS.forceOffsetStart,
    });
    super({
      ...options,
      name,
      port: new XgmiiTxPort(options.signals, lanes, { clock: options.clock, enable: options.enable }),
      codec: new XgmiiCodec(lanes),
      gap,
    });
    this.lanes = lanes;
    this.dic = gap;
  }

  get enableDic(): boolean { return this.dic.enableDic; }
  set enableDic(value: boolean) { this.dic.enableDic = value; }

  get forceOffsetStart(): boolean { return this.dic.forceOffsetStart; }
  set forceOffsetStart(value: boolean) { this.dic.forceOffsetStart = value; }

  getDeficit(): number { return this.dic.getDeficit(); }
}

export class XgmiiReceiver extends LinkReceiver {
  readonly lanes: number;

  constructor(options: XgmiiReceiverOptions) {
    const name = options.name ?? 'xgmii-rx';
    const lanes = xgmiiLanes(options.signals, name);
    super({
      ...options,
      name,
      port: new XgmiiRxPort(options.signals, lanes, { clock: options.clock, enable: options.enable }),
      codec: new XgmiiCodec(lanes),
    });
    this.lanes = lanes;
  }
}
