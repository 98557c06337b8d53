/**
 * RMII - 2-bit data on a 50 MHz reference clock, least-significant pair
 * first. 100 Mb/s uses every edge; 10 Mb/s holds each pair for ten edges.
 * crs_dv frames the data in both directions.
 */

import { LINK_DEFAULTS, rmiiDivider } from '../core/config';
import { CountdownGap } from '../codec/GapControl';
import { DIBIT_CODEC } from '../codec/LaneCodec';
import { LinkReceiver } from '../link/LinkReceiver';
import { LinkTransmitter } from '../link/LinkTransmitter';
import { EnvelopeRxPort, EnvelopeTxPort, type EnvelopeSignals } from '../link/ports/EnvelopePort';
import { assertEnvelopeWidths } from './Gmii';
import type { EngineOptions, TransmitterOptions } from './types';

export interface RmiiEngineOptions {
  signals: EnvelopeSignals;
  /** 10 or 100 Mb/s */
  speed?: number;
}

export class RmiiTransmitter extends LinkTransmitter {
  private readonly envelope: EnvelopeTxPort;

  constructor(options: TransmitterOptions & RmiiEngineOptions) {
    const name = options.name ?? 'rmii-tx';
    assertEnvelopeWidths(options.signals, 2, name);
    const port = new EnvelopeTxPort(options.signals, {
      clock: options.clock,
      enable: options.enable,
      divider: rmiiDivider(options.speed ?? 100),
    });
    super({
      ...options,
      name,
      port,
      codec: DIBIT_CODEC,
      gap: new CountdownGap(options.ifg ?? LINK_DEFAULTS.ifg),
    });
    this.envelope = port;
  }

  setSpeed(speed: number): void {
    this.envelope.divider.setDivider(rmiiDivider(speed));
  }

  getDivider(): number { return this.envelope.divider.getDivider(); }
}

export class RmiiReceiver extends LinkReceiver {
  private readonly envelope: EnvelopeRxPort;

  constructor(options: EngineOptions & RmiiEngineOptions) {
    const name = options.name ?? 'rmii-rx';
    assertEnvelopeWidths(options.signals, 2, name);
    const port = new EnvelopeRxPort(options.signals, {
      clock: options.clock,
      enable: options.enable,
      divider: rmiiDivider(options.speed ?? 100),
    });
    super({ ...options, name, port, codec: DIBIT_CODEC });
    this.envelope = port;
  }

  setSpeed(speed: number): void {
    this.envelope.divider.setDivider(rmiiDivider(speed));
  }

  getDivider(): number { return this.envelope.divider.getDivider(); }
}
