/**
 * RGMII - 4-bit double data rate with a combined control signal
 *
 * 1000 Mb/s: one byte per clock, nibbles on both edges.
 * 10/100 Mb/s (MII mode): one nibble per clock, driven on the falling edge.
 */

import { LINK_DEFAULTS } from '../core/config';
import { CountdownGap } from '../codec/GapControl';
import { BYTE_CODEC, NIBBLE_CODEC, type LaneCodec } from '../codec/LaneCodec';
import { LinkReceiver } from '../link/LinkReceiver';
import { LinkTransmitter } from '../link/LinkTransmitter';
import { RgmiiRxPort, RgmiiTxPort, type RgmiiSignals } from '../link/ports/RgmiiPort';
import type { EngineOptions, TransmitterOptions } from './types';

export interface RgmiiEngineOptions {
  signals: RgmiiSignals;
  miiMode?: boolean;
}

function assertRgmiiWidths(signals: RgmiiSignals, source: string): void {
  signals.data.assertWidth(4, source);
  signals.ctl.assertWidth(1, source);
}

export class RgmiiTransmitter extends LinkTransmitter {
  private readonly ddr: RgmiiTxPort;

  constructor(options: TransmitterOptions & RgmiiEngineOptions) {
    const name = options.name ?? 'rgmii-tx';
    assertRgmiiWidths(options.signals, name);
    const port = new RgmiiTxPort(options.signals, { clock: options.clock, enable: options.enable });
    port.miiMode = options.miiMode ?? false;
    super({
      ...options,
      name,
      port,
      codec: BYTE_CODEC,
      gap: new CountdownGap(options.ifg ?? LINK_DEFAULTS.ifg),
    });
    this.ddr = port;
  }

  get miiMode(): boolean { return this.ddr.miiMode; }
  set miiMode(value: boolean) { this.ddr.miiMode = value; }

  protected selectCodec(): LaneCodec {
    return this.ddr.miiMode ? NIBBLE_CODEC : BYTE_CODEC;
  }
}

export class RgmiiReceiver extends LinkReceiver {
  private readonly ddr: RgmiiRxPort;

  constructor(options: EngineOptions & RgmiiEngineOptions) {
    const name = options.name ?? 'rgmii-rx';
    assertRgmiiWidths(options.signals, name);
    const port = new RgmiiRxPort(options.signals, { clock: options.clock, enable: options.enable });
    port.miiMode = options.miiMode ?? false;
    super({ ...options, name, port, codec: BYTE_CODEC });
    this.ddr = port;
  }

  get miiMode(): boolean { return this.ddr.miiMode; }
  set miiMode(value: boolean) { this.ddr.miiMode = value; }

  protected selectCodec(): LaneCodec {
    return this.ddr.miiMode ? NIBBLE_CODEC : BYTE_CODEC;
  }
}
