/**
 * GMII - 8-bit data, one byte per rising edge, framed by tx_en / rx_dv
 *
 * At 10/100 Mb/s GMII carries MII: the same signals, one nibble per edge on
 * data[3:0], low nibble first. Nibble mode is selected by the `miiMode`
 * flag (set by GmiiPhy on speed changes) or by an optional mii_select
 * signal, sampled when a transmit frame starts and when a receive frame
 * ends.
 */

import { LINK_DEFAULTS } from '../core/config';
import { CountdownGap } from '../codec/GapControl';
import { BYTE_CODEC, NIBBLE_CODEC, type LaneCodec } from '../codec/LaneCodec';
import { LinkReceiver } from '../link/LinkReceiver';
import { LinkTransmitter } from '../link/LinkTransmitter';
import { EnvelopeRxPort, EnvelopeTxPort, type EnvelopeSignals } from '../link/ports/EnvelopePort';
import type { Signal } from '../sim/SignalBus';
import type { EngineOptions, TransmitterOptions } from './types';

export interface GmiiEngineOptions {
  signals: EnvelopeSignals;
  miiSelect?: Signal | null;
  miiMode?: boolean;
}

export function assertEnvelopeWidths(signals: EnvelopeSignals, dataWidth: number, source: string): void {
  signals.data.assertWidth(dataWidth, source);
  signals.valid.assertWidth(1, source);
  signals.er?.assertWidth(1, source);
}

function selectGmiiCodec(miiMode: boolean, miiSelect: Signal | null): LaneCodec {
  return miiMode || (miiSelect?.isHigh() ?? false) ? NIBBLE_CODEC : BYTE_CODEC;
}

export class GmiiTransmitter extends LinkTransmitter {
  miiMode: boolean;
  readonly miiSelect: Signal | null;
  private readonly envelope: EnvelopeTxPort;

  constructor(options: TransmitterOptions & GmiiEngineOptions) {
    const name = options.name ?? 'gmii-tx';
    assertEnvelopeWidths(options.signals, 8, name);
    const port = new EnvelopeTxPort(options.signals, { clock: options.clock, enable: options.enable });
    super({
      ...options,
      name,
      port,
      codec: BYTE_CODEC,
      gap: new CountdownGap(options.ifg ?? LINK_DEFAULTS.ifg),
    });
    this.envelope = port;
    this.miiMode = options.miiMode ?? false;
    this.miiSelect = options.miiSelect ?? null;
  }

  setClock(clock: Signal): void {
    this.envelope.clock = clock;
  }

  protected selectCodec(): LaneCodec {
    return selectGmiiCodec(this.miiMode, this.miiSelect);
  }
}

export class GmiiReceiver extends LinkReceiver {
  miiMode: boolean;
  readonly miiSelect: Signal | null;
  private readonly envelope: EnvelopeRxPort;

  constructor(options: EngineOptions & GmiiEngineOptions) {
    const name = options.name ?? 'gmii-rx';
    assertEnvelopeWidths(options.signals, 8, name);
    const port = new EnvelopeRxPort(options.signals, { clock: options.clock, enable: options.enable });
    super({ ...options, name, port, codec: BYTE_CODEC });
    this.envelope = port;
    this.miiMode = options.miiMode ?? false;
    this.miiSelect = options.miiSelect ?? null;
  }

  setClock(clock: Signal): void {
    this.envelope.clock = clock;
  }

  protected selectCodec(): LaneCodec {
    return selectGmiiCodec(this.miiMode, this.miiSelect);
  }
}
