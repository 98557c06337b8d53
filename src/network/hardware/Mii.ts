/**
 * MII - 4-bit data, one nibble per rising edge, low nibble first
 */

import { LINK_DEFAULTS } from '../core/config';
import { CountdownGap } from '../codec/GapControl';
import { NIBBLE_CODEC } from '../codec/LaneCodec';
import { LinkReceiver } from '../link/LinkReceiver';
import { LinkTransmitter } from '../link/LinkTransmitter';
import { EnvelopeRxPort, EnvelopeTxPort, type EnvelopeSignals } from '../link/ports/EnvelopePort';
import { assertEnvelopeWidths } from './Gmii';
import type { EngineOptions, TransmitterOptions } from './types';

export class MiiTransmitter extends LinkTransmitter {
  constructor(options: TransmitterOptions & { signals: EnvelopeSignals }) {
    const name = options.name ?? 'mii-tx';
    assertEnvelopeWidths(options.signals, 4, name);
    super({
      ...options,
      name,
      port: new EnvelopeTxPort(options.signals, { clock: options.clock, enable: options.enable }),
      codec: NIBBLE_CODEC,
      gap: new CountdownGap(options.ifg ?? LINK_DEFAULTS.ifg),
    });
  }
}

export class MiiReceiver extends LinkReceiver {
  constructor(options: EngineOptions & { signals: EnvelopeSignals }) {
    const name = options.name ?? 'mii-rx';
    assertEnvelopeWidths(options.signals, 4, name);
    super({
      ...options,
      name,
      port: new EnvelopeRxPort(options.signals, { clock: options.clock, enable: options.enable }),
      codec: NIBBLE_CODEC,
    });
  }
}
