/**
 * Phy - the PHY side of a MAC/PHY interface
 *
 * Pairs the receiver that listens on the MAC's transmit lines (`tx`) with
 * the transmitter that drives the MAC's receive lines (`rx`), and owns the
 * clock generator for the configured speed. Frame semantics stay in the
 * engines; the Phy only keeps clock period, nibble mode and divider in step
 * with the link speed.
 *
 * Speed change:
 *   setSpeed(s) → clock.stop() → applySpeed(s) → clock.start(period(s))
 *     → tx.pulseReset() / rx.pulseReset()
 */

import { assertSpeed, clockPeriodPs } from '../core/config';
import { Logger, type EventLogger } from '../core/Logger';
import type { InterfaceMode, LinkSpeed } from '../core/types';
import type { LinkReceiver } from '../link/LinkReceiver';
import type { LinkTransmitter } from '../link/LinkTransmitter';
import type { Clock } from '../sim/Clock';
import type { Simulator } from '../sim/Simulator';

export abstract class Phy<TxSide extends LinkReceiver, RxSide extends LinkTransmitter> {
  readonly sim: Simulator;
  readonly mode: InterfaceMode;
  readonly name: string;
  abstract readonly tx: TxSide;
  abstract readonly rx: RxSide;
  protected readonly clock: Clock;
  protected readonly logger: EventLogger;
  protected speed: LinkSpeed;

  protected constructor(
    sim: Simulator,
    mode: InterfaceMode,
    name: string,
    clock: Clock,
    initialSpeed: LinkSpeed,
    logger: EventLogger = Logger,
  ) {
    this.sim = sim;
    this.mode = mode;
    this.name = name;
    this.clock = clock;
    this.speed = initialSpeed;
    this.logger = logger;
  }

  getSpeed(): LinkSpeed { return this.speed; }
  getClockPeriod(): number { return this.clock.getPeriod(); }

  setSpeed(speed: number): void {
    const checked = assertSpeed(this.mode, speed);
    this.clock.stop();
    this.speed = checked;
    this.applySpeed(checked);
    this.clock.start(clockPeriodPs(this.mode, checked));
    this.tx.pulseReset();
    this.rx.pulseReset();
    this.logger.info(this.name, 'phy:speed', `${this.name}: link speed ${checked} Mb/s`, {
      simTime: this.sim.time,
      period: this.clock.getPeriod(),
    });
  }

  /** Reconfigure both engines for `speed`; the clock is stopped meanwhile */
  protected abstract applySpeed(speed: LinkSpeed): void;
}
