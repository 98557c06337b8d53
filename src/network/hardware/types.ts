/**
 * Options shared by the per-interface engines and Phy façades
 */

import type { EventLogger } from '../core/Logger';
import type { QueueLimits } from '../core/types';
import type { ResetOptions } from '../link/ResettableEngine';
import type { Signal } from '../sim/SignalBus';
import type { Simulator } from '../sim/Simulator';

export interface EngineOptions extends ResetOptions {
  sim: Simulator;
  clock: Signal;
  enable?: Signal | null;
  name?: string;
  limits?: QueueLimits;
  logger?: EventLogger;
}

export interface TransmitterOptions extends EngineOptions {
  /** Inter-frame gap in byte-times */
  ifg?: number;
}

export interface PhyOptions extends ResetOptions {
  speed?: number;
  ifg?: number;
  logger?: EventLogger;
  /** Name prefix for the two engines */
  name?: string;
}
