/**
 * ResettableEngine - reset handling shared by every link engine
 *
 * Reset comes from an optional signal (with configurable active level) or
 * from the engine's owner (assertReset / deassertReset / pulseReset). The
 * engine is in reset while either source asserts it.
 *
 *   assert   → run task killed, onResetAssert() cleans up engine state
 *   deassert → a fresh run task starts from IDLE
 */

import { Logger, type EventLogger } from '../core/Logger';
import type { Signal } from '../sim/SignalBus';
import type { Simulator, Task } from '../sim/Simulator';

export interface ResetOptions {
  reset?: Signal | null;
  /** Level at which the reset signal asserts, high by default */
  resetActiveLevel?: boolean;
}

export abstract class ResettableEngine {
  readonly sim: Simulator;
  readonly name: string;
  protected readonly logger: EventLogger;
  private localReset = false;
  private externalReset = false;
  private inReset = true;
  private runTask: Task | null = null;

  protected constructor(sim: Simulator, name: string, logger: EventLogger = Logger) {
    this.sim = sim;
    this.name = name;
    this.logger = logger;
  }

  /** Call once the subclass is wired; starts the run task unless reset is held */
  protected initReset(options: ResetOptions): void {
    const signal = options.reset ?? null;
    const activeLevel = options.resetActiveLevel ?? true;
    if (signal) {
      this.externalReset = signal.isHigh() === activeLevel;
      this.sim.start(`${this.name}:reset`, task => this.watchReset(task, signal, activeLevel));
    }
    this.updateReset();
  }

  isInReset(): boolean { return this.inReset; }

  assertReset(): void {
    this.localReset = true;
    this.updateReset();
  }

  deassertReset(): void {
    this.localReset = false;
    this.updateReset();
  }

  /** Tear down and restart, as on a speed change */
  pulseReset(): void {
    this.assertReset();
    this.deassertReset();
  }

  protected abstract run(task: Task): Promise<void>;
  protected abstract onResetAssert(): void;

  private async watchReset(task: Task, signal: Signal, activeLevel: boolean): Promise<void> {
    for (;;) {
      this.externalReset = signal.isHigh() === activeLevel;
      this.updateReset();
      await task.edge(signal);
    }
  }

  private updateReset(): void {
    const state = this.localReset || this.externalReset;
    if (state === this.inReset) return;
    this.inReset = state;
    if (state) {
      this.runTask?.kill();
      this.runTask = null;
      this.logger.info(this.name, 'reset:assert', `${this.name}: reset asserted`, { simTime: this.sim.time });
      this.onResetAssert();
    } else {
      this.logger.debug(this.name, 'reset:deassert', `${this.name}: reset released`, { simTime: this.sim.time });
      this.runTask = this.sim.start(`${this.name}:run`, task => this.run(task));
    }
  }
}
