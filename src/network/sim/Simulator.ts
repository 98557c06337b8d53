/**
 * Simulator - in-process discrete-event scheduler for the link engines.
 *
 * Time is an integer number of picoseconds. Each time step runs in phases:
 *   1. fire every callback scheduled for the step (clock toggles, timers)
 *   2. let all resumed tasks run until they suspend again
 *   3. commit queued signal writes atomically (one delta cycle); edge waiters
 *      resume and may queue more writes, repeat until quiet
 *   4. release read-only waiters, then continue with the next step
 *
 * Tasks are async functions that suspend only on triggers handed out by
 * their `Task` handle. A trigger that fires after kill() never resumes the
 * task, but a continuation already queued on the same step still runs, so
 * long-lived loops check `isAlive()` after every suspension.
 */

import { ConfigurationError, SimulationError, SimulationTimeoutError } from '../core/errors';
import type { Signal, SignalBus } from './SignalBus';
import type { SimEvent } from './SimEvent';

interface TimelineEntry {
  time: number;
  seq: number;
  fire: () => void;
}

export interface RunOptions {
  /** Give up after this much simulated time (ps) */
  timeout?: number;
}

type StopReason = 'done' | 'deadline' | 'starved';

/** Default run timeout: 10 µs of simulated time */
export const DEFAULT_RUN_TIMEOUT_PS = 10_000_000;

const MAX_DELTA_CYCLES = 10_000;

function drainMicrotasks(): Promise<void> {
  return new Promise<void>(resolve => setImmediate(resolve));
}

export class Task {
  readonly sim: Simulator;
  readonly name: string;
  private killed = false;

  constructor(sim: Simulator, name: string) {
    this.sim = sim;
    this.name = name;
  }

  isAlive(): boolean { return !this.killed; }

  kill(): void {
    this.killed = true;
  }

  risingEdge(signal: Signal): Promise<void> { return this.guard(signal.nextEdge('rising')); }
  fallingEdge(signal: Signal): Promise<void> { return this.guard(signal.nextEdge('falling')); }
  edge(signal: Signal): Promise<void> { return this.guard(signal.nextEdge('change')); }
  readOnly(): Promise<void> { return this.guard(this.sim.readOnly()); }
  timer(delay: number): Promise<void> { return this.guard(this.sim.timer(delay)); }
  wait(event: SimEvent): Promise<void> { return this.guard(event.wait()); }

  // A trigger that fires after kill() leaves the task suspended forever
  private guard(trigger: Promise<void>): Promise<void> {
    return trigger.then(() => (this.killed ? new Promise<void>(() => undefined) : undefined));
  }
}

export class Simulator {
  private now = 0;
  private seq = 0;
  private timeline: TimelineEntry[] = [];
  private pendingWrites = new Map<Signal, bigint>();
  private readOnlyWaiters: Array<() => void> = [];
  private failure: { task: string; error: unknown } | null = null;
  private running = false;

  get time(): number { return this.now; }

  isRunning(): boolean { return this.running; }

  // ─── Scheduling ─────────────────────────────────────────────────

  /** Schedule `fire` after `delay` ps; returns a function that unschedules it */
  schedule(delay: number, fire: () => void): () => void {
    if (!Number.isInteger(delay) || delay < 0) {
      throw new ConfigurationError(`delay must be a non-negative integer number of ps, got ${delay}`);
    }
    const entry: TimelineEntry = { time: this.now + delay, seq: this.seq++, fire };
    // binary search for the first entry strictly later than the new one
    let lo = 0;
    let hi = this.timeline.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.timeline[mid].time <= entry.time) lo = mid + 1;
      else hi = mid;
    }
    this.timeline.splice(lo, 0, entry);
    return () => {
      const index = this.timeline.indexOf(entry);
      if (index >= 0) this.timeline.splice(index, 1);
    };
  }

  timer(delay: number): Promise<void> {
    return new Promise<void>(resolve => this.schedule(delay, resolve));
  }

  readOnly(): Promise<void> {
    return new Promise<void>(resolve => this.readOnlyWaiters.push(resolve));
  }

  /**
   * Resolves true when `trigger` settles first, false once `timeout` ps
   * pass. The timer is taken off the timeline either way.
   */
  async withTimeout(trigger: Promise<void>, timeout: number): Promise<boolean> {
    let cancel = (): void => undefined;
    const expired = new Promise<boolean>(resolve => {
      cancel = this.schedule(timeout, () => resolve(false));
    });
    try {
      return await Promise.race([trigger.then(() => true), expired]);
    } finally {
      cancel();
    }
  }

  queueWrite(signal: Signal, value: bigint): void {
    this.pendingWrites.set(signal, value);
  }

  /**
   * Start a task. The body begins on the next microtask, so it can be
   * started from a constructor before the caller finishes wiring.
   */
  start(name: string, body: (task: Task) => Promise<void>): Task {
    const task = new Task(this, name);
    Promise.resolve()
      .then(() => body(task))
      .catch((error: unknown) => this.fail(task, error));
    return task;
  }

  // ─── Running ────────────────────────────────────────────────────

  /**
   * Run the simulation until `body` settles and return its result.
   * Rejects with the first failure of any task, with
   * SimulationTimeoutError once `timeout` ps have elapsed, or with
   * SimulationError when nothing is left to schedule.
   */
  async run<T>(body: (task: Task) => Promise<T>, options: RunOptions = {}): Promise<T> {
    const timeout = options.timeout ?? DEFAULT_RUN_TIMEOUT_PS;
    const state: { outcome: { ok: true; value: T } | { ok: false; error: unknown } | null } = { outcome: null };
    const task = new Task(this, 'run');
    Promise.resolve()
      .then(() => body(task))
      .then(
        value => { state.outcome = { ok: true, value }; },
        (error: unknown) => { state.outcome = { ok: false, error }; },
      );

    const reason = await this.advance(() => state.outcome !== null, this.now + timeout);
    const outcome = state.outcome;
    if (outcome === null) {
      if (reason === 'starved') {
        throw new SimulationError(`deadlock at ${this.now} ps: run body is waiting but nothing is scheduled`);
      }
      throw new SimulationTimeoutError(this.now, timeout);
    }
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  /** Advance simulated time by `duration` ps */
  async runFor(duration: number): Promise<void> {
    if (!Number.isInteger(duration) || duration < 0) {
      throw new ConfigurationError(`duration must be a non-negative integer number of ps, got ${duration}`);
    }
    const deadline = this.now + duration;
    const reason = await this.advance(() => false, deadline);
    if (reason === 'starved') this.now = deadline;
  }

  private async advance(done: () => boolean, deadline: number): Promise<StopReason> {
    if (this.running) throw new SimulationError('simulator is already running');
    this.running = true;
    try {
      await this.settle();
      for (;;) {
        if (done()) return 'done';
        const next = this.timeline[0];
        if (next === undefined) return 'starved';
        if (next.time > deadline) {
          this.now = deadline;
          return 'deadline';
        }
        this.now = next.time;
        while (this.timeline.length > 0 && this.timeline[0].time === this.now) {
          const entry = this.timeline.shift();
          entry?.fire();
        }
        await this.settle();
      }
    } finally {
      this.running = false;
    }
  }

  /** Run delta cycles and the read-only phase until the time step is quiet */
  private async settle(): Promise<void> {
    let deltas = 0;
    for (;;) {
      await drainMicrotasks();
      this.throwIfFailed();
      if (this.pendingWrites.size > 0) {
        if (++deltas > MAX_DELTA_CYCLES) {
          throw new SimulationError(`no convergence after ${MAX_DELTA_CYCLES} delta cycles at ${this.now} ps`);
        }
        this.commit();
        continue;
      }
      if (this.readOnlyWaiters.length > 0) {
        const waiters = this.readOnlyWaiters;
        this.readOnlyWaiters = [];
        for (const resolve of waiters) resolve();
        continue;
      }
      return;
    }
  }

  private commit(): void {
    const byBus = new Map<SignalBus, Map<Signal, bigint>>();
    for (const [signal, value] of this.pendingWrites) {
      let writes = byBus.get(signal.bus);
      if (!writes) {
        writes = new Map();
        byBus.set(signal.bus, writes);
      }
      writes.set(signal, value);
    }
    this.pendingWrites = new Map();
    for (const [bus, writes] of byBus) bus.commit(writes);
  }

  private fail(task: Task, error: unknown): void {
    if (!task.isAlive()) return;
    this.failure ??= { task: task.name, error };
  }

  private throwIfFailed(): void {
    const failure = this.failure;
    if (failure) {
      this.failure = null;
      throw failure.error;
    }
  }
}
