/**
 * SignalBus - named signal vectors held in a zustand store.
 *
 * The store holds the committed value of every signal. Writes made through
 * `Signal.drive()` are queued on the simulator and applied to the store in
 * one `setState` per delta cycle; the store's change notification is where
 * edges are detected and edge waiters released.
 *
 * Signal flow:
 *   Signal.drive(v) → Simulator.queueWrite() → [delta] → SignalBus.commit()
 *   store.setState(patch) → subscribe(state, prev) → Signal.notify(before, after)
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { ConfigurationError, ContractViolationError } from '../core/errors';
import type { Simulator } from './Simulator';

export type SignalState = Record<string, bigint>;

export type EdgeKind = 'rising' | 'falling' | 'change';

interface EdgeWaiter {
  kind: EdgeKind;
  resolve: () => void;
}

export class Signal {
  readonly bus: SignalBus;
  readonly name: string;
  readonly width: number;
  readonly mask: bigint;
  private waiters: EdgeWaiter[] = [];

  constructor(bus: SignalBus, name: string, width: number) {
    this.bus = bus;
    this.name = name;
    this.width = width;
    this.mask = (1n << BigInt(width)) - 1n;
  }

  /** Committed value; writes queued this delta are not visible yet */
  get value(): bigint {
    return this.bus.read(this.name);
  }

  toNumber(): number { return Number(this.value); }
  isHigh(): boolean { return this.value !== 0n; }

  assertWidth(expected: number, source?: string): this {
    if (this.width !== expected) {
      throw new ConfigurationError(`signal "${this.name}" must be ${expected} bits wide, got ${this.width}`, source);
    }
    return this;
  }

  /** Queue a write, committed at the end of the current delta */
  drive(value: bigint | number): void {
    this.bus.sim.queueWrite(this, this.fit(value));
  }

  /** Write bypassing the delta queue (initial values, test stimulus outside a run) */
  setImmediateValue(value: bigint | number): void {
    this.bus.commit(new Map([[this, this.fit(value)]]));
  }

  nextEdge(kind: EdgeKind): Promise<void> {
    return new Promise<void>(resolve => this.waiters.push({ kind, resolve }));
  }

  notify(before: bigint, after: bigint): void {
    const rising = before === 0n && after !== 0n;
    const falling = before !== 0n && after === 0n;
    const fired: EdgeWaiter[] = [];
    const kept: EdgeWaiter[] = [];
    for (const waiter of this.waiters) {
      const hit = waiter.kind === 'change'
        || (waiter.kind === 'rising' && rising)
        || (waiter.kind === 'falling' && falling);
      (hit ? fired : kept).push(waiter);
    }
    this.waiters = kept;
    for (const waiter of fired) waiter.resolve();
  }

  private fit(value: bigint | number): bigint {
    const v = BigInt(value);
    if (v < 0n || v > this.mask) {
      throw new ContractViolationError(`value ${v} does not fit a ${this.width}-bit signal`, this.name);
    }
    return v;
  }
}

export class SignalBus {
  readonly sim: Simulator;
  readonly store: StoreApi<SignalState>;
  private readonly signals = new Map<string, Signal>();

  constructor(sim: Simulator) {
    this.sim = sim;
    this.store = createStore<SignalState>()(() => ({}));
    this.store.subscribe((state, prev) => this.dispatch(state, prev));
  }

  /** Declare a signal; names are unique per bus */
  signal(name: string, width: number = 1, initial: bigint | number = 0): Signal {
    if (this.signals.has(name)) {
      throw new ConfigurationError(`signal "${name}" already declared`);
    }
    if (!Number.isInteger(width) || width < 1) {
      throw new ConfigurationError(`signal "${name}" has invalid width ${width}`);
    }
    const sig = new Signal(this, name, width);
    this.signals.set(name, sig);
    sig.setImmediateValue(initial);
    return sig;
  }

  get(name: string): Signal {
    const sig = this.signals.get(name);
    if (!sig) throw new ConfigurationError(`unknown signal "${name}"`);
    return sig;
  }

  has(name: string): boolean { return this.signals.has(name); }

  read(name: string): bigint {
    return this.store.getState()[name] ?? 0n;
  }

  /** Apply a batch of writes in a single store update */
  commit(values: ReadonlyMap<Signal, bigint>): void {
    const patch: SignalState = {};
    for (const [sig, value] of values) patch[sig.name] = value;
    this.store.setState(patch);
  }

  private dispatch(state: SignalState, prev: SignalState): void {
    for (const [name, sig] of this.signals) {
      const before = prev[name];
      const after = state[name];
      if (before !== undefined && after !== undefined && before !== after) {
        sig.notify(before, after);
      }
    }
  }
}
