/**
 * LinkTransmitter - generic transmit engine
 *
 * Owns an outbound FrameQueue and one run task that drives a TxPort every
 * enabled clock phase. All mode knowledge lives in the port (signals and
 * clocking), the LaneCodec (unit mapping) and the GapControl (IFG rules).
 *
 * Frame flow:
 *   send(frame) → FrameQueue.put() → run(): TransmitSequencer.step()
 *     → TxPort.drive(units) ... last unit → frame.handleTxComplete()
 */

import { assertIfg } from '../core/config';
import { ContractViolationError } from '../core/errors';
import type { EventLogger } from '../core/Logger';
import type { QueueLimits } from '../core/types';
import type { GapControl } from '../codec/GapControl';
import type { LaneCodec } from '../codec/LaneCodec';
import type { Frame } from '../frame/Frame';
import { SimEvent } from '../sim/SimEvent';
import type { Simulator, Task } from '../sim/Simulator';
import { FrameQueue } from './FrameQueue';
import type { TxPort } from './ports/BusPort';
import { ResettableEngine, type ResetOptions } from './ResettableEngine';
import { TransmitSequencer, type TxCycle } from './TransmitSequencer';

export interface LinkTransmitterOptions extends ResetOptions {
  sim: Simulator;
  name: string;
  port: TxPort;
  codec: LaneCodec;
  gap: GapControl;
  limits?: QueueLimits;
  logger?: EventLogger;
}

export interface TransmitStats {
  framesSent: number;
  bytesSent: number;
  framesFlushed: number;
}

export class LinkTransmitter extends ResettableEngine {
  readonly queue: FrameQueue;
  protected readonly port: TxPort;
  protected codec: LaneCodec;
  protected readonly sequencer: TransmitSequencer;
  private readonly idleEvent: SimEvent;
  private active = false;
  private framesDequeued = 0;
  private stats: TransmitStats = { framesSent: 0, bytesSent: 0, framesFlushed: 0 };

  constructor(options: LinkTransmitterOptions) {
    super(options.sim, options.name, options.logger);
    this.port = options.port;
    this.codec = options.codec;
    assertIfg(options.gap.ifg, this.name);
    this.sequencer = new TransmitSequencer({ gap: options.gap, codec: () => this.selectCodec() });
    this.queue = new FrameQueue(this.name, options.limits);
    this.idleEvent = new SimEvent(`${this.name}:idle`);
    this.idleEvent.set();
    this.initReset(options);
  }

  // ─── Configuration ──────────────────────────────────────────────

  get ifg(): number { return this.sequencer.gap.ifg; }

  set ifg(value: number) {
    this.sequencer.gap.ifg = assertIfg(value, this.name);
  }

  getCodec(): LaneCodec { return this.codec; }

  setLimits(limits: QueueLimits): void {
    this.queue.setLimits(limits);
  }

  getStats(): TransmitStats { return { ...this.stats }; }

  /** Codec for the frame about to start; GMII overrides this to honour mii_select */
  protected selectCodec(): LaneCodec {
    return this.codec;
  }

  // ─── Queue surface ──────────────────────────────────────────────

  async send(frame: Frame): Promise<void> {
    await this.queue.put(frame);
    this.idleEvent.clear();
  }

  sendNowait(frame: Frame): void {
    this.queue.putNowait(frame);
    this.idleEvent.clear();
  }

  count(): number { return this.queue.count(); }
  empty(): boolean { return this.queue.empty(); }
  full(): boolean { return this.queue.full(); }

  /** Nothing queued and nothing on the wire */
  idle(): boolean { return this.queue.empty() && !this.active; }

  /** Drop queued frames; each one still gets its completion, with no end time */
  clear(): void {
    for (const frame of this.queue.clear()) {
      frame.simTimeEnd = null;
      frame.handleTxComplete();
    }
    if (!this.active) this.idleEvent.set();
  }

  /** Resolves true once idle, or false if `timeout` ps pass first */
  async wait(timeout?: number): Promise<boolean> {
    if (this.idle()) return true;
    if (timeout === undefined) {
      await this.idleEvent.wait();
      return true;
    }
    return this.sim.withTimeout(this.idleEvent.wait(), timeout);
  }

  // ─── Run task ───────────────────────────────────────────────────

  protected async run(task: Task): Promise<void> {
    this.active = false;
    for (;;) {
      await this.port.nextCycle(task);
      // a continuation already queued on this edge can still run after kill()
      if (!task.isAlive()) return;
      if (!this.port.isEnabled()) {
        await this.port.hold(task);
        if (!task.isAlive()) return;
        continue;
      }

      const cycle = this.step();
      const now = this.sim.time;
      if (cycle.started) {
        cycle.started.simTimeStart = now;
        this.active = true;
      }
      if (cycle.sfd) {
        const frame = this.sequencer.getCurrentFrame() ?? cycle.finished;
        if (frame) frame.simTimeSfd = now;
      }
      if (cycle.finished) this.complete(cycle.finished);

      await this.port.drive(task, cycle.units);
      if (!task.isAlive()) return;

      if (cycle.drained) {
        this.active = false;
        this.idleEvent.set();
        await task.wait(this.queue.available);
        if (!task.isAlive()) return;
      }
    }
  }

  protected onResetAssert(): void {
    this.port.quiesce();
    const frame = this.sequencer.reset();
    if (frame) {
      this.stats.framesFlushed++;
      this.logger.warn(this.name, 'tx:flush', `${this.name}: flushed transmit frame during reset`, {
        simTime: this.sim.time,
        length: frame.length,
      });
      frame.handleTxComplete();
    }
    this.active = false;
    if (this.queue.empty()) this.idleEvent.set();
  }

  private step(): TxCycle {
    try {
      return this.sequencer.step(() => this.dequeue());
    } catch (err) {
      if (err instanceof ContractViolationError && err.source === undefined) {
        throw new ContractViolationError(err.message, this.name, this.framesDequeued - 1);
      }
      throw err;
    }
  }

  private dequeue(): Frame | undefined {
    const frame = this.queue.take();
    if (frame) {
      this.framesDequeued++;
      frame.simTimeSfd = null;
      frame.simTimeEnd = null;
    }
    return frame;
  }

  private complete(frame: Frame): void {
    frame.simTimeEnd = this.sim.time;
    this.stats.framesSent++;
    this.stats.bytesSent += frame.length;
    this.logger.info(this.name, 'tx:frame', `${this.name}: sent ${frame.length}-byte frame`, {
      simTime: this.sim.time,
      length: frame.length,
      start: frame.simTimeStart,
      sfd: frame.simTimeSfd,
    });
    frame.handleTxComplete();
  }
}
