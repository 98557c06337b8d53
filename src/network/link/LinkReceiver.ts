/**
 * LinkReceiver - generic receive engine
 *
 * Samples an RxPort every enabled phase while a frame is in progress and,
 * between frames, lets the port suspend until the bus shows activity.
 * Completed frames go to the receive queue.
 *
 * Frame flow:
 *   run(): RxPort.sample() → FrameAssembler.push() → FrameQueue.push()
 *     → recv() / recvNowait()
 */

import type { EventLogger } from '../core/Logger';
import type { QueueLimits } from '../core/types';
import type { LaneCodec } from '../codec/LaneCodec';
import type { Frame } from '../frame/Frame';
import type { Simulator, Task } from '../sim/Simulator';
import { FrameAssembler } from './FrameAssembler';
import { FrameQueue } from './FrameQueue';
import type { RxPort } from './ports/BusPort';
import { ResettableEngine, type ResetOptions } from './ResettableEngine';

export interface LinkReceiverOptions extends ResetOptions {
  sim: Simulator;
  name: string;
  port: RxPort;
  codec: LaneCodec;
  limits?: QueueLimits;
  logger?: EventLogger;
}

export interface ReceiveStats {
  framesReceived: number;
  bytesReceived: number;
  flaggedFrames: number;
}

export class LinkReceiver extends ResettableEngine {
  readonly queue: FrameQueue;
  protected readonly port: RxPort;
  protected codec: LaneCodec;
  protected readonly assembler: FrameAssembler;
  private active = false;
  private stats: ReceiveStats = { framesReceived: 0, bytesReceived: 0, flaggedFrames: 0 };

  constructor(options: LinkReceiverOptions) {
    super(options.sim, options.name, options.logger);
    this.port = options.port;
    this.codec = options.codec;
    this.assembler = new FrameAssembler(options.codec);
    this.queue = new FrameQueue(this.name, options.limits);
    this.initReset(options);
  }

  getCodec(): LaneCodec { return this.codec; }
  getStats(): ReceiveStats { return { ...this.stats }; }

  /** Codec used to reassemble the current frame; GMII overrides this to honour mii_select */
  protected selectCodec(): LaneCodec {
    return this.codec;
  }

  // ─── Queue surface ──────────────────────────────────────────────

  async recv(compact: boolean = true): Promise<Frame> {
    const frame = await this.queue.get();
    if (compact) frame.compact();
    return frame;
  }

  /** Throws QueueEmptyError when nothing has been received */
  recvNowait(compact: boolean = true): Frame {
    const frame = this.queue.getNowait();
    if (compact) frame.compact();
    return frame;
  }

  count(): number { return this.queue.count(); }
  empty(): boolean { return this.queue.empty(); }
  full(): boolean { return this.queue.full(); }

  /** No frame being received */
  idle(): boolean { return !this.active; }

  clear(): void {
    this.queue.clear();
  }

  /** Resolves true once a frame is available, or false if `timeout` ps pass first */
  async wait(timeout?: number): Promise<boolean> {
    if (!this.queue.empty()) return true;
    if (timeout === undefined) {
      await this.queue.available.wait();
      return true;
    }
    return this.sim.withTimeout(this.queue.available.wait(), timeout);
  }

  // ─── Run task ───────────────────────────────────────────────────

  protected async run(task: Task): Promise<void> {
    this.active = false;
    for (;;) {
      await this.port.nextCycle(task);
      if (!task.isAlive()) return;
      if (!this.port.isEnabled()) {
        await this.port.hold(task);
        if (!task.isAlive()) return;
        continue;
      }

      this.assembler.codec = this.selectCodec();
      for (const frame of this.assembler.push(this.port.sample(), this.sim.time)) {
        this.deliver(frame);
      }
      this.active = this.assembler.isInFrame();

      if (!this.active && this.port.awaitActivity) {
        await this.port.awaitActivity(task);
        if (!task.isAlive()) return;
      }
    }
  }

  protected onResetAssert(): void {
    this.assembler.reset();
    this.active = false;
  }

  private deliver(frame: Frame): void {
    this.stats.framesReceived++;
    this.stats.bytesReceived += frame.length;
    const flagged = frame.hasFlags();
    if (flagged) this.stats.flaggedFrames++;
    this.logger.log(flagged ? 'warn' : 'info', this.name, flagged ? 'rx:flagged' : 'rx:frame',
      `${this.name}: received ${frame.length}-byte frame${flagged ? ' with error/control flags' : ''}`, {
        simTime: this.sim.time,
        length: frame.length,
        startLane: frame.rxStartLane,
      });
    this.queue.push(frame);
  }
}
