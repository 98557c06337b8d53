/**
 * FrameQueue - FIFO of frames with occupancy accounting
 *
 * Byte and frame counters move with every push/take so they always equal
 * the sums over the queued frames. The queue is full once a counter is
 * strictly above its limit; blocking producers wait on the dequeue event.
 */

import { resolveQueueLimits } from '../core/config';
import { QueueEmptyError, QueueFullError } from '../core/errors';
import type { QueueLimits, QueueStats } from '../core/types';
import { SimEvent } from '../sim/SimEvent';
import type { Frame } from '../frame/Frame';

export class FrameQueue {
  readonly owner: string;
  /** Set while at least one frame is queued */
  readonly available: SimEvent;
  /** Pulsed on every take */
  readonly dequeued: SimEvent;
  private frames: Frame[] = [];
  private bytes = 0;
  private limits: QueueLimits;

  constructor(owner: string, limits: QueueLimits = {}) {
    this.owner = owner;
    this.limits = resolveQueueLimits(limits, owner);
    this.available = new SimEvent(`${owner}:available`);
    this.dequeued = new SimEvent(`${owner}:dequeued`);
  }

  // ─── Occupancy ──────────────────────────────────────────────────

  count(): number { return this.frames.length; }
  empty(): boolean { return this.frames.length === 0; }
  getStats(): QueueStats { return { frames: this.frames.length, bytes: this.bytes }; }
  getLimits(): QueueLimits { return { ...this.limits }; }

  setLimits(limits: QueueLimits): void {
    this.limits = resolveQueueLimits(limits, this.owner);
  }

  full(): boolean {
    const { bytes, frames } = this.limits;
    if (bytes !== undefined && this.bytes > bytes) return true;
    if (frames !== undefined && this.frames.length > frames) return true;
    return false;
  }

  // ─── Producer side ──────────────────────────────────────────────

  /** Enqueue, waiting for dequeues while the queue is full */
  async put(frame: Frame): Promise<void> {
    while (this.full()) {
      this.dequeued.clear();
      await this.dequeued.wait();
    }
    this.push(frame);
  }

  putNowait(frame: Frame): void {
    if (this.full()) throw new QueueFullError(this.owner);
    this.push(frame);
  }

  /** Enqueue without a limit check (receive side) */
  push(frame: Frame): void {
    this.frames.push(frame);
    this.bytes += frame.length;
    this.available.set();
  }

  // ─── Consumer side ──────────────────────────────────────────────

  take(): Frame | undefined {
    const frame = this.frames.shift();
    if (!frame) return undefined;
    this.bytes -= frame.length;
    if (this.frames.length === 0) this.available.clear();
    this.dequeued.set();
    return frame;
  }

  async get(): Promise<Frame> {
    for (;;) {
      const frame = this.take();
      if (frame) return frame;
      await this.available.wait();
    }
  }

  getNowait(): Frame {
    const frame = this.take();
    if (!frame) throw new QueueEmptyError(this.owner);
    return frame;
  }

  /** Remove every queued frame */
  clear(): Frame[] {
    const removed = this.frames;
    this.frames = [];
    this.bytes = 0;
    this.available.clear();
    this.dequeued.set();
    return removed;
  }
}
