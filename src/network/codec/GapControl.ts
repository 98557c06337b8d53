/**
 * Inter-frame gap accounting
 *
 * CountdownGap idles a fixed number of bus units after every frame.
 * DeficitIdleGap implements the XGMII deficit idle counter (IEEE 802.3
 * clause 46.3.1.4): frames may only start on lane 0 (or lane 4 on buses
 * wider than 4 bytes), so individual gaps are rounded up or down and the
 * difference is carried in a deficit so the long-run average stays at the
 * configured IFG.
 */

export interface GapControl {
  /** Called once per enabled phase while no frame is in flight; true keeps the bus idle */
  inGap(): boolean;
  /** A frame is about to start; returns true to start it on lane 4 */
  beginFrame(): boolean;
  /** No frame was waiting once the gap expired */
  idle(): void;
  /**
   * The last unit of a frame went out. `tailLanes` counts the lane holding
   * that unit plus the lanes padded after it.
   */
  endFrame(tailLanes: number, unitsPerByte: number): void;
  reset(): void;
  ifg: number;
}

export class CountdownGap implements GapControl {
  ifg: number;
  private remaining = 0;

  constructor(ifg: number) {
    this.ifg = ifg;
  }

  getRemaining(): number { return this.remaining; }

  inGap(): boolean {
    if (this.remaining > 0) {
      this.remaining--;
      return true;
    }
    return false;
  }

  beginFrame(): boolean {
    return false;
  }

  idle(): void {}

  // IFG is in byte-times; sub-byte interfaces idle for every unit of each byte
  endFrame(_tailLanes: number, unitsPerByte: number): void {
    this.remaining = Math.max(this.ifg, 1) * unitsPerByte;
  }

  reset(): void {
    this.remaining = 0;
  }
}

export interface DeficitIdleOptions {
  enableDic?: boolean;
  /** Always start frames on lane 4 (buses wider than 4 lanes) */
  forceOffsetStart?: boolean;
}

export class DeficitIdleGap implements GapControl {
  ifg: number;
  enableDic: boolean;
  forceOffsetStart: boolean;
  private readonly lanes: number;
  private ifgCount = 0;
  private deficit = 0;

  constructor(lanes: number, ifg: number, options: DeficitIdleOptions = {}) {
    this.lanes = lanes;
    this.ifg = ifg;
    this.enableDic = options.enableDic ?? true;
    this.forceOffsetStart = options.forceOffsetStart ?? false;
  }

  getDeficit(): number { return this.deficit; }
  getIfgCount(): number { return this.ifgCount; }

  inGap(): boolean {
    if (this.ifgCount + this.deficit > this.lanes - 1 || (!this.enableDic && this.ifgCount > 4)) {
      this.ifgCount -= this.lanes;
      if (this.ifgCount < 0) {
        if (this.enableDic) this.deficit = Math.max(this.deficit + this.ifgCount, 0);
        this.ifgCount = 0;
      }
      return true;
    }
    return false;
  }

  beginFrame(): boolean {
    const threshold = this.enableDic ? 3 - this.deficit : 0;
    const offset = (this.lanes > 4 && this.ifgCount > threshold) || (this.forceOffsetStart && this.lanes > 4);
    if (offset) this.ifgCount -= 4;
    if (this.enableDic) this.deficit = Math.max(this.deficit + this.ifgCount, 0);
    this.ifgCount = 0;
    return offset;
  }

  idle(): void {
    this.deficit = 0;
    this.ifgCount = 0;
  }

  endFrame(tailLanes: number): void {
    this.ifgCount = Math.max(this.ifg - tailLanes, 0);
  }

  reset(): void {
    this.idle();
  }
}
