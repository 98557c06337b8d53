/**
 * Completion - one-shot result channel.
 *
 * Resolves at most once; later calls to resolve() are ignored and report
 * false. Used as the transmit-complete notification of a Frame.
 */

export class Completion<T> {
  private readonly promise: Promise<T>;
  private readonly settle: (value: T) => void;
  private result: { value: T } | null = null;
  private resolveCount = 0;

  constructor() {
    let settle: (value: T) => void = () => undefined;
    this.promise = new Promise<T>(resolve => { settle = resolve; });
    this.settle = settle;
  }

  resolve(value: T): boolean {
    this.resolveCount++;
    if (this.result) return false;
    this.result = { value };
    this.settle(value);
    return true;
  }

  isDone(): boolean { return this.result !== null; }

  /** Value if resolved */
  peek(): T | undefined { return this.result?.value; }

  /** Number of resolve() calls, including ignored ones */
  getResolveCount(): number { return this.resolveCount; }

  wait(): Promise<T> {
    return this.promise;
  }
}
