/**
 * SimEvent - level-sensitive event flag.
 *
 * Waiters registered while the flag is clear resume when it is set; waiting
 * on a set flag resolves immediately. Used for queue activity, dequeue and
 * idle notifications.
 */

export class SimEvent {
  readonly name: string;
  private flag = false;
  private waiters: Array<() => void> = [];

  constructor(name: string = 'event') {
    this.name = name;
  }

  isSet(): boolean { return this.flag; }

  set(): void {
    this.flag = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }

  clear(): void {
    this.flag = false;
  }

  wait(): Promise<void> {
    if (this.flag) return Promise.resolve();
    return new Promise<void>(resolve => this.waiters.push(resolve));
  }
}
