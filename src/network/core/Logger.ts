/**
 * Link event log
 *
 * Engines and Phy models report what happened on the wire (frame driven,
 * frame received, frame flushed by reset, speed change) as named events.
 * Entries are kept in a sliding window and pushed to listeners as they
 * arrive. Pass an `EventLogger` with `now: () => sim.time` to stamp entries
 * in simulation time; the shared `Logger` uses the wall clock.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LinkLog {
  timestamp: number;
  level: LogLevel;
  /** Engine or Phy name */
  source: string;
  /** e.g. "tx:frame", "reset:assert" */
  event: string;
  message: string;
  data?: Record<string, unknown>;
}

export type LogListener = (log: LinkLog) => void;

/** `event` matches by prefix, so "tx:" selects every transmit event */
export interface LogFilter {
  source?: string;
  event?: string;
  level?: LogLevel;
}

export interface EventLoggerOptions {
  now?: () => number;
  /** Entries older than the newest `capacity` are dropped */
  capacity?: number;
  /** Entries below this level are neither kept nor delivered */
  minLevel?: LogLevel;
}

function matches(log: LinkLog, filter: LogFilter | undefined): boolean {
  if (!filter) return true;
  if (filter.source !== undefined && filter.source !== log.source) return false;
  if (filter.event !== undefined && !log.event.startsWith(filter.event)) return false;
  return filter.level === undefined || filter.level === log.level;
}

export class EventLogger {
  private readonly now: () => number;
  private readonly capacity: number;
  private readonly minRank: number;
  private readonly listeners = new Map<LogListener, LogFilter | undefined>();
  private entries: LinkLog[] = [];

  constructor(options: EventLoggerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.capacity = options.capacity ?? 10_000;
    this.minRank = LEVEL_RANK[options.minLevel ?? 'debug'];
  }

  log(level: LogLevel, source: string, event: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < this.minRank) return;
    const entry: LinkLog = { timestamp: this.now(), level, source, event, message, data };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    for (const [listener, filter] of this.listeners) {
      if (matches(entry, filter)) listener(entry);
    }
  }

  debug(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', source, event, message, data);
  }

  info(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', source, event, message, data);
  }

  warn(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', source, event, message, data);
  }

  error(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', source, event, message, data);
  }

  /** Returns the function that removes the listener */
  subscribe(listener: LogListener, filter?: LogFilter): () => void {
    this.listeners.set(listener, filter);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getLogs(filter?: LogFilter): LinkLog[] {
    return this.entries.filter(log => matches(log, filter));
  }

  getLogsByEvent(event: string): LinkLog[] {
    return this.getLogs({ event });
  }

  /** Drop kept entries and listeners */
  reset(): void {
    this.entries = [];
    this.listeners.clear();
  }
}

export const Logger = new EventLogger();
