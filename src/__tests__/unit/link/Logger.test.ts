/**
 * Unit tests for the link event log
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EventLogger, type LinkLog } from '@/network/core/Logger';

describe('EventLogger', () => {
  let now: number;
  let logger: EventLogger;

  beforeEach(() => {
    now = 0;
    logger = new EventLogger({ now: () => now, capacity: 4 });
  });

  it('should stamp entries with the injected clock', () => {
    now = 8000;
    logger.info('gmii-tx', 'tx:frame', 'sent', { simTime: 8000 });

    expect(logger.getLogs()).toEqual([{
      timestamp: 8000,
      level: 'info',
      source: 'gmii-tx',
      event: 'tx:frame',
      message: 'sent',
      data: { simTime: 8000 },
    }]);
  });

  it('should filter by source, event prefix and level', () => {
    logger.info('a', 'tx:frame', 'm1');
    logger.warn('a', 'tx:flush', 'm2');
    logger.info('b', 'rx:frame', 'm3');

    expect(logger.getLogs({ source: 'a' }).map(l => l.message)).toEqual(['m1', 'm2']);
    expect(logger.getLogsByEvent('tx:').map(l => l.event)).toEqual(['tx:frame', 'tx:flush']);
    expect(logger.getLogs({ event: 'tx:', level: 'info' }).map(l => l.message)).toEqual(['m1']);
  });

  it('should deliver to matching listeners until unsubscribed', () => {
    const seen: LinkLog[] = [];
    const unsubscribe = logger.subscribe(l => seen.push(l), { source: 'a', level: 'warn' });

    logger.warn('a', 'tx:flush', 'one');
    logger.info('a', 'tx:frame', 'two');
    logger.warn('b', 'tx:flush', 'three');
    unsubscribe();
    logger.warn('a', 'tx:flush', 'four');

    expect(seen.map(l => l.message)).toEqual(['one']);
  });

  it('should keep only the newest entries up to capacity', () => {
    for (let i = 0; i < 6; i++) logger.debug('a', 'e', `m${i}`);
    expect(logger.getLogs().map(l => l.message)).toEqual(['m2', 'm3', 'm4', 'm5']);
  });

  it('should drop entries below the minimum level', () => {
    const quiet = new EventLogger({ minLevel: 'info' });
    const seen: LinkLog[] = [];
    quiet.subscribe(l => seen.push(l));

    quiet.debug('a', 'reset:deassert', 'm');
    quiet.info('a', 'reset:assert', 'm');

    expect(quiet.getLogs().map(l => l.event)).toEqual(['reset:assert']);
    expect(seen).toHaveLength(1);
  });

  it('should clear entries and listeners on reset', () => {
    const seen: LinkLog[] = [];
    logger.subscribe(l => seen.push(l));
    logger.error('a', 'e', 'm');
    logger.reset();
    logger.error('a', 'e', 'm');

    expect(seen).toHaveLength(1);
    expect(logger.getLogs()).toHaveLength(1);
  });
});
