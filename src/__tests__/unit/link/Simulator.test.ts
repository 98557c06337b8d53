/**
 * Unit tests for the discrete-event simulator, signal bus and clock
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError, ContractViolationError, SimulationTimeoutError } from '@/network/core/errors';
import { Clock } from '@/network/sim/Clock';
import { SignalBus, type Signal } from '@/network/sim/SignalBus';
import { SimEvent } from '@/network/sim/SimEvent';
import { Simulator } from '@/network/sim/Simulator';

describe('Simulator', () => {
  let sim: Simulator;
  let bus: SignalBus;
  let clk: Signal;

  beforeEach(() => {
    sim = new Simulator();
    bus = new SignalBus(sim);
    clk = bus.signal('clk');
  });

  describe('signal writes', () => {
    it('should defer driven values to the end of the delta', async () => {
      const a = bus.signal('a', 4);
      const seen = await sim.run(async task => {
        a.drive(3);
        const before = a.value;
        await task.timer(10);
        return [before, a.value];
      });
      expect(seen).toEqual([0n, 3n]);
    });

    it('should show committed values in the read-only phase', async () => {
      const a = bus.signal('a', 4);
      const value = await sim.run(async task => {
        a.drive(9);
        await task.readOnly();
        return a.value;
      });
      expect(value).toBe(9n);
      expect(sim.time).toBe(0);
    });

    it('should reject values wider than the signal', () => {
      const d = bus.signal('d', 4);
      expect(() => d.drive(16)).toThrow(ContractViolationError);
      expect(() => d.drive(-1)).toThrow(ContractViolationError);
    });

    it('should reject duplicate and zero-width signals', () => {
      expect(() => bus.signal('clk')).toThrow('signal "clk" already declared');
      expect(() => bus.signal('z', 0)).toThrow(ConfigurationError);
      expect(() => bus.get('missing')).toThrow('unknown signal "missing"');
    });

    it('should check widths for callers', () => {
      const d = bus.signal('d', 4);
      expect(d.assertWidth(4)).toBe(d);
      expect(() => d.assertWidth(8, 'gmii-tx')).toThrow('gmii-tx: signal "d" must be 8 bits wide, got 4');
    });

    it('should keep signal values in the store', () => {
      const a = bus.signal('a', 8, 0x12);
      expect(bus.store.getState().a).toBe(0x12n);
      a.setImmediateValue(0x34);
      expect(a.toNumber()).toBe(0x34);
    });
  });

  describe('clock', () => {
    it('should rise half a period after start and every period after', async () => {
      new Clock(sim, clk, 10).start();
      const edges = await sim.run(async task => {
        const times: number[] = [];
        for (let i = 0; i < 3; i++) {
          await task.risingEdge(clk);
          times.push(sim.time);
        }
        return times;
      });
      expect(edges).toEqual([5, 15, 25]);
    });

    it('should see falling edges between rising edges', async () => {
      new Clock(sim, clk, 10).start();
      const time = await sim.run(async task => {
        await task.risingEdge(clk);
        await task.fallingEdge(clk);
        return sim.time;
      });
      expect(time).toBe(10);
    });

    it('should stop toggling when stopped', async () => {
      const clock = new Clock(sim, clk, 10);
      clock.start();
      let edges = 0;
      sim.start('count', async task => {
        for (;;) {
          await task.risingEdge(clk);
          edges++;
        }
      });
      await sim.run(async task => {
        await task.timer(22);
        clock.stop();
        await task.timer(100);
      });
      expect(edges).toBe(2);
      expect(clock.isRunning()).toBe(false);
    });

    it('should reject periods below 2 ps', () => {
      expect(() => new Clock(sim, clk, 1)).toThrow(ConfigurationError);
    });
  });

  describe('tasks', () => {
    it('should never resume a killed task', async () => {
      new Clock(sim, clk, 10).start();
      let count = 0;
      const counter = sim.start('counter', async task => {
        for (;;) {
          await task.risingEdge(clk);
          count++;
        }
      });
      await sim.run(async task => {
        await task.timer(32);
        counter.kill();
        await task.timer(50);
      });
      expect(count).toBe(3);
      expect(counter.isAlive()).toBe(false);
    });

    it('should resume a task waiting on an event when it is set', async () => {
      const ready = new SimEvent('ready');
      let at = -1;
      sim.start('waiter', async task => {
        await task.wait(ready);
        at = sim.time;
      });
      await sim.run(async task => {
        await task.timer(40);
        ready.set();
        await task.timer(1);
      });
      expect(at).toBe(40);
    });

    it('should fail the run when a task throws', async () => {
      sim.start('bad', async () => {
        throw new Error('boom');
      });
      await expect(sim.run(async task => task.timer(10))).rejects.toThrow('boom');
    });
  });

  describe('run', () => {
    it('should time out while the clock keeps running', async () => {
      new Clock(sim, clk, 10).start();
      const never = new SimEvent('never');
      await expect(sim.run(async task => task.wait(never), { timeout: 1000 }))
        .rejects.toBeInstanceOf(SimulationTimeoutError);
      expect(sim.time).toBe(1000);
    });

    it('should report a deadlock when nothing is scheduled', async () => {
      const never = new SimEvent('never');
      await expect(sim.run(async task => task.wait(never))).rejects.toThrow(/deadlock/);
    });

    it('should advance by a fixed duration', async () => {
      await sim.runFor(100);
      expect(sim.time).toBe(100);
      await sim.runFor(50);
      expect(sim.time).toBe(150);
    });

    it('should unschedule a callback', async () => {
      let fired = false;
      const cancel = sim.schedule(10, () => { fired = true; });
      cancel();
      await sim.runFor(20);
      expect(fired).toBe(false);
    });

    it('should take the timeout off the timeline when the trigger wins', async () => {
      const ready = new SimEvent('ready');
      sim.schedule(10, () => ready.set());

      const won = await sim.run(async () => sim.withTimeout(ready.wait(), 1000));

      expect(won).toBe(true);
      expect(sim.time).toBe(10);
      const never = new SimEvent('never');
      await expect(sim.run(async task => task.wait(never))).rejects.toThrow('deadlock at 10 ps');
    });

    it('should resolve false when the timeout passes first', async () => {
      const never = new SimEvent('never');
      const won = await sim.run(async () => sim.withTimeout(never.wait(), 1000));
      expect(won).toBe(false);
      expect(sim.time).toBe(1000);
    });

    it('should reject negative delays', () => {
      expect(() => sim.schedule(-1, () => undefined)).toThrow(ConfigurationError);
    });
  });
});
