/**
 * Integration tests: transmit and receive engines wired back to back on a
 * shared set of signals
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { xgmiiIdlePattern } from '@/network/core/constants';
import { ConfigurationError, ContractViolationError } from '@/network/core/errors';
import { EventLogger } from '@/network/core/Logger';
import { Completion } from '@/network/frame/Completion';
import { Frame } from '@/network/frame/Frame';
import { GmiiReceiver, GmiiTransmitter } from '@/network/hardware/Gmii';
import { MiiReceiver, MiiTransmitter } from '@/network/hardware/Mii';
import { RgmiiReceiver, RgmiiTransmitter } from '@/network/hardware/Rgmii';
import { RmiiReceiver, RmiiTransmitter } from '@/network/hardware/Rmii';
import { XgmiiReceiver, XgmiiTransmitter } from '@/network/hardware/Xgmii';
import { Clock } from '@/network/sim/Clock';
import { SignalBus, type Signal } from '@/network/sim/SignalBus';
import { Simulator } from '@/network/sim/Simulator';
import { lowRuns, monitorXgmii, onRisingEdge, payload, sampleEveryEdge, xgmiiGaps } from './testbench';

describe('Link engines', () => {
  let sim: Simulator;
  let bus: SignalBus;
  let clk: Signal;
  let logger: EventLogger;

  beforeEach(() => {
    sim = new Simulator();
    bus = new SignalBus(sim);
    clk = bus.signal('clk');
    logger = new EventLogger({ now: () => sim.time });
  });

  // ==================== GMII ====================

  describe('GMII', () => {
    let txd: Signal;
    let txEr: Signal;
    let txEn: Signal;

    beforeEach(() => {
      txd = bus.signal('txd', 8);
      txEr = bus.signal('tx_er');
      txEn = bus.signal('tx_en');
      new Clock(sim, clk, 8000).start();
    });

    const pair = (extra: { enable?: Signal; miiSelect?: Signal } = {}) => {
      const signals = { data: txd, er: txEr, valid: txEn };
      return {
        tx: new GmiiTransmitter({ sim, clock: clk, signals, logger, ...extra }),
        rx: new GmiiReceiver({ sim, clock: clk, signals, logger, ...extra }),
      };
    };

    it('should carry a frame byte for byte', async () => {
      const { tx, rx } = pair();
      const sent = Frame.fromPayload(payload(46));

      const got = await sim.run(async () => {
        await tx.send(sent);
        return rx.recv();
      });

      expect(got.equals(sent)).toBe(true);
      expect(got.checkFcs()).toBe(true);
      expect(got.flags).toBeNull();
      expect(sent.simTimeSfd).toBe(sent.simTimeStart === null ? null : sent.simTimeStart + 7 * 8000);
      expect(rx.getStats()).toEqual({ framesReceived: 1, bytesReceived: 72, flaggedFrames: 0 });
      expect(logger.getLogsByEvent('tx:frame')).toHaveLength(1);
      expect(logger.getLogsByEvent('rx:frame')).toHaveLength(1);
    });

    it('should carry tx_er through to the received flags', async () => {
      const { tx, rx } = pair();
      const sent = Frame.fromPayload(payload(46));
      sent.flags = new Array<number>(sent.length).fill(0);
      sent.flags[40] = 1;

      const got = await sim.run(async () => {
        await tx.send(sent);
        return rx.recv();
      });

      expect(got.flags?.[40]).toBe(1);
      expect(got.hasFlags()).toBe(true);
      expect(rx.getStats().flaggedFrames).toBe(1);
      expect(logger.getLogsByEvent('rx:flagged')[0].level).toBe('warn');
    });

    it('should switch to nibbles while mii_select is high', async () => {
      const miiSelect = bus.signal('mii_select', 1, 1);
      const { tx, rx } = pair({ miiSelect });
      const sent = Frame.fromPayload(payload(64, 3));

      const got = await sim.run(async () => {
        await tx.send(sent);
        return rx.recv();
      });

      expect(got.equals(sent)).toBe(true);
      // 76 bytes, two nibbles each
      expect(sent.simTimeEnd === null || sent.simTimeStart === null ? -1 : sent.simTimeEnd - sent.simTimeStart)
        .toBe(151 * 8000);
    });

    it('should hold exactly ifg idle cycles between frames', async () => {
      const { tx, rx } = pair();
      const enable = sampleEveryEdge(sim, clk, txEn);

      await sim.run(async () => {
        tx.sendNowait(Frame.fromPayload(payload(46, 1)));
        tx.sendNowait(Frame.fromPayload(payload(46, 2)));
        await rx.recv();
        await rx.recv();
      });

      expect(lowRuns(enable)).toEqual([12]);
    });

    it('should use a changed ifg for the next gap', async () => {
      const { tx, rx } = pair();
      tx.ifg = 5;
      const enable = sampleEveryEdge(sim, clk, txEn);

      await sim.run(async () => {
        tx.sendNowait(Frame.fromPayload(payload(46, 1)));
        tx.sendNowait(Frame.fromPayload(payload(46, 2)));
        await rx.recv();
        await rx.recv();
      });

      expect(lowRuns(enable)).toEqual([5]);
      expect(() => { tx.ifg = -1; }).toThrow(ConfigurationError);
    });

    it('should only advance on enabled cycles', async () => {
      const enable = bus.signal('clk_en');
      const { tx, rx } = pair({ enable });
      sim.start('clock-enable', async task => {
        let i = 0;
        for (;;) {
          await task.fallingEdge(clk);
          i++;
          enable.drive(i % 4 === 0 ? 1 : 0);
        }
      });
      const sent = Frame.fromPayload(payload(46));

      const got = await sim.run(async () => {
        await tx.send(sent);
        return rx.recv();
      });

      expect(got.equals(sent)).toBe(true);
      expect(sent.simTimeEnd === null || sent.simTimeStart === null ? -1 : sent.simTimeEnd - sent.simTimeStart)
        .toBe(71 * 4 * 8000);
    });

    it('should flush the frame in flight on reset and recover', async () => {
      const { tx, rx } = pair();
      const txComplete = new Completion<Frame>();
      const first = Frame.fromPayload(payload(46), { txComplete });
      const second = Frame.fromPayload(payload(46, 9));

      const got = await sim.run(async task => {
        await tx.send(first);
        await task.timer(200_000);
        expect(tx.idle()).toBe(false);

        tx.assertReset();
        rx.pulseReset();
        await task.readOnly();
        expect(txEn.value).toBe(0n);
        expect(tx.isInReset()).toBe(true);

        tx.deassertReset();
        await tx.send(second);
        return rx.recv();
      });

      expect(got.equals(second)).toBe(true);
      expect(rx.empty()).toBe(true);
      expect(txComplete.getResolveCount()).toBe(1);
      expect(first.simTimeEnd).toBeNull();
      expect(tx.getStats()).toEqual({ framesSent: 1, bytesSent: 72, framesFlushed: 1 });
      expect(logger.getLogsByEvent('tx:flush')).toHaveLength(1);
    });

    it('should not start the next queued frame when reset lands on a clock edge', async () => {
      const hook = onRisingEdge(sim, clk, 20);
      const { tx, rx } = pair();
      const txComplete = new Completion<Frame>();
      const first = Frame.fromPayload(payload(46), { txComplete });
      const second = Frame.fromPayload(payload(46, 9));
      hook.action = () => {
        tx.assertReset();
        rx.pulseReset();
      };

      const got = await sim.run(async task => {
        tx.sendNowait(first);
        tx.sendNowait(second);

        await task.timer(200_000);
        expect(tx.isInReset()).toBe(true);
        expect(txEn.value).toBe(0n);
        expect(tx.count()).toBe(1);
        await task.timer(96_000);
        expect(txEn.value).toBe(0n);
        expect(tx.count()).toBe(1);

        tx.deassertReset();
        return rx.recv();
      });

      expect(got.equals(second)).toBe(true);
      expect(got.checkFcs()).toBe(true);
      expect(second.simTimeStart).toBe(300_000);
      expect(rx.empty()).toBe(true);
      expect(txComplete.getResolveCount()).toBe(1);
      expect(first.simTimeEnd).toBeNull();
      expect(tx.getStats()).toEqual({ framesSent: 1, bytesSent: 72, framesFlushed: 1 });
    });

    it('should restamp a frame that is sent again', async () => {
      const { tx } = pair();
      const frame = Frame.fromPayload(payload(46));

      const [firstStart, firstEnd] = await sim.run(async task => {
        await tx.send(frame);
        await tx.wait();
        const stamps = [frame.simTimeStart, frame.simTimeEnd];
        tx.sendNowait(frame);
        await task.timer(16_000);
        return stamps;
      });

      expect(firstEnd).not.toBeNull();
      expect(frame.simTimeStart).not.toBe(firstStart);
      expect(frame.simTimeSfd).toBeNull();
      expect(frame.simTimeEnd).toBeNull();
    });

    it('should hold the engines in reset while the reset signal is asserted', async () => {
      const rst = bus.signal('rst', 1, 1);
      const signals = { data: txd, er: txEr, valid: txEn };
      const tx = new GmiiTransmitter({ sim, clock: clk, signals, logger, reset: rst });
      const rx = new GmiiReceiver({ sim, clock: clk, signals, logger, reset: rst });
      const sent = Frame.fromPayload(payload(46));

      const got = await sim.run(async task => {
        tx.sendNowait(sent);
        await task.timer(100_000);
        expect(sent.simTimeStart).toBeNull();
        rst.drive(0);
        return rx.recv();
      });

      expect(got.equals(sent)).toBe(true);
    });

    it('should resolve completions and wait for idle', async () => {
      const { tx, rx } = pair();
      const txComplete = new Completion<Frame>();
      const sent = Frame.fromPayload(payload(46), { txComplete });

      const [early, late, noFrame] = await sim.run(async () => {
        await tx.send(sent);
        const shortWait = await tx.wait(16_000);
        const longWait = await tx.wait();
        await rx.recv();
        return [shortWait, longWait, await rx.wait(40_000)];
      });

      expect([early, late, noFrame]).toEqual([false, true, false]);
      expect(txComplete.peek()).toBe(sent);
      expect(tx.idle()).toBe(true);
    });

    it('should complete queued frames without end times on clear', async () => {
      const { tx } = pair();
      const txComplete = new Completion<Frame>();
      const frame = Frame.fromPayload(payload(46), { txComplete });
      tx.sendNowait(frame);
      tx.clear();

      expect(tx.empty()).toBe(true);
      expect(txComplete.peek()).toBe(frame);
      expect(frame.simTimeEnd).toBeNull();
    });

    it('should reject a data bus of the wrong width', () => {
      const narrow = bus.signal('narrow', 4);
      expect(() => new GmiiTransmitter({ sim, clock: clk, signals: { data: narrow, valid: txEn } }))
        .toThrow('gmii-tx: signal "narrow" must be 8 bits wide, got 4');
    });
  });

  // ==================== MII / RMII ====================

  describe('MII', () => {
    it('should carry a frame as nibbles', async () => {
      const signals = { data: bus.signal('txd', 4), er: bus.signal('tx_er'), valid: bus.signal('tx_en') };
      new Clock(sim, clk, 40000).start();
      const tx = new MiiTransmitter({ sim, clock: clk, signals });
      const rx = new MiiReceiver({ sim, clock: clk, signals });
      const sent = Frame.fromPayload(payload(46, 4));

      const got = await sim.run(async () => {
        await tx.send(sent);
        return rx.recv();
      }, { timeout: 100_000_000 });

      expect(got.equals(sent)).toBe(true);
    });
  });

  describe('RMII', () => {
    for (const speed of [100, 10]) {
      it(`should carry a frame as bit pairs at ${speed} Mb/s`, async () => {
        const signals = { data: bus.signal('txd', 2), valid: bus.signal('tx_en') };
        new Clock(sim, clk, 20000).start();
        const tx = new RmiiTransmitter({ sim, clock: clk, signals, speed });
        const rx = new RmiiReceiver({ sim, clock: clk, signals, speed });
        const sent = Frame.fromPayload(payload(46, 5));

        const got = await sim.run(async () => {
          await tx.send(sent);
          return rx.recv();
        }, { timeout: 1_000_000_000 });

        expect(got.equals(sent)).toBe(true);
        expect(tx.getDivider()).toBe(speed === 10 ? 10 : 1);
      });
    }
  });

  // ==================== RGMII ====================

  describe('RGMII', () => {
    for (const miiMode of [false, true]) {
      it(`should carry a frame on both clock edges${miiMode ? ' in MII mode' : ''}`, async () => {
        const signals = { data: bus.signal('txd', 4), ctl: bus.signal('tx_ctl') };
        new Clock(sim, clk, miiMode ? 40000 : 8000).start();
        const tx = new RgmiiTransmitter({ sim, clock: clk, signals, miiMode });
        const rx = new RgmiiReceiver({ sim, clock: clk, signals, miiMode });
        const sent = Frame.fromPayload(payload(60, 6));

        const got = await sim.run(async () => {
          await tx.send(sent);
          return rx.recv();
        }, { timeout: 100_000_000 });

        expect(got.equals(sent)).toBe(true);
        expect(got.flags).toBeNull();
      });
    }

    it('should signal tx_er as ctl toggling on the rising edge', async () => {
      const signals = { data: bus.signal('txd', 4), ctl: bus.signal('tx_ctl') };
      new Clock(sim, clk, 8000).start();
      const tx = new RgmiiTransmitter({ sim, clock: clk, signals });
      const rx = new RgmiiReceiver({ sim, clock: clk, signals });
      const sent = Frame.fromPayload(payload(60, 6));
      sent.flags = new Array<number>(sent.length).fill(0);
      sent.flags[20] = 1;

      const got = await sim.run(async () => {
        await tx.send(sent);
        return rx.recv();
      });

      expect(got.equals(sent)).toBe(true);
      expect(got.flags?.[20]).toBe(1);
      expect(got.flags?.filter(f => f !== 0)).toHaveLength(1);
    });
  });

  // ==================== XGMII ====================

  describe('XGMII', () => {
    const xgmii = (lanes: number, options: { forceOffsetStart?: boolean } = {}) => {
      const signals = { data: bus.signal('xgmii_d', lanes * 8), ctrl: bus.signal('xgmii_c', lanes) };
      new Clock(sim, clk, 6400).start();
      return {
        signals,
        tx: new XgmiiTransmitter({ sim, clock: clk, signals, logger, ...options }),
        rx: new XgmiiReceiver({ sim, clock: clk, signals, logger }),
      };
    };

    for (const lanes of [1, 4, 8]) {
      it(`should carry frames over ${lanes} lane${lanes > 1 ? 's' : ''}`, async () => {
        const { tx, rx } = xgmii(lanes);
        const sent = [Frame.fromPayload(payload(46, 1)), Frame.fromPayload(payload(101, 2))];

        const got = await sim.run(async () => {
          for (const frame of sent) tx.sendNowait(frame);
          return [await rx.recv(), await rx.recv()];
        });

        expect(got.map((f, i) => f.equals(sent[i]))).toEqual([true, true]);
        expect(got.map(f => f.rxStartLane)).toEqual([0, 0]);
        expect(tx.lanes).toBe(lanes);
      });
    }

    it('should keep at least 12 idle byte-times between 64-byte frames', async () => {
      const { tx, rx, signals } = xgmii(8);
      const stream = monitorXgmii(sim, clk, signals, 8);
      const bytes = Uint8Array.from({ length: 64 }, (_, i) => i);
      const sent = [Frame.fromPayload(bytes), Frame.fromPayload(bytes)];

      const got = await sim.run(async () => {
        for (const frame of sent) tx.sendNowait(frame);
        return [await rx.recv(), await rx.recv()];
      });

      expect([...got[0].getPayload()]).toEqual([...bytes]);
      expect(got[1].checkFcs()).toBe(true);
      expect(xgmiiGaps(stream)).toEqual([12]);
    });

    it('should drive idle through a reset and restart cleanly with the queued frame', async () => {
      const hook = onRisingEdge(sim, clk, 9);
      const { tx, rx, signals } = xgmii(8);
      const idle = xgmiiIdlePattern(8);
      const txComplete = new Completion<Frame>();
      const first = Frame.fromPayload(payload(400), { txComplete });
      const second = Frame.fromPayload(payload(46, 5));
      hook.action = () => {
        tx.assertReset();
        rx.pulseReset();
      };

      const got = await sim.run(async task => {
        tx.sendNowait(first);
        tx.sendNowait(second);

        for (const at of [60_000, 100_000, 150_000]) {
          await task.timer(at - sim.time);
          expect([signals.data.value, signals.ctrl.value]).toEqual([idle.d, idle.c]);
          expect(tx.count()).toBe(1);
        }

        tx.deassertReset();
        return rx.recv();
      });

      expect(got.equals(second)).toBe(true);
      expect(got.checkFcs()).toBe(true);
      expect(got.rxStartLane).toBe(0);
      expect(second.simTimeStart).toBe(150_400);
      expect(rx.empty()).toBe(true);
      expect(txComplete.getResolveCount()).toBe(1);
      expect(tx.getStats().framesFlushed).toBe(1);
    });

    it('should start frames on lane 4 when offset start is forced', async () => {
      const { tx, rx } = xgmii(8, { forceOffsetStart: true });
      expect(tx.forceOffsetStart).toBe(true);
      const sent = Frame.fromPayload(payload(46));

      const got = await sim.run(async () => {
        await tx.send(sent);
        return rx.recv();
      });

      expect(got.equals(sent)).toBe(true);
      expect(got.rxStartLane).toBe(4);
    });

    it('should fail the run on a frame without a leading preamble byte', async () => {
      const { tx } = xgmii(4);

      await expect(sim.run(async task => {
        await tx.send(new Frame([0xd5, 0x00, 0x01]));
        await task.timer(100_000);
      })).rejects.toThrow(ContractViolationError);
    });

    it('should name the engine and frame in a contract violation', async () => {
      const { tx } = xgmii(4);

      await expect(sim.run(async task => {
        await tx.send(new Frame([0xd5, 0x00, 0x01]));
        await task.timer(100_000);
      })).rejects.toThrow('xgmii-tx: frame does not begin with a preamble byte, cannot substitute START (frame #0)');
    });

    it('should need one control bit per lane', () => {
      const signals = { data: bus.signal('d32', 32), ctrl: bus.signal('c8', 8) };
      expect(() => new XgmiiTransmitter({ sim, clock: clk, signals }))
        .toThrow('xgmii-tx: data width 32 needs a 4-bit control vector, got 8');
    });
  });
});
