/**
 * Unit tests for command-queue.ts
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import * as fc from "fast-check";
import { CommandQueue } from "./command-queue.js";
import { PipelineCommandType, type PipelineCommand } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function cmd(type: PipelineCommandType, data = 0): PipelineCommand {
  return { type, data };
}

afterEach(() => {
  vi.useRealTimers();
});

// ─── FIFO Behavior ──────────────────────────────────────────────────────────────

describe("CommandQueue", () => {
  it("delivers commands in enqueue order", async () => {
    const q = new CommandQueue(5);
    q.send(cmd(PipelineCommandType.WAKE_DETECTED));
    q.send(cmd(PipelineCommandType.SPEECH_END));
    q.send(cmd(PipelineCommandType.RESUME_WWD, 7));

    expect(await q.receive(10)).toEqual(cmd(PipelineCommandType.WAKE_DETECTED));
    expect(await q.receive(10)).toEqual(cmd(PipelineCommandType.SPEECH_END));
    expect(await q.receive(10)).toEqual(cmd(PipelineCommandType.RESUME_WWD, 7));
    expect(q.size).toBe(0);
  });

  it("rejects and counts commands sent to a full queue", () => {
    const q = new CommandQueue(2);
    expect(q.send(cmd(PipelineCommandType.TIMER_BEEP))).toBe(true);
    expect(q.send(cmd(PipelineCommandType.ALARM_BEEP))).toBe(true);
    expect(q.send(cmd(PipelineCommandType.ERROR_BEEP))).toBe(false);
    expect(q.droppedCount).toBe(1);
    expect(q.poll()).toEqual(cmd(PipelineCommandType.TIMER_BEEP));
    expect(q.poll()).toEqual(cmd(PipelineCommandType.ALARM_BEEP));
    expect(q.poll()).toBeNull();
  });

  it("wraps around the circular buffer", () => {
    const q = new CommandQueue(3);
    for (let round = 0; round < 4; round++) {
      q.send(cmd(PipelineCommandType.OFFLINE_CMD, round * 2));
      q.send(cmd(PipelineCommandType.OFFLINE_CMD, round * 2 + 1));
      expect(q.poll()?.data).toBe(round * 2);
      expect(q.poll()?.data).toBe(round * 2 + 1);
    }
    expect(q.size).toBe(0);
  });

  it("resolves null when nothing arrives before the timeout", async () => {
    vi.useFakeTimers();
    const q = new CommandQueue();
    const pending = q.receive(1000);
    await vi.advanceTimersByTimeAsync(1000);
    expect(await pending).toBeNull();
  });

  it("hands a command straight to a waiting consumer", async () => {
    vi.useFakeTimers();
    const q = new CommandQueue();
    const pending = q.receive(1000);
    expect(q.send(cmd(PipelineCommandType.STOP_WWD))).toBe(true);
    expect(await pending).toEqual(cmd(PipelineCommandType.STOP_WWD));
    expect(q.size).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects a second concurrent consumer", async () => {
    vi.useFakeTimers();
    const q = new CommandQueue();
    const first = q.receive(1000);
    await expect(q.receive(1000)).rejects.toThrow("single consumer");
    q.clear();
    expect(await first).toBeNull();
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new CommandQueue(0)).toThrow("positive integer");
  });

  it("never holds more than its capacity and loses nothing it accepted", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 12 }),
        fc.array(fc.boolean(), { maxLength: 100 }),
        (capacity, ops) => {
          const q = new CommandQueue(capacity);
          const expected: number[] = [];
          let next = 0;
          for (const isSend of ops) {
            if (isSend) {
              const wasFull = q.size === capacity;
              const accepted = q.send(cmd(PipelineCommandType.OFFLINE_CMD, next));
              expect(accepted).toBe(!wasFull);
              if (accepted) expected.push(next);
              next++;
            } else {
              const got = q.poll();
              expect(got?.data ?? null).toBe(expected.shift() ?? null);
            }
            expect(q.size).toBeLessThanOrEqual(capacity);
            expect(q.size).toBe(expected.length);
          }
        },
      ),
    );
  });
});
