/**
 * Bounded command queue feeding the single orchestrator consumer.
 * Uses a circular buffer for O(1) send/receive; a full queue rejects the new
 * command rather than blocking the producer.
 */

import type { PipelineCommand } from "./types.js";

export class CommandQueue {
  private buffer: (PipelineCommand | null)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private capacity: number;
  private dropped: number;
  private waiter: ((command: PipelineCommand | null) => void) | null;
  private waiterTimer: ReturnType<typeof setTimeout> | null;

  constructor(capacity: number = 10) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Command queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<PipelineCommand | null>(capacity).fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.dropped = 0;
    this.waiter = null;
    this.waiterTimer = null;
  }

  /**
   * Enqueue a command. Returns false (and counts a drop) if the queue is full.
   * A consumer already waiting in receive() gets the command directly.
   */
  send(command: PipelineCommand): boolean {
    if (this.waiter && this.count === 0) {
      const waiter = this.waiter;
      this.clearWaiter();
      waiter(command);
      return true;
    }

    if (this.count === this.capacity) {
      this.dropped++;
      return false;
    }

    this.buffer[this.tail] = command;
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    return true;
  }

  /**
   * Dequeue the next command (FIFO), waiting up to `timeoutMs` for one to arrive.
   * Resolves null on timeout. Only one receive() may be pending at a time.
   */
  receive(timeoutMs: number): Promise<PipelineCommand | null> {
    const next = this.poll();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.waiter) {
      return Promise.reject(new Error("CommandQueue supports a single consumer"));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
      this.waiterTimer = setTimeout(() => {
        this.clearWaiter();
        resolve(null);
      }, timeoutMs);
    });
  }

  /** Dequeue without waiting, or null if empty. */
  poll(): PipelineCommand | null {
    if (this.count === 0) {
      return null;
    }

    const command = this.buffer[this.head];
    this.buffer[this.head] = null; // release reference
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return command;
  }

  /** Number of commands rejected because the queue was full. */
  get droppedCount(): number {
    return this.dropped;
  }

  /** Current queue depth. */
  get size(): number {
    return this.count;
  }

  /** Clear all queued commands and release a pending consumer with null. */
  clear(): void {
    for (let i = 0; i < this.capacity; i++) {
      this.buffer[i] = null;
    }
    this.head = 0;
    this.tail = 0;
    this.count = 0;

    if (this.waiter) {
      const waiter = this.waiter;
      this.clearWaiter();
      waiter(null);
    }
  }

  private clearWaiter(): void {
    if (this.waiterTimer) {
      clearTimeout(this.waiterTimer);
      this.waiterTimer = null;
    }
    this.waiter = null;
  }
}
