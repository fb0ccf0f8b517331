// Voice Satellite - Local Countdown Timers
// Timers started by voice (local shortcut or backend intent) count down on the
// device with a one-second tick; a finished timer is reported once and removed.

import { v4 as uuidv4 } from "uuid";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const DEFAULT_MAX_TIMERS = 5;
const DEFAULT_TICK_MS = 1000;

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface LocalTimer {
  id: string;
  name: string;
  durationSeconds: number;
  remainingSeconds: number;
  paused: boolean;
  startedAt: Date;
}

export interface TimerManagerOptions {
  maxTimers?: number;
  tickMs?: number;
  logger?: Logger;
}

/**
 * Human-readable timer name, e.g. "5 minute timer", "1m 30s timer".
 */
export function describeDuration(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes > 0 && secs > 0) return `${minutes}m ${secs}s timer`;
  if (minutes > 0) return `${minutes} minute timer`;
  return `${secs} second timer`;
}

export class TimerManager {
  private readonly maxTimers: number;
  private readonly tickMs: number;
  private readonly logger: Logger;

  private timers = new Map<string, LocalTimer>();
  private interval: ReturnType<typeof setInterval> | null = null;
  private onFinished: ((timer: LocalTimer) => void) | null = null;

  constructor(options: TimerManagerOptions = {}) {
    this.maxTimers = options.maxTimers ?? DEFAULT_MAX_TIMERS;
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.logger = options.logger ?? createConsoleLogger("TimerManager");
  }

  /** Single slot; a later registration replaces the earlier one. */
  setFinishedHandler(handler: (timer: LocalTimer) => void): void {
    this.onFinished = handler;
  }

  /**
   * Start a timer. Returns null when `seconds` is not positive or the
   * maximum number of timers is already running.
   */
  start(seconds: number, name?: string): LocalTimer | null {
    const duration = Math.round(seconds);
    if (!Number.isFinite(duration) || duration <= 0) {
      this.logger.warn(`Refusing timer with invalid duration ${seconds}`);
      return null;
    }
    if (this.timers.size >= this.maxTimers) {
      this.logger.warn(`Timer limit reached (${this.maxTimers}); not starting "${name ?? describeDuration(duration)}"`);
      return null;
    }

    const timer: LocalTimer = {
      id: uuidv4(),
      name: name ?? describeDuration(duration),
      durationSeconds: duration,
      remainingSeconds: duration,
      paused: false,
      startedAt: new Date(),
    };
    this.timers.set(timer.id, timer);
    this.ensureTicking();
    this.logger.info(`Timer started: ${timer.name} (${duration}s)`);
    return { ...timer };
  }

  stop(id: string): boolean {
    const removed = this.timers.delete(id);
    if (removed) this.logger.info(`Timer ${id} stopped`);
    this.stopTickingIfIdle();
    return removed;
  }

  pause(id: string): boolean {
    const timer = this.timers.get(id);
    if (!timer || timer.paused) return false;
    timer.paused = true;
    return true;
  }

  resume(id: string): boolean {
    const timer = this.timers.get(id);
    if (!timer || !timer.paused) return false;
    timer.paused = false;
    return true;
  }

  /** Change a running timer to a new total duration, restarting its countdown. */
  update(id: string, seconds: number): boolean {
    const timer = this.timers.get(id);
    const duration = Math.round(seconds);
    if (!timer || !Number.isFinite(duration) || duration <= 0) return false;
    timer.durationSeconds = duration;
    timer.remainingSeconds = duration;
    timer.name = describeDuration(duration);
    this.logger.info(`Timer ${id} adjusted to ${duration}s`);
    return true;
  }

  get(id: string): LocalTimer | null {
    const timer = this.timers.get(id);
    return timer ? { ...timer } : null;
  }

  findByName(name: string): LocalTimer | null {
    const wanted = name.toLowerCase();
    for (const timer of this.timers.values()) {
      if (timer.name.toLowerCase() === wanted) return { ...timer };
    }
    return null;
  }

  list(): LocalTimer[] {
    return [...this.timers.values()].map((t) => ({ ...t }));
  }

  get count(): number {
    return this.timers.size;
  }

  stopAll(): void {
    this.timers.clear();
    this.stopTickingIfIdle();
  }

  private ensureTicking(): void {
    if (this.interval) return;
    this.interval = setInterval(() => this.tick(), this.tickMs);
  }

  private stopTickingIfIdle(): void {
    if (this.timers.size === 0 && this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  private tick(): void {
    const finished: LocalTimer[] = [];
    for (const timer of this.timers.values()) {
      if (timer.paused) continue;
      timer.remainingSeconds--;
      if (timer.remainingSeconds <= 0) {
        finished.push(timer);
      }
    }

    for (const timer of finished) {
      this.timers.delete(timer.id);
      this.logger.info(`Timer finished: ${timer.name}`);
      try {
        this.onFinished?.({ ...timer, remainingSeconds: 0 });
      } catch (err) {
        this.logger.error(`Timer finished handler failed: ${errorMessage(err)}`);
      }
    }
    this.stopTickingIfIdle();
  }
}
