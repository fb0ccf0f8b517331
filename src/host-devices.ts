// Voice Satellite - Host devices
// Stand-ins for the satellite hardware when running on an ordinary host:
// microphone input replayed from a raw PCM file, synthesized speech written to
// disk, and LED, beeper and media player that only log.

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  AudioCapture,
  Beeper,
  LedState,
  LocalMediaPlayer,
  MediaState,
  StatusLed,
  StatusPublisher,
  TtsPlayer,
  Watchdog,
  WakeModeOptions,
} from "./types.js";
import { delay } from "./utils/deferred.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** 512 samples of 16-bit mono PCM, 32 ms at 16 kHz */
export const FRAME_BYTES = 1024;
export const FRAME_INTERVAL_MS = 32;

// ─── Capture ────────────────────────────────────────────────────────────────────

export interface PcmFileCaptureOptions {
  frameBytes?: number;
  frameIntervalMs?: number;
  logger?: Logger;
}

/**
 * Replays a PCM buffer as microphone input, one frame per interval, looping.
 * Without a source it delivers silence. Wake-word mode has no detector on a
 * host; wakes arrive through the control server instead.
 */
export class PcmFileCapture implements AudioCapture {
  private readonly source: Buffer | null;
  private readonly frameBytes: number;
  private readonly frameIntervalMs: number;
  private readonly logger: Logger;

  private interval: ReturnType<typeof setInterval> | null = null;
  private wakeMode = false;
  private offset = 0;

  constructor(source: Buffer | null, options: PcmFileCaptureOptions = {}) {
    this.frameBytes = options.frameBytes ?? FRAME_BYTES;
    this.frameIntervalMs = options.frameIntervalMs ?? FRAME_INTERVAL_MS;
    this.logger = options.logger ?? createConsoleLogger("Capture");
    // Whole frames only
    const usable = source ? source.length - (source.length % this.frameBytes) : 0;
    this.source = source && usable > 0 ? source.subarray(0, usable) : null;
  }

  static async fromFile(filePath: string | null, options: PcmFileCaptureOptions = {}): Promise<PcmFileCapture> {
    if (!filePath) {
      return new PcmFileCapture(null, options);
    }
    const pcm = await readFile(filePath);
    return new PcmFileCapture(pcm, options);
  }

  get isRunning(): boolean {
    return this.interval !== null || this.wakeMode;
  }

  start(onFrame: (frame: Buffer) => void): void {
    this.halt();
    this.offset = 0;
    this.interval = setInterval(() => onFrame(this.nextFrame()), this.frameIntervalMs);
  }

  startWakeMode(_onWake: () => void, options: WakeModeOptions): void {
    this.halt();
    this.wakeMode = true;
    this.logger.info(`Wake-word mode (threshold ${options.threshold})`);
  }

  async stopAndWait(_timeoutMs: number): Promise<boolean> {
    this.halt();
    return true;
  }

  private halt(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.wakeMode = false;
  }

  private nextFrame(): Buffer {
    if (!this.source) {
      return Buffer.alloc(this.frameBytes);
    }
    const frame = this.source.subarray(this.offset, this.offset + this.frameBytes);
    this.offset = (this.offset + this.frameBytes) % this.source.length;
    return Buffer.from(frame);
  }
}

// ─── TTS Output ─────────────────────────────────────────────────────────────────

/**
 * Collects streamed speech and writes each response to `outputDir` as
 * response-NNN.mp3. Playback counts as complete once the file is written.
 */
export class FileTtsPlayer implements TtsPlayer {
  private readonly outputDir: string;
  private readonly logger: Logger;

  private chunks: Buffer[] = [];
  private onComplete: (() => void) | null = null;
  private counter = 0;
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(outputDir: string, logger: Logger = createConsoleLogger("TtsPlayer")) {
    this.outputDir = outputDir;
    this.logger = logger;
  }

  start(onComplete: () => void): void {
    this.chunks = [];
    this.onComplete = onComplete;
  }

  feed(chunk: Buffer | null): void {
    if (!this.onComplete) return;
    if (chunk) {
      this.chunks.push(chunk);
      return;
    }

    const done = this.onComplete;
    this.onComplete = null;
    const audio = Buffer.concat(this.chunks);
    this.chunks = [];
    this.counter++;
    const file = join(this.outputDir, `response-${String(this.counter).padStart(3, "0")}.mp3`);

    this.pendingWrite = this.write(file, audio).then(done);
  }

  stop(): void {
    this.chunks = [];
    this.onComplete = null;
  }

  /** Resolves once the most recent response has been written. */
  flush(): Promise<void> {
    return this.pendingWrite;
  }

  private async write(file: string, audio: Buffer): Promise<void> {
    if (audio.length === 0) {
      this.logger.warn("Empty response audio; nothing written");
      return;
    }
    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(file, audio);
      this.logger.info(`Response audio written to ${file} (${audio.length} bytes)`);
    } catch (err) {
      this.logger.error(`Failed to write response audio: ${errorMessage(err)}`);
    }
  }
}

// ─── Indicators ─────────────────────────────────────────────────────────────────

export class LoggingStatusLed implements StatusLed {
  private current: LedState = "idle";

  constructor(private readonly logger: Logger = createConsoleLogger("LED")) {}

  get state(): LedState {
    return this.current;
  }

  set(state: LedState): void {
    if (state === this.current) return;
    this.current = state;
    this.logger.info(`LED → ${state}`);
  }
}

/** Logs the tone and takes as long as a real beep would. */
export class LoggingBeeper implements Beeper {
  constructor(private readonly logger: Logger = createConsoleLogger("Beeper")) {}

  async play(frequencyHz: number, durationMs: number, volume: number): Promise<void> {
    this.logger.info(`Beep ${frequencyHz} Hz, ${durationMs} ms, volume ${volume}`);
    await delay(durationMs);
  }
}

export type StatusListener = (topic: string, value: string) => void;

/** Publishes status topics to subscribers and remembers the latest value of each. */
export class StatusBus implements StatusPublisher {
  private listeners = new Set<StatusListener>();
  private latestValues = new Map<string, string>();

  constructor(private readonly logger: Logger = createConsoleLogger("Status")) {}

  publish(topic: string, value: string): void {
    this.latestValues.set(topic, value);
    this.logger.info(`${topic}: ${value}`);
    for (const listener of this.listeners) {
      try {
        listener(topic, value);
      } catch (err) {
        this.logger.error(`Status listener failed: ${errorMessage(err)}`);
      }
    }
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  latest(): Record<string, string> {
    return Object.fromEntries(this.latestValues);
  }
}

// ─── Media ──────────────────────────────────────────────────────────────────────

/** Tracks playback state for a host with no music source. */
export class IdleMediaPlayer implements LocalMediaPlayer {
  private current: MediaState = "stopped";

  constructor(private readonly logger: Logger = createConsoleLogger("Media")) {}

  get state(): MediaState {
    return this.current;
  }

  async play(): Promise<void> {
    this.transition("playing");
  }

  async pause(): Promise<void> {
    if (this.current === "playing") this.transition("paused");
  }

  async resume(): Promise<void> {
    if (this.current === "paused") this.transition("playing");
  }

  async stop(): Promise<void> {
    this.transition("stopped");
  }

  async next(): Promise<void> {
    this.logger.info("Next track");
  }

  async previous(): Promise<void> {
    this.logger.info("Previous track");
  }

  private transition(state: MediaState): void {
    if (state === this.current) return;
    this.logger.info(`Media ${this.current} → ${state}`);
    this.current = state;
  }
}

// ─── Watchdog ───────────────────────────────────────────────────────────────────

/** Records consumer heartbeats; the control server reports liveness from it. */
export class LivenessWatchdog implements Watchdog {
  private lastFeed: number | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  feed(): void {
    this.lastFeed = this.now();
  }

  get lastFeedAt(): number | null {
    return this.lastFeed;
  }

  /** True when fed within the last `maxSilenceMs`. */
  isAlive(maxSilenceMs: number): boolean {
    return this.lastFeed !== null && this.now() - this.lastFeed <= maxSilenceMs;
  }
}
