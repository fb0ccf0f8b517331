// Voice Satellite - Audio Resource Arbiter
// Exactly one of wake-word capture, gated capture, TTS playback or local media
// owns the audio path at a time. A new owner starts only after the previous
// one has been stopped and its worker has exited.

import type {
  AudioCapture,
  AudioOwner,
  Deferred,
  LocalMediaPlayer,
  OwnershipResult,
  StopResult,
} from "./types.js";
import { createDeferred } from "./utils/deferred.js";
import { createConsoleLogger, type Logger } from "./logger.js";

/** Default bound on waiting for the previous owner to exit (ms) */
const DEFAULT_STOP_TIMEOUT_MS = 500;

export interface AudioArbiterDeps {
  capture: AudioCapture;
  media: LocalMediaPlayer;
  logger?: Logger;
  stopTimeoutMs?: number;
}

function isCapture(kind: AudioOwner | null): boolean {
  return kind === "wake_word" || kind === "gated_capture";
}

export class AudioArbiter {
  private capture: AudioCapture;
  private media: LocalMediaPlayer;
  private logger: Logger;
  private stopTimeoutMs: number;

  private currentOwner: AudioOwner | null = null;
  private pausedForTts = false;
  private ttsReleased: Deferred<void> | null = null;

  constructor(deps: AudioArbiterDeps) {
    this.capture = deps.capture;
    this.media = deps.media;
    this.logger = deps.logger ?? createConsoleLogger("AudioArbiter");
    this.stopTimeoutMs = deps.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  get owner(): AudioOwner | null {
    return this.currentOwner;
  }

  /** True while local media is paused so TTS can play. */
  get mediaPausedForTts(): boolean {
    return this.pausedForTts;
  }

  /**
   * Claim the audio path for `kind`.
   *
   * - capture while TTS plays: waits for TTS release, bounded by `timeoutMs`
   * - capture while local media owns the path: "busy"
   * - TTS while local media plays: media is paused and restored on release
   * - local media while TTS plays: "busy"
   * - any capture owner is stopped-and-waited first; a stop timeout means
   *   ownership was not transferred
   */
  async requestOwner(kind: AudioOwner, timeoutMs: number = this.stopTimeoutMs): Promise<OwnershipResult> {
    if (this.currentOwner === kind) {
      return "ok";
    }

    if (isCapture(kind) && this.currentOwner === "tts_playback" && this.ttsReleased) {
      const released = await this.waitFor(this.ttsReleased.promise, timeoutMs);
      if (!released) {
        this.logger.warn(`${kind} request timed out waiting for TTS playback to finish`);
        return "timeout";
      }
      if (this.currentOwner === kind) {
        return "ok";
      }
    }

    if (this.currentOwner === "local_media" && isCapture(kind)) {
      return "busy";
    }
    if (this.currentOwner === "tts_playback" && kind === "local_media") {
      return "busy";
    }
    if (this.currentOwner === "tts_playback" && isCapture(kind)) {
      // Another requester won the race while this one waited
      return "busy";
    }

    if (isCapture(this.currentOwner) || this.capture.isRunning) {
      const stopped = await this.stopAndWait(timeoutMs);
      if (stopped === "timeout") {
        return "timeout";
      }
    }

    if (kind === "tts_playback" && this.currentOwner === "local_media" && this.media.state === "playing") {
      await this.media.pause();
      this.pausedForTts = true;
      this.logger.info("Local media paused for TTS playback");
    }

    this.currentOwner = kind;
    if (kind === "tts_playback") {
      this.ttsReleased = createDeferred<void>();
    }
    return "ok";
  }

  /**
   * Give up the path. No-op unless `kind` is the current owner. Releasing TTS
   * resumes local media it paused, which then owns the path again.
   */
  async releaseOwner(kind: AudioOwner): Promise<void> {
    if (this.currentOwner !== kind) {
      return;
    }

    this.currentOwner = null;
    if (kind !== "tts_playback") {
      return;
    }

    const released = this.ttsReleased;
    this.ttsReleased = null;
    try {
      if (this.pausedForTts) {
        this.pausedForTts = false;
        this.currentOwner = "local_media";
        await this.media.resume();
        this.logger.info("Local media resumed after TTS playback");
      }
    } finally {
      released?.resolve();
    }
  }

  /**
   * Stop whichever capture worker holds the path and wait for it to exit.
   * Playback owners are left alone.
   */
  async stopAndWait(timeoutMs: number = this.stopTimeoutMs): Promise<StopResult> {
    if (!isCapture(this.currentOwner) && !this.capture.isRunning) {
      return "ok";
    }

    const exited = await this.capture.stopAndWait(timeoutMs);
    if (!exited) {
      this.logger.warn(`Capture worker did not exit within ${timeoutMs}ms`);
      return "timeout";
    }
    if (isCapture(this.currentOwner)) {
      this.currentOwner = null;
    }
    return "ok";
  }

  private async waitFor(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([promise.then(() => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}
