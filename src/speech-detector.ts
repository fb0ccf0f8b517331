// ─── Speech Boundary Detector ───────────────────────────────────────────────────
// Energy-based voice activity detection. Turns a stream of constant-size PCM
// frames into start/end-of-utterance decisions for gated capture.

import { VadState } from "./types.js";

/**
 * Configuration for the speech boundary detector.
 * Durations are converted to frame counts through `framesPerMs`, derived from
 * the sample rate and the size of the first frame.
 */
export interface SpeechDetectorConfig {
  /** Input sample rate in Hz. Default: 16000 */
  sampleRate: number;
  /** RMS energy a frame must exceed to count as speech. Default: 180 */
  speechThreshold: number;
  /** Silence after speech that ends the utterance. Default: 1800 */
  silenceDurationMs: number;
  /** Accumulated speech required before the utterance counts as started. Default: 200 */
  minSpeechDurationMs: number;
  /** Hard ceiling on the recording regardless of content. Default: 7000 */
  maxRecordingMs: number;
}

export const DEFAULT_SPEECH_DETECTOR_CONFIG: SpeechDetectorConfig = {
  sampleRate: 16000,
  speechThreshold: 180,
  silenceDurationMs: 1800,
  minSpeechDurationMs: 200,
  maxRecordingMs: 7000,
};

/**
 * RMS energy of a 16-bit little-endian PCM frame, truncated to an integer.
 * The mean square is floored before the root.
 */
export function computeFrameEnergy(frame: Buffer): number {
  const sampleCount = Math.floor(frame.length / 2);
  if (sampleCount === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i++) {
    const sample = frame.readInt16LE(i * 2);
    sumSquares += sample * sample;
  }
  return Math.floor(Math.sqrt(Math.floor(sumSquares / sampleCount)));
}

export class SpeechBoundaryDetector {
  private config: SpeechDetectorConfig;

  private currentState: VadState;
  private totalFrames: number;
  private speechFrames: number;
  private silenceFrames: number;
  private framesPerMs: number;
  private energy: number;

  constructor(config: Partial<SpeechDetectorConfig> = {}) {
    this.config = { ...DEFAULT_SPEECH_DETECTOR_CONFIG, ...config };

    this.currentState = VadState.IDLE;
    this.totalFrames = 0;
    this.speechFrames = 0;
    this.silenceFrames = 0;
    this.framesPerMs = Math.max(1, Math.floor(this.config.sampleRate / 1000));
    this.energy = 0;
  }

  get state(): VadState {
    return this.currentState;
  }

  /** Energy of the most recent frame. */
  get currentEnergy(): number {
    return this.energy;
  }

  get settings(): Readonly<SpeechDetectorConfig> {
    return this.config;
  }

  /**
   * Replace thresholds. Takes effect on the next frame; counters are kept.
   */
  configure(config: Partial<SpeechDetectorConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Classify one frame and advance the state machine.
   * A missing or empty frame leaves the detector untouched.
   */
  processFrame(frame: Buffer | null | undefined): VadState {
    if (!frame || frame.length < 2) {
      return this.currentState;
    }

    const sampleCount = Math.floor(frame.length / 2);
    this.energy = computeFrameEnergy(frame);
    const isSpeech = this.energy > this.config.speechThreshold;

    this.totalFrames++;

    // framesPerMs is fixed by the first frame; callers keep the frame size constant
    if (this.totalFrames === 1) {
      const framesPerSecond = Math.floor(this.config.sampleRate / sampleCount);
      this.framesPerMs = Math.max(1, Math.floor(framesPerSecond / 1000));
    }

    if (this.currentState === VadState.IDLE) {
      this.currentState = VadState.LISTENING;
      this.speechFrames = 0;
      this.silenceFrames = 0;
    }

    switch (this.currentState) {
      case VadState.LISTENING:
        if (isSpeech) {
          this.speechFrames++;
          if (this.toMs(this.speechFrames) >= this.config.minSpeechDurationMs) {
            this.currentState = VadState.SPEAKING;
            this.silenceFrames = 0;
          }
        }
        break;

      case VadState.SPEAKING:
        if (isSpeech) {
          this.silenceFrames = 0;
          this.speechFrames++;
        } else {
          this.silenceFrames++;
          if (this.toMs(this.silenceFrames) >= this.config.silenceDurationMs) {
            // SILENCE is only a waypoint: END fires on the same frame
            this.currentState = VadState.SILENCE;
            this.currentState = VadState.END;
          }
        }
        break;

      default:
        break;
    }

    if (this.toMs(this.totalFrames) >= this.config.maxRecordingMs) {
      this.currentState = VadState.END;
    }

    return this.currentState;
  }

  shouldStop(): boolean {
    return this.currentState === VadState.END;
  }

  /** Elapsed recording time in milliseconds (frame count / framesPerMs). */
  durationMs(): number {
    return this.toMs(this.totalFrames);
  }

  reset(): void {
    this.currentState = VadState.IDLE;
    this.totalFrames = 0;
    this.speechFrames = 0;
    this.silenceFrames = 0;
    this.framesPerMs = Math.max(1, Math.floor(this.config.sampleRate / 1000));
    this.energy = 0;
  }

  private toMs(frames: number): number {
    return Math.floor(frames / this.framesPerMs);
  }
}
