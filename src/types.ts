// Voice Satellite - Shared TypeScript interfaces and types
// Session modes, pipeline commands, backend events and the collaborator
// boundaries the orchestrator drives.

// ─── Session Mode State Machine ─────────────────────────────────────────────────

export enum SessionMode {
  WAKE_IDLE = "wake_idle",
  LISTENING = "listening",
  PROCESSING = "processing",
  SPEAKING = "speaking",
}

// ─── Speech Boundary Detector ───────────────────────────────────────────────────

export enum VadState {
  IDLE = "idle",
  LISTENING = "listening",
  SPEAKING = "speaking",
  /** Transient: collapsed into END within the same frame, never returned. */
  SILENCE = "silence",
  END = "end",
}

// ─── Pipeline Commands ──────────────────────────────────────────────────────────

export enum PipelineCommandType {
  WAKE_DETECTED = "wake_detected",
  OFFLINE_CMD = "offline_cmd",
  RESUME_WWD = "resume_wwd",
  STOP_WWD = "stop_wwd",
  RESTART_WWD = "restart_wwd",
  START_FOLLOWUP_VAD = "start_followup_vad",
  TIMER_BEEP = "timer_beep",
  ALARM_BEEP = "alarm_beep",
  CONFIRM_BEEP = "confirm_beep",
  ERROR_BEEP = "error_beep",
  ERROR_RESUME = "error_resume",
  MUSIC_CONTROL = "music_control",
  // Internal transitions posted by the orchestrator's own event handlers
  SPEECH_END = "speech_end",
  PLAY_RESPONSE = "play_response",
  TTS_COMPLETE = "tts_complete",
  SESSION_ERROR = "session_error",
  RESPONSE_TIMEOUT = "response_timeout",
  RUN_FINISHED = "run_finished",
  SPEAK_TEXT = "speak_text",
  SESSION_DEADLINE = "session_deadline",
}

/**
 * Small fire-and-forget command. Large payloads (audio, JSON) stay on the
 * orchestrator's session object and are never carried here.
 */
export interface PipelineCommand {
  type: PipelineCommandType;
  data: number;
}

/** Pre-classified offline (on-device recognised) command ids. */
export enum OfflineCommand {
  LIGHT_ON = 0,
  LIGHT_OFF = 1,
  MUSIC_PLAY = 2,
  MUSIC_STOP = 3,
  MUSIC_NEXT = 4,
  MUSIC_PREVIOUS = 5,
}

/** Data values carried by MUSIC_CONTROL. */
export enum MusicControl {
  PAUSE = 0,
  RESUME = 1,
  STOP = 2,
}

// ─── Backend Events ─────────────────────────────────────────────────────────────

export type BackendEvent =
  | { type: "run-start"; handlerId: number | null }
  | { type: "stt-end"; text: string }
  | {
      type: "intent-end";
      name: string;
      slotsJson: string;
      responseSpeech: string;
      conversationId: string | null;
    }
  | { type: "tts-end"; text: string; audioUrl: string | null }
  | { type: "run-end" }
  | { type: "error"; code: string; message: string }
  | { type: "conversation-response"; speech: string; conversationId: string | null };

// ─── Pipeline Settings ──────────────────────────────────────────────────────────

/** Runtime-tunable thresholds, persisted by the settings store. */
export interface PipelineSettings {
  speechThreshold: number;
  silenceDurationMs: number;
  minSpeechDurationMs: number;
  maxRecordingMs: number;
  /** Wake-word detection threshold, 0..1. */
  wakeThreshold: number;
}

// ─── Session ────────────────────────────────────────────────────────────────────

/** One wake-to-response interaction. At most one exists at a time. */
export interface Session {
  id: string;
  /** Backend run handler id, null until run-start. */
  handlerId: number | null;
  mode: SessionMode;
  followUp: boolean;
  followUpPending: boolean;
  localShortcutTaken: boolean;
  transcript: string;
  responseText: string;
  pendingAudioUrl: string | null;
  speechEnded: boolean;
  startedAt: Date;
}

export interface LocalTimerCandidate {
  seconds: number;
  valid: boolean;
}

// ─── Audio Path Ownership ───────────────────────────────────────────────────────

export type AudioOwner = "wake_word" | "gated_capture" | "tts_playback" | "local_media";

export type OwnershipResult = "ok" | "busy" | "timeout";

export type StopResult = "ok" | "timeout";

// ─── Deferred ───────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

// ─── Collaborators ──────────────────────────────────────────────────────────────

export interface WakeModeOptions {
  /** Wake-word detection threshold, 0..1. */
  threshold: number;
}

/**
 * Microphone capture driver. One worker at a time: either gated capture
 * (frames delivered to `onFrame`) or wake-word mode (detector runs internally).
 */
export interface AudioCapture {
  readonly isRunning: boolean;
  start(onFrame: (frame: Buffer) => void): void;
  startWakeMode(onWake: () => void, options: WakeModeOptions): void;
  /** Resolves true once the worker has exited, false on timeout. */
  stopAndWait(timeoutMs: number): Promise<boolean>;
}

/** Streaming TTS player. `feed(null)` marks end of audio. */
export interface TtsPlayer {
  start(onComplete: () => void): void;
  feed(chunk: Buffer | null): void;
  stop(): void;
}

export type MediaState = "stopped" | "playing" | "paused";

export interface LocalMediaPlayer {
  readonly state: MediaState;
  play(): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  stop(): Promise<void>;
  next(): Promise<void>;
  previous(): Promise<void>;
}

export type LedState = "idle" | "listening" | "processing" | "speaking" | "error";

export interface StatusLed {
  set(state: LedState): void;
}

export interface StatusPublisher {
  publish(topic: string, value: string): void;
}

export interface Beeper {
  play(frequencyHz: number, durationMs: number, volume: number): Promise<void>;
}

export interface Watchdog {
  feed(): void;
}
