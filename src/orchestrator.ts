// Voice Satellite - Voice Orchestrator
// Central state machine for one satellite: wake word → gated capture → backend
// run → spoken response → wake word (or a follow-up turn).
//
// Every transition runs on a single consumer that drains the command queue in
// order. Producers (wake detector, capture callback, backend events, timers,
// the control server) only post small commands; payloads stay on the session.

import { v4 as uuidv4 } from "uuid";
import {
  MusicControl,
  OfflineCommand,
  PipelineCommandType,
  SessionMode,
  VadState,
} from "./types.js";
import type {
  AudioCapture,
  BackendEvent,
  Beeper,
  LocalMediaPlayer,
  LocalTimerCandidate,
  MediaState,
  PipelineCommand,
  PipelineSettings,
  Session,
  StatusLed,
  StatusPublisher,
  TtsPlayer,
  Watchdog,
} from "./types.js";
import type { ConversationClient } from "./conversation-client.js";
import { AudioArbiter } from "./audio-arbiter.js";
import { CommandQueue } from "./command-queue.js";
import { SpeechBoundaryDetector } from "./speech-detector.js";
import { TimerManager } from "./timer-manager.js";
import { reconcileTimerIntent, resolveTimerShortcut } from "./timer-shortcut.js";
import { delay } from "./utils/deferred.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const STATUS_TOPIC = "va_status";
export const RESPONSE_TOPIC = "va_response";
export const LIGHT_TOPIC = "light";

export const STATUS_READY = "SPREMAN";
export const STATUS_LISTENING = "SLUŠAM...";
export const STATUS_PROCESSING = "OBRAĐUJEM...";
export const STATUS_SPEAKING = "GOVORIM...";

/** Frames discarded at the start of every capture while the microphone settles */
const WARMUP_FRAMES = 2;

/** Minimum wake threshold change that restarts wake-word detection */
const WAKE_THRESHOLD_EPSILON = 0.01;

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  speechThreshold: 180,
  silenceDurationMs: 1800,
  minSpeechDurationMs: 200,
  maxRecordingMs: 7000,
  wakeThreshold: 0.5,
};

export interface OrchestratorConfig {
  responseTimeoutMs: number;
  /** Upper bound on a whole session; expiry recovers even if a session-ending command was dropped. */
  sessionDeadlineMs: number;
  followUpMaxRecordingMs: number;
  errorBackoffMs: number;
  pollIntervalMs: number;
  queueCapacity: number;
  stopTimeoutMs: number;
  captureRetryDelayMs: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  responseTimeoutMs: 15_000,
  sessionDeadlineMs: 60_000,
  followUpMaxRecordingMs: 7000,
  errorBackoffMs: 2000,
  pollIntervalMs: 1000,
  queueCapacity: 10,
  stopTimeoutMs: 500,
  captureRetryDelayMs: 200,
};

// ─── Beeps ──────────────────────────────────────────────────────────────────────

interface BeepPattern {
  frequencyHz: number;
  durationMs: number;
  volume: number;
  repeat: number;
  gapMs: number;
}

export const BEEPS = {
  wake: { frequencyHz: 800, durationMs: 120, volume: 40, repeat: 1, gapMs: 0 },
  offline: { frequencyHz: 1000, durationMs: 100, volume: 80, repeat: 1, gapMs: 0 },
  confirm: { frequencyHz: 1200, durationMs: 100, volume: 90, repeat: 2, gapMs: 120 },
  error: { frequencyHz: 400, durationMs: 300, volume: 60, repeat: 1, gapMs: 0 },
  timer: { frequencyHz: 1000, durationMs: 500, volume: 100, repeat: 5, gapMs: 500 },
} as const satisfies Record<string, BeepPattern>;

// ─── Collaborators ──────────────────────────────────────────────────────────────

/** The part of the conversation client the orchestrator drives. */
export type ConversationTransport = Pick<
  ConversationClient,
  | "setHandlers"
  | "connect"
  | "disconnect"
  | "isReady"
  | "startRun"
  | "runText"
  | "sendText"
  | "abandonRun"
  | "streamAudio"
  | "endAudio"
  | "fetchTtsAudio"
>;

export interface OrchestratorObserver {
  onWakeWord?: () => void;
  onVadEvent?: (state: VadState) => void;
  onIntent?: (name: string, slotsJson: string) => void;
  onTranscript?: (text: string) => void;
  onTtsComplete?: () => void;
  onOfflineCommand?: (command: number) => void;
  onModeChange?: (mode: SessionMode) => void;
}

export interface VoiceOrchestratorDeps {
  client: ConversationTransport;
  capture: AudioCapture;
  tts: TtsPlayer;
  media: LocalMediaPlayer;
  led: StatusLed;
  publisher: StatusPublisher;
  beeper: Beeper;
  watchdog?: Watchdog;
  timers?: TimerManager;
  settings?: Partial<PipelineSettings>;
  config?: Partial<OrchestratorConfig>;
  logger?: Logger;
  /** Waits between beeps and before error recovery; replaced in tests. */
  sleep?: (ms: number) => Promise<void>;
}

export interface OrchestratorSnapshot {
  running: boolean;
  mode: SessionMode;
  sessionId: string | null;
  followUp: boolean;
  backendConnected: boolean;
  queueDepth: number;
  droppedCommands: number;
}

// ─── Orchestrator ───────────────────────────────────────────────────────────────

export class VoiceOrchestrator {
  private readonly client: ConversationTransport;
  private readonly capture: AudioCapture;
  private readonly tts: TtsPlayer;
  private readonly media: LocalMediaPlayer;
  private readonly led: StatusLed;
  private readonly publisher: StatusPublisher;
  private readonly beeper: Beeper;
  private readonly watchdog: Watchdog | null;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly config: OrchestratorConfig;

  readonly timers: TimerManager;
  private readonly arbiter: AudioArbiter;
  private readonly queue: CommandQueue;
  private readonly detector: SpeechBoundaryDetector;

  private settings: PipelineSettings;
  private observer: OrchestratorObserver = {};

  private running = false;
  private loop: Promise<void> | null = null;
  private mode: SessionMode = SessionMode.WAKE_IDLE;

  private session: Session | null = null;
  /** Incremented per session; carried as `data` so stale commands can be told apart. */
  private sessionSeq = 0;
  private wakePending = false;
  private warmupRemaining = 0;
  private conversationId: string | null = null;
  private responseTimer: ReturnType<typeof setTimeout> | null = null;
  private deadlineTimer: ReturnType<typeof setTimeout> | null = null;

  /** Local timer started for the current backend run, kept until run-end for reconciliation. */
  private shortcut: { timerId: string; seconds: number } | null = null;
  private lastCandidate: LocalTimerCandidate | null = null;

  private nextTextId = 1;
  private pendingTexts = new Map<number, string>();

  constructor(deps: VoiceOrchestratorDeps) {
    this.client = deps.client;
    this.capture = deps.capture;
    this.tts = deps.tts;
    this.media = deps.media;
    this.led = deps.led;
    this.publisher = deps.publisher;
    this.beeper = deps.beeper;
    this.watchdog = deps.watchdog ?? null;
    this.logger = deps.logger ?? createConsoleLogger("Orchestrator");
    this.sleep = deps.sleep ?? delay;
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...deps.config };
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...deps.settings };

    this.timers = deps.timers ?? new TimerManager({ logger: this.logger });
    this.arbiter = new AudioArbiter({
      capture: this.capture,
      media: this.media,
      logger: this.logger,
      stopTimeoutMs: this.config.stopTimeoutMs,
    });
    this.queue = new CommandQueue(this.config.queueCapacity);
    this.detector = new SpeechBoundaryDetector({
      speechThreshold: this.settings.speechThreshold,
      silenceDurationMs: this.settings.silenceDurationMs,
      minSpeechDurationMs: this.settings.minSpeechDurationMs,
      maxRecordingMs: this.settings.maxRecordingMs,
    });

    this.timers.setFinishedHandler((timer) => {
      this.logger.info(`Timer "${timer.name}" finished`);
      this.post(PipelineCommandType.TIMER_BEEP, 0);
    });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Connect to the backend, enter wake-word mode and start the consumer.
   * An unreachable backend is not fatal: the client keeps reconnecting.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    this.client.setHandlers({
      onEvent: (event) => this.handleBackendEvent(event),
      onConnectionChange: (connected) => this.handleConnectionChange(connected),
    });

    try {
      await this.client.connect();
    } catch (err) {
      this.logger.warn(`Backend not reachable yet (${errorMessage(err)}); retrying in the background`);
    }

    this.post(PipelineCommandType.RESUME_WWD, 0);
    this.loop = this.runLoop();
  }

  /** Stop the consumer, any capture and playback, and disconnect. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.queue.clear();
    await this.loop;
    this.loop = null;

    this.clearResponseTimer();
    this.clearDeadlineTimer();
    this.tts.stop();
    this.session = null;
    this.pendingTexts.clear();
    await this.arbiter.releaseOwner("tts_playback");
    const stopped = await this.arbiter.stopAndWait(this.config.stopTimeoutMs);
    if (stopped === "timeout") {
      this.logger.warn("Capture did not stop cleanly during shutdown");
    }
    await this.client.disconnect();
    this.logger.info("Orchestrator stopped");
  }

  /** Single registration slot; a later call replaces the earlier observer. */
  setObserver(observer: OrchestratorObserver): void {
    this.observer = observer;
  }

  get currentMode(): SessionMode {
    return this.mode;
  }

  get currentSettings(): Readonly<PipelineSettings> {
    return this.settings;
  }

  snapshot(): OrchestratorSnapshot {
    return {
      running: this.running,
      mode: this.mode,
      sessionId: this.session?.id ?? null,
      followUp: this.session?.followUp ?? false,
      backendConnected: this.client.isReady,
      queueDepth: this.queue.size,
      droppedCommands: this.queue.droppedCount,
    };
  }

  // ─── Producers ──────────────────────────────────────────────────────────────

  /** Report a detected wake word. Ignored while a session is pending or active. */
  notifyWakeWord(): boolean {
    if (this.session || this.wakePending) {
      this.logger.info("Wake word ignored: session already in progress");
      return false;
    }
    this.notify((o) => o.onWakeWord?.());
    this.wakePending = this.post(PipelineCommandType.WAKE_DETECTED, 0);
    return this.wakePending;
  }

  notifyOfflineCommand(command: number): boolean {
    return this.post(PipelineCommandType.OFFLINE_CMD, command);
  }

  triggerAlarm(alarmId: number): boolean {
    return this.post(PipelineCommandType.ALARM_BEEP, alarmId);
  }

  musicControl(action: MusicControl): boolean {
    return this.post(PipelineCommandType.MUSIC_CONTROL, action);
  }

  /** Local media changed state outside the orchestrator (e.g. playlist ended). */
  notifyMediaState(state: MediaState): boolean {
    if (state === "playing") return this.post(PipelineCommandType.STOP_WWD, 0);
    if (state === "stopped") return this.post(PipelineCommandType.RESUME_WWD, 0);
    return false;
  }

  /** Run text through the backend and speak its answer. */
  speakText(text: string): boolean {
    const trimmed = text.trim();
    if (trimmed.length === 0) return false;
    const id = this.nextTextId++;
    this.pendingTexts.set(id, trimmed);
    const queued = this.post(PipelineCommandType.SPEAK_TEXT, id);
    if (!queued) this.pendingTexts.delete(id);
    return queued;
  }

  /**
   * Send text to the conversation agent without a pipeline run. The answer is
   * published on the response topic when it arrives.
   */
  sendConversationText(text: string): boolean {
    const trimmed = text.trim();
    if (trimmed.length === 0) return false;
    return this.client.sendText(trimmed) !== null;
  }

  /**
   * Apply new thresholds. VAD changes take effect on the next frame; a wake
   * threshold change restarts wake-word detection.
   */
  updateConfig(partial: Partial<PipelineSettings>): PipelineSettings {
    const previous = this.settings;
    this.settings = { ...previous, ...partial };
    this.detector.configure({
      speechThreshold: this.settings.speechThreshold,
      silenceDurationMs: this.settings.silenceDurationMs,
      minSpeechDurationMs: this.settings.minSpeechDurationMs,
    });
    if (Math.abs(this.settings.wakeThreshold - previous.wakeThreshold) > WAKE_THRESHOLD_EPSILON) {
      this.post(PipelineCommandType.RESTART_WWD, 0);
    }
    return { ...this.settings };
  }

  // ─── Consumer ───────────────────────────────────────────────────────────────

  private async runLoop(): Promise<void> {
    this.logger.info("Command consumer started");
    while (this.running) {
      const command = await this.queue.receive(this.config.pollIntervalMs);
      this.watchdog?.feed();
      if (!this.running) continue;
      if (command) {
        await this.dispatch(command);
      } else if (!this.session && !this.wakePending) {
        await this.resumeOnIdle();
      }
    }
    this.logger.info("Command consumer stopped");
  }

  /** Idle poll: brings wake word back if the RESUME_WWD that should have done so was dropped. */
  private async resumeOnIdle(): Promise<void> {
    try {
      await this.resumeWakeWord();
    } catch (err) {
      this.logger.warn(`Idle resume failed: ${errorMessage(err)}`);
    }
  }

  private async dispatch(command: PipelineCommand): Promise<void> {
    try {
      await this.handleCommand(command);
    } catch (err) {
      await this.recover(`${command.type} failed: ${errorMessage(err)}`);
    }
  }

  private async handleCommand(command: PipelineCommand): Promise<void> {
    switch (command.type) {
      case PipelineCommandType.WAKE_DETECTED:
        this.wakePending = false;
        await this.beginSession(false);
        break;
      case PipelineCommandType.START_FOLLOWUP_VAD:
        await this.beginSession(true);
        break;
      case PipelineCommandType.SPEECH_END:
        await this.handleSpeechEnd(command.data);
        break;
      case PipelineCommandType.PLAY_RESPONSE:
        await this.playResponse(command.data);
        break;
      case PipelineCommandType.TTS_COMPLETE:
        await this.completeResponse(command.data);
        break;
      case PipelineCommandType.RUN_FINISHED:
        this.handleRunFinished(command.data);
        break;
      case PipelineCommandType.SESSION_ERROR:
        if (this.current(command.data)) {
          await this.recover("Backend reported an error");
        }
        break;
      case PipelineCommandType.RESPONSE_TIMEOUT:
        if (this.current(command.data)?.mode === SessionMode.PROCESSING) {
          await this.recover(`No backend response within ${this.config.responseTimeoutMs}ms`);
        }
        break;
      case PipelineCommandType.SESSION_DEADLINE:
        if (this.current(command.data)) {
          await this.recover(`Session exceeded ${this.config.sessionDeadlineMs}ms`);
        }
        break;
      case PipelineCommandType.SPEAK_TEXT:
        await this.beginTextSession(command.data);
        break;
      case PipelineCommandType.RESUME_WWD:
        await this.resumeWakeWord();
        break;
      case PipelineCommandType.STOP_WWD:
        await this.stopWakeWord();
        break;
      case PipelineCommandType.RESTART_WWD:
        await this.stopWakeWord();
        await this.resumeWakeWord();
        break;
      case PipelineCommandType.OFFLINE_CMD:
        await this.handleOfflineCommand(command.data);
        break;
      case PipelineCommandType.MUSIC_CONTROL:
        await this.handleMusicControl(command.data);
        break;
      case PipelineCommandType.TIMER_BEEP:
      case PipelineCommandType.ALARM_BEEP:
        await this.playBeep(BEEPS.timer);
        this.post(PipelineCommandType.RESUME_WWD, 0);
        break;
      case PipelineCommandType.CONFIRM_BEEP:
        await this.playBeep(BEEPS.confirm);
        if (this.session?.localShortcutTaken && this.session.mode !== SessionMode.SPEAKING) {
          await this.finishSession(false);
        }
        this.post(PipelineCommandType.RESUME_WWD, 0);
        break;
      case PipelineCommandType.ERROR_BEEP:
        this.led.set("error");
        await this.playBeep(BEEPS.error);
        break;
      case PipelineCommandType.ERROR_RESUME:
        await this.sleep(this.config.errorBackoffMs);
        await this.resumeWakeWord();
        break;
    }
  }

  // ─── Sessions ───────────────────────────────────────────────────────────────

  private async beginSession(followUp: boolean): Promise<void> {
    if (this.session) {
      this.logger.warn("Session already active; ignoring new turn");
      return;
    }

    const session = this.createSession(followUp);
    this.setMode(SessionMode.LISTENING);
    this.led.set("listening");
    this.publisher.publish(STATUS_TOPIC, STATUS_LISTENING);
    if (!followUp) {
      await this.playBeep(BEEPS.wake);
    }

    await this.acquireCapture();

    const requestId = this.client.startRun(this.conversationId);
    if (requestId === null) {
      throw new Error("Backend not connected");
    }

    this.detector.reset();
    this.detector.configure({
      maxRecordingMs: followUp ? this.config.followUpMaxRecordingMs : this.settings.maxRecordingMs,
    });
    this.warmupRemaining = WARMUP_FRAMES;
    const seq = this.sessionSeq;
    this.capture.start((frame) => this.handleFrame(seq, frame));
    this.logger.info(`Session ${session.id} listening${followUp ? " (follow-up)" : ""}`);
  }

  private async beginTextSession(textId: number): Promise<void> {
    const text = this.pendingTexts.get(textId);
    this.pendingTexts.delete(textId);
    if (text === undefined) return;
    if (this.session) {
      this.logger.warn("Session active; dropping text request");
      return;
    }

    const stopped = await this.arbiter.stopAndWait(this.config.stopTimeoutMs);
    if (stopped === "timeout") {
      throw new Error("Capture did not stop for text request");
    }

    const session = this.createSession(false);
    session.transcript = text;
    if (this.client.runText(text, this.conversationId) === null) {
      throw new Error("Backend not connected");
    }
    session.speechEnded = true;
    this.enterProcessing(this.sessionSeq);
  }

  private createSession(followUp: boolean): Session {
    this.sessionSeq++;
    this.shortcut = null;
    this.lastCandidate = null;
    const session: Session = {
      id: uuidv4(),
      handlerId: null,
      mode: SessionMode.LISTENING,
      followUp,
      followUpPending: false,
      localShortcutTaken: false,
      transcript: "",
      responseText: "",
      pendingAudioUrl: null,
      speechEnded: false,
      startedAt: new Date(),
    };
    this.session = session;
    this.armDeadline(this.sessionSeq, this.config.sessionDeadlineMs);
    return session;
  }

  /** Re-arms shortly after a failed post so a full queue cannot strand the session. */
  private armDeadline(seq: number, ms: number): void {
    this.clearDeadlineTimer();
    this.deadlineTimer = setTimeout(() => {
      this.deadlineTimer = null;
      if (!this.current(seq)) return;
      if (!this.post(PipelineCommandType.SESSION_DEADLINE, seq)) {
        this.armDeadline(seq, this.config.pollIntervalMs);
      }
    }, ms);
  }

  /** Claim the microphone, retrying once after a short pause. */
  private async acquireCapture(): Promise<void> {
    let result = await this.arbiter.requestOwner("gated_capture", this.config.stopTimeoutMs);
    if (result !== "ok") {
      this.logger.warn(`Microphone ${result}; retrying`);
      await this.sleep(this.config.captureRetryDelayMs);
      result = await this.arbiter.requestOwner("gated_capture", this.config.stopTimeoutMs);
    }
    if (result !== "ok") {
      throw new Error(`Microphone unavailable (${result})`);
    }
  }

  private handleFrame(seq: number, frame: Buffer): void {
    const session = this.current(seq);
    if (!session || session.speechEnded) return;
    if (this.warmupRemaining > 0) {
      this.warmupRemaining--;
      return;
    }

    const previous = this.detector.state;
    const state = this.detector.processFrame(frame);
    if (state !== previous) {
      this.notify((o) => o.onVadEvent?.(state));
    }
    this.client.streamAudio(frame);

    if (state === VadState.END) {
      session.speechEnded = true;
      this.post(PipelineCommandType.SPEECH_END, seq);
    }
  }

  private async handleSpeechEnd(seq: number): Promise<void> {
    const session = this.current(seq);
    if (!session || session.mode !== SessionMode.LISTENING) return;

    session.speechEnded = true;
    this.client.endAudio();
    const stopped = await this.arbiter.stopAndWait(this.config.stopTimeoutMs);
    if (stopped === "timeout") {
      this.logger.warn("Capture did not stop after end of speech");
    }
    this.enterProcessing(seq);
  }

  private enterProcessing(seq: number): void {
    const session = this.current(seq);
    if (!session) return;
    this.setMode(SessionMode.PROCESSING);
    this.led.set("processing");
    this.publisher.publish(STATUS_TOPIC, STATUS_PROCESSING);

    if (!session.localShortcutTaken) {
      this.clearResponseTimer();
      this.responseTimer = setTimeout(() => {
        this.responseTimer = null;
        this.post(PipelineCommandType.RESPONSE_TIMEOUT, seq);
      }, this.config.responseTimeoutMs);
    }
  }

  private async playResponse(seq: number): Promise<void> {
    const session = this.current(seq);
    if (!session) return;

    const owned = await this.arbiter.requestOwner("tts_playback", this.config.stopTimeoutMs);
    if (owned !== "ok") {
      throw new Error(`Audio path unavailable for playback (${owned})`);
    }

    this.setMode(SessionMode.SPEAKING);
    this.led.set("speaking");
    this.publisher.publish(STATUS_TOPIC, STATUS_SPEAKING);
    if (session.responseText) {
      this.publisher.publish(RESPONSE_TOPIC, session.responseText);
    }

    const url = session.pendingAudioUrl;
    if (!url) {
      this.post(PipelineCommandType.TTS_COMPLETE, seq);
      return;
    }

    this.tts.start(() => this.post(PipelineCommandType.TTS_COMPLETE, seq));
    const bytes = await this.client.fetchTtsAudio(url, (chunk) => this.tts.feed(chunk));
    this.logger.info(`Response audio streamed (${bytes} bytes)`);
  }

  private async completeResponse(seq: number): Promise<void> {
    const session = this.current(seq);
    if (!session) return;

    await this.arbiter.releaseOwner("tts_playback");
    this.notify((o) => o.onTtsComplete?.());

    // Media resumed after the response owns the path again; no follow-up over music
    const followUp = session.followUpPending && this.arbiter.owner !== "local_media";
    await this.finishSession(false);
    this.post(followUp ? PipelineCommandType.START_FOLLOWUP_VAD : PipelineCommandType.RESUME_WWD, 0);
  }

  private handleRunFinished(seq: number): void {
    const session = this.current(seq);
    if (!session || session.localShortcutTaken) return;
    if (session.mode !== SessionMode.LISTENING && session.mode !== SessionMode.PROCESSING) return;

    this.logger.info("Run ended without a spoken response");
    if (session.responseText) {
      this.publisher.publish(RESPONSE_TOPIC, session.responseText);
    }
    this.finishSessionNow();
    this.post(PipelineCommandType.RESUME_WWD, 0);
  }

  /** End the session, releasing whatever it holds. */
  private async finishSession(abandonRun: boolean): Promise<void> {
    if (abandonRun) {
      this.client.abandonRun();
    }
    this.finishSessionNow();
    const stopped = await this.arbiter.stopAndWait(this.config.stopTimeoutMs);
    if (stopped === "timeout") {
      this.logger.warn("Capture did not stop at end of session");
    }
  }

  private finishSessionNow(): void {
    this.clearResponseTimer();
    this.clearDeadlineTimer();
    if (this.session) {
      const elapsed = Date.now() - this.session.startedAt.getTime();
      this.logger.info(`Session ${this.session.id} finished after ${elapsed}ms`);
    }
    this.session = null;
    this.setMode(SessionMode.WAKE_IDLE);
  }

  /** Any failure: drop the session, then error beep and a delayed return to wake-word mode. */
  private async recover(reason: string): Promise<void> {
    this.logger.error(reason);
    try {
      if (this.session) {
        this.tts.stop();
        await this.arbiter.releaseOwner("tts_playback");
        await this.finishSession(true);
      }
    } catch (err) {
      this.logger.error(`Cleanup after failure failed: ${errorMessage(err)}`);
      this.finishSessionNow();
    }
    this.post(PipelineCommandType.ERROR_BEEP, 0);
    this.post(PipelineCommandType.ERROR_RESUME, 0);
  }

  // ─── Backend Events ─────────────────────────────────────────────────────────

  private handleBackendEvent(event: BackendEvent): void {
    switch (event.type) {
      case "run-start":
        if (this.session) this.session.handlerId = event.handlerId;
        break;

      case "stt-end":
        this.handleTranscript(event.text);
        break;

      case "intent-end":
        this.handleIntent(event.name, event.slotsJson, event.responseSpeech, event.conversationId);
        break;

      case "tts-end": {
        const session = this.session;
        if (!session || session.localShortcutTaken) return;
        this.clearResponseTimer();
        if (event.text) session.responseText = event.text;
        session.pendingAudioUrl = event.audioUrl;
        session.followUpPending = session.responseText.trimEnd().endsWith("?");
        this.post(PipelineCommandType.PLAY_RESPONSE, this.sessionSeq);
        break;
      }

      case "run-end":
        this.shortcut = null;
        if (this.session) this.post(PipelineCommandType.RUN_FINISHED, this.sessionSeq);
        break;

      case "error":
        this.logger.error(`Backend error ${event.code}: ${event.message}`);
        if (this.session) this.post(PipelineCommandType.SESSION_ERROR, this.sessionSeq);
        break;

      case "conversation-response":
        if (event.conversationId) this.conversationId = event.conversationId;
        this.publisher.publish(RESPONSE_TOPIC, event.speech);
        break;
    }
  }

  private handleTranscript(text: string): void {
    const session = this.session;
    if (!session) return;
    session.transcript = text;
    this.notify((o) => o.onTranscript?.(text));

    const candidate = resolveTimerShortcut(text);
    this.lastCandidate = candidate;
    if (!candidate.valid) return;

    const timer = this.timers.start(candidate.seconds);
    if (!timer) return;

    this.logger.info(`Local timer shortcut: ${candidate.seconds}s`);
    session.localShortcutTaken = true;
    this.shortcut = { timerId: timer.id, seconds: candidate.seconds };
    this.clearResponseTimer();
    if (session.mode === SessionMode.LISTENING) {
      this.post(PipelineCommandType.SPEECH_END, this.sessionSeq);
    }
    this.post(PipelineCommandType.CONFIRM_BEEP, 0);
  }

  private handleIntent(name: string, slotsJson: string, speech: string, conversationId: string | null): void {
    this.notify((o) => o.onIntent?.(name, slotsJson));
    if (conversationId) this.conversationId = conversationId;

    const session = this.session;
    if (session && speech) session.responseText = speech;

    const result = reconcileTimerIntent({
      localTaken: this.shortcut !== null,
      localSeconds: this.shortcut?.seconds ?? 0,
      candidate: this.lastCandidate,
      intentName: name,
      slotsJson,
    });

    if (result.action === "adjust" && this.shortcut) {
      this.timers.update(this.shortcut.timerId, result.seconds);
      this.shortcut.seconds = result.seconds;
    }

    let suppress = result.suppressBackendSpeech;
    if (result.action === "start") {
      const timer = this.timers.start(result.seconds);
      if (!timer) {
        // The backend's own answer is all the user will hear
        this.logger.warn(`Timer for ${result.seconds}s not started (${this.timers.count} running)`);
        suppress = false;
      } else if (result.confirmLocally) {
        this.shortcut = { timerId: timer.id, seconds: result.seconds };
        this.post(PipelineCommandType.CONFIRM_BEEP, 0);
      }
    }

    if (suppress && session) {
      session.localShortcutTaken = true;
      this.clearResponseTimer();
    }
  }

  private handleConnectionChange(connected: boolean): void {
    this.logger.info(`Backend ${connected ? "connected" : "disconnected"}`);
    if (!connected && this.session) {
      this.post(PipelineCommandType.SESSION_ERROR, this.sessionSeq);
    }
  }

  // ─── Wake Word ──────────────────────────────────────────────────────────────

  private async resumeWakeWord(): Promise<void> {
    if (this.session) return;
    if (this.media.state !== "stopped") {
      this.logger.info(`Wake word stays off while media is ${this.media.state}`);
      return;
    }
    if (this.arbiter.owner === "wake_word" && this.capture.isRunning) {
      return;
    }

    if (this.arbiter.owner === "local_media") {
      await this.arbiter.releaseOwner("local_media");
    }
    const result = await this.arbiter.requestOwner("wake_word", this.config.stopTimeoutMs);
    if (result !== "ok") {
      throw new Error(`Cannot resume wake word (${result})`);
    }

    this.capture.startWakeMode(() => this.notifyWakeWord(), { threshold: this.settings.wakeThreshold });
    this.setMode(SessionMode.WAKE_IDLE);
    this.led.set("idle");
    this.publisher.publish(STATUS_TOPIC, STATUS_READY);
  }

  private async stopWakeWord(): Promise<void> {
    if (this.arbiter.owner !== "wake_word") return;
    const stopped = await this.arbiter.stopAndWait(this.config.stopTimeoutMs);
    if (stopped === "timeout") {
      throw new Error("Wake word capture did not stop");
    }
  }

  // ─── Offline Commands and Media ─────────────────────────────────────────────

  private async handleOfflineCommand(command: number): Promise<void> {
    if (this.session) {
      this.logger.warn(`Offline command ${command} ignored during a session`);
      return;
    }

    switch (command) {
      case OfflineCommand.LIGHT_ON:
        this.publisher.publish(LIGHT_TOPIC, "ON");
        break;
      case OfflineCommand.LIGHT_OFF:
        this.publisher.publish(LIGHT_TOPIC, "OFF");
        break;
      case OfflineCommand.MUSIC_PLAY: {
        const owned = await this.arbiter.requestOwner("local_media", this.config.stopTimeoutMs);
        if (owned !== "ok") {
          throw new Error(`Cannot start media (${owned})`);
        }
        await this.media.play();
        break;
      }
      case OfflineCommand.MUSIC_STOP:
        await this.media.stop();
        await this.arbiter.releaseOwner("local_media");
        break;
      case OfflineCommand.MUSIC_NEXT:
        await this.media.next();
        break;
      case OfflineCommand.MUSIC_PREVIOUS:
        await this.media.previous();
        break;
      default:
        this.logger.warn(`Unknown offline command ${command}`);
        break;
    }

    await this.playBeep(BEEPS.offline);
    this.notify((o) => o.onOfflineCommand?.(command));
    this.post(PipelineCommandType.RESUME_WWD, 0);
  }

  private async handleMusicControl(action: number): Promise<void> {
    switch (action) {
      case MusicControl.PAUSE:
        await this.media.pause();
        break;
      case MusicControl.RESUME:
        await this.media.resume();
        break;
      case MusicControl.STOP:
        await this.media.stop();
        await this.arbiter.releaseOwner("local_media");
        this.post(PipelineCommandType.RESUME_WWD, 0);
        break;
      default:
        this.logger.warn(`Unknown music control ${action}`);
        break;
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private async playBeep(pattern: BeepPattern): Promise<void> {
    for (let i = 0; i < pattern.repeat; i++) {
      await this.beeper.play(pattern.frequencyHz, pattern.durationMs, pattern.volume);
      if (i < pattern.repeat - 1 && pattern.gapMs > 0) {
        await this.sleep(pattern.gapMs);
      }
    }
  }

  /** The active session if `seq` still identifies it. */
  private current(seq: number): Session | null {
    return this.session && seq === this.sessionSeq ? this.session : null;
  }

  private setMode(mode: SessionMode): void {
    if (this.session) this.session.mode = mode;
    if (this.mode === mode) return;
    this.mode = mode;
    this.notify((o) => o.onModeChange?.(mode));
  }

  private post(type: PipelineCommandType, data: number): boolean {
    const queued = this.queue.send({ type, data });
    if (!queued) {
      this.logger.warn(`Command queue full; dropped ${type}`);
    }
    return queued;
  }

  private clearDeadlineTimer(): void {
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = null;
    }
  }

  private clearResponseTimer(): void {
    if (this.responseTimer) {
      clearTimeout(this.responseTimer);
      this.responseTimer = null;
    }
  }

  private notify(call: (observer: OrchestratorObserver) => void): void {
    try {
      call(this.observer);
    } catch (err) {
      this.logger.error(`Observer failed: ${errorMessage(err)}`);
    }
  }
}
