// Unit tests for VoiceOrchestrator
// Drives the full wake → capture → backend → response cycle through in-process fakes.

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  VoiceOrchestrator,
  type ConversationTransport,
  type VoiceOrchestratorDeps,
} from "./orchestrator.js";
import type { ConversationHandlers, EndAudioResult, StreamResult } from "./conversation-client.js";
import { TimerManager } from "./timer-manager.js";
import { MusicControl, OfflineCommand, SessionMode, VadState } from "./types.js";
import type {
  AudioCapture,
  BackendEvent,
  Beeper,
  LedState,
  LocalMediaPlayer,
  MediaState,
  StatusLed,
  StatusPublisher,
  TtsPlayer,
  WakeModeOptions,
} from "./types.js";

// ─── Fakes ──────────────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

class FakeClient implements ConversationTransport {
  handlers: ConversationHandlers = {};
  isReady = true;
  runs: Array<string | null | undefined> = [];
  textRuns: string[] = [];
  sentTexts: string[] = [];
  streamed: Buffer[] = [];
  endAudioCalls = 0;
  abandoned = 0;
  disconnected = false;
  fetched: string[] = [];

  setHandlers(handlers: ConversationHandlers): void {
    this.handlers = handlers;
  }
  async connect(): Promise<void> {}
  async disconnect(): Promise<void> {
    this.disconnected = true;
  }
  startRun(conversationId?: string | null): number | null {
    this.runs.push(conversationId);
    return this.runs.length;
  }
  runText(text: string): number | null {
    this.textRuns.push(text);
    return 100 + this.textRuns.length;
  }
  sendText(text: string): number | null {
    this.sentTexts.push(text);
    return 200 + this.sentTexts.length;
  }
  abandonRun(): void {
    this.abandoned++;
  }
  streamAudio(pcm: Buffer): StreamResult {
    this.streamed.push(pcm);
    return "sent";
  }
  endAudio(): EndAudioResult {
    this.endAudioCalls++;
    return "sent";
  }
  async fetchTtsAudio(url: string, sink: (chunk: Buffer | null) => void): Promise<number> {
    this.fetched.push(url);
    sink(Buffer.from([1, 2, 3, 4]));
    sink(null);
    return 4;
  }

  emit(event: BackendEvent): void {
    this.handlers.onEvent?.(event);
  }
}

class FakeCapture implements AudioCapture {
  mode: "wake" | "gated" | null = null;
  wakeThresholds: number[] = [];
  private onFrame: ((frame: Buffer) => void) | null = null;
  private onWake: (() => void) | null = null;

  get isRunning(): boolean {
    return this.mode !== null;
  }
  start(onFrame: (frame: Buffer) => void): void {
    this.mode = "gated";
    this.onFrame = onFrame;
  }
  startWakeMode(onWake: () => void, options: WakeModeOptions): void {
    this.mode = "wake";
    this.onWake = onWake;
    this.wakeThresholds.push(options.threshold);
  }
  async stopAndWait(): Promise<boolean> {
    this.mode = null;
    this.onFrame = null;
    this.onWake = null;
    return true;
  }

  push(frame: Buffer): void {
    this.onFrame?.(frame);
  }
  wake(): void {
    this.onWake?.();
  }
}

/**
 * Completes playback as soon as the end-of-audio marker arrives, or on
 * finish() when autoComplete is off.
 */
class FakeTts implements TtsPlayer {
  starts = 0;
  stops = 0;
  chunks: Buffer[] = [];
  autoComplete = true;
  private onComplete: (() => void) | null = null;

  start(onComplete: () => void): void {
    this.starts++;
    this.onComplete = onComplete;
  }
  feed(chunk: Buffer | null): void {
    if (chunk) {
      this.chunks.push(chunk);
      return;
    }
    if (this.autoComplete) this.finish();
  }
  finish(): void {
    const done = this.onComplete;
    this.onComplete = null;
    done?.();
  }
  stop(): void {
    this.stops++;
    this.onComplete = null;
  }
}

class FakeMedia implements LocalMediaPlayer {
  state: MediaState = "stopped";
  calls: string[] = [];

  async play(): Promise<void> {
    this.calls.push("play");
    this.state = "playing";
  }
  async pause(): Promise<void> {
    this.calls.push("pause");
    this.state = "paused";
  }
  async resume(): Promise<void> {
    this.calls.push("resume");
    this.state = "playing";
  }
  async stop(): Promise<void> {
    this.calls.push("stop");
    this.state = "stopped";
  }
  async next(): Promise<void> {
    this.calls.push("next");
  }
  async previous(): Promise<void> {
    this.calls.push("previous");
  }
}

class RecordingBeeper implements Beeper {
  beeps: Array<[number, number, number]> = [];
  async play(frequencyHz: number, durationMs: number, volume: number): Promise<void> {
    this.beeps.push([frequencyHz, durationMs, volume]);
  }
  count(frequencyHz: number): number {
    return this.beeps.filter(([f]) => f === frequencyHz).length;
  }
}

class RecordingPublisher implements StatusPublisher {
  messages: Array<[string, string]> = [];
  publish(topic: string, value: string): void {
    this.messages.push([topic, value]);
  }
}

class RecordingLed implements StatusLed {
  states: LedState[] = [];
  set(state: LedState): void {
    this.states.push(state);
  }
}

/** 512 samples of a constant value; its energy equals `amplitude`. */
function frame(amplitude: number): Buffer {
  const buf = Buffer.alloc(1024);
  for (let i = 0; i < 512; i++) {
    buf.writeInt16LE(amplitude, i * 2);
  }
  return buf;
}

const LOUD = 1000;
const QUIET = 0;

// ─── Harness ────────────────────────────────────────────────────────────────────

let active: VoiceOrchestrator | null = null;

function createHarness(overrides: Partial<VoiceOrchestratorDeps> = {}) {
  const client = new FakeClient();
  const capture = new FakeCapture();
  const tts = new FakeTts();
  const media = new FakeMedia();
  const beeper = new RecordingBeeper();
  const publisher = new RecordingPublisher();
  const led = new RecordingLed();
  const watchdog = { feed: vi.fn() };

  const orchestrator = new VoiceOrchestrator({
    client,
    capture,
    tts,
    media,
    led,
    publisher,
    beeper,
    watchdog,
    logger: createSilentLogger(),
    sleep: async () => {},
    // framesPerMs is 1 for 512-sample frames, so these read as frame counts
    settings: { speechThreshold: 100, silenceDurationMs: 3, minSpeechDurationMs: 2, maxRecordingMs: 1000 },
    config: { pollIntervalMs: 20 },
    ...overrides,
  });
  active = orchestrator;
  return { orchestrator, client, capture, tts, media, beeper, publisher, led, watchdog };
}

type Harness = ReturnType<typeof createHarness>;

async function startInWakeMode(h: Harness): Promise<void> {
  await h.orchestrator.start();
  await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
}

async function wakeAndListen(h: Harness): Promise<void> {
  h.capture.wake();
  await vi.waitFor(() => expect(h.capture.mode).toBe("gated"));
}

/** Two warm-up frames, two speech frames, three silent frames: the utterance ends on the last. */
function speakUtterance(h: Harness): void {
  for (const amplitude of [LOUD, LOUD, LOUD, LOUD, QUIET, QUIET, QUIET]) {
    h.capture.push(frame(amplitude));
  }
}

afterEach(async () => {
  if (active) {
    active.timers.stopAll();
    await active.stop();
    active = null;
  }
});

// ─── Wake Word ──────────────────────────────────────────────────────────────────

describe("VoiceOrchestrator", () => {
  describe("start()", () => {
    it("enters wake-word mode and reports ready", async () => {
      const h = createHarness();
      await startInWakeMode(h);

      expect(h.capture.wakeThresholds).toEqual([0.5]);
      expect(h.publisher.messages).toContainEqual(["va_status", "SPREMAN"]);
      expect(h.orchestrator.currentMode).toBe(SessionMode.WAKE_IDLE);
      await vi.waitFor(() => expect(h.watchdog.feed).toHaveBeenCalled());
    });

    it("stops capture and disconnects on stop()", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      await h.orchestrator.stop();

      expect(h.capture.mode).toBeNull();
      expect(h.client.disconnected).toBe(true);
      expect(h.orchestrator.snapshot().running).toBe(false);
    });
  });

  describe("wake word", () => {
    it("opens exactly one session for a repeated wake word", async () => {
      const h = createHarness();
      const onWakeWord = vi.fn();
      h.orchestrator.setObserver({ onWakeWord });
      await startInWakeMode(h);

      h.capture.wake();
      h.capture.wake();
      await vi.waitFor(() => expect(h.capture.mode).toBe("gated"));

      expect(h.orchestrator.notifyWakeWord()).toBe(false);
      expect(onWakeWord).toHaveBeenCalledTimes(1);
      expect(h.client.runs).toEqual([null]);
      expect(h.beeper.beeps).toEqual([[800, 120, 40]]);
      expect(h.orchestrator.currentMode).toBe(SessionMode.LISTENING);
      expect(h.publisher.messages).toContainEqual(["va_status", "SLUŠAM..."]);
    });
  });

  // ─── Capture and VAD ──────────────────────────────────────────────────────────

  describe("gated capture", () => {
    it("skips warm-up frames, streams speech and ends the turn on silence", async () => {
      const h = createHarness();
      const onVadEvent = vi.fn();
      h.orchestrator.setObserver({ onVadEvent });
      await startInWakeMode(h);
      await wakeAndListen(h);

      speakUtterance(h);
      h.capture.push(frame(LOUD));

      expect(h.client.streamed).toHaveLength(5);
      expect(onVadEvent.mock.calls.map(([state]) => state)).toEqual([
        VadState.LISTENING,
        VadState.SPEAKING,
        VadState.END,
      ]);

      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));
      expect(h.client.endAudioCalls).toBe(1);
      expect(h.capture.mode).toBeNull();
      expect(h.publisher.messages).toContainEqual(["va_status", "OBRAĐUJEM..."]);
    });

    it("returns to wake-word mode when the run ends without a response", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      await wakeAndListen(h);
      speakUtterance(h);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));

      h.client.emit({ type: "run-end" });

      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.orchestrator.snapshot().sessionId).toBeNull();
      expect(h.beeper.count(400)).toBe(0);
    });
  });

  // ─── Local Timer Shortcut ─────────────────────────────────────────────────────

  describe("local timer shortcut", () => {
    it("starts the timer, confirms and resumes wake word without waiting for the backend", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      await wakeAndListen(h);

      h.client.emit({ type: "stt-end", text: "postavi timer na 5 minuta" });

      await vi.waitFor(() => {
        expect(h.capture.mode).toBe("wake");
        expect(h.orchestrator.snapshot().sessionId).toBeNull();
      });
      expect(h.orchestrator.timers.list().map((t) => t.durationSeconds)).toEqual([300]);
      expect(h.client.endAudioCalls).toBe(1);
      expect(h.beeper.beeps.slice(1)).toEqual([
        [1200, 100, 90],
        [1200, 100, 90],
      ]);
    });

    it("adjusts the local timer to the backend's duration and keeps the backend quiet", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      await wakeAndListen(h);
      h.client.emit({ type: "stt-end", text: "postavi timer na 5 minuta" });
      await vi.waitFor(() => expect(h.orchestrator.snapshot().sessionId).toBeNull());

      h.client.emit({
        type: "intent-end",
        name: "HassStartTimer",
        slotsJson: '{"targets":[{"type":"timer","duration":330}]}',
        responseSpeech: "Timer postavljen",
        conversationId: null,
      });
      h.client.emit({ type: "tts-end", text: "Timer postavljen", audioUrl: "/api/tts_proxy/t.mp3" });
      h.client.emit({ type: "run-end" });

      expect(h.orchestrator.timers.list().map((t) => t.durationSeconds)).toEqual([330]);
      expect(h.tts.starts).toBe(0);
      expect(h.client.fetched).toEqual([]);
      expect(h.beeper.count(1200)).toBe(2);
    });

    it("leaves timers alone when neither side resolved a duration", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      await wakeAndListen(h);
      h.client.emit({ type: "stt-end", text: "molim te pet minuta" });
      speakUtterance(h);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));

      // No keyword in the transcript, so no local candidate either
      h.client.emit({
        type: "intent-end",
        name: "HassStartTimer",
        slotsJson: '{"targets":[{"type":"timer"}]}',
        responseSpeech: "",
        conversationId: null,
      });
      h.client.emit({ type: "tts-end", text: "", audioUrl: null });
      h.client.emit({ type: "run-end" });

      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.orchestrator.timers.count).toBe(0);
      expect(h.beeper.count(1200)).toBe(0);
    });
  });

  describe("timer intent without a free slot", () => {
    it("lets the backend answer and ends the session", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      for (let i = 0; i < 5; i++) {
        expect(h.orchestrator.timers.start(600 + i)).not.toBeNull();
      }
      await wakeAndListen(h);

      h.client.emit({ type: "stt-end", text: "postavi timer na 5 minuta" });
      speakUtterance(h);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));

      h.client.emit({
        type: "intent-end",
        name: "HassStartTimer",
        slotsJson: '{"targets":[{"type":"timer"}]}',
        responseSpeech: "Nema slobodnih tajmera.",
        conversationId: null,
      });
      h.client.emit({ type: "tts-end", text: "Nema slobodnih tajmera.", audioUrl: null });
      h.client.emit({ type: "run-end" });

      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.orchestrator.snapshot().sessionId).toBeNull();
      expect(h.orchestrator.timers.count).toBe(5);
      expect(h.beeper.count(1200)).toBe(0);
      expect(h.publisher.messages).toContainEqual(["va_response", "Nema slobodnih tajmera."]);
      expect(h.orchestrator.notifyWakeWord()).toBe(true);
    });
  });

  // ─── Responses ────────────────────────────────────────────────────────────────

  describe("responses", () => {
    it("plays the response and opens a follow-up turn after a question", async () => {
      const h = createHarness();
      const onTtsComplete = vi.fn();
      h.orchestrator.setObserver({ onTtsComplete });
      await startInWakeMode(h);
      await wakeAndListen(h);
      speakUtterance(h);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));

      const answer = "Sutra sunčano. Želiš li više detalja?";
      h.client.emit({
        type: "intent-end",
        name: "HassGetWeather",
        slotsJson: "{}",
        responseSpeech: answer,
        conversationId: "conv-1",
      });
      h.client.emit({ type: "tts-end", text: answer, audioUrl: "/api/tts_proxy/abc.mp3" });
      h.client.emit({ type: "run-end" });

      await vi.waitFor(() => expect(h.client.runs).toEqual([null, "conv-1"]));
      await vi.waitFor(() => expect(h.capture.mode).toBe("gated"));
      expect(h.client.fetched).toEqual(["/api/tts_proxy/abc.mp3"]);
      expect(h.tts.chunks).toEqual([Buffer.from([1, 2, 3, 4])]);
      expect(onTtsComplete).toHaveBeenCalledTimes(1);
      expect(h.publisher.messages).toContainEqual(["va_status", "GOVORIM..."]);
      expect(h.publisher.messages).toContainEqual(["va_response", answer]);
      expect(h.orchestrator.currentMode).toBe(SessionMode.LISTENING);
      expect(h.beeper.count(800)).toBe(1);
    });

    it("returns to wake-word mode after a statement without audio", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      await wakeAndListen(h);
      speakUtterance(h);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));

      h.client.emit({ type: "tts-end", text: "Svjetlo je upaljeno.", audioUrl: null });

      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.tts.starts).toBe(0);
      expect(h.client.runs).toHaveLength(1);
      expect(h.publisher.messages).toContainEqual(["va_response", "Svjetlo je upaljeno."]);
    });

    it("speaks the backend's answer to a text request", async () => {
      const h = createHarness();
      await startInWakeMode(h);

      expect(h.orchestrator.speakText("  koliko je sati ")).toBe(true);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));
      expect(h.client.textRuns).toEqual(["koliko je sati"]);
      expect(h.capture.mode).toBeNull();

      h.client.emit({ type: "tts-end", text: "Deset sati.", audioUrl: null });
      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.publisher.messages).toContainEqual(["va_response", "Deset sati."]);
    });

    it("ignores empty text requests", () => {
      const h = createHarness();
      expect(h.orchestrator.speakText("   ")).toBe(false);
      expect(h.orchestrator.sendConversationText(" ")).toBe(false);
    });

    it("caps a follow-up turn at the follow-up recording limit", async () => {
      const h = createHarness({ config: { pollIntervalMs: 20, followUpMaxRecordingMs: 6 } });
      await startInWakeMode(h);
      await wakeAndListen(h);
      speakUtterance(h);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));

      h.client.emit({ type: "tts-end", text: "Koji grad?", audioUrl: null });
      await vi.waitFor(() => expect(h.client.runs).toHaveLength(2));
      await vi.waitFor(() => expect(h.capture.mode).toBe("gated"));

      // Two warm-up frames, then speech that never pauses
      for (let i = 0; i < 10; i++) {
        h.capture.push(frame(LOUD));
      }

      expect(h.client.streamed).toHaveLength(5 + 6);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));
      expect(h.client.endAudioCalls).toBe(2);
    });

    it("publishes the agent's answer to conversation text and continues that conversation", async () => {
      const h = createHarness();
      await startInWakeMode(h);

      expect(h.orchestrator.sendConversationText("  upali svjetlo ")).toBe(true);
      expect(h.client.sentTexts).toEqual(["upali svjetlo"]);

      h.client.emit({ type: "conversation-response", speech: "Upaljeno.", conversationId: "c-7" });
      expect(h.publisher.messages).toContainEqual(["va_response", "Upaljeno."]);

      await wakeAndListen(h);
      expect(h.client.runs).toEqual(["c-7"]);
    });
  });

  // ─── Errors ───────────────────────────────────────────────────────────────────

  describe("errors", () => {
    it("turns a backend error into an error beep and a return to wake word", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      await wakeAndListen(h);

      h.client.emit({ type: "error", code: "stt-stream-failed", message: "boom" });

      await vi.waitFor(() => {
        expect(h.beeper.count(400)).toBe(1);
        expect(h.capture.mode).toBe("wake");
      });
      expect(h.beeper.beeps).toContainEqual([400, 300, 60]);
      expect(h.led.states).toContain("error");
      expect(h.client.abandoned).toBe(1);
      expect(h.orchestrator.snapshot().sessionId).toBeNull();
    });

    it("gives up on a backend that never answers", async () => {
      const h = createHarness({ config: { pollIntervalMs: 20, responseTimeoutMs: 30 } });
      await startInWakeMode(h);
      await wakeAndListen(h);
      speakUtterance(h);

      await vi.waitFor(() => {
        expect(h.beeper.count(400)).toBe(1);
        expect(h.capture.mode).toBe("wake");
      });
    });

    it("recovers a session whose completion was dropped from a full queue", async () => {
      const logger = createSilentLogger();
      const h = createHarness({ logger, config: { pollIntervalMs: 20, sessionDeadlineMs: 1000 } });
      h.tts.autoComplete = false;
      await startInWakeMode(h);
      await wakeAndListen(h);
      speakUtterance(h);
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));

      h.client.emit({ type: "tts-end", text: "Evo odgovora.", audioUrl: "/api/tts_proxy/x.mp3" });
      await vi.waitFor(() => expect(h.client.fetched).toHaveLength(1));

      for (let i = 0; i < 11; i++) {
        h.orchestrator.notifyOfflineCommand(OfflineCommand.LIGHT_ON);
      }
      h.tts.finish();
      expect(logger.warn).toHaveBeenCalledWith("Command queue full; dropped tts_complete");

      await vi.waitFor(
        () => {
          expect(h.beeper.count(400)).toBe(1);
          expect(h.capture.mode).toBe("wake");
        },
        { timeout: 3000 },
      );
      expect(h.orchestrator.snapshot().sessionId).toBeNull();
      expect(h.tts.stops).toBe(1);
      expect(h.orchestrator.notifyWakeWord()).toBe(true);
    });

    it("treats a lost connection during a session as an error", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      await wakeAndListen(h);

      h.client.handlers.onConnectionChange?.(false);

      await vi.waitFor(() => expect(h.beeper.count(400)).toBe(1));
      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
    });

    it("fails the session when the run cannot be opened", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      h.client.isReady = false;
      h.client.startRun = () => null;

      h.capture.wake();

      await vi.waitFor(() => expect(h.beeper.count(400)).toBe(1));
      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.orchestrator.snapshot().sessionId).toBeNull();
    });
  });

  // ─── Offline Commands and Media ───────────────────────────────────────────────

  describe("offline commands", () => {
    it("starts music and keeps wake word off while it plays", async () => {
      const h = createHarness();
      const onOfflineCommand = vi.fn();
      h.orchestrator.setObserver({ onOfflineCommand });
      await startInWakeMode(h);

      h.orchestrator.notifyOfflineCommand(OfflineCommand.MUSIC_PLAY);
      await vi.waitFor(() => expect(onOfflineCommand).toHaveBeenCalledWith(2));

      expect(h.media.calls).toEqual(["play"]);
      expect(h.beeper.beeps).toEqual([[1000, 100, 80]]);
      expect(h.capture.mode).toBeNull();

      h.orchestrator.musicControl(MusicControl.STOP);
      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.media.calls).toEqual(["play", "stop"]);
    });

    it("pauses music for a spoken answer, resumes it and skips the follow-up turn", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      h.orchestrator.notifyOfflineCommand(OfflineCommand.MUSIC_PLAY);
      await vi.waitFor(() => expect(h.media.state).toBe("playing"));

      h.orchestrator.speakText("koja je ovo pjesma");
      await vi.waitFor(() => expect(h.orchestrator.currentMode).toBe(SessionMode.PROCESSING));
      h.client.emit({ type: "tts-end", text: "Želiš li još jednu?", audioUrl: "/api/tts_proxy/q.mp3" });

      await vi.waitFor(() => expect(h.orchestrator.snapshot().sessionId).toBeNull());
      expect(h.tts.chunks).toEqual([Buffer.from([1, 2, 3, 4])]);
      expect(h.media.calls).toEqual(["play", "pause", "resume"]);
      expect(h.media.state).toBe("playing");
      expect(h.client.runs).toEqual([]);
      expect(h.capture.mode).toBeNull();
    });

    it("pauses, resumes and stops music on request", async () => {
      const h = createHarness();
      await startInWakeMode(h);
      h.orchestrator.notifyOfflineCommand(OfflineCommand.MUSIC_PLAY);
      await vi.waitFor(() => expect(h.media.state).toBe("playing"));

      expect(h.orchestrator.musicControl(MusicControl.PAUSE)).toBe(true);
      await vi.waitFor(() => expect(h.media.state).toBe("paused"));
      expect(h.capture.mode).toBeNull();

      h.orchestrator.musicControl(MusicControl.RESUME);
      await vi.waitFor(() => expect(h.media.state).toBe("playing"));

      h.orchestrator.musicControl(MusicControl.STOP);
      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.media.calls).toEqual(["play", "pause", "resume", "stop"]);
    });

    it("brings wake word back on an idle poll when the resume request was lost", async () => {
      const h = createHarness();
      await startInWakeMode(h);

      h.media.state = "playing";
      h.orchestrator.notifyMediaState("playing");
      await vi.waitFor(() => expect(h.capture.mode).toBeNull());

      // Playback ends without a "stopped" notification
      h.media.state = "stopped";
      await vi.waitFor(() => expect(h.capture.mode).toBe("wake"));
      expect(h.capture.wakeThresholds).toEqual([0.5, 0.5]);
    });

    it("publishes light commands", async () => {
      const h = createHarness();
      await startInWakeMode(h);

      h.orchestrator.notifyOfflineCommand(OfflineCommand.LIGHT_ON);
      await vi.waitFor(() => expect(h.publisher.messages).toContainEqual(["light", "ON"]));
      expect(h.capture.mode).toBe("wake");
    });
  });

  // ─── Timers, Alarms and Settings ──────────────────────────────────────────────

  describe("timers and settings", () => {
    it("beeps five times when a timer finishes", async () => {
      const timers = new TimerManager({ tickMs: 5, logger: createSilentLogger() });
      const h = createHarness({ timers });
      await startInWakeMode(h);

      timers.start(1);

      await vi.waitFor(() => expect(h.beeper.count(1000)).toBe(5));
      expect(h.beeper.beeps.every(([f, d, v]) => f === 1000 && d === 500 && v === 100)).toBe(true);
    });

    it("sounds the alarm pattern on request", async () => {
      const h = createHarness();
      await startInWakeMode(h);

      expect(h.orchestrator.triggerAlarm(3)).toBe(true);
      await vi.waitFor(() => expect(h.beeper.count(1000)).toBe(5));
    });

    it("restarts wake word only when the threshold really changes", async () => {
      const h = createHarness();
      await startInWakeMode(h);

      h.orchestrator.updateConfig({ wakeThreshold: 0.7 });
      await vi.waitFor(() => expect(h.capture.wakeThresholds).toEqual([0.5, 0.7]));

      const settings = h.orchestrator.updateConfig({ wakeThreshold: 0.705, speechThreshold: 250 });
      await new Promise((resolve) => setTimeout(resolve, 60));

      expect(h.capture.wakeThresholds).toEqual([0.5, 0.7]);
      expect(settings.speechThreshold).toBe(250);
      expect(h.orchestrator.currentSettings.wakeThreshold).toBe(0.705);
    });
  });
});
