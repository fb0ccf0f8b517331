// Voice Satellite - Conversation Protocol Client
// Persistent WebSocket connection to the assist pipeline backend: authenticates,
// opens runs, streams handler-id framed PCM and decodes the run event sequence.
// Synthesized speech is fetched over HTTP and streamed to a sink.

import WebSocket from "ws";
import type { BackendEvent } from "./types.js";
import {
  buildAudioRun,
  buildAuth,
  buildConversationProcess,
  buildTextRun,
  decodeServerMessage,
  type ClientMessage,
} from "./assist-protocol.js";
import { encodeAudioFrame, encodeEndOfAudio } from "./pipeline-frame-codec.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Delay before reconnecting after the transport drops (ms) */
const DEFAULT_RECONNECT_DELAY_MS = 10_000;

/** Bound on the HTTP download of synthesized speech (ms) */
const DEFAULT_TTS_TIMEOUT_MS = 10_000;

/** Audio chunks held while waiting for run-start (~2 s of 32 ms frames) */
const DEFAULT_MAX_BUFFERED_FRAMES = 64;

// ─── Types ──────────────────────────────────────────────────────────────────────

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export type StreamResult = "sent" | "buffered" | "rejected";

export type EndAudioResult = "sent" | "deferred" | "rejected";

export interface ConversationHandlers {
  onEvent?: (event: BackendEvent) => void;
  onConnectionChange?: (connected: boolean) => void;
}

export interface ConversationClientOptions {
  /** WebSocket endpoint, e.g. ws://host:8123/api/websocket */
  url: string;
  accessToken: string;
  /** Base for relative TTS URLs, e.g. http://host:8123 */
  httpBaseUrl: string;
  reconnectDelayMs?: number;
  ttsTimeoutMs?: number;
  maxBufferedFrames?: number;
  fetch?: FetchFn;
  logger?: Logger;
}

interface RunState {
  requestId: number;
  /** Binary handler id; null before run-start and after end-of-audio. */
  handlerId: number | null;
  started: boolean;
  audioEnded: boolean;
  endPending: boolean;
  pendingFrames: Buffer[];
}

// ─── Client ─────────────────────────────────────────────────────────────────────

export class ConversationClient {
  private readonly url: string;
  private readonly accessToken: string;
  private readonly httpBaseUrl: string;
  private readonly reconnectDelayMs: number;
  private readonly ttsTimeoutMs: number;
  private readonly maxBufferedFrames: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  private handlers: ConversationHandlers = {};
  private ws: WebSocket | null = null;
  private authenticated = false;
  private closedByUser = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private authWaiter: { resolve: () => void; reject: (err: Error) => void } | null = null;

  private nextId = 1;
  private run: RunState | null = null;
  private processRequestId: number | null = null;
  private droppedFrames = 0;

  constructor(options: ConversationClientOptions) {
    this.url = options.url;
    this.accessToken = options.accessToken;
    this.httpBaseUrl = options.httpBaseUrl;
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.ttsTimeoutMs = options.ttsTimeoutMs ?? DEFAULT_TTS_TIMEOUT_MS;
    this.maxBufferedFrames = options.maxBufferedFrames ?? DEFAULT_MAX_BUFFERED_FRAMES;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createConsoleLogger("ConversationClient");
  }

  /** Single registration slot; a later call replaces the earlier handlers. */
  setHandlers(handlers: ConversationHandlers): void {
    this.handlers = handlers;
  }

  get isReady(): boolean {
    return this.authenticated && this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  /** Handler id of the current run, or null when audio may not be sent. */
  get handlerId(): number | null {
    return this.run?.handlerId ?? null;
  }

  get hasActiveRun(): boolean {
    return this.run !== null;
  }

  /** Audio chunks discarded because the pre-run-start buffer was full. */
  get droppedFrameCount(): number {
    return this.droppedFrames;
  }

  // ─── Connection Lifecycle ───────────────────────────────────────────────────

  /**
   * Open the socket and authenticate. Resolves on auth_ok; rejects on
   * auth_invalid or if the socket closes first. Reconnection is scheduled
   * either way unless disconnect() was called.
   */
  connect(): Promise<void> {
    this.closedByUser = false;
    this.clearReconnectTimer();
    if (this.ws) {
      return this.isReady ? Promise.resolve() : Promise.reject(new Error("Connection already in progress"));
    }

    return new Promise((resolve, reject) => {
      this.authWaiter = { resolve, reject };
      this.logger.info(`Connecting to ${this.url}`);

      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
        if (isBinary) {
          this.logger.warn("Ignoring unexpected binary frame from backend");
          return;
        }
        const text = Buffer.isBuffer(data) ? data.toString("utf-8") : String(data);
        this.handleText(ws, text);
      });

      ws.on("close", () => {
        this.handleClose(ws);
      });

      ws.on("error", (err: Error) => {
        this.logger.error(`WebSocket error: ${err.message}`);
      });
    });
  }

  /** Close the connection without scheduling a reconnect. */
  disconnect(): Promise<void> {
    this.closedByUser = true;
    this.clearReconnectTimer();
    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      ws.once("close", () => resolve());
      ws.close();
    });
  }

  private handleClose(ws: WebSocket): void {
    if (this.ws !== ws) return;

    const wasReady = this.authenticated;
    this.ws = null;
    this.authenticated = false;
    this.processRequestId = null;

    // Handler id dies with the transport; an in-flight run is not resumed
    if (this.run) {
      this.logger.warn(`Connection lost during run ${this.run.requestId}; run abandoned`);
      this.run = null;
    }

    this.settleAuth(new Error("Connection closed before authentication completed"));
    if (wasReady) {
      this.logger.warn("Disconnected from backend");
      this.notifyConnection(false);
    }

    if (!this.closedByUser) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    this.clearReconnectTimer();
    this.logger.info(`Reconnecting in ${this.reconnectDelayMs}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((err) => {
        this.logger.warn(`Reconnect attempt failed: ${errorMessage(err)}`);
      });
    }, this.reconnectDelayMs);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private settleAuth(err: Error | null): void {
    const waiter = this.authWaiter;
    if (!waiter) return;
    this.authWaiter = null;
    if (err) waiter.reject(err);
    else waiter.resolve();
  }

  // ─── Incoming Messages ──────────────────────────────────────────────────────

  private handleText(ws: WebSocket, text: string): void {
    const msg = decodeServerMessage(text);
    if (!msg) {
      this.logger.warn(`Ignoring unrecognised message: ${text.slice(0, 200)}`);
      return;
    }

    switch (msg.type) {
      case "auth_required":
        this.sendJson(ws, buildAuth(this.accessToken));
        break;

      case "auth_ok":
        this.authenticated = true;
        this.logger.info("Authenticated with backend");
        this.settleAuth(null);
        this.notifyConnection(true);
        break;

      case "auth_invalid":
        this.logger.error(`Authentication rejected: ${msg.message || "invalid token"}`);
        this.settleAuth(new Error(`Authentication rejected: ${msg.message || "invalid token"}`));
        ws.close();
        break;

      case "event": {
        if (!this.run || msg.id !== this.run.requestId) {
          return;
        }
        if (!msg.event) {
          this.logger.info(`Pipeline stage: ${msg.eventType}`);
          return;
        }
        this.handleRunEvent(ws, msg.event);
        break;
      }

      case "result":
        if (msg.id === this.processRequestId) {
          this.processRequestId = null;
          if (msg.success && msg.speech !== null) {
            this.emit({ type: "conversation-response", speech: msg.speech, conversationId: msg.conversationId });
          } else if (!msg.success) {
            this.logger.warn(`conversation/process failed: ${msg.error?.message ?? "unknown error"}`);
          }
        } else if (this.run && msg.id === this.run.requestId && !msg.success) {
          this.run = null;
          this.emit({
            type: "error",
            code: msg.error?.code ?? "unknown",
            message: msg.error?.message ?? "Pipeline run rejected",
          });
        }
        break;
    }
  }

  private handleRunEvent(ws: WebSocket, event: BackendEvent): void {
    const run = this.run;
    if (!run) return;

    switch (event.type) {
      case "run-start":
        run.started = true;
        run.handlerId = run.audioEnded && !run.endPending ? null : event.handlerId;
        this.logger.info(`Run ${run.requestId} started (handler id ${event.handlerId ?? "none"})`);
        this.flushPending(ws, run);
        break;

      case "run-end":
      case "error":
        this.run = null;
        break;

      default:
        break;
    }

    if (event.type === "error") {
      this.logger.error(`Pipeline error: ${event.code} - ${event.message}`);
    }
    this.emit(event);
  }

  private flushPending(ws: WebSocket, run: RunState): void {
    const frames = run.pendingFrames;
    run.pendingFrames = [];
    if (run.handlerId === null) {
      if (frames.length > 0) {
        this.logger.warn(`Discarding ${frames.length} buffered audio chunks: run has no audio handler`);
      }
      run.endPending = false;
      return;
    }

    for (const pcm of frames) {
      this.sendBinary(ws, encodeAudioFrame(run.handlerId, pcm));
    }
    if (run.endPending) {
      run.endPending = false;
      this.sendBinary(ws, encodeEndOfAudio(run.handlerId));
      run.handlerId = null;
    }
  }

  // ─── Runs ───────────────────────────────────────────────────────────────────

  /**
   * Open an audio run (STT → TTS). Any previous run is abandoned.
   * Returns the request id, or null when not connected.
   */
  startRun(conversationId?: string | null): number | null {
    const ws = this.readySocket("start run");
    if (!ws) return null;

    const id = this.nextId++;
    this.run = this.newRun(id, false);
    this.sendJson(ws, buildAudioRun(id, conversationId));
    this.logger.info(`Starting audio run ${id}`);
    return id;
  }

  /** Open a text run (intent → TTS); used to have the backend speak or answer text. */
  runText(text: string, conversationId?: string | null): number | null {
    const ws = this.readySocket("run text");
    if (!ws) return null;

    const id = this.nextId++;
    this.run = this.newRun(id, true);
    this.sendJson(ws, buildTextRun(id, text, conversationId));
    this.logger.info(`Starting text run ${id}`);
    return id;
  }

  /** Send text to the conversation agent; the answer arrives as conversation-response. */
  sendText(text: string): number | null {
    const ws = this.readySocket("send text");
    if (!ws) return null;

    const id = this.nextId++;
    this.processRequestId = id;
    this.sendJson(ws, buildConversationProcess(id, text));
    return id;
  }

  /** Drop the current run locally; its later events are ignored. */
  abandonRun(): void {
    if (this.run) {
      this.logger.info(`Abandoning run ${this.run.requestId}`);
      this.run = null;
    }
  }

  /**
   * Stream one PCM chunk. Chunks sent before run-start are buffered (bounded,
   * oldest dropped) and flushed in order once the handler id is known.
   */
  streamAudio(pcm: Buffer): StreamResult {
    const run = this.run;
    const ws = this.ws;
    if (!run || !ws || !this.isReady || run.audioEnded) return "rejected";
    if (pcm.length === 0 || pcm.length % 2 !== 0) return "rejected";

    if (run.handlerId === null) {
      if (run.started) return "rejected";
      run.pendingFrames.push(Buffer.from(pcm));
      if (run.pendingFrames.length > this.maxBufferedFrames) {
        run.pendingFrames.shift();
        this.droppedFrames++;
      }
      return "buffered";
    }

    this.sendBinary(ws, encodeAudioFrame(run.handlerId, pcm));
    return "sent";
  }

  /**
   * Signal end of audio. Deferred until run-start when the handler id is not
   * known yet. The handler id is invalid afterwards.
   */
  endAudio(): EndAudioResult {
    const run = this.run;
    const ws = this.ws;
    if (!run || !ws || !this.isReady || run.audioEnded) return "rejected";
    run.audioEnded = true;

    if (run.handlerId === null) {
      if (run.started) return "rejected";
      run.endPending = true;
      return "deferred";
    }

    this.sendBinary(ws, encodeEndOfAudio(run.handlerId));
    this.logger.info(`Audio stream ended (handler id ${run.handlerId})`);
    run.handlerId = null;
    return "sent";
  }

  // ─── TTS Download ───────────────────────────────────────────────────────────

  /**
   * Download synthesized speech and forward each chunk to `sink`, then
   * `sink(null)`. The end marker is sent on failure too; the error is rethrown.
   */
  async fetchTtsAudio(url: string, sink: (chunk: Buffer | null) => void): Promise<number> {
    const target = new URL(url, this.httpBaseUrl).toString();
    let total = 0;
    try {
      const res = await this.fetchFn(target, { signal: AbortSignal.timeout(this.ttsTimeoutMs) });
      if (!res.ok || !res.body) {
        throw new Error(`TTS download failed: HTTP ${res.status}`);
      }
      const reader = res.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        if (value.length > 0) {
          total += value.length;
          sink(Buffer.from(value));
        }
      }
      this.logger.info(`Downloaded TTS audio (${total} bytes)`);
      return total;
    } finally {
      sink(null);
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private newRun(requestId: number, textOnly: boolean): RunState {
    if (this.run) {
      this.logger.info(`Run ${this.run.requestId} replaced by run ${requestId}`);
    }
    return {
      requestId,
      handlerId: null,
      started: false,
      audioEnded: textOnly,
      endPending: false,
      pendingFrames: [],
    };
  }

  private readySocket(action: string): WebSocket | null {
    if (!this.isReady || !this.ws) {
      this.logger.warn(`Cannot ${action}: not connected`);
      return null;
    }
    return this.ws;
  }

  private sendJson(ws: WebSocket, message: ClientMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private sendBinary(ws: WebSocket, frame: Buffer): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(frame);
    }
  }

  private emit(event: BackendEvent): void {
    try {
      this.handlers.onEvent?.(event);
    } catch (err) {
      this.logger.error(`Event handler failed for ${event.type}: ${errorMessage(err)}`);
    }
  }

  private notifyConnection(connected: boolean): void {
    try {
      this.handlers.onConnectionChange?.(connected);
    } catch (err) {
      this.logger.error(`Connection handler failed: ${errorMessage(err)}`);
    }
  }
}
