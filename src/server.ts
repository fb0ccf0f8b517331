// Voice Satellite - Control Server
// HTTP endpoints for triggering and inspecting the orchestrator, plus a
// WebSocket on the same port that pushes mode and status changes to dashboards.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import type { VoiceOrchestrator } from "./orchestrator.js";
import type { SettingsStore } from "./settings-store.js";
import { validateSettings } from "./settings-store.js";
import type { LivenessWatchdog, StatusBus } from "./host-devices.js";
import { MusicControl, OfflineCommand, type PipelineSettings, type SessionMode } from "./types.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** The consumer polls every second; three missed polls count as stalled */
const DEFAULT_LIVENESS_WINDOW_MS = 3000;

const MUSIC_ACTIONS: ReadonlyMap<string, MusicControl> = new Map([
  ["pause", MusicControl.PAUSE],
  ["resume", MusicControl.RESUME],
  ["stop", MusicControl.STOP],
]);

// ─── Messages ───────────────────────────────────────────────────────────────────

export type DashboardMessage =
  | { type: "mode"; mode: SessionMode }
  | { type: "status"; topic: string; value: string };

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  orchestrator: VoiceOrchestrator;
  /** Persists settings accepted by POST /config. */
  settingsStore?: SettingsStore;
  /** Status topics forwarded to WebSocket clients and reported by GET /status. */
  statusBus?: StatusBus;
  watchdog?: LivenessWatchdog;
  livenessWindowMs?: number;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 * Takes the orchestrator's observer slot to broadcast mode changes.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    orchestrator,
    settingsStore,
    statusBus,
    watchdog,
    livenessWindowMs = DEFAULT_LIVENESS_WINDOW_MS,
    logger = createConsoleLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer });

  app.use(express.json());

  // ─── Health and Status ──────────────────────────────────────────────────────

  app.get("/health", (_req, res) => {
    const alive = watchdog ? watchdog.isAlive(livenessWindowMs) : true;
    res.status(alive ? 200 : 503).json({ status: alive ? "ok" : "stalled" });
  });

  app.get("/status", (_req, res) => {
    res.json({
      ...orchestrator.snapshot(),
      settings: orchestrator.currentSettings,
      timers: orchestrator.timers.list(),
      topics: statusBus?.latest() ?? {},
    });
  });

  // ─── Triggers ───────────────────────────────────────────────────────────────

  app.post("/wake", (_req, res) => {
    const accepted = orchestrator.notifyWakeWord();
    res.status(accepted ? 202 : 409).json({ accepted });
  });

  app.post("/tts", (req, res) => {
    const text = readString(req.body, "text");
    if (!text) {
      res.status(400).json({ error: 'Body must contain a non-empty "text"' });
      return;
    }
    const accepted = orchestrator.speakText(text);
    res.status(accepted ? 202 : 503).json({ accepted });
  });

  app.post("/conversation", (req, res) => {
    const text = readString(req.body, "text");
    if (!text) {
      res.status(400).json({ error: 'Body must contain a non-empty "text"' });
      return;
    }
    const accepted = orchestrator.sendConversationText(text);
    res.status(accepted ? 202 : 503).json({ accepted });
  });

  app.post("/alarm/:id", (req, res) => {
    const id = parseId(req.params.id);
    if (id === null) {
      res.status(400).json({ error: "Alarm id must be a non-negative integer" });
      return;
    }
    const accepted = orchestrator.triggerAlarm(id);
    res.status(accepted ? 202 : 503).json({ accepted });
  });

  app.post("/offline/:id", (req, res) => {
    const id = parseId(req.params.id);
    if (id === null || OfflineCommand[id] === undefined) {
      res.status(400).json({ error: `Unknown offline command "${req.params.id}"` });
      return;
    }
    const accepted = orchestrator.notifyOfflineCommand(id);
    res.status(accepted ? 202 : 503).json({ accepted });
  });

  app.post("/music/:action", (req, res) => {
    const action = MUSIC_ACTIONS.get(req.params.action);
    if (action === undefined) {
      res.status(400).json({ error: `Unknown music action "${req.params.action}"` });
      return;
    }
    const accepted = orchestrator.musicControl(action);
    res.status(accepted ? 202 : 503).json({ accepted });
  });

  // ─── Settings ───────────────────────────────────────────────────────────────

  app.post("/config", (req, res, next) => {
    const validated = tryValidateSettings(req.body);
    if (!validated.ok) {
      res.status(400).json({ error: validated.error });
      return;
    }

    const settings = orchestrator.updateConfig(validated.settings);
    const saved = settingsStore ? settingsStore.save(settings) : Promise.resolve();
    saved.then(() => {
      logger.info(`Settings updated: ${JSON.stringify(validated.settings)}`);
      res.json({ settings });
    }, next);
  });

  // ─── Timers ─────────────────────────────────────────────────────────────────

  app.get("/timers", (_req, res) => {
    res.json({ timers: orchestrator.timers.list() });
  });

  app.post("/timers", (req, res) => {
    const seconds = readNumber(req.body, "seconds");
    if (seconds === null || seconds <= 0) {
      res.status(400).json({ error: 'Body must contain a positive "seconds"' });
      return;
    }
    const timer = orchestrator.timers.start(seconds, readString(req.body, "name") ?? undefined);
    if (!timer) {
      res.status(409).json({ error: "Timer limit reached" });
      return;
    }
    res.status(201).json({ timer });
  });

  app.delete("/timers/:id", (req, res) => {
    if (!orchestrator.timers.stop(req.params.id)) {
      res.status(404).json({ error: `Timer not found: ${req.params.id}` });
      return;
    }
    res.status(204).end();
  });

  // Malformed JSON bodies and failed writes end up here
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof SyntaxError ? 400 : 500;
    if (status === 500) logger.error(`Request failed: ${errorMessage(err)}`);
    res.status(status).json({ error: errorMessage(err) });
  });

  // ─── Dashboard Broadcast ────────────────────────────────────────────────────

  const broadcast = (message: DashboardMessage): void => {
    const text = JSON.stringify(message);
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(text);
      }
    }
  };

  orchestrator.setObserver({
    onModeChange: (mode) => broadcast({ type: "mode", mode }),
    onWakeWord: () => logger.info("Wake word"),
    onTranscript: (text) => logger.info(`Transcript: "${text}"`),
    onIntent: (name) => logger.info(`Intent: ${name}`),
    onOfflineCommand: (command) => logger.info(`Offline command ${OfflineCommand[command] ?? command}`),
  });
  const unsubscribe = statusBus?.subscribe((topic, value) => broadcast({ type: "status", topic, value }));

  wss.on("connection", (ws: WebSocket) => {
    logger.info("Dashboard connected");
    sendMessage(ws, { type: "mode", mode: orchestrator.currentMode });
    ws.on("error", (err) => logger.warn(`Dashboard socket error: ${err.message}`));
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      unsubscribe?.();
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: DashboardMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function tryValidateSettings(
  body: unknown,
): { ok: true; settings: Partial<PipelineSettings> } | { ok: false; error: string } {
  try {
    return { ok: true, settings: validateSettings(body) };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

function parseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  return parseInt(raw, 10);
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return new Map(Object.entries(body)).get(key);
}

function readString(body: unknown, key: string): string | null {
  const value = field(body, key);
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

function readNumber(body: unknown, key: string): number | null {
  const value = field(body, key);
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}
