// Voice Satellite - Environment configuration
// Reads the process environment (populated from .env by dotenv in the entry point).

import type { PipelineSettings } from "./types.js";
import { DEFAULT_PIPELINE_SETTINGS, DEFAULT_ORCHESTRATOR_CONFIG } from "./orchestrator.js";

export interface SatelliteConfig {
  /** Assist pipeline WebSocket, e.g. ws://homeassistant.local:8123/api/websocket */
  backendUrl: string;
  backendToken: string;
  /** Base for relative TTS URLs, derived from backendUrl. */
  httpBaseUrl: string;
  controlPort: number;
  settingsFile: string;
  /** Raw 16 kHz mono PCM replayed as microphone input; capture idles when unset. */
  capturePcmFile: string | null;
  outputDir: string;
  /** Environment overrides for the VAD; persisted settings take precedence at runtime. */
  vad: Partial<PipelineSettings>;
  responseTimeoutMs: number;
  reconnectDelayMs: number;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`${name} is not set. Add it to your .env file.`);
  }
  return value;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function optionalPositiveInt(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  return raw ? positiveInt(env, name, 0) : undefined;
}

/**
 * HTTP origin matching a ws:// or wss:// URL (ws → http, wss → https).
 * Throws on any other scheme.
 */
export function deriveHttpBaseUrl(wsUrl: string): string {
  let url: URL;
  try {
    url = new URL(wsUrl);
  } catch {
    throw new Error(`BACKEND_URL is not a valid URL: "${wsUrl}"`);
  }
  if (url.protocol !== "ws:" && url.protocol !== "wss:") {
    throw new Error(`BACKEND_URL must use ws:// or wss://, got "${url.protocol}"`);
  }
  const scheme = url.protocol === "wss:" ? "https:" : "http:";
  return `${scheme}//${url.host}`;
}

export function loadConfig(env: Env = process.env): SatelliteConfig {
  const backendUrl = required(env, "BACKEND_URL");
  const backendToken = required(env, "BACKEND_TOKEN");

  const vad: Partial<PipelineSettings> = {};
  const speechThreshold = optionalPositiveInt(env, "VAD_SPEECH_THRESHOLD");
  const silenceDurationMs = optionalPositiveInt(env, "VAD_SILENCE_MS");
  const minSpeechDurationMs = optionalPositiveInt(env, "VAD_MIN_SPEECH_MS");
  const maxRecordingMs = optionalPositiveInt(env, "VAD_MAX_RECORDING_MS");
  if (speechThreshold !== undefined) vad.speechThreshold = speechThreshold;
  if (silenceDurationMs !== undefined) vad.silenceDurationMs = silenceDurationMs;
  if (minSpeechDurationMs !== undefined) vad.minSpeechDurationMs = minSpeechDurationMs;
  if (maxRecordingMs !== undefined) vad.maxRecordingMs = maxRecordingMs;

  return {
    backendUrl,
    backendToken,
    httpBaseUrl: deriveHttpBaseUrl(backendUrl),
    controlPort: positiveInt(env, "CONTROL_PORT", 3000),
    settingsFile: env.SETTINGS_FILE?.trim() || "settings.json",
    capturePcmFile: env.CAPTURE_PCM_FILE?.trim() || null,
    outputDir: env.OUTPUT_DIR?.trim() || "output",
    vad,
    responseTimeoutMs: positiveInt(env, "RESPONSE_TIMEOUT_MS", DEFAULT_ORCHESTRATOR_CONFIG.responseTimeoutMs),
    reconnectDelayMs: positiveInt(env, "RECONNECT_DELAY_MS", 10_000),
  };
}

/** Environment VAD overrides applied on top of the built-in defaults. */
export function initialSettings(config: SatelliteConfig): PipelineSettings {
  return { ...DEFAULT_PIPELINE_SETTINGS, ...config.vad };
}
