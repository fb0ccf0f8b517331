// Voice Satellite - Settings Store
// Pipeline thresholds persisted as JSON so values tuned through the control
// server survive a restart.

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { PipelineSettings } from "./types.js";
import { DEFAULT_PIPELINE_SETTINGS } from "./orchestrator.js";

type SettingsKey = keyof PipelineSettings;

interface FieldRule {
  integer: boolean;
  min: number;
  max: number;
}

const RULES: Record<SettingsKey, FieldRule> = {
  speechThreshold: { integer: true, min: 1, max: 32767 },
  silenceDurationMs: { integer: true, min: 1, max: 60_000 },
  minSpeechDurationMs: { integer: true, min: 1, max: 60_000 },
  maxRecordingMs: { integer: true, min: 1, max: 120_000 },
  wakeThreshold: { integer: false, min: 0.01, max: 1 },
};

function isSettingsKey(key: string): key is SettingsKey {
  return Object.prototype.hasOwnProperty.call(RULES, key);
}

/**
 * Validates a partial settings object (e.g. a request body).
 * Throws on unknown keys, non-numbers and out-of-range values.
 */
export function validateSettings(input: unknown): Partial<PipelineSettings> {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new Error("Settings must be a JSON object");
  }

  const result: Partial<PipelineSettings> = {};
  for (const [key, value] of Object.entries(input)) {
    if (!isSettingsKey(key)) {
      throw new Error(`Unknown setting "${key}"`);
    }
    const rule = RULES[key];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new Error(`Setting "${key}" must be a number`);
    }
    if (rule.integer && !Number.isInteger(value)) {
      throw new Error(`Setting "${key}" must be an integer`);
    }
    if (value < rule.min || value > rule.max) {
      throw new Error(`Setting "${key}" must be between ${rule.min} and ${rule.max}`);
    }
    result[key] = value;
  }
  return result;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class SettingsStore {
  private readonly filePath: string;
  private readonly defaults: PipelineSettings;

  constructor(filePath: string, defaults: PipelineSettings = DEFAULT_PIPELINE_SETTINGS) {
    this.filePath = filePath;
    this.defaults = defaults;
  }

  get path(): string {
    return this.filePath;
  }

  /** Stored settings over the defaults; a missing file yields the defaults. */
  async load(): Promise<PipelineSettings> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return { ...this.defaults };
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new Error(`Settings file ${this.filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return { ...this.defaults, ...validateSettings(parsed) };
  }

  async save(settings: PipelineSettings): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(settings, null, 2) + "\n", "utf-8");
  }
}
