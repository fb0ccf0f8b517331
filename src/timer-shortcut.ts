// Voice Satellite - Local Timer Shortcut
// Recognises timer requests in a transcript without waiting for the backend's
// NLU, and reconciles the local guess with the backend's own intent result so
// that one utterance produces one confirmation.

import { readFileSync } from "node:fs";
import type { LocalTimerCandidate } from "./types.js";

// ─── Number Words ───────────────────────────────────────────────────────────────

export interface NumberWords {
  units: Map<string, number>;
  teens: Map<string, number>;
  tens: Map<string, number>;
  half: Set<string>;
  conjunctions: Set<string>;
}

function toNumberMap(value: unknown, field: string): Map<string, number> {
  if (typeof value !== "object" || value === null) {
    throw new Error(`number-words: "${field}" must be an object`);
  }
  const map = new Map<string, number>();
  for (const [word, n] of Object.entries(value)) {
    if (typeof n !== "number") {
      throw new Error(`number-words: "${field}.${word}" must be a number`);
    }
    map.set(word, n);
  }
  return map;
}

function toWordSet(value: unknown, field: string): Set<string> {
  if (!Array.isArray(value) || !value.every((w) => typeof w === "string")) {
    throw new Error(`number-words: "${field}" must be an array of strings`);
  }
  return new Set(value);
}

/** Validate the parsed contents of a number-words JSON file. */
export function parseNumberWords(raw: unknown): NumberWords {
  if (typeof raw !== "object" || raw === null) {
    throw new Error("number-words: expected a JSON object");
  }
  const entries = new Map(Object.entries(raw));
  return {
    units: toNumberMap(entries.get("units"), "units"),
    teens: toNumberMap(entries.get("teens"), "teens"),
    tens: toNumberMap(entries.get("tens"), "tens"),
    half: toWordSet(entries.get("half"), "half"),
    conjunctions: toWordSet(entries.get("conjunctions"), "conjunctions"),
  };
}

const NUMBER_WORDS_URL = new URL("../data/number-words.json", import.meta.url);

let defaultWords: NumberWords | null = null;

function numberWords(): NumberWords {
  if (!defaultWords) {
    defaultWords = parseNumberWords(JSON.parse(readFileSync(NUMBER_WORDS_URL, "utf-8")));
  }
  return defaultWords;
}

// ─── Keywords and Units ─────────────────────────────────────────────────────────

const TIMER_KEYWORDS = ["timer", "tajmer", "тајмер"];

const HOUR_UNITS = new Set(["h", "hr", "hrs", "hour", "hours", "sat", "sata", "sati", "satova", "сат", "сата", "сати", "час", "часа"]);
const MINUTE_UNITS = new Set(["m", "min", "mins"]);
const SECOND_UNITS = new Set(["s", "sec", "secs", "sek"]);

function unitSeconds(token: string): number | null {
  if (HOUR_UNITS.has(token)) return 3600;
  if (MINUTE_UNITS.has(token) || token.startsWith("minut") || token.startsWith("минут")) return 60;
  if (
    SECOND_UNITS.has(token) ||
    token.startsWith("sekund") ||
    token.startsWith("second") ||
    token.startsWith("секунд")
  ) {
    return 1;
  }
  return null;
}

export function hasTimerKeyword(text: string): boolean {
  const lower = text.toLowerCase();
  return TIMER_KEYWORDS.some((k) => lower.includes(k));
}

// ─── Duration Parsing ───────────────────────────────────────────────────────────

const ISO_DURATION = /\bpt(?=\d)(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?\b/;
const CLOCK_DURATION = /\b(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?\b/;

function tokenize(lower: string): string[] {
  return lower
    .replace(/(\d)(\p{L})/gu, "$1 $2")
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length > 0);
}

interface Quantity {
  value: number;
  consumed: number;
}

function readQuantity(tokens: string[], i: number, words: NumberWords): Quantity | null {
  const token = tokens[i];
  if (/^\d+$/.test(token)) {
    return { value: parseInt(token, 10), consumed: 1 };
  }
  if (words.half.has(token)) {
    // "half an hour"
    const skip = tokens[i + 1] === "an" || tokens[i + 1] === "a" ? 2 : 1;
    return { value: 0.5, consumed: skip };
  }

  const tens = words.tens.get(token);
  if (tens !== undefined) {
    const next = tokens[i + 1];
    const direct = next !== undefined ? words.units.get(next) : undefined;
    if (direct !== undefined) {
      return { value: tens + direct, consumed: 2 };
    }
    const afterConjunction = tokens[i + 2];
    if (next !== undefined && words.conjunctions.has(next) && afterConjunction !== undefined) {
      const unit = words.units.get(afterConjunction);
      if (unit !== undefined) {
        return { value: tens + unit, consumed: 3 };
      }
    }
    return { value: tens, consumed: 1 };
  }

  const small = words.teens.get(token) ?? words.units.get(token);
  return small !== undefined ? { value: small, consumed: 1 } : null;
}

/**
 * Parse a duration from free text, in seconds.
 *
 * Recognises `PT#H#M#S`, `H:M:S` / `M:S`, and quantity + unit pairs
 * (digits or number words, summed across pairs). A quantity with no unit
 * anywhere in the text is taken as minutes. Returns null when nothing usable
 * is found or the total is zero.
 */
export function parseDuration(text: string, words: NumberWords = numberWords()): number | null {
  const lower = text.toLowerCase();

  const iso = ISO_DURATION.exec(lower);
  if (iso && (iso[1] || iso[2] || iso[3])) {
    const total = Number(iso[1] ?? 0) * 3600 + Number(iso[2] ?? 0) * 60 + Number(iso[3] ?? 0);
    return total > 0 ? total : null;
  }

  const clock = CLOCK_DURATION.exec(lower);
  if (clock) {
    const total =
      clock[3] !== undefined
        ? Number(clock[1]) * 3600 + Number(clock[2]) * 60 + Number(clock[3])
        : Number(clock[1]) * 60 + Number(clock[2]);
    return total > 0 ? total : null;
  }

  const tokens = tokenize(lower);
  let total = 0;
  let unitFound = false;
  let bare: number | null = null;

  for (let i = 0; i < tokens.length; ) {
    const quantity = readQuantity(tokens, i, words);
    if (!quantity) {
      i++;
      continue;
    }
    const unitToken = tokens[i + quantity.consumed];
    const unit = unitToken !== undefined ? unitSeconds(unitToken) : null;
    if (unit !== null) {
      total += quantity.value * unit;
      unitFound = true;
      i += quantity.consumed + 1;
    } else {
      if (bare === null) bare = quantity.value;
      i += quantity.consumed;
    }
  }

  if (unitFound) {
    const seconds = Math.round(total);
    return seconds > 0 ? seconds : null;
  }
  if (bare !== null) {
    const seconds = Math.round(bare * 60);
    return seconds > 0 ? seconds : null;
  }
  return null;
}

/**
 * Local timer candidate for a transcript: valid only when a timer keyword and
 * a positive duration are both present.
 */
export function resolveTimerShortcut(text: string, words?: NumberWords): LocalTimerCandidate {
  if (!hasTimerKeyword(text)) {
    return { seconds: 0, valid: false };
  }
  const seconds = parseDuration(text, words);
  return seconds === null ? { seconds: 0, valid: false } : { seconds, valid: true };
}

// ─── Backend Reconciliation ─────────────────────────────────────────────────────

function durationValueToSeconds(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? Math.round(value) : null;
  }
  if (typeof value === "string") {
    return parseDuration(value);
  }
  if (typeof value === "object" && value !== null) {
    const parts = new Map(Object.entries(value));
    const part = (key: string) => {
      const n = parts.get(key);
      return typeof n === "number" && Number.isFinite(n) ? n : 0;
    };
    const total = part("hours") * 3600 + part("minutes") * 60 + part("seconds");
    return total > 0 ? Math.round(total) : null;
  }
  return null;
}

/**
 * Timer duration from the backend's intent data, in seconds. Looks at the
 * first target's `duration`, then a top-level `duration`. Returns null when
 * the backend did not resolve one.
 */
export function extractBackendTimerSeconds(slotsJson: string): number | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(slotsJson);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;
  const root = new Map(Object.entries(parsed));

  const targets = root.get("targets");
  if (Array.isArray(targets) && targets.length > 0) {
    const first: unknown = targets[0];
    if (typeof first === "object" && first !== null) {
      const fromTarget = durationValueToSeconds(new Map(Object.entries(first)).get("duration"));
      if (fromTarget !== null) return fromTarget;
    }
  }
  return durationValueToSeconds(root.get("duration"));
}

export function isTimerIntent(intentName: string): boolean {
  return intentName.toLowerCase().includes("timer");
}

export interface TimerIntentInput {
  /** A local timer was already started (and confirmed) for this utterance. */
  localTaken: boolean;
  localSeconds: number;
  /** Candidate from the transcript, if one was resolved but not acted on. */
  candidate: LocalTimerCandidate | null;
  intentName: string;
  slotsJson: string;
}

export interface TimerReconciliation {
  /** start: begin a new timer; adjust: change the local one to `seconds`. */
  action: "none" | "start" | "adjust";
  seconds: number;
  /** Play the local confirmation cue. */
  confirmLocally: boolean;
  /** Skip the backend's spoken response for this utterance. */
  suppressBackendSpeech: boolean;
}

/**
 * Decide what a backend intent means for local timers. The backend's
 * structured duration wins when present; the local guess only fills in when
 * the backend recognised a timer but could not resolve its length. At most
 * one path confirms to the user.
 */
export function reconcileTimerIntent(input: TimerIntentInput): TimerReconciliation {
  const none = (suppress: boolean): TimerReconciliation => ({
    action: "none",
    seconds: 0,
    confirmLocally: false,
    suppressBackendSpeech: suppress,
  });

  if (!isTimerIntent(input.intentName)) {
    return none(input.localTaken);
  }

  const backendSeconds = extractBackendTimerSeconds(input.slotsJson);

  if (backendSeconds !== null) {
    if (!input.localTaken) {
      return { action: "start", seconds: backendSeconds, confirmLocally: false, suppressBackendSpeech: false };
    }
    if (backendSeconds === input.localSeconds) {
      return none(true);
    }
    return { action: "adjust", seconds: backendSeconds, confirmLocally: false, suppressBackendSpeech: true };
  }

  if (input.localTaken) {
    return none(true);
  }
  if (input.candidate?.valid) {
    return { action: "start", seconds: input.candidate.seconds, confirmLocally: true, suppressBackendSpeech: true };
  }
  return none(false);
}
