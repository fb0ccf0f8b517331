/**
 * Assist pipeline JSON protocol: outgoing request builders and validation of
 * incoming server messages into typed values.
 *
 * Server messages carry a top-level `type` (auth_required, auth_ok,
 * auth_invalid, event, result); run lifecycle events nest a second `type`
 * under `event`.
 */

import type { BackendEvent } from "./types.js";
import { isValidHandlerId } from "./pipeline-frame-codec.js";

// ─── Audio Input Format ─────────────────────────────────────────────────────────

export const AUDIO_INPUT_FORMAT = {
  sample_rate: 16000,
  num_channels: 1,
  bit_depth: 16,
} as const;

// ─── Outgoing Messages ──────────────────────────────────────────────────────────

export interface AuthMessage {
  type: "auth";
  access_token: string;
}

export interface RunAudioMessage {
  id: number;
  type: "assist_pipeline/run";
  start_stage: "stt";
  end_stage: "tts";
  input: typeof AUDIO_INPUT_FORMAT;
  conversation_id?: string;
}

export interface RunTextMessage {
  id: number;
  type: "assist_pipeline/run";
  start_stage: "intent";
  end_stage: "tts";
  input: { text: string };
  conversation_id?: string;
}

export interface ConversationProcessMessage {
  id: number;
  type: "conversation/process";
  text: string;
}

export type ClientMessage = AuthMessage | RunAudioMessage | RunTextMessage | ConversationProcessMessage;

export function buildAuth(accessToken: string): AuthMessage {
  return { type: "auth", access_token: accessToken };
}

export function buildAudioRun(id: number, conversationId?: string | null): RunAudioMessage {
  const msg: RunAudioMessage = {
    id,
    type: "assist_pipeline/run",
    start_stage: "stt",
    end_stage: "tts",
    input: AUDIO_INPUT_FORMAT,
  };
  if (conversationId) msg.conversation_id = conversationId;
  return msg;
}

export function buildTextRun(id: number, text: string, conversationId?: string | null): RunTextMessage {
  const msg: RunTextMessage = {
    id,
    type: "assist_pipeline/run",
    start_stage: "intent",
    end_stage: "tts",
    input: { text },
  };
  if (conversationId) msg.conversation_id = conversationId;
  return msg;
}

export function buildConversationProcess(id: number, text: string): ConversationProcessMessage {
  return { id, type: "conversation/process", text };
}

// ─── Incoming Messages ──────────────────────────────────────────────────────────

export type ServerMessage =
  | { type: "auth_required" }
  | { type: "auth_ok" }
  | { type: "auth_invalid"; message: string }
  | {
      type: "event";
      id: number;
      /** Raw event type, kept for logging informational stages. */
      eventType: string;
      /** Decoded run lifecycle event, or null for informational/unusable events. */
      event: BackendEvent | null;
    }
  | {
      type: "result";
      id: number;
      success: boolean;
      error: { code: string; message: string } | null;
      speech: string | null;
      conversationId: string | null;
    };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getRecord(obj: Record<string, unknown> | null, key: string): Record<string, unknown> | null {
  if (!obj) return null;
  const value = obj[key];
  return isRecord(value) ? value : null;
}

function getString(obj: Record<string, unknown> | null, key: string): string | null {
  if (!obj) return null;
  const value = obj[key];
  return typeof value === "string" ? value : null;
}

/** Follows `response.speech.plain.speech`. */
function extractPlainSpeech(response: Record<string, unknown> | null): string | null {
  return getString(getRecord(getRecord(response, "speech"), "plain"), "speech");
}

/**
 * Decode one run lifecycle event from an `event` message's `event` object.
 * Returns null for informational stages (stt-start, intent-start, tts-start)
 * and for events missing the fields they need.
 */
export function decodePipelineEvent(event: Record<string, unknown>): BackendEvent | null {
  const eventType = getString(event, "type");
  const data = getRecord(event, "data");

  switch (eventType) {
    case "run-start": {
      const handlerId = getRecord(data, "runner_data")?.["stt_binary_handler_id"];
      // Text runs have no STT stage and therefore no handler id
      return { type: "run-start", handlerId: isValidHandlerId(handlerId) ? handlerId : null };
    }

    case "stt-end": {
      const text = getString(getRecord(data, "stt_output"), "text");
      return text === null ? null : { type: "stt-end", text };
    }

    case "intent-end": {
      const intentOutput = getRecord(data, "intent_output");
      if (!intentOutput) return null;
      const response = getRecord(intentOutput, "response");
      const responseType = getString(response, "response_type") ?? "unknown";
      const responseData = getRecord(response, "data");

      let name = responseType;
      const targets = responseData?.["targets"];
      if (responseType === "action_done" && Array.isArray(targets) && targets.length > 0) {
        const first: unknown = targets[0];
        const targetType = isRecord(first) ? getString(first, "type") : null;
        if (targetType) name = targetType;
      }

      return {
        type: "intent-end",
        name,
        slotsJson: JSON.stringify(responseData ?? {}),
        responseSpeech: extractPlainSpeech(response) ?? "",
        conversationId: getString(intentOutput, "conversation_id"),
      };
    }

    case "tts-end": {
      const ttsOutput = getRecord(data, "tts_output");
      return {
        type: "tts-end",
        text: getString(ttsOutput, "text") ?? "",
        audioUrl: getString(ttsOutput, "url"),
      };
    }

    case "run-end":
      return { type: "run-end" };

    case "error":
      return {
        type: "error",
        code: getString(data, "code") ?? "unknown",
        message: getString(data, "message") ?? "",
      };

    default:
      return null;
  }
}

/**
 * Parse and validate a text frame from the server.
 * Returns null for invalid JSON or unrecognised shapes.
 */
export function decodeServerMessage(text: string): ServerMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const type = getString(parsed, "type");
  const id = parsed["id"];

  switch (type) {
    case "auth_required":
      return { type: "auth_required" };
    case "auth_ok":
      return { type: "auth_ok" };
    case "auth_invalid":
      return { type: "auth_invalid", message: getString(parsed, "message") ?? "" };

    case "event": {
      const event = getRecord(parsed, "event");
      if (typeof id !== "number" || !event) return null;
      return {
        type: "event",
        id,
        eventType: getString(event, "type") ?? "unknown",
        event: decodePipelineEvent(event),
      };
    }

    case "result": {
      if (typeof id !== "number") return null;
      const errorObj = getRecord(parsed, "error");
      const result = getRecord(parsed, "result");
      return {
        type: "result",
        id,
        success: parsed["success"] === true,
        error: errorObj
          ? {
              code: getString(errorObj, "code") ?? "unknown",
              message: getString(errorObj, "message") ?? "",
            }
          : null,
        speech: extractPlainSpeech(getRecord(result, "response")),
        conversationId: getString(result, "conversation_id"),
      };
    }

    default:
      return null;
  }
}
