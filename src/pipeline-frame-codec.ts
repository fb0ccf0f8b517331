/**
 * Binary audio framing for the assist pipeline stream.
 *
 * Wire format: [1 byte handler id][N bytes little-endian PCM16]
 * End of audio: [1 byte handler id] with N = 0
 *
 * The handler id is assigned by the backend in the run-start event and scopes
 * every binary frame of that run.
 */

// ─── Constants ──────────────────────────────────────────────────────────────────

const MAX_HANDLER_ID = 0xff;

/** PCM16 samples are 2 bytes; an odd payload cannot be valid audio. */
const BYTES_PER_SAMPLE = 2;

export interface DecodedAudioFrame {
  handlerId: number;
  pcm: Buffer;
  endOfAudio: boolean;
}

export function isValidHandlerId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_HANDLER_ID;
}

function assertHandlerId(handlerId: number): void {
  if (!isValidHandlerId(handlerId)) {
    throw new Error(`Invalid handler id: ${handlerId} (expected integer 0-${MAX_HANDLER_ID})`);
  }
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode one chunk of captured audio.
 * Produces: [handlerId][PCM bytes]
 */
export function encodeAudioFrame(handlerId: number, pcm: Buffer): Buffer {
  assertHandlerId(handlerId);
  if (pcm.length === 0) {
    throw new Error("Audio frame payload is empty; use encodeEndOfAudio to close the stream");
  }
  if (pcm.length % BYTES_PER_SAMPLE !== 0) {
    throw new Error(`Audio frame payload must be whole PCM16 samples, got ${pcm.length} bytes`);
  }

  const buf = Buffer.alloc(1 + pcm.length);
  buf[0] = handlerId;
  pcm.copy(buf, 1);
  return buf;
}

/** Encode the end-of-audio marker: the handler id byte alone. */
export function encodeEndOfAudio(handlerId: number): Buffer {
  assertHandlerId(handlerId);
  return Buffer.from([handlerId]);
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

/**
 * Decode a binary frame. Returns null for an empty buffer or a payload that is
 * not whole PCM16 samples.
 */
export function decodeAudioFrame(buf: Buffer): DecodedAudioFrame | null {
  if (buf.length === 0) return null;

  const pcm = buf.subarray(1);
  if (pcm.length % BYTES_PER_SAMPLE !== 0) return null;

  return {
    handlerId: buf[0],
    pcm,
    endOfAudio: pcm.length === 0,
  };
}
