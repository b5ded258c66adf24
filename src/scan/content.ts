/**
 * Text/binary classification of file content.
 *
 * A buffer is binary when any of these holds:
 * - the first 8 KiB contain a NUL byte
 * - the buffer is not valid UTF-8
 * - more than 30% of the first 8 KiB are control bytes (anything below 0x20
 *   other than tab, LF, CR, FF, BS and ESC, plus DEL)
 *
 * An empty buffer is text.
 */

import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";

export const SAMPLE_SIZE = 8192;

export const CONTROL_RATIO_THRESHOLD = 0.3;

const STREAM_CHUNK_SIZE = 1024 * 1024;

const ALLOWED_CONTROL_BYTES = new Set([0x08, 0x09, 0x0a, 0x0c, 0x0d, 0x1b]);

export type DetectedContent = "text" | "binary";

function isControlByte(byte: number): boolean {
  if (byte === 0x7f) return true;
  return byte < 0x20 && !ALLOWED_CONTROL_BYTES.has(byte);
}

/**
 * Apply the NUL and control-ratio checks to the leading sample only.
 */
export function sampleLooksBinary(bytes: Uint8Array): boolean {
  const length = Math.min(bytes.length, SAMPLE_SIZE);
  if (length === 0) return false;

  let control = 0;
  for (let i = 0; i < length; i++) {
    const byte = bytes[i] ?? 0;
    if (byte === 0) return true;
    if (isControlByte(byte)) control++;
  }
  return control / length > CONTROL_RATIO_THRESHOLD;
}

/**
 * Decode bytes as UTF-8, keeping a byte order mark if present.
 * Returns null when the bytes are not valid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch {
    return null;
  }
}

export function detectContentType(bytes: Uint8Array): DetectedContent {
  if (sampleLooksBinary(bytes)) return "binary";
  return decodeUtf8(bytes) === null ? "binary" : "text";
}

/**
 * Decode bytes as text, or return null when they classify as binary.
 */
export function decodeText(bytes: Uint8Array): string | null {
  if (sampleLooksBinary(bytes)) return null;
  return decodeUtf8(bytes);
}

/**
 * Classify a file on disk. The leading sample is read first so large binary
 * files are rejected without reading them whole.
 */
export async function probeFile(path: string): Promise<DetectedContent> {
  const handle = await open(path, "r");
  try {
    const sample = Buffer.alloc(SAMPLE_SIZE);
    const { bytesRead } = await handle.read(sample, 0, SAMPLE_SIZE, 0);
    if (sampleLooksBinary(sample.subarray(0, bytesRead))) return "binary";
  } finally {
    await handle.close();
  }

  return (await isUtf8File(path)) ? "text" : "binary";
}

/**
 * Validate a file as UTF-8 chunk by chunk, so size is bounded only by the
 * time it takes to read.
 */
export async function isUtf8File(path: string): Promise<boolean> {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    for await (const chunk of createReadStream(path, { highWaterMark: STREAM_CHUNK_SIZE })) {
      decoder.decode(chunk, { stream: true });
    }
    decoder.decode();
  } catch (error) {
    // TextDecoder reports malformed input as a TypeError; read failures propagate
    if (error instanceof TypeError) return false;
    throw error;
  }
  return true;
}
