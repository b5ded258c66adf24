/**
 * Content fingerprints.
 *
 * SHA-256 truncated to 16 hex characters, streamed so large files are never
 * held in memory.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { FileSystemEntry } from "../core/types.js";

export const FINGERPRINT_LENGTH = 16;

export function fingerprintBuffer(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex").slice(0, FINGERPRINT_LENGTH);
}

export async function fingerprintFile(path: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest("hex").slice(0, FINGERPRINT_LENGTH);
}

/**
 * Entries are immutable; attaching a fingerprint yields a new entry.
 */
export function withFingerprint(
  entry: FileSystemEntry,
  fingerprint: string
): FileSystemEntry {
  return { ...entry, fingerprint };
}
