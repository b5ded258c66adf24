/**
 * Version information for the CLI, read from package.json at runtime.
 */

import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = dirname(fileURLToPath(import.meta.url));

let cachedVersion: string | null = null;

async function tryReadPackageVersion(path: string): Promise<string | null> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch {
    return null;
  }
  const pkg: unknown = JSON.parse(content);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
    return typeof pkg.version === "string" ? pkg.version : null;
  }
  return null;
}

/**
 * Current version from package.json, cached after the first call.
 *
 * Compiled: dist/core/version.js -> ../../package.json
 * Source:   src/core/version.ts  -> ../../package.json
 */
export async function getVersion(): Promise<string> {
  if (cachedVersion) {
    return cachedVersion;
  }

  const version = await tryReadPackageVersion(join(moduleDir, "..", "..", "package.json"));
  cachedVersion = version ?? "unknown";
  return cachedVersion;
}
