/**
 * diffy library exports.
 *
 * This module exports the core types and functions for programmatic use.
 */

// Core types and errors
export * from "./core/types.js";
export * from "./core/errors.js";
export { configureLogger, resetLogger } from "./core/logger.js";

// Scanning
export { scanRoot, type ScanOptions } from "./scan/scanner.js";
export { IgnoreRules, parseIgnoreLine, parseIgnoreFile } from "./scan/ignore.js";
export { detectContentType, decodeText } from "./scan/content.js";
export { fingerprintBuffer, fingerprintFile } from "./scan/fingerprint.js";

// Matching
export * from "./tree/index.js";

// Line diff
export { diffLines, type DiffOptions, type LineDiff } from "./diff/line-diff.js";
export { diffFilePair, MAX_DIFF_FILE_SIZE, type FilePairRoots } from "./diff/file-diff.js";
export { reconstructText } from "./diff/hunks.js";

// Sessions
export * from "./compare/index.js";

// Renderers
export * from "./render/index.js";

// Web
export { startServer, type RunningServer, type ServerOptions } from "./web/server.js";
