/**
 * Custom error classes for diffy.
 */

import type { Side } from "./types.js";

export class DiffyError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = "DiffyError";
  }
}

export class RootNotFoundError extends DiffyError {
  constructor(
    public readonly side: Side,
    public readonly path: string
  ) {
    super(`${capitalize(side)} path '${path}' does not exist`, 1);
    this.name = "RootNotFoundError";
  }
}

export class RootUnreadableError extends DiffyError {
  constructor(
    public readonly side: Side,
    public readonly path: string,
    reason: string
  ) {
    super(`${capitalize(side)} path '${path}' cannot be read: ${reason}`, 1);
    this.name = "RootUnreadableError";
  }
}

export class ScanAbortedError extends DiffyError {
  constructor(root: string) {
    super(`Scan of ${root} was aborted`, 130);
    this.name = "ScanAbortedError";
  }
}

export class BinaryContentError extends DiffyError {
  constructor(
    public readonly relativePath: string,
    public readonly side: Side
  ) {
    super(
      `Cannot compute a line diff for ${displayPath(relativePath)}: ` +
        `${side} side is binary`,
      1
    );
    this.name = "BinaryContentError";
  }
}

export class NodeNotFoundError extends DiffyError {
  constructor(public readonly relativePath: string) {
    super(`No entry at ${displayPath(relativePath)} in either tree`, 1);
    this.name = "NodeNotFoundError";
  }
}

export class NotAFilePairError extends DiffyError {
  constructor(public readonly relativePath: string) {
    super(`${displayPath(relativePath)} is not a file on both sides`, 1);
    this.name = "NotAFilePairError";
  }
}

export class EntryUnreadableError extends DiffyError {
  constructor(
    public readonly relativePath: string,
    public readonly side: Side,
    reason: string
  ) {
    super(
      `Cannot read ${side} side of ${displayPath(relativePath)}: ${reason}`,
      1
    );
    this.name = "EntryUnreadableError";
  }
}

export class FileTooLargeError extends DiffyError {
  constructor(
    public readonly relativePath: string,
    public readonly side: Side,
    public readonly size: number,
    public readonly limit: number
  ) {
    super(
      `Cannot compute a line diff for ${displayPath(relativePath)}: ` +
        `${side} side is ${size} bytes, the limit is ${limit}`,
      1
    );
    this.name = "FileTooLargeError";
  }
}

export class InvalidOptionError extends DiffyError {
  constructor(option: string, reason: string) {
    super(`Invalid value for ${option}: ${reason}`, 2);
    this.name = "InvalidOptionError";
  }
}

/**
 * Extract a readable reason from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return typeof code === "string" ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}

function displayPath(relativePath: string): string {
  return relativePath === "" ? "the root" : relativePath;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
