/**
 * Compare module exports.
 */

export * from "./session.js";
