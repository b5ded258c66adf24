/**
 * Tree module exports.
 */

export * from "./matcher.js";
export * from "./query.js";
