/**
 * Renderer exports.
 */

export * from "./json.js";
export * from "./terminal.js";
