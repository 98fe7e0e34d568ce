/**
 * @module core
 * Core layer exports (domain + ports + commands)
 */

export * from "./domain/index.js";
export * from "./ports/index.js";
export * from "./commands/index.js";
