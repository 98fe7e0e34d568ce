/**
 * @module adapters/logging
 */

export * from "./console-logger.js";
