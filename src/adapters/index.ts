/**
 * @module adapters
 * Adapters for external systems (PostgreSQL, logging, telemetry)
 */

export * from "./persistence/index.js";
export * from "./logging/index.js";
export * from "./telemetry/index.js";
