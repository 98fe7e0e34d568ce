/**
 * @module adapters/telemetry
 */

export * from "./tracer.js";
export * from "./metrics.js";
