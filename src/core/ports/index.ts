/**
 * @module core/ports
 * Ports (interfaces) for hexagonal architecture
 */

export * from "./database-driver.port.js";
export * from "./logger.port.js";
export * from "./telemetry.port.js";
