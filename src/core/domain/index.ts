/**
 * @module core/domain
 * Domain entities, value objects and errors
 */

export * from "./entities/index.js";
export * from "./value-objects/index.js";
export * from "./errors/index.js";
