/**
 * @module core/domain/value-objects
 */

export * from "./command-kind.js";
export * from "./parameter-direction.js";
export * from "./db-type.js";
export * from "./isolation-level.js";
export * from "./reader-behavior.js";
