/**
 * @module adapters/persistence
 * PostgreSQL driver adapter
 */

export * from "./pg-driver.js";
export * from "./buffered-cursor.js";
export * from "./statement-renderer.js";
