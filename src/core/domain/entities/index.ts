/**
 * @module core/domain/entities
 */

export * from "./sql-parameter.js";
export * from "./data-row.js";
