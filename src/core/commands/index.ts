/**
 * @module core/commands
 */

export * from "./sql-command.js";
export * from "./sql-session.js";
