/**
 * Command Kind Value Object
 */

export type CommandKind = "PROCEDURE" | "TEXT";
