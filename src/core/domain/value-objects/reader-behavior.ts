/**
 * Reader Behavior Value Object
 *
 * Tells the driver how much of a result the caller is going to read.
 */

export type ReaderBehavior = "DEFAULT" | "SINGLE_RESULT" | "SINGLE_ROW";
