/**
 * Parameter Direction Value Object
 */

export type ParameterDirection = "INPUT" | "OUTPUT" | "INPUT_OUTPUT";

export function isOutputDirection(direction: ParameterDirection): boolean {
  return direction === "OUTPUT" || direction === "INPUT_OUTPUT";
}

export function isInputDirection(direction: ParameterDirection): boolean {
  return direction === "INPUT" || direction === "INPUT_OUTPUT";
}
