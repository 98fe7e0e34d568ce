/**
 * Telemetry Port
 *
 * Tracing and metrics hooks for command execution.
 */

import type { CommandKind } from "../domain/value-objects/command-kind.js";

export type SpanAttributeValue = string | number | boolean;

export interface SpanLike {
  setAttribute(key: string, value: SpanAttributeValue): void;
  setStatus(status: { code: number; message?: string }): void;
  recordException(exception: Error): void;
  end(): void;
}

export interface TracerPort {
  startSpan(name: string, attributes?: Record<string, SpanAttributeValue>): SpanLike;
}

/**
 * Terminal operation names as reported to telemetry
 */
export type CommandOperation =
  | "execute"
  | "queryOne"
  | "query"
  | "queryEach"
  | "queryAsDictionary"
  | "queryMultiple";

export interface MetricRecorder {
  recordCommand(
    kind: CommandKind,
    operation: CommandOperation,
    durationMs: number,
  ): void;
  recordFailure(
    kind: CommandKind,
    operation: CommandOperation,
    errorType: string,
  ): void;
  recordRollback(kind: CommandKind, operation: CommandOperation): void;
}
