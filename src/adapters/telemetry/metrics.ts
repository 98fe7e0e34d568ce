/**
 * Command Metrics
 *
 * A no-op recorder (default) and an in-memory recorder that can export its
 * counters in Prometheus text format.
 */

import type { CommandKind } from "../../core/domain/value-objects/command-kind.js";
import type {
  CommandOperation,
  MetricRecorder,
} from "../../core/ports/telemetry.port.js";

// ============================================
// No-op Implementation
// ============================================

export class NoopMetrics implements MetricRecorder {
  recordCommand(
    _kind: CommandKind,
    _operation: CommandOperation,
    _durationMs: number,
  ): void {}
  recordFailure(
    _kind: CommandKind,
    _operation: CommandOperation,
    _errorType: string,
  ): void {}
  recordRollback(_kind: CommandKind, _operation: CommandOperation): void {}
}

export const noopMetrics: MetricRecorder = new NoopMetrics();

// ============================================
// In-memory Implementation
// ============================================

export interface CommandMetricsSnapshot {
  commandsTotal: number;
  failuresTotal: number;
  rollbacksTotal: number;
  durationMsTotal: number;
  /** Failures keyed by error name */
  failuresByType: Record<string, number>;
}

export class InMemoryMetrics implements MetricRecorder {
  private commandsTotal = 0;
  private failuresTotal = 0;
  private rollbacksTotal = 0;
  private durationMsTotal = 0;
  private readonly failuresByType = new Map<string, number>();

  constructor(private readonly prefix = "sql") {}

  recordCommand(
    _kind: CommandKind,
    _operation: CommandOperation,
    durationMs: number,
  ): void {
    this.commandsTotal++;
    this.durationMsTotal += durationMs;
  }

  recordFailure(
    _kind: CommandKind,
    _operation: CommandOperation,
    errorType: string,
  ): void {
    this.failuresTotal++;
    this.failuresByType.set(
      errorType,
      (this.failuresByType.get(errorType) ?? 0) + 1,
    );
  }

  recordRollback(_kind: CommandKind, _operation: CommandOperation): void {
    this.rollbacksTotal++;
  }

  snapshot(): CommandMetricsSnapshot {
    return {
      commandsTotal: this.commandsTotal,
      failuresTotal: this.failuresTotal,
      rollbacksTotal: this.rollbacksTotal,
      durationMsTotal: this.durationMsTotal,
      failuresByType: Object.fromEntries(this.failuresByType),
    };
  }

  toPrometheusFormat(): string {
    const metrics = this.snapshot();
    const lines: string[] = [];

    const addCounter = (name: string, help: string, value: number) => {
      lines.push(`# HELP ${this.prefix}_${name} ${help}`);
      lines.push(`# TYPE ${this.prefix}_${name} counter`);
      lines.push(`${this.prefix}_${name} ${value}`);
    };

    addCounter(
      "commands_total",
      "Commands that completed successfully",
      metrics.commandsTotal,
    );
    addCounter("failures_total", "Commands that failed", metrics.failuresTotal);
    addCounter(
      "rollbacks_total",
      "Transactions rolled back after a failure",
      metrics.rollbacksTotal,
    );
    addCounter(
      "duration_ms_total",
      "Time spent in successful commands, in milliseconds",
      metrics.durationMsTotal,
    );

    return lines.join("\n") + "\n";
  }
}
