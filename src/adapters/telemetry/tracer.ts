/**
 * Tracer
 *
 * No-op tracer used when no tracing backend is wired in. Pass your own
 * TracerPort (e.g. a thin wrapper around @opentelemetry/api) to the session
 * to get real spans.
 */

import type {
  SpanAttributeValue,
  SpanLike,
  TracerPort,
} from "../../core/ports/telemetry.port.js";

const noopSpan: SpanLike = {
  setAttribute: () => {},
  setStatus: () => {},
  recordException: () => {},
  end: () => {},
};

export const noopTracer: TracerPort = {
  startSpan: (
    _name: string,
    _attributes?: Record<string, SpanAttributeValue>,
  ): SpanLike => noopSpan,
};
