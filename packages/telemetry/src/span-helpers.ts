/**
 * Runs fileset work inside an OpenTelemetry span. A failure is recorded as
 * an exception event, an ERROR status and, for catalog errors, an
 * `error.code` attribute; the span is ended either way.
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";

export const TRACER_NAME = "harvestkit";

/** Attribute values accepted on fileset spans */
export type SpanAttributes = Readonly<Record<string, string | number | boolean>>;

/**
 * Execute an async function within a named OTel span.
 *
 * When no tracer provider is registered the function still runs,
 * inside a no-op span.
 *
 * @param name - Span name (e.g., "harvestkit.fileset.read")
 * @param attributes - Key-value pairs to set on the span
 * @param fn - Async function to execute within the span
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        span.setAttribute(key, value);
      }
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
        if ("code" in error && typeof error.code === "string") {
          span.setAttribute("error.code", error.code);
        }
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
