/**
 * @harvestkit/telemetry — OpenTelemetry tracing and metrics helpers.
 *
 * Public API:
 * - withSpan() — run a function inside a span
 * - getFilesetLoads() — fileset load counter
 */

export { getFilesetLoads } from "./metrics.js";
export { type SpanAttributes, TRACER_NAME, withSpan } from "./span-helpers.js";
