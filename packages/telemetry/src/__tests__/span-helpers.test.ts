import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { withSpan } from "../span-helpers.js";

class CodedError extends Error {
  constructor(
    message: string,
    readonly code: string,
  ) {
    super(message);
  }
}

const READ_ATTRIBUTES = { "fileset.module": "nginx", "fileset.name": "access" };

describe("withSpan", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable();
    provider.register();
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  it("records a fileset read with its attributes", async () => {
    const vars = await withSpan("harvestkit.fileset.read", READ_ATTRIBUTES, async () => ({
      pipeline: "default",
    }));

    expect(vars).toEqual({ pipeline: "default" });
    const [span] = exporter.getFinishedSpans();
    expect(span?.name).toBe("harvestkit.fileset.read");
    expect(span?.attributes).toEqual(READ_ATTRIBUTES);
    expect(span?.status.code).toBe(SpanStatusCode.OK);
  });

  it("tags a failed read with the error code", async () => {
    const error = new CodedError("Error reading manifest file /m/manifest.yml", "FILESET_MANIFEST_READ_FAILED");

    await expect(
      withSpan("harvestkit.fileset.read", READ_ATTRIBUTES, async () => {
        throw error;
      }),
    ).rejects.toBe(error);

    const [span] = exporter.getFinishedSpans();
    expect(span?.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "Error reading manifest file /m/manifest.yml",
    });
    expect(span?.attributes["error.code"]).toBe("FILESET_MANIFEST_READ_FAILED");
    expect(span?.events.map((e) => e.name)).toEqual(["exception"]);
  });

  it("leaves error.code unset for errors without a code", async () => {
    await expect(
      withSpan("harvestkit.fileset.read", {}, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    const [span] = exporter.getFinishedSpans();
    expect(span?.attributes).not.toHaveProperty("error.code");
    expect(span?.status.code).toBe(SpanStatusCode.ERROR);
  });

  it("ends the span when a non-Error value is thrown", async () => {
    await expect(
      withSpan("harvestkit.fileset.read", {}, async () => {
        throw "unreadable";
      }),
    ).rejects.toBe("unreadable");

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.status.message).toBe("unreadable");
    expect(spans[0]?.events).toHaveLength(0);
  });

  it("parents spans opened inside the callback", async () => {
    await withSpan("harvestkit.module.load", { module: "nginx" }, async () => {
      await withSpan("harvestkit.fileset.read", READ_ATTRIBUTES, async () => undefined);
    });

    const read = exporter.getFinishedSpans().find((s) => s.name === "harvestkit.fileset.read");
    const load = exporter.getFinishedSpans().find((s) => s.name === "harvestkit.module.load");
    expect(read?.parentSpanId).toBe(load?.spanContext().spanId);
  });
});

describe("withSpan without a tracer provider", () => {
  it("still runs the callback", async () => {
    trace.disable();

    expect(await withSpan("harvestkit.fileset.read", READ_ATTRIBUTES, async () => "ok")).toBe("ok");
  });
});
