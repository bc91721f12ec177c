import type { Server } from "node:http";

import { InMemorySpanExporter } from "@opentelemetry/sdk-trace-base";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
  ComplexOperationService,
  createService,
  FetchLike,
  loadServiceConfig,
  PhaseContext,
  PhaseHandlers,
  sleep,
} from "../src";

import {
  createInstantHandlers,
  createLogSink,
  EXTERNAL_API_URL,
  jsonResponse,
  TODO,
} from "./helpers";

const listen = (service: ComplexOperationService) =>
  new Promise<Server>((resolve) => {
    const server = service.app.listen(0, () => resolve(server));
  });

const baseUrlOf = (server: Server) => {
  const address = server.address();
  if (address == null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return `http://127.0.0.1:${address.port}`;
};

describe("complex operation service", () => {
  let service: ComplexOperationService;
  let server: Server;
  let spanExporter: InMemorySpanExporter;

  const start = async ({
    env = {},
    externalFetch = async () => jsonResponse(TODO),
    handlers = {},
  }: {
    env?: Record<string, string>;
    externalFetch?: FetchLike;
    handlers?: Partial<PhaseHandlers>;
  } = {}) => {
    spanExporter = new InMemorySpanExporter();
    service = createService({
      config: loadServiceConfig({
        SERVICE_NAME: "test-service",
        EXTERNAL_API_URL,
        ...env,
      }),
      spanExporter,
      fetch: externalFetch,
      handlers: { ...createInstantHandlers(), ...handlers },
      logSink: createLogSink(),
    });
    server = await listen(service);
    return baseUrlOf(server);
  };

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await service.shutdown();
  });

  it("should answer with the external data", async () => {
    const baseUrl = await start();

    const response = await fetch(`${baseUrl}/complex-operation`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      message: "Complex operation completed",
      external_data: TODO,
    });
  });

  it("should export the spans of a run with the service resource", async () => {
    const baseUrl = await start();

    await fetch(`${baseUrl}/complex-operation`, {
      headers: { "x-correlation-id": "req-42" },
    });
    await service.exporter.flush();

    const spans = spanExporter.getFinishedSpans();
    expect(spans).toHaveLength(9);
    const root = spans.find((span) => span.name === "complex_operation");
    expect(root?.attributes["correlation.id"]).toBe("req-42");
    expect(root?.resource.attributes["service.name"]).toBe("test-service");
  });

  it("should read the correlation id from the query string", async () => {
    const baseUrl = await start();

    await fetch(`${baseUrl}/complex-operation?correlation_id=req-7`);

    const root = service.exporter
      .bufferedSpans()
      .find((span) => span.name === "complex_operation");
    expect(root?.attributes["correlation.id"]).toBe("req-7");
  });

  it("should map an external call failure to 502", async () => {
    const baseUrl = await start({
      externalFetch: async () => jsonResponse({}, 500),
    });

    const response = await fetch(`${baseUrl}/complex-operation`);

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: {
        kind: "external_call",
        phase: "external_call",
        message: `${EXTERNAL_API_URL} responded with status 500`,
      },
      trace_id: expect.stringMatching(/^[0-9a-f]{32}$/),
    });
  });

  it("should map a phase failure to 500", async () => {
    const baseUrl = await start({
      handlers: {
        processing: async () => {
          throw new Error("malformed rows");
        },
      },
    });

    const response = await fetch(`${baseUrl}/complex-operation`);

    expect(response.status).toBe(500);
    expect(await response.json()).toMatchObject({
      error: { kind: "phase", phase: "processing", message: "malformed rows" },
    });
  });

  it("should map a timeout to 504", async () => {
    const baseUrl = await start({
      env: { PIPELINE_TIMEOUT_MS: "50" },
      handlers: {
        databaseQuery: ({ signal }: PhaseContext) => sleep(1000, signal),
      },
    });

    const response = await fetch(`${baseUrl}/complex-operation`);

    expect(response.status).toBe(504);
    expect(await response.json()).toMatchObject({
      error: {
        kind: "timeout",
        message: "Complex operation did not finish within 50ms",
      },
    });
  });

  it("should cancel the run when the client disconnects", async () => {
    const baseUrl = await start({
      handlers: {
        databaseQuery: ({ signal }: PhaseContext) => sleep(1000, signal),
      },
    });

    await expect(
      fetch(`${baseUrl}/complex-operation`, {
        signal: AbortSignal.timeout(50),
      }),
    ).rejects.toThrow();

    await vi.waitFor(() => {
      const root = service.exporter
        .bufferedSpans()
        .find((span) => span.name === "complex_operation");
      expect(root?.status).toEqual({ code: "cancelled", detail: "cancelled" });
    });
  });

  it("should report exporter stats on the health check", async () => {
    const baseUrl = await start();
    await fetch(`${baseUrl}/complex-operation`);

    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: "ok",
      exporter: { buffered: 9, inFlight: 0, droppedCapacity: 0 },
    });
  });
});
