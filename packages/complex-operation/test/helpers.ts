import { DiagLogLevel } from "@opentelemetry/api";
import {
  CompletedSpan,
  CorrelationLogger,
  InMemorySpanSink,
  TracingContext,
} from "@pipeline-trace/core";
import { vi } from "vitest";

import {
  ComplexOperationExecutor,
  ExternalCallAdapter,
  FetchLike,
  PhaseHandlers,
} from "../src";

export const EXTERNAL_API_URL = "http://external.test/todos/1";

export const TODO = {
  userId: 1,
  id: 1,
  title: "placeholder todo",
  completed: false,
};

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

export const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export const createInstantHandlers = (): PhaseHandlers => ({
  databaseQuery: vi.fn(async () => {}),
  processing: vi.fn(async () => {}),
  subTask: vi.fn(async () => {}),
  finalComputation: vi.fn(async () => {}),
});

export const createLogSink = () => ({
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
  verbose: vi.fn(),
});

export interface HarnessOptions {
  handlers?: Partial<PhaseHandlers>;
  fetch?: FetchLike;
  timeoutMillis?: number;
}

/**
 * An executor wired to an in-memory span sink, a recording log sink and a
 * fake `fetch` that answers with {@link TODO}.
 */
export function createHarness({
  handlers = {},
  fetch = async () => jsonResponse(TODO),
  timeoutMillis,
}: HarnessOptions = {}) {
  const sink = new InMemorySpanSink();
  const tracing = new TracingContext({ sink });
  const logSink = createLogSink();
  const logger = new CorrelationLogger({
    tracing,
    sink: logSink,
    level: DiagLogLevel.ALL,
  });
  const fetchMock = vi.fn<FetchLike>(fetch);
  const phaseHandlers = { ...createInstantHandlers(), ...handlers };
  const executor = new ComplexOperationExecutor({
    tracing,
    logger,
    externalCall: new ExternalCallAdapter({
      tracing,
      logger,
      fetch: fetchMock,
    }),
    externalApiUrl: EXTERNAL_API_URL,
    handlers: phaseHandlers,
    timeoutMillis,
  });
  const spanNamed = (name: string): CompletedSpan => {
    const span = sink.findByName(name);
    if (span == null) {
      throw new Error(`No completed span named "${name}"`);
    }
    return span;
  };
  return {
    sink,
    tracing,
    logger,
    logSink,
    fetch: fetchMock,
    handlers: phaseHandlers,
    executor,
    spanNamed,
  };
}
