import type { PipelineSpan } from "@pipeline-trace/core";

export const ROOT_SPAN_NAME = "complex_operation";

export const PHASES = {
  databaseQuery: "database_query",
  processing: "processing",
  concurrentFanout: "concurrent_fanout",
  externalCall: "external_call",
  finalComputation: "final_computation",
} as const;

export type PhaseName = (typeof PHASES)[keyof typeof PHASES];

export const FAN_OUT_TASKS = ["task1", "task2", "task3"] as const;

export type FanOutTask = (typeof FAN_OUT_TASKS)[number];

/**
 * Anything that gets its own span inside the root span.
 */
export type StepName = PhaseName | FanOutTask;

export interface PhaseContext {
  /**
   * Aborted when the run is cancelled or times out.
   */
  signal: AbortSignal;
  /**
   * The span of the phase being run. Attributes set on it are exported.
   */
  span: PipelineSpan;
}

/**
 * The work done by each phase. A handler signals failure by rejecting.
 */
export interface PhaseHandlers {
  databaseQuery(context: PhaseContext): Promise<void>;
  processing(context: PhaseContext): Promise<void>;
  subTask(task: FanOutTask, context: PhaseContext): Promise<void>;
  finalComputation(context: PhaseContext): Promise<void>;
}

/**
 * Resolves after `ms`, or rejects with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface SimulatedHandlersOptions {
  /**
   * Source of uniformly distributed numbers in [0, 1).
   */
  random?: () => number;
}

/**
 * Handlers that only wait, standing in for real I/O.
 */
export function createSimulatedHandlers({
  random = Math.random,
}: SimulatedHandlersOptions = {}): PhaseHandlers {
  const latency = (min: number, max: number) =>
    Math.round(min + random() * (max - min));
  return {
    databaseQuery: async ({ span, signal }) => {
      const ms = latency(100, 300);
      span.setAttribute("simulated.latency_ms", ms);
      await sleep(ms, signal);
    },
    processing: async ({ span, signal }) => {
      const ms = latency(200, 400);
      span.setAttribute("simulated.latency_ms", ms);
      await sleep(ms, signal);
    },
    subTask: async (task, { span, signal }) => {
      const ms = latency(100, 500);
      span.setAttributes({ "task.name": task, "simulated.latency_ms": ms });
      await sleep(ms, signal);
    },
    finalComputation: async ({ span, signal }) => {
      const ms = latency(100, 200);
      span.setAttribute("simulated.latency_ms", ms);
      await sleep(ms, signal);
    },
  };
}
