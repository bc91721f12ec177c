import { SpanKind } from "@opentelemetry/api";
import {
  ContextStack,
  CorrelationLogger,
  errorMessage,
  TracingContext,
} from "@pipeline-trace/core";

import {
  PipelineCancelledError,
  PipelineError,
  PipelinePhaseError,
  SubTaskFailure,
  SubTaskFailureError,
  toPipelineError,
} from "./errors";
import { ExternalCallAdapter } from "./ExternalCallAdapter";
import {
  createSimulatedHandlers,
  FAN_OUT_TASKS,
  PhaseContext,
  PhaseHandlers,
  PHASES,
  ROOT_SPAN_NAME,
  StepName,
} from "./phases";

export const DEFAULT_PIPELINE_TIMEOUT_MILLIS = 30_000;

export interface ComplexOperationResult {
  message: string;
  external_data: Record<string, unknown>;
}

export type PipelineResult =
  | { ok: true; value: ComplexOperationResult; traceId: string }
  | { ok: false; error: PipelineError; traceId: string };

export interface RunInput {
  /**
   * Recorded on the root span as `correlation.id`.
   */
  correlationId?: string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface ComplexOperationExecutorOptions {
  tracing: TracingContext;
  logger: CorrelationLogger;
  externalCall: ExternalCallAdapter;
  externalApiUrl: string;
  handlers?: PhaseHandlers;
  timeoutMillis?: number;
}

/**
 * Resolves or rejects with `work`, or rejects with the signal's reason as soon
 * as it aborts, whichever happens first.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Runs the complex operation: a database query, processing, three concurrent
 * sub-tasks, an external API call and a final computation, each in its own
 * span under a `complex_operation` root span.
 *
 * The first failure stops the phases that follow it. On timeout or caller
 * cancellation every open span is closed with the cancelled status at once,
 * and the run returns without waiting for in-flight work.
 */
export class ComplexOperationExecutor {
  private readonly tracing: TracingContext;
  private readonly logger: CorrelationLogger;
  private readonly externalCall: ExternalCallAdapter;
  private readonly externalApiUrl: string;
  private readonly handlers: PhaseHandlers;
  private readonly timeoutMillis: number;

  constructor({
    tracing,
    logger,
    externalCall,
    externalApiUrl,
    handlers = createSimulatedHandlers(),
    timeoutMillis = DEFAULT_PIPELINE_TIMEOUT_MILLIS,
  }: ComplexOperationExecutorOptions) {
    this.tracing = tracing;
    this.logger = logger;
    this.externalCall = externalCall;
    this.externalApiUrl = externalApiUrl;
    this.handlers = handlers;
    this.timeoutMillis = timeoutMillis;
  }

  async run(
    { correlationId }: RunInput = {},
    { signal }: RunOptions = {},
  ): Promise<PipelineResult> {
    const { span: root, stack } = this.tracing.startTrace(ROOT_SPAN_NAME, {
      kind: SpanKind.SERVER,
      attributes:
        correlationId == null ? {} : { "correlation.id": correlationId },
    });
    const { traceId } = root;

    const controller = new AbortController();
    // Registered before anything else listens, so every span is closed by the
    // time the run observes the abort.
    controller.signal.addEventListener(
      "abort",
      () => {
        const reason: unknown = controller.signal.reason;
        this.tracing.cancel(
          root,
          reason instanceof PipelineCancelledError ? reason.reason : "cancelled",
        );
      },
      { once: true },
    );
    const timer = setTimeout(() => {
      controller.abort(
        new PipelineCancelledError(
          "timeout",
          `Complex operation did not finish within ${this.timeoutMillis}ms`,
        ),
      );
    }, this.timeoutMillis);
    const onCallerAbort = () => {
      controller.abort(
        new PipelineCancelledError(
          "cancelled",
          "Complex operation was cancelled by the caller",
        ),
      );
    };
    if (signal?.aborted) {
      onCallerAbort();
    } else {
      signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    return this.tracing.withStack(stack, async (): Promise<PipelineResult> => {
      try {
        const value = await raceAbort(
          this.runPhases(stack, controller.signal),
          controller.signal,
        );
        this.tracing.endSpan(stack);
        return { ok: true, value, traceId };
      } catch (error) {
        const pipelineError = toPipelineError(error);
        this.logger.error("Complex operation failed", {
          "error.kind": pipelineError.kind,
          "error.phase": pipelineError.phase,
          "error.message": pipelineError.message,
        });
        root.forceEnd({ code: "error", detail: pipelineError.message });
        return { ok: false, error: pipelineError, traceId };
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onCallerAbort);
      }
    });
  }

  private async runPhases(
    root: ContextStack,
    signal: AbortSignal,
  ): Promise<ComplexOperationResult> {
    this.logger.info("Starting complex operation");
    await this.runStep(
      PHASES.databaseQuery,
      root,
      signal,
      (context) => this.handlers.databaseQuery(context),
      "Database query completed",
    );
    await this.runStep(
      PHASES.processing,
      root,
      signal,
      (context) => this.handlers.processing(context),
      "Data processing completed",
    );
    await this.runFanOut(root, signal);
    const externalData = await this.callExternalApi(root, signal);
    await this.runStep(
      PHASES.finalComputation,
      root,
      signal,
      (context) => this.handlers.finalComputation(context),
      "Final computation completed",
    );
    return {
      message: "Complex operation completed",
      external_data: externalData,
    };
  }

  private async runStep(
    name: StepName,
    parent: ContextStack,
    signal: AbortSignal,
    work: (context: PhaseContext) => Promise<void>,
    completedMessage: string,
  ): Promise<void> {
    signal.throwIfAborted();
    await this.tracing.withSpan(name, parent, async (span) => {
      try {
        await work({ signal, span });
      } catch (error) {
        if (signal.aborted || error instanceof PipelinePhaseError) {
          throw error;
        }
        throw new PipelinePhaseError(name, errorMessage(error), {
          cause: error,
        });
      }
      this.logger.info(completedMessage);
    });
  }

  private async runFanOut(
    root: ContextStack,
    signal: AbortSignal,
  ): Promise<void> {
    signal.throwIfAborted();
    await this.tracing.withSpan(
      PHASES.concurrentFanout,
      root,
      async (span, fanOut) => {
        span.setAttribute("fanout.tasks", [...FAN_OUT_TASKS]);
        const outcomes = await Promise.allSettled(
          FAN_OUT_TASKS.map((task) =>
            this.runStep(
              task,
              this.tracing.fork(fanOut),
              signal,
              (context) => this.handlers.subTask(task, context),
              `Async operation ${task} completed`,
            ),
          ),
        );
        signal.throwIfAborted();
        const failures: SubTaskFailure[] = [];
        outcomes.forEach((outcome, index) => {
          if (outcome.status === "rejected") {
            failures.push({
              task: FAN_OUT_TASKS[index],
              message: errorMessage(outcome.reason),
            });
          }
        });
        if (failures.length > 0) {
          throw new SubTaskFailureError(failures);
        }
      },
    );
  }

  private async callExternalApi(
    root: ContextStack,
    signal: AbortSignal,
  ): Promise<Record<string, unknown>> {
    signal.throwIfAborted();
    const result = await this.externalCall.call(this.externalApiUrl, root, {
      signal,
    });
    if (!result.ok) {
      throw new PipelinePhaseError(PHASES.externalCall, result.error.message, {
        cause: result.error,
      });
    }
    return result.body;
  }
}
