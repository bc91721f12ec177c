import { assertUnreachable, errorMessage } from "@pipeline-trace/core";

import { FanOutTask, PHASES, StepName } from "./phases";

/**
 * A phase of the complex operation failed; later phases did not run.
 */
export class PipelinePhaseError extends Error {
  readonly phase: StepName;

  constructor(phase: StepName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelinePhaseError";
    this.phase = phase;
  }
}

export interface SubTaskFailure {
  task: FanOutTask;
  message: string;
}

/**
 * One or more sub-tasks of the fan-out failed. Raised only after every
 * sub-task has finished.
 */
export class SubTaskFailureError extends PipelinePhaseError {
  readonly failures: SubTaskFailure[];

  constructor(failures: SubTaskFailure[]) {
    super(
      PHASES.concurrentFanout,
      `Sub-task(s) failed: ${failures
        .map(({ task, message }) => `${task} (${message})`)
        .join(", ")}`,
    );
    this.name = "SubTaskFailureError";
    this.failures = failures;
  }
}

/**
 * - `transport`: the request never produced a response
 * - `status`: the response status was not 2xx
 * - `body`: the body was not a JSON object
 */
export type ExternalCallFailureReason = "transport" | "status" | "body";

export class ExternalCallError extends Error {
  readonly endpoint: string;
  readonly reason: ExternalCallFailureReason;
  readonly status?: number;

  constructor(
    message: string,
    options: {
      endpoint: string;
      reason: ExternalCallFailureReason;
      status?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "ExternalCallError";
    this.endpoint = options.endpoint;
    this.reason = options.reason;
    this.status = options.status;
  }
}

export type CancellationReason = "timeout" | "cancelled";

/**
 * The run was aborted by its deadline or by the caller.
 */
export class PipelineCancelledError extends Error {
  readonly reason: CancellationReason;

  constructor(reason: CancellationReason, message: string) {
    super(message);
    this.name = "PipelineCancelledError";
    this.reason = reason;
  }
}

export type PipelineErrorKind =
  | "phase"
  | "subtask"
  | "external_call"
  | "timeout"
  | "cancelled"
  | "internal";

/**
 * What a caller is told about a failed run.
 */
export interface PipelineError {
  kind: PipelineErrorKind;
  phase?: StepName;
  message: string;
}

export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineCancelledError) {
    return { kind: error.reason, message: error.message };
  }
  if (error instanceof SubTaskFailureError) {
    return { kind: "subtask", phase: error.phase, message: error.message };
  }
  if (error instanceof PipelinePhaseError) {
    return {
      kind: error.cause instanceof ExternalCallError ? "external_call" : "phase",
      phase: error.phase,
      message: error.message,
    };
  }
  return { kind: "internal", message: errorMessage(error) };
}

/**
 * The HTTP status a failed run is answered with.
 */
export function statusCodeFor({ kind }: PipelineError): number {
  switch (kind) {
    case "external_call":
      return 502;
    case "timeout":
      return 504;
    case "cancelled":
      return 499;
    case "phase":
    case "subtask":
    case "internal":
      return 500;
    default:
      return assertUnreachable(kind);
  }
}
