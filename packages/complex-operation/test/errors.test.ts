import { describe, expect, it } from "vitest";

import {
  ExternalCallError,
  PipelineCancelledError,
  PipelinePhaseError,
  statusCodeFor,
  SubTaskFailureError,
  toPipelineError,
} from "../src";

describe("toPipelineError", () => {
  it("should describe an external call failure", () => {
    const cause = new ExternalCallError("http://external.test failed", {
      endpoint: "http://external.test",
      reason: "transport",
    });
    const error = new PipelinePhaseError("external_call", cause.message, {
      cause,
    });

    expect(toPipelineError(error)).toEqual({
      kind: "external_call",
      phase: "external_call",
      message: "http://external.test failed",
    });
  });

  it("should describe a sub-task failure", () => {
    const error = new SubTaskFailureError([
      { task: "task1", message: "a" },
      { task: "task3", message: "b" },
    ]);

    expect(toPipelineError(error)).toEqual({
      kind: "subtask",
      phase: "concurrent_fanout",
      message: "Sub-task(s) failed: task1 (a), task3 (b)",
    });
  });

  it("should describe a cancellation by its reason", () => {
    expect(
      toPipelineError(new PipelineCancelledError("timeout", "too slow")),
    ).toEqual({ kind: "timeout", message: "too slow" });
  });

  it("should describe anything else as internal", () => {
    expect(toPipelineError("boom")).toEqual({
      kind: "internal",
      message: "boom",
    });
  });
});

describe("statusCodeFor", () => {
  it.each([
    ["external_call", 502],
    ["timeout", 504],
    ["cancelled", 499],
    ["phase", 500],
    ["subtask", 500],
    ["internal", 500],
  ] as const)("should answer %s with %i", (kind, status) => {
    expect(statusCodeFor({ kind, message: "failed" })).toBe(status);
  });
});
