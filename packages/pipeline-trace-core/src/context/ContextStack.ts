import { SpanLifecycleError } from "../errors";
import { PipelineSpan } from "../span/PipelineSpan";

/**
 * The open spans of one execution path, innermost last.
 *
 * Stacks are immutable: {@link push}, {@link pop} and {@link fork} all return
 * new instances, so a stack handed to a concurrent branch can never be
 * changed by its siblings.
 */
export class ContextStack {
  readonly traceId: string;
  private readonly frames: readonly PipelineSpan[];

  private constructor(traceId: string, frames: readonly PipelineSpan[]) {
    this.traceId = traceId;
    this.frames = frames;
  }

  static root(traceId: string): ContextStack {
    return new ContextStack(traceId, []);
  }

  /** The innermost span, whether or not it is still open. */
  get top(): PipelineSpan | undefined {
    return this.frames.at(-1);
  }

  get depth(): number {
    return this.frames.length;
  }

  get spans(): readonly PipelineSpan[] {
    return this.frames;
  }

  /**
   * The innermost span that has not completed yet. Differs from {@link top}
   * only after a forced close.
   */
  innermostOpen(): PipelineSpan | undefined {
    return this.frames.findLast((span) => !span.isEnded());
  }

  push(span: PipelineSpan): ContextStack {
    if (span.traceId !== this.traceId) {
      throw new SpanLifecycleError(
        `Span "${span.name}" belongs to trace ${span.traceId}, not ${this.traceId}`,
      );
    }
    return new ContextStack(this.traceId, [...this.frames, span]);
  }

  /**
   * @returns the innermost span and the stack beneath it
   */
  pop(): [PipelineSpan, ContextStack] {
    const span = this.top;
    if (span == null) {
      throw new SpanLifecycleError("Cannot pop an empty context stack");
    }
    return [span, new ContextStack(this.traceId, this.frames.slice(0, -1))];
  }

  /**
   * Copies the stack for a concurrent branch.
   */
  fork(): ContextStack {
    return new ContextStack(this.traceId, [...this.frames]);
  }
}
