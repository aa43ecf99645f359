import type { AgentId, Stage } from "./types";

/** Rejected run request. Raised before any run state exists. */
export class ValidationError extends Error {
  readonly name = "ValidationError";

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

export class NotFoundError extends Error {
  readonly name = "NotFoundError";
}

export class ActorInvocationError extends Error {
  readonly name = "ActorInvocationError";

  constructor(
    readonly actorId: AgentId,
    readonly stage: Stage,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ToolExecutionError extends Error {
  readonly name = "ToolExecutionError";

  constructor(
    readonly tool: string,
    message: string,
  ) {
    super(`${tool}: ${message}`);
  }
}

export class RunCancelledError extends Error {
  readonly name = "RunCancelledError";

  constructor(reason = "run cancelled") {
    super(reason);
  }
}

export class TurnTimeoutError extends Error {
  readonly name = "TurnTimeoutError";

  constructor(
    readonly stage: Stage,
    readonly timeoutMs: number,
  ) {
    super(`${stage} turn timed out after ${timeoutMs}ms`);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "unknown error";

/** Throws RunCancelledError when the signal has been aborted. */
export const throwIfCancelled = (signal: AbortSignal | undefined): void => {
  if (!signal?.aborted) {
    return;
  }
  const reason: unknown = signal.reason;
  if (reason instanceof RunCancelledError) {
    throw reason;
  }
  throw new RunCancelledError(
    typeof reason === "string" ? reason : errorMessage(reason),
  );
};
