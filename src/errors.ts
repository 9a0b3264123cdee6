import type { WorkflowPhase } from "./types";

/**
 * Transport-agnostic workflow errors. The HTTP layer maps `statusCode`
 * onto the response; everything else stays a client-addressable condition.
 */
export class WorkflowError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number,
    readonly retryable = false
  ) {
    super(message);
    this.name = "WorkflowError";
  }
}

export class SessionNotFoundError extends WorkflowError {
  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND", 404);
    this.name = "SessionNotFoundError";
  }
}

export class InvalidTransitionError extends WorkflowError {
  constructor(
    message: string,
    readonly phase?: WorkflowPhase
  ) {
    super(message, "INVALID_TRANSITION", 400);
    this.name = "InvalidTransitionError";
  }
}

export class SessionConflictError extends WorkflowError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is already processing another request. Retry shortly.`, "SESSION_CONFLICT", 409, true);
    this.name = "SessionConflictError";
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}
