/**
 * Run Lifecycle Errors
 *
 * Error types raised while submitting, polling and inspecting runs.
 * Each carries a stable `code` so callers can branch without instanceof
 * chains across package boundaries.
 */

import type { RunError, RunStatus } from "../client/types.js";

export type AgentRunErrorCode =
  | "UNSUPPORTED_ACTION"
  | "APPROVAL_MISMATCH"
  | "POLL_EXHAUSTED"
  | "PREMATURE_INSPECTION"
  | "REMOTE_TERMINAL_FAILURE"
  | "REMOTE_REQUEST";

/**
 * Base class for all run lifecycle errors.
 */
export class AgentRunError extends Error {
  constructor(
    public readonly code: AgentRunErrorCode,
    message: string,
    public readonly runId?: string
  ) {
    super(message);
    this.name = "AgentRunError";
  }
}

/**
 * The run paused on a pending action this client cannot answer.
 */
export class UnsupportedActionError extends AgentRunError {
  constructor(
    public readonly actionType: string,
    runId?: string
  ) {
    super("UNSUPPORTED_ACTION", `Unsupported required action: ${actionType}`, runId);
    this.name = "UnsupportedActionError";
  }
}

/**
 * A resolver returned decisions that do not line up with the requests.
 */
export class ApprovalMismatchError extends AgentRunError {
  constructor(message: string, runId?: string) {
    super("APPROVAL_MISMATCH", message, runId);
    this.name = "ApprovalMismatchError";
  }
}

/**
 * The retry or poll budget ran out before the run reached a terminal state.
 */
export class PollExhaustedError extends AgentRunError {
  constructor(
    message: string,
    runId?: string,
    public readonly lastError?: unknown
  ) {
    super("POLL_EXHAUSTED", message, runId);
    this.name = "PollExhaustedError";
  }
}

/**
 * Steps were requested for a run that has not completed.
 */
export class PrematureInspectionError extends AgentRunError {
  constructor(
    public readonly status: RunStatus,
    runId?: string
  ) {
    super(
      "PREMATURE_INSPECTION",
      `Cannot inspect steps of run${runId ? ` ${runId}` : ""} in status "${status}"; wait for "completed"`,
      runId
    );
    this.name = "PrematureInspectionError";
  }
}

/**
 * The service reported failed, cancelled or expired.
 */
export class RemoteTerminalFailureError extends AgentRunError {
  constructor(
    public readonly status: RunStatus,
    public readonly lastError: RunError | undefined,
    runId?: string
  ) {
    const detail = lastError ? `: ${lastError.code}: ${lastError.message}` : "";
    super("REMOTE_TERMINAL_FAILURE", `Run ${status}${detail}`, runId);
    this.name = "RemoteTerminalFailureError";
  }
}

/**
 * An HTTP request to the service failed.
 *
 * `transient` marks failures worth retrying (network errors, 408, 429, 5xx).
 */
export class RemoteRequestError extends AgentRunError {
  constructor(
    message: string,
    public readonly status: number | undefined,
    public readonly transient: boolean
  ) {
    super("REMOTE_REQUEST", message);
    this.name = "RemoteRequestError";
  }
}

/**
 * HTTP statuses that are retried.
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Whether an error from the transport should be retried by the poller.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof RemoteRequestError) {
    return error.transient;
  }
  // fetch rejects with TypeError on network failure
  return error instanceof TypeError && error.message === "fetch failed";
}

export function isAgentRunError(error: unknown): error is AgentRunError {
  return error instanceof AgentRunError;
}
