/**
 * Core approval types.
 *
 * A run paused in `requires_action` carries one or more tool calls that the
 * service will not execute until each one is approved or denied. These types
 * describe those calls, the answers sent back, and the pluggable pieces that
 * produce the answers.
 */

/**
 * One requested tool invocation inside a pending action.
 * Immutable once received.
 */
export interface ToolCallRequest {
  /** Identifier the service expects back in the decision */
  id: string;
  /** Tool (capability) name on the MCP server */
  name: string;
  /** Invocation arguments, opaque structured data */
  arguments: Record<string, unknown>;
  /** Label of the MCP server the tool belongs to */
  serverLabel?: string;
}

/**
 * Answer for one ToolCallRequest, as submitted to the service.
 */
export interface ToolApprovalDecision {
  toolCallId: string;
  approve: boolean;
  /** Human-readable reason, kept for the audit trail */
  rationale?: string;
}

/**
 * How long to remember an interactive decision.
 */
export type RememberOption = "none" | "session";

/**
 * Decision returned by a policy or a human for a single call.
 */
export interface ApprovalDecision {
  approved: boolean;
  /** Optional reason for rejection or comment */
  note?: string;
  remember: RememberOption;
}

/**
 * Runtime callback for interactive approval.
 *
 * Different front ends (terminal prompt, tests, a web UI) supply their own.
 */
export type ApprovalCallback = (request: ToolCallRequest) => Promise<ApprovalDecision>;

/**
 * Turns a batch of pending tool calls into decisions.
 *
 * Implementations must return exactly one decision per request, in order,
 * with matching identifiers. The poller verifies this before submitting.
 */
export interface ToolApprovalResolver {
  resolve(requests: readonly ToolCallRequest[]): Promise<ToolApprovalDecision[]>;
}
