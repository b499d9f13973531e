/**
 * Remote Agent Service Types
 *
 * Domain-level view of the agent service: runs, required actions, steps and
 * messages. The REST client converts wire payloads into these shapes.
 */

import type { ToolApprovalDecision, ToolCallRequest } from "../approval/types.js";
import type { McpToolDefinition } from "../tools/registry.js";

/**
 * Run status as reported by the service.
 */
export type RunStatus =
  | "queued"
  | "in_progress"
  | "requires_action"
  | "cancelling"
  | "completed"
  | "failed"
  | "cancelled"
  | "expired";

/** Statuses after which the service will not change the run again */
export const TERMINAL_STATUSES: readonly RunStatus[] = ["completed", "failed", "cancelled", "expired"];

export function isTerminalStatus(status: RunStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Pending action attached to a run in `requires_action`.
 *
 * Only tool approvals are understood; every other tag is carried as
 * `unsupported` so the poller has to handle it explicitly.
 */
export type RequiredAction =
  | {
      type: "submit_tool_approval";
      toolCalls: ToolCallRequest[];
    }
  | {
      type: "unsupported";
      /** The action tag the service sent */
      actionType: string;
      raw: unknown;
    };

/**
 * Diagnostic the service attaches to failed runs.
 */
export interface RunError {
  code: string;
  message: string;
}

export interface Run {
  id: string;
  threadId: string;
  agentId: string;
  status: RunStatus;
  requiredAction?: RequiredAction;
  lastError?: RunError;
}

/**
 * Tool-call metadata recorded on a run step.
 */
export interface StepToolCall {
  id: string;
  /** Tool kind, e.g. "mcp" or "function" */
  type: string;
  name?: string;
  /** Arguments exactly as the service recorded them */
  arguments?: unknown;
  output?: unknown;
  serverLabel?: string;
}

export interface RunStep {
  id: string;
  /** e.g. "message_creation", "tool_calls", "activities" */
  type: string;
  status: string;
  createdAt?: Date;
  toolCalls: StepToolCall[];
}

/**
 * One page of run steps.
 */
export interface RunStepPage {
  steps: RunStep[];
  hasMore: boolean;
  lastId?: string;
}

export interface ThreadMessage {
  id: string;
  role: "user" | "assistant";
  text: string;
}

/**
 * Per-run MCP resources (approval requirement, headers).
 */
export interface McpToolResource {
  serverLabel: string;
  requireApproval: "always" | "never";
  headers?: Record<string, string>;
}

export interface CreateRunOptions {
  /** Tool definitions overriding the agent's for this run */
  tools?: McpToolDefinition[];
  toolResources?: McpToolResource[];
}

/**
 * The asynchronous executor the poller drives.
 */
export interface RemoteExecutor {
  createRun(threadId: string, agentId: string, options?: CreateRunOptions): Promise<Run>;
  getRun(threadId: string, runId: string): Promise<Run>;
  submitToolApprovals(threadId: string, runId: string, decisions: ToolApprovalDecision[]): Promise<Run>;
  listRunSteps(threadId: string, runId: string, options?: { after?: string }): Promise<RunStepPage>;
  cancelRun(threadId: string, runId: string): Promise<Run>;
}

export interface Agent {
  id: string;
  name: string;
  model: string;
}

export interface CreateAgentOptions {
  name: string;
  model: string;
  instructions: string;
  tools: McpToolDefinition[];
}

/**
 * Thin request/response calls around the run lifecycle.
 */
export interface AgentsApi {
  createAgent(options: CreateAgentOptions): Promise<Agent>;
  getAgent(agentId: string): Promise<Agent>;
  createThread(): Promise<{ id: string }>;
  createMessage(threadId: string, content: string): Promise<ThreadMessage>;
  getLatestAssistantMessage(threadId: string): Promise<ThreadMessage | null>;
}

/**
 * Everything a session needs from the service.
 */
export type AgentServiceClient = RemoteExecutor & AgentsApi;
