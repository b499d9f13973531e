/**
 * Runtime Events
 *
 * Event types emitted during a session for observability and debugging.
 * Nothing in the runtime writes to the console; front ends subscribe via
 * `onEvent` and render what they need.
 */

import type { RunStatus, StepToolCall } from "../client/types.js";

/**
 * Base event with common properties.
 */
interface BaseEvent {
  /** Timestamp when the event occurred */
  timestamp: Date;
}

export interface SessionStartEvent extends BaseEvent {
  type: "session_start";
  agentId: string;
  threadId: string;
}

export interface MessageCreatedEvent extends BaseEvent {
  type: "message_created";
  threadId: string;
  messageId: string;
}

export interface RunSubmittedEvent extends BaseEvent {
  type: "run_submitted";
  runId: string;
  threadId: string;
  status: RunStatus;
  /** Allow-list sent with the run (empty = every tool) */
  allowedTools: string[];
}

/**
 * One poll observation.
 */
export interface RunStatusEvent extends BaseEvent {
  type: "run_status";
  runId: string;
  status: RunStatus;
  /** 1-based poll counter */
  poll: number;
}

/**
 * A transient query failure that will be retried.
 */
export interface PollRetryEvent extends BaseEvent {
  type: "poll_retry";
  runId: string;
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: string;
}

export interface ApprovalRequestEvent extends BaseEvent {
  type: "approval_request";
  toolCallId: string;
  toolName: string;
  toolArgs: Record<string, unknown>;
}

export interface ApprovalDecisionEvent extends BaseEvent {
  type: "approval_decision";
  toolCallId: string;
  toolName: string;
  approved: boolean;
  cached: boolean;
  rationale?: string;
}

export interface ApprovalsSubmittedEvent extends BaseEvent {
  type: "approvals_submitted";
  runId: string;
  approved: number;
  denied: number;
}

export interface RunEndEvent extends BaseEvent {
  type: "run_end";
  runId: string;
  status: RunStatus;
  polls: number;
  approvalSubmissions: number;
  durationMs: number;
}

export interface AssistantMessageEvent extends BaseEvent {
  type: "assistant_message";
  messageId: string;
  text: string;
}

/**
 * Tool-call metadata recovered from the run steps.
 */
export interface StepToolCallEvent extends BaseEvent {
  type: "step_tool_call";
  runId: string;
  stepId: string;
  toolCall: StepToolCall;
}

/**
 * A session turn failed; the session continues.
 */
export interface TurnErrorEvent extends BaseEvent {
  type: "turn_error";
  error: string;
  code?: string;
}

/**
 * Output of a session command such as `:tools`.
 */
export interface SessionNoticeEvent extends BaseEvent {
  type: "session_notice";
  message: string;
}

export interface SessionEndEvent extends BaseEvent {
  type: "session_end";
  threadId: string;
  turns: number;
  failures: number;
  reason: "quit" | "end_of_input" | "interrupted";
}

/**
 * Union of all runtime events.
 */
export type RuntimeEvent =
  | SessionStartEvent
  | MessageCreatedEvent
  | RunSubmittedEvent
  | RunStatusEvent
  | PollRetryEvent
  | ApprovalRequestEvent
  | ApprovalDecisionEvent
  | ApprovalsSubmittedEvent
  | RunEndEvent
  | AssistantMessageEvent
  | StepToolCallEvent
  | TurnErrorEvent
  | SessionNoticeEvent
  | SessionEndEvent;

/**
 * Event data without timestamp (for internal use before emit adds timestamp).
 * Uses distributive conditional type to preserve the discriminated union.
 */
export type RuntimeEventData = RuntimeEvent extends infer E
  ? E extends RuntimeEvent
    ? Omit<E, "timestamp">
    : never
  : never;

/**
 * Callback function for receiving runtime events.
 */
export type RuntimeEventCallback = (event: RuntimeEvent) => void;

/**
 * Build an emitter that stamps events and forwards them to `onEvent`.
 */
export function createEmitter(onEvent?: RuntimeEventCallback): (event: RuntimeEventData) => void {
  return (event) => {
    if (onEvent) {
      onEvent({ ...event, timestamp: new Date() });
    }
  };
}
