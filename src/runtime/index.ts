/**
 * Run Lifecycle Runtime
 */

export {
  RunPoller,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_MAX_POLLS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  type RunPollerOptions,
  type PollResult,
} from "./poller.js";

export { StepInspector, type InspectedToolCall } from "./steps.js";

export {
  SessionOrchestrator,
  QUIT_COMMANDS,
  isQuitCommand,
  type LineSource,
  type SessionOptions,
  type SessionResult,
} from "./session.js";

export {
  AgentRunError,
  UnsupportedActionError,
  ApprovalMismatchError,
  PollExhaustedError,
  PrematureInspectionError,
  RemoteTerminalFailureError,
  RemoteRequestError,
  isTransientStatus,
  isTransientError,
  isAgentRunError,
  type AgentRunErrorCode,
} from "./errors.js";

export {
  InterruptError,
  createInterruptSignal,
  isInterruptError,
  sleep,
  type InterruptSignal,
} from "./interrupt.js";

export {
  createEmitter,
  type RuntimeEvent,
  type RuntimeEventData,
  type RuntimeEventCallback,
  type SessionStartEvent,
  type MessageCreatedEvent,
  type RunSubmittedEvent,
  type RunStatusEvent,
  type PollRetryEvent,
  type ApprovalRequestEvent,
  type ApprovalDecisionEvent,
  type ApprovalsSubmittedEvent,
  type RunEndEvent,
  type AssistantMessageEvent,
  type StepToolCallEvent,
  type TurnErrorEvent,
  type SessionNoticeEvent,
  type SessionEndEvent,
} from "./events.js";
