/**
 * Agent Service Client
 */

export {
  AgentsRestClient,
  AGENT_SERVICE_SCOPE,
  DEFAULT_API_VERSION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type AgentsRestClientConfig,
  type TokenProvider,
  type FetchLike,
} from "./rest-client.js";

export { parseToolArguments } from "./schemas.js";

export {
  TERMINAL_STATUSES,
  isTerminalStatus,
  type RunStatus,
  type RequiredAction,
  type RunError,
  type Run,
  type StepToolCall,
  type RunStep,
  type RunStepPage,
  type ThreadMessage,
  type McpToolResource,
  type CreateRunOptions,
  type RemoteExecutor,
  type Agent,
  type CreateAgentOptions,
  type AgentsApi,
  type AgentServiceClient,
} from "./types.js";
