/**
 * Approval System Core
 *
 * Decides approve/deny for each tool call a paused run is waiting on.
 * Runtime-agnostic: front ends plug in through ApprovalCallback.
 */

// Types
export type {
  ToolCallRequest,
  ToolApprovalDecision,
  ToolApprovalResolver,
  ApprovalDecision,
  ApprovalCallback,
  RememberOption,
} from "./types.js";

// Memory
export { ApprovalMemory, stableStringify } from "./memory.js";

// Resolver
export {
  ApprovalResolver,
  APPROVAL_MODES,
  isApprovalMode,
  verifyDecisions,
  type ApprovalMode,
  type ApprovalResolverOptions,
} from "./resolver.js";
