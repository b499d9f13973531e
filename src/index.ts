/**
 * agent-runner - Drive remote agents through create/run/poll/approve with MCP tool approvals
 */

// Approval system
export * from "./approval/index.js";

// MCP tool allow-list
export * from "./tools/index.js";

// Agent service client
export * from "./client/index.js";

// Run lifecycle: poller, step inspection, sessions
export * from "./runtime/index.js";

// Name -> agent id persistence
export * from "./store/index.js";

// Configuration
export * from "./config/index.js";

// CLI presentation (selective exports; the entry point stays in cli/run.ts)
export { createTraceFormatter, formatDuration, formatArgs, type TraceFormatterOptions } from "./cli/trace.js";
export { createCLIApprovalCallback, createReadlineAsk, parseApprovalAnswer, type Ask } from "./cli/approval.js";
