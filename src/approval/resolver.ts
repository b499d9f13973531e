/**
 * ApprovalResolver for mode-based approval handling.
 *
 * Turns the tool calls of a pending action into one decision each. The
 * mode picks the policy; everything else (ordering, identifier matching,
 * audit events, session memory) is shared.
 */

import { ApprovalMemory } from "./memory.js";
import type {
  ApprovalCallback,
  ApprovalDecision,
  ToolApprovalDecision,
  ToolApprovalResolver,
  ToolCallRequest,
} from "./types.js";
import type { AllowedToolRegistry } from "../tools/registry.js";
import { ApprovalMismatchError } from "../runtime/errors.js";
import { createEmitter, type RuntimeEventCallback } from "../runtime/events.js";

/**
 * Approval mode determines how requests are handled.
 *
 * - **approve_all**: Approves every call (default)
 * - **auto_deny**: Denies every call
 * - **interactive**: Asks a callback per call (blocks until decision)
 * - **allow_list**: Approves only tools currently in the allow-list
 */
export type ApprovalMode = "approve_all" | "auto_deny" | "interactive" | "allow_list";

export const APPROVAL_MODES: readonly ApprovalMode[] = ["approve_all", "auto_deny", "interactive", "allow_list"];

export function isApprovalMode(value: string): value is ApprovalMode {
  return (APPROVAL_MODES as readonly string[]).includes(value);
}

export interface ApprovalResolverOptions {
  mode?: ApprovalMode;
  /** Required for interactive mode */
  approvalCallback?: ApprovalCallback;
  /** Required for allow_list mode */
  registry?: AllowedToolRegistry;
  /** Receives approval_request / approval_decision events */
  onEvent?: RuntimeEventCallback;
}

/**
 * Default resolver used by the poller.
 *
 * @example
 * ```typescript
 * // Auto-approve everything
 * const resolver = new ApprovalResolver();
 *
 * // Only approve tools the user allowed
 * const resolver = new ApprovalResolver({ mode: "allow_list", registry });
 *
 * // Ask a human
 * const resolver = new ApprovalResolver({
 *   mode: "interactive",
 *   approvalCallback: async (request) => ({ approved: await ask(request), remember: "none" }),
 * });
 * ```
 */
export class ApprovalResolver implements ToolApprovalResolver {
  readonly mode: ApprovalMode;
  private readonly approvalCallback?: ApprovalCallback;
  private readonly registry?: AllowedToolRegistry;
  private readonly emit: ReturnType<typeof createEmitter>;
  private readonly _memory = new ApprovalMemory();

  constructor(options: ApprovalResolverOptions = {}) {
    this.mode = options.mode ?? "approve_all";
    if (this.mode === "interactive" && !options.approvalCallback) {
      throw new Error("Interactive mode requires an approvalCallback");
    }
    if (this.mode === "allow_list" && !options.registry) {
      throw new Error("allow_list mode requires a registry");
    }
    this.approvalCallback = options.approvalCallback;
    this.registry = options.registry;
    this.emit = createEmitter(options.onEvent);
  }

  get memory(): ApprovalMemory {
    return this._memory;
  }

  clearSessionApprovals(): void {
    this._memory.clear();
  }

  /**
   * Decide every request, in order.
   *
   * Interactive prompts run one at a time so a human sees them in the
   * order the service listed them.
   */
  async resolve(requests: readonly ToolCallRequest[]): Promise<ToolApprovalDecision[]> {
    const decisions: ToolApprovalDecision[] = [];

    for (const request of requests) {
      this.emit({
        type: "approval_request",
        toolCallId: request.id,
        toolName: request.name,
        toolArgs: request.arguments,
      });

      const { decision, cached } = await this.decide(request);

      this.emit({
        type: "approval_decision",
        toolCallId: request.id,
        toolName: request.name,
        approved: decision.approved,
        cached,
        rationale: decision.note,
      });

      decisions.push({
        toolCallId: request.id,
        approve: decision.approved,
        ...(decision.note !== undefined ? { rationale: decision.note } : {}),
      });
    }

    verifyDecisions(requests, decisions);
    return decisions;
  }

  private async decide(request: ToolCallRequest): Promise<{ decision: ApprovalDecision; cached: boolean }> {
    switch (this.mode) {
      case "approve_all":
        return { decision: { approved: true, remember: "none" }, cached: false };

      case "auto_deny":
        return {
          decision: { approved: false, note: `Auto-deny mode: ${request.name} was not approved`, remember: "none" },
          cached: false,
        };

      case "allow_list": {
        const allowed = this.registry?.has(request.name) ?? false;
        return {
          decision: allowed
            ? { approved: true, remember: "none" }
            : { approved: false, note: `Tool '${request.name}' is not in the allow-list`, remember: "none" },
          cached: false,
        };
      }

      case "interactive": {
        const cached = this._memory.lookup(request.name, request.arguments);
        if (cached !== undefined) {
          return { decision: cached, cached: true };
        }
        if (this.approvalCallback === undefined) {
          throw new Error("No approvalCallback provided for interactive mode");
        }
        const decision = await this.approvalCallback(request);
        // Denials are not cached; each one stays explicit.
        if (decision.approved && decision.remember === "session") {
          this._memory.store(request.name, request.arguments, decision);
        }
        return { decision, cached: false };
      }
    }
  }
}

/**
 * Check that `decisions` answers `requests` one-to-one, in order.
 *
 * @throws ApprovalMismatchError on a count or identifier mismatch
 */
export function verifyDecisions(
  requests: readonly ToolCallRequest[],
  decisions: readonly ToolApprovalDecision[],
  runId?: string
): void {
  if (decisions.length !== requests.length) {
    throw new ApprovalMismatchError(
      `Expected ${requests.length} approval decision(s), got ${decisions.length}`,
      runId
    );
  }

  requests.forEach((request, index) => {
    const decision = decisions[index];
    if (decision === undefined || decision.toolCallId !== request.id) {
      throw new ApprovalMismatchError(
        `Decision ${index + 1} is for '${decision?.toolCallId ?? "nothing"}', expected '${request.id}'`,
        runId
      );
    }
  });
}
