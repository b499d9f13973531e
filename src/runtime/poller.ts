/**
 * Run Poller
 *
 * Submits a run and drives it to a terminal state. The service is the only
 * source of truth for run state: the poller never infers completion, and the
 * only thing it writes mid-run is tool approvals.
 *
 * Per poll cycle:
 *   terminal            → stop
 *   requires_action     → resolve + submit approvals (once per call set)
 *   queued/in_progress  → wait, poll again
 */

import type { CreateRunOptions, RemoteExecutor, Run } from "../client/types.js";
import { isTerminalStatus } from "../client/types.js";
import type { ToolApprovalDecision, ToolApprovalResolver, ToolCallRequest } from "../approval/types.js";
import { ApprovalResolver, verifyDecisions } from "../approval/resolver.js";
import type { AllowedToolRegistry } from "../tools/registry.js";
import {
  PollExhaustedError,
  RemoteTerminalFailureError,
  UnsupportedActionError,
  isTransientError,
} from "./errors.js";
import { createEmitter, type RuntimeEventCallback } from "./events.js";
import { InterruptError, sleep as defaultSleep, type InterruptSignal } from "./interrupt.js";

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_MAX_POLLS = 600;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;
export const DEFAULT_RETRY_MAX_DELAY_MS = 8000;

export interface RunPollerOptions {
  executor: RemoteExecutor;
  /** Defaults to an approve-all ApprovalResolver */
  resolver?: ToolApprovalResolver;
  /** Source of the tool definition sent with each new run */
  registry?: AllowedToolRegistry;
  /** Approval requirement sent with the MCP tool resource */
  requireApproval?: "always" | "never";
  /** Wait between active observations */
  pollIntervalMs?: number;
  /** Upper bound on queries (successful or not) per run */
  maxPolls?: number;
  /**
   * Consecutive transient failures tolerated before giving up. Status
   * queries and approval submissions are counted separately; a successful
   * status query does not reset the submission count.
   */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** Throw RemoteTerminalFailureError for failed/cancelled/expired (default: true) */
  failOnTerminalError?: boolean;
  /** Ask the service to cancel the run when interrupted (default: false) */
  cancelOnInterrupt?: boolean;
  signal?: InterruptSignal;
  /** Injected for tests */
  sleep?: (ms: number, signal?: InterruptSignal) => Promise<void>;
  onEvent?: RuntimeEventCallback;
}

/**
 * Outcome of driving one run.
 */
export interface PollResult {
  run: Run;
  /** Number of successful status queries */
  polls: number;
  /** Number of approval batches sent to the service */
  approvalSubmissions: number;
  durationMs: number;
}

/**
 * Drives runs through the create/poll/approve lifecycle.
 *
 * @example
 * ```typescript
 * const poller = new RunPoller({ executor: client, registry });
 * const { run } = await poller.submit(thread.id, agentId);
 * ```
 */
export class RunPoller {
  private readonly executor: RemoteExecutor;
  private readonly resolver: ToolApprovalResolver;
  private readonly registry?: AllowedToolRegistry;
  private readonly requireApproval: "always" | "never";
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly failOnTerminalError: boolean;
  private readonly cancelOnInterrupt: boolean;
  private readonly signal?: InterruptSignal;
  private readonly sleep: (ms: number, signal?: InterruptSignal) => Promise<void>;
  private readonly emit: ReturnType<typeof createEmitter>;
  private readonly activeRuns = new Set<string>();

  constructor(options: RunPollerOptions) {
    this.executor = options.executor;
    this.resolver = options.resolver ?? new ApprovalResolver({ onEvent: options.onEvent });
    this.registry = options.registry;
    this.requireApproval = options.requireApproval ?? "always";
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxPolls = options.maxPolls ?? DEFAULT_MAX_POLLS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS;
    this.failOnTerminalError = options.failOnTerminalError ?? true;
    this.cancelOnInterrupt = options.cancelOnInterrupt ?? false;
    this.signal = options.signal;
    this.sleep = options.sleep ?? defaultSleep;
    this.emit = createEmitter(options.onEvent);
  }

  /**
   * Tool overrides for a new run, built from the registry as it is now.
   */
  buildRunOptions(): CreateRunOptions {
    if (!this.registry) {
      return {};
    }
    return {
      tools: [this.registry.toToolDefinition()],
      toolResources: [{ serverLabel: this.registry.serverLabel, requireApproval: this.requireApproval }],
    };
  }

  /**
   * Create a run on the thread and poll it to a terminal state.
   */
  async submit(threadId: string, agentId: string): Promise<PollResult> {
    const options = this.buildRunOptions();
    const run = await this.executor.createRun(threadId, agentId, options);

    this.emit({
      type: "run_submitted",
      runId: run.id,
      threadId,
      status: run.status,
      allowedTools: options.tools?.[0]?.allowed_tools ?? [],
    });

    return this.waitForRun(run);
  }

  /**
   * Poll an existing run until it reaches a terminal state.
   *
   * @throws UnsupportedActionError for pending actions other than tool approval
   * @throws ApprovalMismatchError if the resolver's output does not line up
   * @throws PollExhaustedError when the retry or poll budget runs out
   * @throws RemoteTerminalFailureError for failed/cancelled/expired runs
   * @throws InterruptError when the signal fires
   */
  async waitForRun(run: Run): Promise<PollResult> {
    if (this.activeRuns.has(run.id)) {
      throw new Error(`Run ${run.id} is already being polled`);
    }
    this.activeRuns.add(run.id);
    try {
      return await this.pollLoop(run);
    } finally {
      this.activeRuns.delete(run.id);
    }
  }

  private async pollLoop(initial: Run): Promise<PollResult> {
    const startTime = Date.now();
    const { id: runId, threadId } = initial;
    const submittedCallSets = new Set<string>();
    // Decisions awaiting a successful submission, so a retry does not ask again.
    const pendingDecisions = new Map<string, ToolApprovalDecision[]>();

    let polls = 0;
    let queries = 0;
    let approvalSubmissions = 0;
    let queryFailures = 0;
    let submissionFailures = 0;

    const finish = (run: Run): PollResult => {
      const result: PollResult = { run, polls, approvalSubmissions, durationMs: Date.now() - startTime };
      this.emit({
        type: "run_end",
        runId,
        status: run.status,
        polls,
        approvalSubmissions,
        durationMs: result.durationMs,
      });
      return result;
    };

    const backOff = async (error: unknown, attempt: number): Promise<void> => {
      if (attempt > this.maxRetries) {
        throw new PollExhaustedError(
          `Gave up on run ${runId} after ${this.maxRetries} retries: ${errorMessage(error)}`,
          runId,
          error
        );
      }
      const delayMs = Math.min(
        this.retryBaseDelayMs * 2 ** (attempt - 1),
        this.retryMaxDelayMs
      );
      this.emit({
        type: "poll_retry",
        runId,
        attempt,
        maxRetries: this.maxRetries,
        delayMs,
        error: errorMessage(error),
      });
      await this.sleep(delayMs, this.signal);
    };

    for (;;) {
      if (queries >= this.maxPolls) {
        throw new PollExhaustedError(`Run ${runId} still active after ${this.maxPolls} polls`, runId);
      }

      let run: Run;
      queries += 1;
      try {
        run = await this.executor.getRun(threadId, runId);
      } catch (error) {
        if (!isTransientError(error)) {
          throw error;
        }
        queryFailures += 1;
        await backOff(error, queryFailures);
        await this.checkInterrupt(threadId, runId);
        continue;
      }
      queryFailures = 0;
      polls += 1;
      this.emit({ type: "run_status", runId, status: run.status, poll: polls });

      if (isTerminalStatus(run.status)) {
        const result = finish(run);
        if (this.failOnTerminalError && run.status !== "completed") {
          throw new RemoteTerminalFailureError(run.status, run.lastError, runId);
        }
        return result;
      }

      await this.checkInterrupt(threadId, runId);

      if (run.status === "requires_action") {
        const toolCalls = this.pendingToolCalls(run);
        const key = callSetKey(toolCalls);

        if (!submittedCallSets.has(key)) {
          let decisions = pendingDecisions.get(key);
          if (decisions === undefined) {
            decisions = await this.resolver.resolve(toolCalls);
            verifyDecisions(toolCalls, decisions, runId);
            pendingDecisions.set(key, decisions);
          }

          try {
            await this.executor.submitToolApprovals(threadId, runId, decisions);
          } catch (error) {
            if (!isTransientError(error)) {
              throw error;
            }
            // Not recorded as submitted: the next poll will offer it again.
            submissionFailures += 1;
            await backOff(error, submissionFailures);
            await this.checkInterrupt(threadId, runId);
            continue;
          }

          submissionFailures = 0;
          pendingDecisions.delete(key);
          submittedCallSets.add(key);
          approvalSubmissions += 1;
          this.emit({
            type: "approvals_submitted",
            runId,
            approved: decisions.filter((d) => d.approve).length,
            denied: decisions.filter((d) => !d.approve).length,
          });
        }
      }

      await this.sleep(this.pollIntervalMs, this.signal);
      await this.checkInterrupt(threadId, runId);
    }
  }

  /**
   * Extract the tool calls of a pending action, rejecting anything else.
   */
  private pendingToolCalls(run: Run): ToolCallRequest[] {
    const action = run.requiredAction;
    if (action === undefined) {
      throw new UnsupportedActionError("<missing>", run.id);
    }

    switch (action.type) {
      case "submit_tool_approval":
        return action.toolCalls;
      case "unsupported":
        throw new UnsupportedActionError(action.actionType, run.id);
      default: {
        const unhandled: never = action;
        throw new UnsupportedActionError(String(unhandled), run.id);
      }
    }
  }

  private async checkInterrupt(threadId: string, runId: string): Promise<void> {
    if (!this.signal?.interrupted) {
      return;
    }
    if (this.cancelOnInterrupt) {
      await this.executor.cancelRun(threadId, runId);
    }
    throw new InterruptError(`Stopped polling run ${runId}`);
  }
}

/**
 * Order-insensitive identity of a batch of tool calls.
 */
function callSetKey(toolCalls: readonly ToolCallRequest[]): string {
  return toolCalls.map((call) => call.id).sort().join("\u0000");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

