/**
 * Session Orchestrator
 *
 * Runs an interactive conversation against one agent: every input line
 * becomes a user message and a run on a single thread. Failures of a turn
 * are reported and the session moves on to the next line.
 */

import type { AgentServiceClient, Run } from "../client/types.js";
import type { AllowedToolRegistry } from "../tools/registry.js";
import { isAgentRunError } from "./errors.js";
import { createEmitter, type RuntimeEventCallback, type SessionEndEvent } from "./events.js";
import { isInterruptError, type InterruptSignal } from "./interrupt.js";
import type { RunPoller } from "./poller.js";
import { StepInspector } from "./steps.js";

/** Input lines that end the session (compared case-insensitively) */
export const QUIT_COMMANDS: readonly string[] = [":quit", ":q", ":exit"];

/**
 * Where user lines come from. A readline interface satisfies this.
 */
export type LineSource = AsyncIterable<string>;

export interface SessionOptions {
  client: AgentServiceClient;
  agentId: string;
  poller: RunPoller;
  /** Defaults to an inspector over `client` */
  inspector?: StepInspector;
  /** Enables the `:allow`, `:deny` and `:tools` commands */
  registry?: AllowedToolRegistry;
  signal?: InterruptSignal;
  onEvent?: RuntimeEventCallback;
}

export interface SessionResult {
  threadId: string;
  /** Messages sent, successful or not */
  turns: number;
  failures: number;
  reason: SessionEndEvent["reason"];
}

export function isQuitCommand(line: string): boolean {
  return QUIT_COMMANDS.includes(line.trim().toLowerCase());
}

export class SessionOrchestrator {
  private readonly client: AgentServiceClient;
  private readonly agentId: string;
  private readonly poller: RunPoller;
  private readonly inspector: StepInspector;
  private readonly registry?: AllowedToolRegistry;
  private readonly signal?: InterruptSignal;
  private readonly emit: ReturnType<typeof createEmitter>;

  constructor(options: SessionOptions) {
    this.client = options.client;
    this.agentId = options.agentId;
    this.poller = options.poller;
    this.inspector = options.inspector ?? new StepInspector(options.client);
    this.registry = options.registry;
    this.signal = options.signal;
    this.emit = createEmitter(options.onEvent);
  }

  /**
   * Read lines until a quit command, end of input or an interrupt.
   * The agent itself is left in place.
   */
  async run(input: LineSource): Promise<SessionResult> {
    const thread = await this.client.createThread();
    const threadId = thread.id;
    this.emit({ type: "session_start", agentId: this.agentId, threadId });

    let turns = 0;
    let failures = 0;
    let reason: SessionEndEvent["reason"] = "end_of_input";

    for await (const rawLine of input) {
      const line = rawLine.trim();
      if (line === "") {
        continue;
      }
      if (isQuitCommand(line)) {
        reason = "quit";
        break;
      }
      if (line.startsWith(":")) {
        this.handleCommand(line);
        continue;
      }

      turns += 1;
      try {
        await this.runTurn(threadId, line);
      } catch (error) {
        if (isInterruptError(error)) {
          reason = "interrupted";
          break;
        }
        failures += 1;
        this.emit({
          type: "turn_error",
          error: error instanceof Error ? error.message : String(error),
          ...(isAgentRunError(error) ? { code: error.code } : {}),
        });
      }

      if (this.signal?.interrupted) {
        reason = "interrupted";
        break;
      }
    }

    // Input closed by an interrupt rather than by the user.
    if (reason === "end_of_input" && this.signal?.interrupted) {
      reason = "interrupted";
    }

    this.emit({ type: "session_end", threadId, turns, failures, reason });
    return { threadId, turns, failures, reason };
  }

  /**
   * Send one message and drive its run to the end.
   */
  async runTurn(threadId: string, text: string): Promise<Run> {
    const message = await this.client.createMessage(threadId, text);
    this.emit({ type: "message_created", threadId, messageId: message.id });

    const { run } = await this.poller.submit(threadId, this.agentId);

    const reply = await this.client.getLatestAssistantMessage(threadId);
    if (reply) {
      this.emit({ type: "assistant_message", messageId: reply.id, text: reply.text });
    }

    if (run.status === "completed") {
      for (const { stepId, toolCall } of await this.inspector.toolCalls(run)) {
        this.emit({ type: "step_tool_call", runId: run.id, stepId, toolCall });
      }
    }
    return run;
  }

  private handleCommand(line: string): void {
    const [command = "", ...rest] = line.split(/\s+/);
    const name = rest.join(" ");
    const registry = this.registry;

    if (!registry) {
      this.notice(`No tool registry configured; ${command} is unavailable`);
      return;
    }

    switch (command.toLowerCase()) {
      case ":allow":
        if (!name) {
          this.notice("Usage: :allow <tool>");
          return;
        }
        registry.add(name);
        this.notice(`Allowed ${name} for the next run`);
        return;
      case ":deny":
        if (!name) {
          this.notice("Usage: :deny <tool>");
          return;
        }
        if (!registry.restricted) {
          this.notice(`No allow-list on ${registry.serverLabel}; add tools with :allow first`);
          return;
        }
        registry.remove(name);
        this.notice(`Removed ${name} from the allow-list`);
        return;
      case ":tools": {
        const tools = [...registry.current()].sort();
        if (!registry.restricted) {
          this.notice(`No allow-list on ${registry.serverLabel}; every tool is offered`);
        } else if (tools.length === 0) {
          this.notice(`Allow-list on ${registry.serverLabel} is empty; no tools are offered`);
        } else {
          this.notice(`Allowed tools on ${registry.serverLabel}: ${tools.join(", ")}`);
        }
        return;
      }
      default:
        this.notice(`Unknown command: ${command}`);
    }
  }

  private notice(message: string): void {
    this.emit({ type: "session_notice", message });
  }
}
