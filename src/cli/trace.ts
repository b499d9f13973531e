/**
 * CLI Trace Formatter
 *
 * Formats runtime events for human-readable CLI output.
 * Uses boxen for panels and picocolors for styling.
 */

import boxen from "boxen";
import pc from "picocolors";
import type { RuntimeEvent } from "../runtime/events.js";

/**
 * Options for the trace formatter.
 */
export interface TraceFormatterOptions {
  /** Show every poll observation and retry */
  verbose?: boolean;
  /** Truncate approval arguments past this length (default: never) */
  maxContentLength?: number;
  /** Whether to show timestamps */
  showTimestamps?: boolean;
  /** Output sink (default: console.log) */
  write?: (line: string) => void;
}

/**
 * Truncate a string to a maximum length.
 */
function truncate(str: string, maxLen?: number): string {
  if (maxLen === undefined || str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + "...";
}

/**
 * Format duration in milliseconds.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

/**
 * Format tool arguments for display.
 */
export function formatArgs(args: Record<string, unknown>, maxLen?: number): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(args)) {
    const valueStr = typeof value === "string" ? value : JSON.stringify(value);
    lines.push(`  ${pc.cyan(key)}: ${truncate(valueStr, maxLen)}`);
  }
  return lines.join("\n");
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Create a trace formatter for session events.
 */
export function createTraceFormatter(options: TraceFormatterOptions = {}): (event: RuntimeEvent) => void {
  const verbose = options.verbose ?? false;
  const maxLen = options.maxContentLength;
  const showTimestamps = options.showTimestamps ?? verbose;
  const write = options.write ?? ((line: string) => console.log(line));

  return (event: RuntimeEvent) => {
    const timestamp = showTimestamps ? pc.dim(`[${event.timestamp.toISOString()}] `) : "";

    switch (event.type) {
      case "session_start":
        write(
          boxen(`${pc.bold("Agent")}: ${event.agentId}\n${pc.bold("Thread")}: ${event.threadId}`, {
            title: pc.green("SESSION"),
            padding: { left: 1, right: 1, top: 0, bottom: 0 },
            borderColor: "green",
            borderStyle: "round",
          })
        );
        write(pc.dim("Type messages. Use :quit to exit."));
        break;

      case "message_created":
        if (verbose) {
          write(`${timestamp}Created message ${event.messageId}`);
        }
        break;

      case "run_submitted": {
        const tools = event.allowedTools.length > 0 ? pc.dim(` [tools: ${event.allowedTools.join(", ")}]`) : "";
        write(`${timestamp}Run ${pc.bold(event.runId)} (status: ${event.status})${tools}`);
        break;
      }

      case "run_status":
        if (verbose) {
          write(`${timestamp}  Status: ${event.status} ${pc.dim(`(poll ${event.poll})`)}`);
        }
        break;

      case "poll_retry":
        write(
          `${timestamp}${pc.yellow("Retrying")} ${event.runId} ` +
            `(${event.attempt}/${event.maxRetries}) in ${formatDuration(event.delayMs)}: ${event.error}`
        );
        break;

      case "approval_request": {
        const args = Object.keys(event.toolArgs).length > 0 ? `\n${formatArgs(event.toolArgs, maxLen)}` : "";
        write(`${timestamp}Approval required for ${pc.yellow(event.toolName)}${args}`);
        break;
      }

      case "approval_decision": {
        const status = event.approved ? pc.green("✓ Approved") : pc.red("✗ Denied");
        const cached = event.cached ? pc.dim(" (cached)") : "";
        const rationale = event.rationale ? pc.dim(` ${event.rationale}`) : "";
        write(`${timestamp}${status} ${event.toolName}${cached}${rationale}`);
        break;
      }

      case "approvals_submitted":
        if (verbose) {
          write(`${timestamp}Submitted ${event.approved} approval(s), ${event.denied} denial(s)`);
        }
        break;

      case "run_end": {
        const color = event.status === "completed" ? pc.green : pc.red;
        write(
          `${timestamp}Run ${event.runId} ${color(event.status)} ` +
            pc.dim(`(${event.polls} polls, ${formatDuration(event.durationMs)})`)
        );
        break;
      }

      // Printed verbatim.
      case "assistant_message":
        write(pc.bold(pc.green("Assistant:")));
        write(event.text);
        break;

      case "step_tool_call": {
        const call = event.toolCall;
        const label = call.serverLabel ? pc.dim(`${call.serverLabel}/`) : "";
        write(`${timestamp}  (Tool used: ${label}${call.name ?? call.type})`);
        if (call.arguments !== undefined) {
          write(pc.dim(`    arguments: ${formatValue(call.arguments)}`));
        }
        if (call.output !== undefined) {
          write(pc.dim(`    output: ${formatValue(call.output)}`));
        }
        break;
      }

      case "turn_error": {
        const code = event.code ? pc.dim(` [${event.code}]`) : "";
        write(`${timestamp}${pc.red("Error")}: ${event.error}${code}`);
        break;
      }

      case "session_notice":
        write(`${timestamp}${pc.cyan(event.message)}`);
        break;

      case "session_end":
        write(
          `${timestamp}Exiting after ${event.turns} turn(s), ${event.failures} failed. ` +
            pc.dim("(Agent not deleted; reuse with another session.)")
        );
        break;
    }
  };
}
