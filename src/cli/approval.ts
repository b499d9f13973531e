/**
 * CLI Approval Callback
 *
 * Terminal-based approval prompts for MCP tool calls.
 */

import * as readline from "readline";
import type { ApprovalCallback, ApprovalDecision, ToolCallRequest } from "../approval/index.js";
import { InterruptError } from "../runtime/interrupt.js";

/**
 * Ask one question and resolve with the raw answer.
 */
export type Ask = (question: string) => Promise<string>;

/**
 * Options for creating a CLI approval callback.
 */
export interface CLIApprovalOptions {
  /**
   * Question source. Pass one built on the session's readline interface so
   * prompts and chat input share stdin; otherwise a one-off interface is
   * opened per prompt.
   */
  ask?: Ask;
  /** Output sink (default: console.log) */
  write?: (line: string) => void;
}

/**
 * Format tool arguments for display.
 */
function formatArgs(args: Record<string, unknown>, indent: string = "  "): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(args)) {
    const valueStr = typeof value === "string"
      ? value.length > 60 ? value.slice(0, 57) + "..." : value
      : JSON.stringify(value);
    lines.push(`${indent}${key}: ${valueStr}`);
  }
  return lines.join("\n");
}

/**
 * The part of a readline interface that prompts use.
 */
export interface QuestionSource {
  question(query: string, callback: (answer: string) => void): void;
  once(event: "close", listener: () => void): unknown;
  off(event: "close", listener: () => void): unknown;
}

/**
 * Ask through an existing readline interface. Closing the interface while a
 * question is open rejects with InterruptError.
 */
export function createReadlineAsk(rl: QuestionSource): Ask {
  return (question) =>
    new Promise((resolve, reject) => {
      const onClose = (): void => {
        reject(new InterruptError("Input closed while waiting for an answer"));
      };
      rl.once("close", onClose);
      rl.question(question, (answer) => {
        rl.off("close", onClose);
        resolve(answer);
      });
    });
}

/**
 * Ask through a readline interface opened for this one question.
 */
const askOnce: Ask = async (question) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await createReadlineAsk(rl)(question);
  } finally {
    rl.close();
  }
};

/**
 * Map a typed answer to a decision. Returns null for unrecognised input.
 */
export function parseApprovalAnswer(answer: string): ApprovalDecision | null {
  switch (answer.trim().toLowerCase()) {
    case "y":
    case "yes":
      return { approved: true, remember: "none" };
    case "r":
    case "remember":
      return { approved: true, remember: "session" };
    case "":
    case "n":
    case "no":
      return { approved: false, remember: "none", note: "Denied at the prompt" };
    default:
      return null;
  }
}

/**
 * Create a CLI approval callback for terminal-based approval.
 *
 * @example
 * ```typescript
 * const resolver = new ApprovalResolver({
 *   mode: "interactive",
 *   approvalCallback: createCLIApprovalCallback({ ask: createReadlineAsk(rl) }),
 * });
 * ```
 */
export function createCLIApprovalCallback(options: CLIApprovalOptions = {}): ApprovalCallback {
  const ask = options.ask ?? askOnce;
  const write = options.write ?? ((line: string) => console.log(line));

  return async (request: ToolCallRequest): Promise<ApprovalDecision> => {
    write("\n" + "─".repeat(60));
    write("APPROVAL REQUEST");
    write("─".repeat(60));
    write(`Tool: ${request.name}`);
    if (request.serverLabel) {
      write(`Server: ${request.serverLabel}`);
    }
    if (Object.keys(request.arguments).length > 0) {
      write("Arguments:");
      write(formatArgs(request.arguments));
    }
    write("─".repeat(60));

    const answer = await ask("Approve? [y]es / [n]o / [r]emember: ");
    const decision = parseApprovalAnswer(answer);
    if (decision) {
      return decision;
    }

    // Unknown input, treat as no
    write("Unknown response, treating as 'no'");
    return { approved: false, remember: "none", note: `Unrecognised answer: ${answer.trim()}` };
  };
}
