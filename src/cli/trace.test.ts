/**
 * Tests for the CLI trace formatter
 */

import { describe, it, expect } from "vitest";
import { createTraceFormatter, formatDuration } from "./trace.js";
import type { RuntimeEvent } from "../runtime/events.js";

const ANSI = /\x1b\[[0-9;]*m/g;
const at = new Date("2026-01-02T03:04:05.000Z");

function capture(verbose = false) {
  const lines: string[] = [];
  const format = createTraceFormatter({ verbose, write: (line) => lines.push(line.replace(ANSI, "")) });
  return { lines, format };
}

describe("formatDuration", () => {
  it.each([
    [250, "250ms"],
    [1500, "1.5s"],
    [90000, "1.5m"],
  ])("formats %i", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe("createTraceFormatter", () => {
  it("prints approval decisions with their rationale", () => {
    const { lines, format } = capture();

    format({
      type: "approval_decision",
      timestamp: at,
      toolCallId: "call_1",
      toolName: "search_docs",
      approved: false,
      cached: false,
      rationale: "Tool 'search_docs' is not in the allow-list",
    });

    expect(lines).toEqual(["✗ Denied search_docs Tool 'search_docs' is not in the allow-list"]);
  });

  it("marks cached approvals", () => {
    const { lines, format } = capture();

    format({ type: "approval_decision", timestamp: at, toolCallId: "c", toolName: "fetch_page", approved: true, cached: true });

    expect(lines).toEqual(["✓ Approved fetch_page (cached)"]);
  });

  it("lists approval arguments", () => {
    const { lines, format } = capture();

    format({
      type: "approval_request",
      timestamp: at,
      toolCallId: "call_1",
      toolName: "search_docs",
      toolArgs: { query: "runs", limit: 3 },
    });

    expect(lines).toEqual(["Approval required for search_docs\n  query: runs\n  limit: 3"]);
  });

  it("hides poll status unless verbose", () => {
    const event: RuntimeEvent = { type: "run_status", timestamp: at, runId: "run_1", status: "in_progress", poll: 2 };

    const quiet = capture();
    quiet.format(event);
    const loud = capture(true);
    loud.format(event);

    expect(quiet.lines).toEqual([]);
    expect(loud.lines).toEqual(["[2026-01-02T03:04:05.000Z]   Status: in_progress (poll 2)"]);
  });

  it("prints step tool calls with their arguments and output", () => {
    const { lines, format } = capture();

    format({
      type: "step_tool_call",
      timestamp: at,
      runId: "run_1",
      stepId: "step_1",
      toolCall: {
        id: "call_1",
        type: "mcp",
        name: "search_docs",
        arguments: '{"query":"runs"}',
        output: { hits: 2 },
        serverLabel: "docs",
      },
    });

    expect(lines).toEqual(["  (Tool used: docs/search_docs)", '    arguments: {"query":"runs"}', '    output: {"hits":2}']);
  });

  it("prints step output in full", () => {
    const { lines, format } = capture(true);
    const output = "r".repeat(2000);

    format({
      type: "step_tool_call",
      timestamp: at,
      runId: "run_1",
      stepId: "step_1",
      toolCall: { id: "call_1", type: "mcp", name: "search_docs", output },
    });

    expect(lines).toEqual(["[2026-01-02T03:04:05.000Z]   (Tool used: search_docs)", `    output: ${output}`]);
  });

  it("truncates approval arguments only when asked to", () => {
    const lines: string[] = [];
    const format = createTraceFormatter({ maxContentLength: 8, write: (line) => lines.push(line.replace(ANSI, "")) });

    format({
      type: "approval_request",
      timestamp: at,
      toolCallId: "call_1",
      toolName: "search_docs",
      toolArgs: { query: "lifecycle of runs" },
    });

    expect(lines).toEqual(["Approval required for search_docs\n  query: lifec..."]);
  });

  it("reports turn errors with their code", () => {
    const { lines, format } = capture();

    format({ type: "turn_error", timestamp: at, error: "Run failed: server_error: boom", code: "REMOTE_TERMINAL_FAILURE" });

    expect(lines).toEqual(["Error: Run failed: server_error: boom [REMOTE_TERMINAL_FAILURE]"]);
  });

  it("prints the assistant reply", () => {
    const { lines, format } = capture();

    format({ type: "assistant_message", timestamp: at, messageId: "msg_2", text: "Found two pages." });

    expect(lines).toEqual(["Assistant:", "Found two pages."]);
  });

  it("prints a long assistant reply in full", () => {
    const { lines, format } = capture();
    const text = `${"word ".repeat(1200)}end`;

    format({ type: "assistant_message", timestamp: at, messageId: "msg_2", text });

    expect(text.length).toBeGreaterThan(4000);
    expect(lines).toEqual(["Assistant:", text]);
  });

  it("summarizes the session on exit", () => {
    const { lines, format } = capture();

    format({ type: "session_end", timestamp: at, threadId: "thread_1", turns: 3, failures: 1, reason: "quit" });

    expect(lines).toEqual(["Exiting after 3 turn(s), 1 failed. (Agent not deleted; reuse with another session.)"]);
  });

  it("prints retry notices", () => {
    const { lines, format } = capture();

    format({
      type: "poll_retry",
      timestamp: at,
      runId: "run_1",
      attempt: 2,
      maxRetries: 5,
      delayMs: 1000,
      error: "HTTP 503",
    });

    expect(lines).toEqual(["Retrying run_1 (2/5) in 1.0s: HTTP 503"]);
  });
});
