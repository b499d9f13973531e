/**
 * Tests for CLI Approval Callbacks
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "events";
import type { ToolCallRequest } from "../approval/index.js";
import { InterruptError } from "../runtime/interrupt.js";

// Mock readline before importing approval.js
const mockQuestion = vi.fn((_question: string, callback: (answer: string) => void) => callback("y"));
const mockClose = vi.fn();
vi.mock("readline", () => ({
  createInterface: vi.fn(() => ({
    question: mockQuestion,
    close: mockClose,
    once: vi.fn(),
    off: vi.fn(),
  })),
}));

import { createCLIApprovalCallback, createReadlineAsk, parseApprovalAnswer } from "./approval.js";

class FakeInterface extends EventEmitter {
  pending?: (answer: string) => void;

  question(_query: string, callback: (answer: string) => void): void {
    this.pending = callback;
  }

  close(): void {
    this.emit("close");
  }
}

const request: ToolCallRequest = {
  id: "call_1",
  name: "search_docs",
  arguments: { query: "run lifecycle", limit: 3 },
  serverLabel: "docs",
};

describe("parseApprovalAnswer", () => {
  it.each(["y", "yes", " YES "])("approves once for %j", (answer) => {
    expect(parseApprovalAnswer(answer)).toEqual({ approved: true, remember: "none" });
  });

  it.each(["r", "remember"])("approves for the session for %j", (answer) => {
    expect(parseApprovalAnswer(answer)).toEqual({ approved: true, remember: "session" });
  });

  it.each(["", "n", "no"])("denies for %j", (answer) => {
    expect(parseApprovalAnswer(answer)).toEqual({ approved: false, remember: "none", note: "Denied at the prompt" });
  });

  it("returns null for anything else", () => {
    expect(parseApprovalAnswer("maybe")).toBeNull();
  });
});

describe("createCLIApprovalCallback", () => {
  beforeEach(() => {
    mockQuestion.mockClear();
    mockClose.mockClear();
  });

  it("shows the call and asks once", async () => {
    const lines: string[] = [];
    const ask = vi.fn(async () => "r");
    const callback = createCLIApprovalCallback({ ask, write: (line) => lines.push(line) });

    const decision = await callback(request);

    expect(decision).toEqual({ approved: true, remember: "session" });
    expect(ask).toHaveBeenCalledWith("Approve? [y]es / [n]o / [r]emember: ");
    expect(lines).toContain("Tool: search_docs");
    expect(lines).toContain("Server: docs");
    expect(lines).toContain("  query: run lifecycle\n  limit: 3");
  });

  it("omits the argument block for calls without arguments", async () => {
    const lines: string[] = [];
    const callback = createCLIApprovalCallback({ ask: async () => "y", write: (line) => lines.push(line) });

    await callback({ id: "call_2", name: "ping", arguments: {} });

    expect(lines).not.toContain("Arguments:");
  });

  it("treats unknown input as a denial", async () => {
    const lines: string[] = [];
    const callback = createCLIApprovalCallback({ ask: async () => "perhaps", write: (line) => lines.push(line) });

    const decision = await callback(request);

    expect(decision).toEqual({ approved: false, remember: "none", note: "Unrecognised answer: perhaps" });
    expect(lines[lines.length - 1]).toBe("Unknown response, treating as 'no'");
  });

  it("opens and closes a readline interface when no ask is given", async () => {
    const callback = createCLIApprovalCallback({ write: () => {} });

    const decision = await callback(request);

    expect(decision).toEqual({ approved: true, remember: "none" });
    expect(mockQuestion).toHaveBeenCalledTimes(1);
    expect(mockClose).toHaveBeenCalledTimes(1);
  });
});

describe("createReadlineAsk", () => {
  it("resolves with the typed answer", async () => {
    const rl = new FakeInterface();
    const answer = createReadlineAsk(rl)("Approve? ");

    rl.pending?.("y");

    await expect(answer).resolves.toBe("y");
    expect(rl.listenerCount("close")).toBe(0);
  });

  it("rejects an open question when the interface closes", async () => {
    const rl = new FakeInterface();
    const answer = createReadlineAsk(rl)("Approve? ");

    rl.close();

    const error = await answer.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InterruptError);
    expect(error).toMatchObject({ message: "Input closed while waiting for an answer" });
  });
});
