/**
 * Session memory for approval caching.
 *
 * Interactive decisions answered with remember="session" are kept here so
 * the same call (tool name + arguments) is not prompted for twice.
 */

import type { ApprovalDecision } from "./types.js";

/**
 * Session cache keyed by (toolName, stable-JSON arguments).
 *
 * @example
 * ```typescript
 * const memory = new ApprovalMemory();
 * memory.store("search_docs", { query: "runs" }, { approved: true, remember: "session" });
 * memory.lookup("search_docs", { query: "runs" }); // → the stored decision
 * ```
 */
export class ApprovalMemory {
  private cache = new Map<string, ApprovalDecision>();

  lookup(toolName: string, args: Record<string, unknown>): ApprovalDecision | undefined {
    return this.cache.get(this.makeKey(toolName, args));
  }

  /**
   * Store a decision. Decisions with remember="none" are ignored.
   */
  store(toolName: string, args: Record<string, unknown>, decision: ApprovalDecision): void {
    if (decision.remember === "none") {
      return;
    }
    this.cache.set(this.makeKey(toolName, args), decision);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  private makeKey(toolName: string, args: Record<string, unknown>): string {
    return `${toolName}:${stableStringify(args)}`;
  }
}

/**
 * JSON stringify with keys sorted at every level of nesting.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "undefined";
  }

  if (Array.isArray(value)) {
    return "[" + value.map((v) => stableStringify(v)).join(",") + "]";
  }

  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return "{" + pairs.join(",") + "}";
}
