/**
 * Agent Store
 *
 * Persists the mapping from human-friendly agent names to service ids so
 * `run` can find an agent made by an earlier `create`.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";

export const DEFAULT_AGENT_STORE_FILE = ".agents.json";

const AgentMapSchema = z.record(z.string(), z.string());

export type AgentMap = z.infer<typeof AgentMapSchema>;

export interface AgentStore {
  /** Agent id for `name`, or null if unknown */
  lookup(name: string): Promise<string | null>;
  store(name: string, agentId: string): Promise<void>;
  list(): Promise<AgentMap>;
}

/**
 * AgentStore backed by a JSON file: `{ "<name>": "<agentId>" }`.
 *
 * The file is rewritten on every store, pretty-printed with sorted keys.
 * A missing file reads as an empty map.
 */
export class FileAgentStore implements AgentStore {
  readonly filePath: string;

  constructor(filePath: string = DEFAULT_AGENT_STORE_FILE) {
    this.filePath = path.resolve(filePath);
  }

  async lookup(name: string): Promise<string | null> {
    const agents = await this.list();
    return Object.prototype.hasOwnProperty.call(agents, name) ? (agents[name] ?? null) : null;
  }

  async store(name: string, agentId: string): Promise<void> {
    if (!name.trim()) {
      throw new Error("Agent name must not be empty");
    }
    const agents = await this.list();
    agents[name] = agentId;

    const sorted: AgentMap = {};
    for (const key of Object.keys(agents).sort()) {
      sorted[key] = agents[key] ?? "";
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(sorted, null, 2) + "\n", "utf-8");
  }

  async list(): Promise<AgentMap> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new Error(
        `Failed to read agent store ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = AgentMapSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Invalid agent store ${this.filePath}: expected an object mapping names to agent ids`);
    }
    return result.data;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
