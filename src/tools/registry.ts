/**
 * Allowed-Tool Registry
 *
 * Tracks which capabilities of an MCP server may be offered to a run.
 * The registry is process-local; the service only sees changes when the
 * next run is submitted with a fresh tool definition.
 */

/**
 * Wire definition of an MCP tool attached to an agent or a run.
 */
export interface McpToolDefinition {
  type: "mcp";
  server_label: string;
  server_url: string;
  allowed_tools?: string[];
}

/**
 * An MCP server plus the capability names currently allowed on it.
 */
export interface ToolRegistration {
  serverLabel: string;
  serverUrl: string;
  allowedTools: ReadonlySet<string>;
  /** False while every tool on the server is offered */
  restricted: boolean;
}

export interface AllowedToolRegistryOptions {
  serverLabel: string;
  serverUrl: string;
  /** Seed names; an empty or missing list leaves the registry unrestricted */
  allowedTools?: Iterable<string>;
}

/**
 * Mutable allow-list for one MCP server.
 *
 * A registry starts unrestricted unless seeded with at least one name: the
 * run's tool definition then carries no `allowed_tools`, and the service
 * offers everything the server exposes. The first `add` or `clear` makes it
 * restricted, and it stays restricted from then on, so removing the last
 * name offers nothing rather than everything.
 *
 * All operations are synchronous and idempotent. Callers mutate it between
 * runs; a run already in flight keeps the definition it was submitted with.
 *
 * @example
 * ```typescript
 * const registry = new AllowedToolRegistry({
 *   serverLabel: "docs",
 *   serverUrl: "https://mcp.example.test/docs",
 * });
 * registry.add("search_docs");
 * const definition = registry.toToolDefinition();
 * ```
 */
export class AllowedToolRegistry {
  readonly serverLabel: string;
  readonly serverUrl: string;
  private allowed: Set<string>;
  private restrictedFlag: boolean;

  constructor(options: AllowedToolRegistryOptions) {
    if (!options.serverLabel.trim()) {
      throw new Error("serverLabel must not be empty");
    }
    this.serverLabel = options.serverLabel;
    this.serverUrl = options.serverUrl;
    this.allowed = new Set(options.allowedTools ?? []);
    this.restrictedFlag = this.allowed.size > 0;
  }

  /** Whether runs are limited to the allowed names */
  get restricted(): boolean {
    return this.restrictedFlag;
  }

  add(name: string): void {
    this.allowed.add(name);
    this.restrictedFlag = true;
  }

  remove(name: string): void {
    this.allowed.delete(name);
  }

  has(name: string): boolean {
    return this.allowed.has(name);
  }

  /**
   * Allow nothing. The registry stays restricted.
   */
  clear(): void {
    this.allowed.clear();
    this.restrictedFlag = true;
  }

  /**
   * Snapshot of the allowed names. Later mutations do not show up in it.
   */
  current(): ReadonlySet<string> {
    return new Set(this.allowed);
  }

  get registration(): ToolRegistration {
    return {
      serverLabel: this.serverLabel,
      serverUrl: this.serverUrl,
      allowedTools: this.current(),
      restricted: this.restrictedFlag,
    };
  }

  /**
   * Build the tool definition sent with the next run. An unrestricted
   * registry leaves `allowed_tools` out; a restricted one always sends it,
   * empty or not.
   */
  toToolDefinition(): McpToolDefinition {
    const definition: McpToolDefinition = {
      type: "mcp",
      server_label: this.serverLabel,
      server_url: this.serverUrl,
    };
    if (this.restrictedFlag) {
      definition.allowed_tools = [...this.allowed].sort();
    }
    return definition;
  }
}
