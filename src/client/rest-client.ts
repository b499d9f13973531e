/**
 * Agent Service REST Client
 *
 * fetch-based client for the agent service's assistants/threads/runs API.
 * Every response is validated against the wire schemas before it is
 * converted into domain types.
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { ToolApprovalDecision } from "../approval/types.js";
import { RemoteRequestError, isTransientStatus } from "../runtime/errors.js";
import {
  AgentWireSchema,
  MessageListSchema,
  MessageWireSchema,
  RunStepListSchema,
  RunWireSchema,
  ThreadWireSchema,
  messageText,
  toAgent,
  toRun,
  toRunStepPage,
  toThreadMessage,
} from "./schemas.js";
import type {
  Agent,
  AgentServiceClient,
  CreateAgentOptions,
  CreateRunOptions,
  Run,
  RunStepPage,
  ThreadMessage,
} from "./types.js";

export const DEFAULT_API_VERSION = "v1";

/** Upper bound on one HTTP exchange, body included */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** OAuth scope for tokens accepted by the service */
export const AGENT_SERVICE_SCOPE = "https://ai.azure.com/.default";

/**
 * Supplies a bearer token for each request.
 */
export type TokenProvider = () => Promise<string>;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface AgentsRestClientConfig {
  /** Project endpoint, e.g. https://<resource>.services.ai.azure.com/api/projects/<project> */
  endpoint: string;
  getToken: TokenProvider;
  apiVersion?: string;
  /** Abort a request (and count it as a transient failure) after this long */
  requestTimeoutMs?: number;
  /** Injected for tests */
  fetch?: FetchLike;
}

interface RequestOptions {
  query?: Record<string, string | undefined>;
  body?: unknown;
}

/**
 * AgentServiceClient over HTTP.
 *
 * @example
 * ```typescript
 * const client = new AgentsRestClient({
 *   endpoint: process.env.PROJECT_ENDPOINT,
 *   getToken: async () => (await credential.getToken(AGENT_SERVICE_SCOPE)).token,
 * });
 * const thread = await client.createThread();
 * ```
 */
export class AgentsRestClient implements AgentServiceClient {
  private readonly endpoint: string;
  private readonly getToken: TokenProvider;
  private readonly apiVersion: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: AgentsRestClientConfig) {
    if (!config.endpoint.trim()) {
      throw new Error("endpoint must not be empty");
    }
    // Remove trailing slash if present
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.getToken = config.getToken;
    this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
  }

  // ==========================================================================
  // Agents, threads, messages
  // ==========================================================================

  async createAgent(options: CreateAgentOptions): Promise<Agent> {
    const wire = await this.request("POST", "/assistants", AgentWireSchema, {
      body: {
        name: options.name,
        model: options.model,
        instructions: options.instructions,
        tools: options.tools,
      },
    });
    return toAgent(wire);
  }

  async getAgent(agentId: string): Promise<Agent> {
    return toAgent(await this.request("GET", `/assistants/${encode(agentId)}`, AgentWireSchema));
  }

  async createThread(): Promise<{ id: string }> {
    const wire = await this.request("POST", "/threads", ThreadWireSchema, { body: {} });
    return { id: wire.id };
  }

  async createMessage(threadId: string, content: string): Promise<ThreadMessage> {
    const wire = await this.request("POST", `/threads/${encode(threadId)}/messages`, MessageWireSchema, {
      body: { role: "user", content },
    });
    return toThreadMessage(wire);
  }

  /**
   * Most recent assistant message that has text, or null.
   */
  async getLatestAssistantMessage(threadId: string): Promise<ThreadMessage | null> {
    const list = await this.request("GET", `/threads/${encode(threadId)}/messages`, MessageListSchema, {
      query: { order: "desc" },
    });
    for (const message of list.data) {
      if (message.role === "assistant" && messageText(message) !== null) {
        return toThreadMessage(message);
      }
    }
    return null;
  }

  // ==========================================================================
  // Runs
  // ==========================================================================

  async createRun(threadId: string, agentId: string, options: CreateRunOptions = {}): Promise<Run> {
    const body: Record<string, unknown> = { assistant_id: agentId };
    if (options.tools && options.tools.length > 0) {
      body.tools = options.tools;
    }
    if (options.toolResources && options.toolResources.length > 0) {
      body.tool_resources = {
        mcp: options.toolResources.map((resource) => ({
          server_label: resource.serverLabel,
          require_approval: resource.requireApproval,
          headers: resource.headers ?? {},
        })),
      };
    }

    return toRun(await this.request("POST", runsPath(threadId), RunWireSchema, { body }));
  }

  async getRun(threadId: string, runId: string): Promise<Run> {
    return toRun(await this.request("GET", runPath(threadId, runId), RunWireSchema));
  }

  async submitToolApprovals(threadId: string, runId: string, decisions: ToolApprovalDecision[]): Promise<Run> {
    const wire = await this.request("POST", `${runPath(threadId, runId)}/submit_tool_outputs`, RunWireSchema, {
      body: {
        tool_approvals: decisions.map((decision) => ({
          tool_call_id: decision.toolCallId,
          approve: decision.approve,
        })),
      },
    });
    return toRun(wire);
  }

  async listRunSteps(threadId: string, runId: string, options: { after?: string } = {}): Promise<RunStepPage> {
    const wire = await this.request("GET", `${runPath(threadId, runId)}/steps`, RunStepListSchema, {
      query: { order: "asc", after: options.after },
    });
    return toRunStepPage(wire);
  }

  async cancelRun(threadId: string, runId: string): Promise<Run> {
    return toRun(await this.request("POST", `${runPath(threadId, runId)}/cancel`, RunWireSchema, { body: {} }));
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = new URL(`${this.endpoint}${path}`);
    url.searchParams.set("api-version", this.apiVersion);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }

    const init: RequestInit = {
      method,
      headers: await this.getHeaders(),
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), init);
    } catch (error) {
      throw this.transportError(method, path, error);
    }

    if (!response.ok) {
      let detail: string;
      try {
        detail = await readErrorDetail(response);
      } catch (error) {
        throw this.transportError(method, path, error);
      }
      throw new RemoteRequestError(
        `${method} ${path} failed with HTTP ${response.status}${detail ? `: ${detail}` : ""}`,
        response.status,
        isTransientStatus(response.status)
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await response.text());
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new RemoteRequestError(
          `Unexpected response from ${method} ${path}: body is not JSON`,
          response.status,
          false
        );
      }
      throw this.transportError(method, path, error);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new RemoteRequestError(`Unexpected response from ${method} ${path}: ${issues}`, response.status, false);
    }
    return parsed.data;
  }

  /**
   * Network failures and timeouts become transient RemoteRequestErrors;
   * anything else passes through.
   */
  private transportError(method: string, path: string, error: unknown): unknown {
    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
      return new RemoteRequestError(
        `${method} ${path} timed out after ${this.requestTimeoutMs}ms`,
        undefined,
        true
      );
    }
    if (error instanceof TypeError) {
      return new RemoteRequestError(`${method} ${path} failed: ${error.message}`, undefined, true);
    }
    return error;
  }

  private async getHeaders(): Promise<Record<string, string>> {
    const token = await this.getToken();
    return {
      "Content-Type": "application/json",
      Authorization: `Bearer ${token}`,
    };
  }
}

function encode(segment: string): string {
  return encodeURIComponent(segment);
}

function runsPath(threadId: string): string {
  return `/threads/${encode(threadId)}/runs`;
}

function runPath(threadId: string, runId: string): string {
  return `${runsPath(threadId)}/${encode(runId)}`;
}

/**
 * Pull a readable message out of an error body, falling back to the raw text.
 */
async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text();
  if (!text) {
    return response.statusText;
  }
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === "object" && body !== null && "error" in body) {
      const error = body.error;
      if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
        return error.message;
      }
    }
  } catch {
    return text;
  }
  return text;
}
