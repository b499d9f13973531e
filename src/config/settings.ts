/**
 * Runner Configuration
 *
 * Schema and loader for agent-runner settings. Values are layered, later
 * layers winning:
 *
 *   defaults ← agent-runner.config.yaml ← environment ← CLI flags
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";
import {
  DEFAULT_MAX_POLLS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
} from "../runtime/poller.js";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../client/rest-client.js";
import { DEFAULT_AGENT_STORE_FILE } from "../store/agent-store.js";

/**
 * Config file names to look for, in order.
 */
export const CONFIG_FILE_NAMES = ["agent-runner.config.yaml", "agent-runner.config.yml"];

export const DEFAULT_MCP_SERVER_URL = "https://gitmcp.io/Azure/azure-rest-api-specs";
export const DEFAULT_MCP_SERVER_LABEL = "github";
export const DEFAULT_INSTRUCTIONS =
  "You are a helpful agent that can use MCP tools to assist users. " +
  "Use the available MCP tools to answer questions and perform tasks.";

/**
 * MCP server attached to created agents and to each run.
 */
export const McpConfigSchema = z.object({
  serverUrl: z.string().url().default(DEFAULT_MCP_SERVER_URL),
  serverLabel: z.string().min(1).default(DEFAULT_MCP_SERVER_LABEL),
  /** Initial allow-list; empty offers every tool */
  allowedTools: z.array(z.string().min(1)).default([]),
  requireApproval: z.enum(["always", "never"]).default("always"),
});

export const ApprovalConfigSchema = z.object({
  mode: z.enum(["approve_all", "auto_deny", "interactive", "allow_list"]).default("approve_all"),
});

export const PollingConfigSchema = z.object({
  intervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
  maxPolls: z.number().int().positive().default(DEFAULT_MAX_POLLS),
  maxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  retryBaseDelayMs: z.number().int().positive().default(DEFAULT_RETRY_BASE_DELAY_MS),
  retryMaxDelayMs: z.number().int().positive().default(DEFAULT_RETRY_MAX_DELAY_MS),
  cancelOnInterrupt: z.boolean().default(false),
  /** Bound on each HTTP request; a timeout counts as a transient failure */
  requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
});

export const AgentRunnerConfigSchema = z.object({
  /** Project endpoint of the agent service */
  endpoint: z.string().url().optional(),
  /** Model deployment used when creating agents */
  model: z.string().min(1).optional(),
  instructions: z.string().min(1).default(DEFAULT_INSTRUCTIONS),
  agentStoreFile: z.string().min(1).default(DEFAULT_AGENT_STORE_FILE),
  approval: ApprovalConfigSchema.default({}),
  mcp: McpConfigSchema.default({}),
  polling: PollingConfigSchema.default({}),
});

export type AgentRunnerConfig = z.infer<typeof AgentRunnerConfigSchema>;

/**
 * One configuration layer. Every field is optional; omitted fields fall
 * through to lower layers. Layers must leave out keys rather than set
 * them to undefined.
 */
export type AgentRunnerConfigInput = z.input<typeof AgentRunnerConfigSchema>;

export interface LoadConfigOptions {
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Explicit config file; skips the search */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence layer, usually from CLI flags */
  overrides?: AgentRunnerConfigInput;
}

export interface LoadedConfig {
  config: AgentRunnerConfig;
  /** The file that was read, or null */
  configPath: string | null;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

/**
 * Load and validate a YAML config file.
 *
 * @throws Error if the file can't be read, parsed or validated
 */
export async function loadConfigFile(configPath: string): Promise<AgentRunnerConfig> {
  const content = await fs.readFile(configPath, "utf-8");
  const parsed = yaml.load(content) ?? {};

  const result = AgentRunnerConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config in ${configPath}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Search `startDir` and its parents for a config file.
 */
export async function findConfigFile(startDir: string): Promise<string | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const candidate = path.join(currentDir, fileName);
      if (await isFile(candidate)) {
        return candidate;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/**
 * Configuration layer from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): AgentRunnerConfigInput {
  const layer: AgentRunnerConfigInput = {};
  if (env.PROJECT_ENDPOINT) {
    layer.endpoint = env.PROJECT_ENDPOINT;
  }
  if (env.MODEL_DEPLOYMENT_NAME) {
    layer.model = env.MODEL_DEPLOYMENT_NAME;
  }
  if (env.AGENT_STORE_FILE) {
    layer.agentStoreFile = env.AGENT_STORE_FILE;
  }

  const mcp: NonNullable<AgentRunnerConfigInput["mcp"]> = {};
  if (env.MCP_SERVER_URL) {
    mcp.serverUrl = env.MCP_SERVER_URL;
  }
  if (env.MCP_SERVER_LABEL) {
    mcp.serverLabel = env.MCP_SERVER_LABEL;
  }
  if (Object.keys(mcp).length > 0) {
    layer.mcp = mcp;
  }
  return layer;
}

/**
 * Merge layers left to right; nested sections merge field by field.
 */
export function mergeConfigLayers(...layers: AgentRunnerConfigInput[]): AgentRunnerConfigInput {
  return layers.reduce<AgentRunnerConfigInput>(
    (merged, layer) => ({
      ...merged,
      ...layer,
      approval: { ...merged.approval, ...layer.approval },
      mcp: { ...merged.mcp, ...layer.mcp },
      polling: { ...merged.polling, ...layer.polling },
    }),
    {}
  );
}

/**
 * Resolve the effective configuration.
 *
 * @throws Error listing every invalid field
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const configPath = options.configPath
    ? path.resolve(options.configPath)
    : await findConfigFile(options.cwd ?? process.cwd());
  const fileLayer: AgentRunnerConfigInput = configPath ? await loadConfigFile(configPath) : {};

  const merged = mergeConfigLayers(fileLayer, configFromEnv(options.env ?? process.env), options.overrides ?? {});

  const result = AgentRunnerConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error)}`);
  }
  return { config: result.data, configPath };
}

/**
 * Fail with a readable message when a setting the command needs is unset.
 */
export function requireSetting<T>(value: T | undefined, description: string): T {
  if (value === undefined) {
    throw new Error(`${description} is required`);
  }
  return value;
}
