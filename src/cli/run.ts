#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * `create` registers an agent with an MCP tool and remembers its id under a
 * name; `run` opens an interactive session against a named agent.
 */

import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import { DefaultAzureCredential } from "@azure/identity";
import * as readline from "readline";
import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { ApprovalResolver, isApprovalMode, APPROVAL_MODES, type ApprovalMode } from "../approval/index.js";
import { AGENT_SERVICE_SCOPE, AgentsRestClient, type AgentServiceClient } from "../client/index.js";
import { loadConfig, requireSetting, type AgentRunnerConfig, type AgentRunnerConfigInput } from "../config/index.js";
import { RunPoller, SessionOrchestrator, createInterruptSignal, type LineSource } from "../runtime/index.js";
import { FileAgentStore, type AgentStore } from "../store/index.js";
import { AllowedToolRegistry } from "../tools/index.js";
import { createCLIApprovalCallback, createReadlineAsk, type Ask } from "./approval.js";
import { createTraceFormatter } from "./trace.js";

/**
 * Interactive input for a session.
 */
export interface SessionInput {
  lines: LineSource;
  /** Used for approval prompts so they share the input stream */
  ask: Ask;
  /** Register a Ctrl+C handler; returns a function that removes it */
  onInterrupt(handler: () => void): () => void;
  close(): void;
}

/**
 * Everything the commands touch outside the process. Tests swap these out.
 */
export interface CLIDependencies {
  createClient(config: AgentRunnerConfig): AgentServiceClient;
  createStore(filePath: string): AgentStore;
  openInput(): SessionInput;
  write(line: string): void;
  writeError(line: string): void;
  exit(code: number): void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

interface CommonOptions {
  config?: string;
  allow: string[];
}

interface CreateOptions extends CommonOptions {
  name: string;
  model?: string;
  mcpUrl?: string;
  mcpLabel?: string;
  instructions?: string;
}

interface RunOptions extends CommonOptions {
  name: string;
  approval?: string;
  verbose?: boolean;
}

/**
 * Collect repeatable option values.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse and validate approval mode option.
 */
function parseApprovalMode(value: string): ApprovalMode {
  if (!isApprovalMode(value)) {
    throw new Error(`Invalid approval mode: ${value}. Must be one of: ${APPROVAL_MODES.join(", ")}`);
  }
  return value;
}

function createRestClient(config: AgentRunnerConfig): AgentServiceClient {
  const endpoint = requireSetting(config.endpoint, "PROJECT_ENDPOINT");
  const credential = new DefaultAzureCredential();
  return new AgentsRestClient({
    endpoint,
    requestTimeoutMs: config.polling.requestTimeoutMs,
    getToken: async () => {
      const token = await credential.getToken(AGENT_SERVICE_SCOPE);
      return token.token;
    },
  });
}

/**
 * Prompted line input on stdin.
 */
function openTerminalInput(): SessionInput {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });

  async function* lines(): AsyncGenerator<string, void, undefined> {
    rl.prompt();
    for await (const line of rl) {
      yield line;
      rl.prompt();
    }
  }

  // A terminal readline swallows Ctrl+C itself; piped input leaves it to the process.
  const onInterrupt = (handler: () => void): (() => void) => {
    rl.on("SIGINT", handler);
    process.on("SIGINT", handler);
    return () => {
      rl.off("SIGINT", handler);
      process.off("SIGINT", handler);
    };
  };

  return { lines: lines(), ask: createReadlineAsk(rl), onInterrupt, close: () => rl.close() };
}

export const defaultDependencies: CLIDependencies = {
  createClient: createRestClient,
  createStore: (filePath) => new FileAgentStore(filePath),
  openInput: openTerminalInput,
  write: (line) => console.log(line),
  writeError: (line) => console.error(line),
  exit: (code) => process.exit(code),
  env: process.env,
  cwd: process.cwd(),
};

function mcpOverrides(options: { mcpUrl?: string; mcpLabel?: string; allow: string[] }): AgentRunnerConfigInput["mcp"] {
  return {
    ...(options.mcpUrl ? { serverUrl: options.mcpUrl } : {}),
    ...(options.mcpLabel ? { serverLabel: options.mcpLabel } : {}),
    ...(options.allow.length > 0 ? { allowedTools: options.allow } : {}),
  };
}

function registryFor(config: AgentRunnerConfig): AllowedToolRegistry {
  return new AllowedToolRegistry({
    serverLabel: config.mcp.serverLabel,
    serverUrl: config.mcp.serverUrl,
    allowedTools: config.mcp.allowedTools,
  });
}

/**
 * Create an agent with the configured MCP server and store its id.
 */
async function createAgentCommand(options: CreateOptions, deps: CLIDependencies): Promise<void> {
  const { config } = await loadConfig({
    cwd: deps.cwd,
    env: deps.env,
    configPath: options.config,
    overrides: {
      ...(options.model ? { model: options.model } : {}),
      ...(options.instructions ? { instructions: options.instructions } : {}),
      mcp: mcpOverrides(options),
    },
  });

  const model = requireSetting(config.model, "Model deployment name (--model or MODEL_DEPLOYMENT_NAME)");
  const client = deps.createClient(config);
  const registry = registryFor(config);

  const agent = await client.createAgent({
    name: options.name,
    model,
    instructions: config.instructions,
    tools: [registry.toToolDefinition()],
  });

  const store = deps.createStore(config.agentStoreFile);
  await store.store(options.name, agent.id);

  deps.write(`Created agent '${options.name}' with ID: ${agent.id}`);
  deps.write(`Stored mapping in ${config.agentStoreFile}`);
}

/**
 * Open an interactive session against a stored agent.
 */
async function runAgentCommand(options: RunOptions, deps: CLIDependencies): Promise<void> {
  const approvalMode = options.approval === undefined ? undefined : parseApprovalMode(options.approval);

  const { config } = await loadConfig({
    cwd: deps.cwd,
    env: deps.env,
    configPath: options.config,
    overrides: {
      ...(approvalMode ? { approval: { mode: approvalMode } } : {}),
      mcp: mcpOverrides(options),
    },
  });

  const store = deps.createStore(config.agentStoreFile);
  const agentId = await store.lookup(options.name);
  if (agentId === null) {
    throw new Error(`Agent name '${options.name}' not found in ${config.agentStoreFile}. Create it first.`);
  }

  const client = deps.createClient(config);
  try {
    await client.getAgent(agentId);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to retrieve agent '${options.name}' (id=${agentId}): ${message}`);
  }

  const onEvent = createTraceFormatter({ verbose: options.verbose ?? false, write: deps.write });
  const registry = registryFor(config);
  const signal = createInterruptSignal();
  const input = deps.openInput();

  const resolver = new ApprovalResolver({
    mode: config.approval.mode,
    approvalCallback:
      config.approval.mode === "interactive" ? createCLIApprovalCallback({ ask: input.ask, write: deps.write }) : undefined,
    registry,
    onEvent,
  });

  const poller = new RunPoller({
    executor: client,
    resolver,
    registry,
    requireApproval: config.mcp.requireApproval,
    pollIntervalMs: config.polling.intervalMs,
    maxPolls: config.polling.maxPolls,
    maxRetries: config.polling.maxRetries,
    retryBaseDelayMs: config.polling.retryBaseDelayMs,
    retryMaxDelayMs: config.polling.retryMaxDelayMs,
    cancelOnInterrupt: config.polling.cancelOnInterrupt,
    signal,
    onEvent,
  });

  const session = new SessionOrchestrator({ client, agentId, poller, registry, signal, onEvent });

  // Ctrl+C stops the current poll and ends the session.
  const removeSigint = input.onInterrupt(() => {
    signal.interrupt();
    input.close();
  });

  try {
    await session.run(input.lines);
  } finally {
    removeSigint();
    input.close();
  }
}

/**
 * Build the command tree.
 */
export function createProgram(deps: CLIDependencies = defaultDependencies): Command {
  const program = new Command();

  const handle = async (action: () => Promise<void>): Promise<void> => {
    try {
      await action();
    } catch (err) {
      deps.writeError(`Error: ${err instanceof Error ? err.message : String(err)}`);
      deps.exit(1);
    }
  };

  program
    .name("agent-runner")
    .description("Create agents with an MCP tool and chat with them, approving tool calls as they happen")
    .version("0.1.0");

  program
    .command("create")
    .description("Create an agent with an MCP tool and store its id under a name")
    .requiredOption("-n, --name <name>", "Human-friendly agent name (unique key)")
    .option("-m, --model <model>", "Model deployment name (overrides MODEL_DEPLOYMENT_NAME)")
    .option("--mcp-url <url>", "MCP server URL")
    .option("--mcp-label <label>", "MCP server label")
    .option("--instructions <text>", "Agent instructions")
    .option("--allow <tool>", "Restrict the agent to this MCP tool (repeatable)", collect, [])
    .option("-c, --config <path>", "Config file (searched upward from the cwd if omitted)")
    .action(async (options: CreateOptions) => {
      await handle(() => createAgentCommand(options, deps));
    });

  program
    .command("run")
    .description("Start an interactive session with a stored agent")
    .requiredOption("-n, --name <name>", "Agent name (key in the agent store)")
    .option("-a, --approval <mode>", `Approval mode: ${APPROVAL_MODES.join(", ")}`)
    .option("--allow <tool>", "Allow this MCP tool for each run (repeatable)", collect, [])
    .option("-c, --config <path>", "Config file (searched upward from the cwd if omitted)")
    .option("-v, --verbose", "Show every poll and tool-call details")
    .action(async (options: RunOptions) => {
      await handle(() => runAgentCommand(options, deps));
    });

  return program;
}

/**
 * Main CLI execution.
 */
export async function runCLI(argv: string[] = process.argv, deps: CLIDependencies = defaultDependencies): Promise<void> {
  await createProgram(deps).parseAsync(argv);
}

// Run CLI if this is the main module
// Handle symlinks by resolving the real path
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return fileURLToPath(import.meta.url) === realpathSync(entry);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

const isTestEnvironment = typeof process !== "undefined" && !!process.env.VITEST;

if (!isTestEnvironment && isMainModule()) {
  loadDotenv({ override: false });
  runCLI().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
