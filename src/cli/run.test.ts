/**
 * Tests for CLI Entry Point
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import { runCLI, type CLIDependencies, type SessionInput } from "./run.js";
import type { AgentRunnerConfig } from "../config/index.js";
import { FileAgentStore } from "../store/index.js";
import { InterruptError } from "../runtime/index.js";
import { ScriptedExecutor, approvalAction, mcpCall, type RunScript } from "../testing/index.js";

const ANSI = /\x1b\[[0-9;]*m/g;

async function* lines(values: string[]): AsyncGenerator<string, void, undefined> {
  for (const value of values) {
    yield value;
  }
}

describe("runCLI", () => {
  let tempDir: string;
  let storeFile: string;
  let executor: ScriptedExecutor;
  let output: string[];
  let errors: string[];
  let exit: ReturnType<typeof vi.fn>;
  let clientConfigs: AgentRunnerConfig[];

  function deps(inputLines: string[] = [], answers: string[] = []): CLIDependencies {
    const input: SessionInput = {
      lines: lines(inputLines),
      ask: vi.fn(async () => answers.shift() ?? ""),
      onInterrupt: () => () => {},
      close: vi.fn(),
    };
    return {
      createClient: (config) => {
        clientConfigs.push(config);
        return executor;
      },
      createStore: (filePath) => new FileAgentStore(filePath),
      openInput: () => input,
      write: (line) => output.push(line.replace(ANSI, "")),
      writeError: (line) => errors.push(line),
      exit: (code) => exit(code),
      env: {
        PROJECT_ENDPOINT: "https://agents.example.test/api/projects/demo",
        AGENT_STORE_FILE: storeFile,
      },
      cwd: tempDir,
    };
  }

  function useRuns(runs: RunScript[]): void {
    executor = new ScriptedExecutor({ runs });
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "agent-runner-cli-test-"));
    storeFile = path.join(tempDir, ".agents.json");
    await fs.writeFile(path.join(tempDir, "agent-runner.config.yaml"), "polling:\n  intervalMs: 1\n");
    executor = new ScriptedExecutor();
    output = [];
    errors = [];
    exit = vi.fn();
    clientConfigs = [];
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("create", () => {
    it("creates the agent and stores its id", async () => {
      await runCLI(
        ["node", "agent-runner", "create", "--name", "docs-agent", "--model", "gpt-4o-mini", "--mcp-url", "https://mcp.example.test/docs", "--mcp-label", "docs"],
        deps()
      );

      expect(errors).toEqual([]);
      expect(output).toEqual([
        "Created agent 'docs-agent' with ID: asst_scripted",
        `Stored mapping in ${storeFile}`,
      ]);
      expect(JSON.parse(await fs.readFile(storeFile, "utf-8"))).toEqual({ "docs-agent": "asst_scripted" });
      expect(clientConfigs[0]?.mcp).toMatchObject({ serverUrl: "https://mcp.example.test/docs", serverLabel: "docs" });
    });

    it("passes the MCP tool with its allow-list to the service", async () => {
      const createAgent = vi.spyOn(executor, "createAgent");

      await runCLI(
        ["node", "agent-runner", "create", "-n", "docs-agent", "-m", "gpt-4o-mini", "--mcp-url", "https://mcp.example.test/docs", "--mcp-label", "docs", "--allow", "search_docs", "--allow", "fetch_page"],
        deps()
      );

      expect(createAgent).toHaveBeenCalledWith(
        expect.objectContaining({
          name: "docs-agent",
          model: "gpt-4o-mini",
          tools: [
            {
              type: "mcp",
              server_label: "docs",
              server_url: "https://mcp.example.test/docs",
              allowed_tools: ["fetch_page", "search_docs"],
            },
          ],
        })
      );
    });

    it("fails without a model", async () => {
      await runCLI(["node", "agent-runner", "create", "--name", "docs-agent"], deps());

      expect(errors).toEqual(["Error: Model deployment name (--model or MODEL_DEPLOYMENT_NAME) is required"]);
      expect(exit).toHaveBeenCalledWith(1);
    });
  });

  describe("run", () => {
    beforeEach(async () => {
      await new FileAgentStore(storeFile).store("docs-agent", "asst_1");
    });

    it("runs a session until :quit", async () => {
      useRuns([
        {
          statuses: [
            { status: "requires_action", requiredAction: approvalAction([mcpCall("call_1", "search_docs", { query: "runs" })]) },
            "completed",
          ],
          reply: "Runs are documented under /runs.",
        },
      ]);

      await runCLI(["node", "agent-runner", "run", "--name", "docs-agent"], deps(["where are runs?", ":quit"]));

      expect(errors).toEqual([]);
      expect(exit).not.toHaveBeenCalled();
      expect(executor.messages.map((message) => message.text)).toEqual(["where are runs?"]);
      expect(executor.approvalSubmissions).toEqual([
        { runId: "run_1", decisions: [{ toolCallId: "call_1", approve: true }] },
      ]);
      expect(output).toContain("✓ Approved search_docs");
      expect(output.some((line) => line.includes("Runs are documented under /runs."))).toBe(true);
      expect(output[output.length - 1]).toBe(
        "Exiting after 1 turn(s), 0 failed. (Agent not deleted; reuse with another session.)"
      );
    });

    it("asks at the prompt in interactive mode", async () => {
      useRuns([
        {
          statuses: [
            { status: "requires_action", requiredAction: approvalAction([mcpCall("call_1", "delete_page", { id: 7 })]) },
            "completed",
          ],
        },
      ]);

      await runCLI(
        ["node", "agent-runner", "run", "--name", "docs-agent", "--approval", "interactive"],
        deps(["clean up", ":q"], ["n"])
      );

      expect(executor.approvalSubmissions).toEqual([
        {
          runId: "run_1",
          decisions: [{ toolCallId: "call_1", approve: false, rationale: "Denied at the prompt" }],
        },
      ]);
      expect(output).toContain("Tool: delete_page");
    });

    it("ends the session when input closes during an approval prompt", async () => {
      useRuns([
        {
          statuses: [
            { status: "requires_action", requiredAction: approvalAction([mcpCall("call_1", "delete_page")]) },
            "completed",
          ],
        },
      ]);
      const dependencies = deps(["clean up", "never sent"]);
      const input = dependencies.openInput();
      input.ask = vi.fn(async () => {
        throw new InterruptError("Input closed while waiting for an answer");
      });

      await runCLI(["node", "agent-runner", "run", "--name", "docs-agent", "--approval", "interactive"], dependencies);

      expect(errors).toEqual([]);
      expect(executor.approvalSubmissions).toEqual([]);
      expect(executor.messages.map((message) => message.text)).toEqual(["clean up"]);
      expect(output[output.length - 1]).toBe(
        "Exiting after 1 turn(s), 0 failed. (Agent not deleted; reuse with another session.)"
      );
    });

    it("sends the allow-list with each run", async () => {
      useRuns([{ statuses: ["completed"] }]);

      await runCLI(
        ["node", "agent-runner", "run", "--name", "docs-agent", "--allow", "search_docs"],
        deps(["hi"])
      );

      expect(executor.createRunCalls[0]?.options?.tools?.[0]?.allowed_tools).toEqual(["search_docs"]);
    });

    it("rejects unknown approval modes", async () => {
      await runCLI(["node", "agent-runner", "run", "--name", "docs-agent", "--approval", "sometimes"], deps());

      expect(errors).toEqual([
        "Error: Invalid approval mode: sometimes. Must be one of: approve_all, auto_deny, interactive, allow_list",
      ]);
      expect(exit).toHaveBeenCalledWith(1);
    });

    it("fails for an unknown agent name", async () => {
      await runCLI(["node", "agent-runner", "run", "--name", "missing"], deps());

      expect(errors).toEqual([`Error: Agent name 'missing' not found in ${storeFile}. Create it first.`]);
      expect(exit).toHaveBeenCalledWith(1);
    });

    it("fails when the stored agent cannot be retrieved", async () => {
      vi.spyOn(executor, "getAgent").mockRejectedValue(new Error("HTTP 404"));

      await runCLI(["node", "agent-runner", "run", "--name", "docs-agent"], deps(["hi"]));

      expect(errors).toEqual(["Error: Failed to retrieve agent 'docs-agent' (id=asst_1): HTTP 404"]);
      expect(executor.createRunCalls).toHaveLength(0);
    });
  });
});
