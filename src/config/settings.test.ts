/**
 * Tests for runner configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import {
  DEFAULT_INSTRUCTIONS,
  DEFAULT_MCP_SERVER_LABEL,
  DEFAULT_MCP_SERVER_URL,
  configFromEnv,
  findConfigFile,
  loadConfig,
  mergeConfigLayers,
  requireSetting,
} from "./settings.js";

describe("configFromEnv", () => {
  it("maps the known variables", () => {
    expect(
      configFromEnv({
        PROJECT_ENDPOINT: "https://agents.example.test/api/projects/demo",
        MODEL_DEPLOYMENT_NAME: "gpt-4o-mini",
        MCP_SERVER_URL: "https://mcp.example.test/docs",
        MCP_SERVER_LABEL: "docs",
        AGENT_STORE_FILE: "state/agents.json",
      })
    ).toEqual({
      endpoint: "https://agents.example.test/api/projects/demo",
      model: "gpt-4o-mini",
      agentStoreFile: "state/agents.json",
      mcp: { serverUrl: "https://mcp.example.test/docs", serverLabel: "docs" },
    });
  });

  it("ignores unset and empty variables", () => {
    expect(configFromEnv({ PROJECT_ENDPOINT: "", HOME: "/home/test" })).toEqual({});
  });
});

describe("mergeConfigLayers", () => {
  it("lets later layers win field by field", () => {
    const merged = mergeConfigLayers(
      { model: "base", mcp: { serverLabel: "docs", allowedTools: ["a"] }, polling: { intervalMs: 2000 } },
      { mcp: { serverLabel: "wiki" } },
      { model: "override" }
    );

    expect(merged).toEqual({
      model: "override",
      approval: {},
      mcp: { serverLabel: "wiki", allowedTools: ["a"] },
      polling: { intervalMs: 2000 },
    });
  });
});

describe("findConfigFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "agent-runner-config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("finds a config file in a parent directory", async () => {
    const configPath = path.join(tempDir, "agent-runner.config.yaml");
    await fs.writeFile(configPath, "model: gpt-4o-mini\n");
    const nested = path.join(tempDir, "a", "b");
    await fs.mkdir(nested, { recursive: true });

    expect(await findConfigFile(nested)).toBe(configPath);
  });

  it("accepts the .yml extension", async () => {
    const configPath = path.join(tempDir, "agent-runner.config.yml");
    await fs.writeFile(configPath, "model: gpt-4o-mini\n");

    expect(await findConfigFile(tempDir)).toBe(configPath);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "agent-runner-config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("applies defaults without file or environment", async () => {
    const { config } = await loadConfig({ cwd: tempDir, env: {} });

    expect(config).toMatchObject({
      instructions: DEFAULT_INSTRUCTIONS,
      agentStoreFile: ".agents.json",
      approval: { mode: "approve_all" },
      mcp: {
        serverUrl: DEFAULT_MCP_SERVER_URL,
        serverLabel: DEFAULT_MCP_SERVER_LABEL,
        allowedTools: [],
        requireApproval: "always",
      },
      polling: {
        intervalMs: 1000,
        maxPolls: 600,
        maxRetries: 5,
        retryBaseDelayMs: 500,
        retryMaxDelayMs: 8000,
        cancelOnInterrupt: false,
        requestTimeoutMs: 30000,
      },
    });
    expect(config.endpoint).toBeUndefined();
    expect(config.model).toBeUndefined();
  });

  it("layers file, environment and overrides in that order", async () => {
    const configPath = path.join(tempDir, "agent-runner.config.yaml");
    await fs.writeFile(
      configPath,
      [
        "endpoint: https://file.example.test/api/projects/demo",
        "model: file-model",
        "approval:",
        "  mode: allow_list",
        "mcp:",
        "  serverLabel: file-label",
        "  allowedTools: [search_docs]",
        "polling:",
        "  intervalMs: 250",
        "",
      ].join("\n")
    );

    const loaded = await loadConfig({
      cwd: tempDir,
      env: { MODEL_DEPLOYMENT_NAME: "env-model", MCP_SERVER_LABEL: "env-label" },
      overrides: { mcp: { serverLabel: "flag-label" } },
    });

    expect(loaded.configPath).toBe(configPath);
    expect(loaded.config.endpoint).toBe("https://file.example.test/api/projects/demo");
    expect(loaded.config.model).toBe("env-model");
    expect(loaded.config.approval.mode).toBe("allow_list");
    expect(loaded.config.mcp).toEqual({
      serverUrl: DEFAULT_MCP_SERVER_URL,
      serverLabel: "flag-label",
      allowedTools: ["search_docs"],
      requireApproval: "always",
    });
    expect(loaded.config.polling.intervalMs).toBe(250);
  });

  it("treats an empty file as all defaults", async () => {
    const configPath = path.join(tempDir, "agent-runner.config.yaml");
    await fs.writeFile(configPath, "");

    const loaded = await loadConfig({ cwd: tempDir, env: {} });

    expect(loaded.configPath).toBe(configPath);
    expect(loaded.config.approval.mode).toBe("approve_all");
  });

  it("lists every invalid field in the file", async () => {
    const configPath = path.join(tempDir, "agent-runner.config.yaml");
    await fs.writeFile(configPath, "approval:\n  mode: sometimes\npolling:\n  intervalMs: -5\n");

    const error = await loadConfig({ cwd: tempDir, env: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    const message = error instanceof Error ? error.message : "";
    expect(message.split("\n")[0]).toBe(`Invalid config in ${configPath}:`);
    expect(message).toContain("  - approval.mode: ");
    expect(message).toContain("  - polling.intervalMs: ");
  });

  it("rejects an invalid endpoint from the environment", async () => {
    await expect(loadConfig({ cwd: tempDir, env: { PROJECT_ENDPOINT: "not a url" } })).rejects.toThrow(
      "Invalid configuration:\n  - endpoint: Invalid url"
    );
  });

  it("reads an explicit config path", async () => {
    const configPath = path.join(tempDir, "custom.yaml");
    await fs.writeFile(configPath, "model: custom-model\n");

    const loaded = await loadConfig({ configPath, env: {} });

    expect(loaded.configPath).toBe(configPath);
    expect(loaded.config.model).toBe("custom-model");
  });
});

describe("requireSetting", () => {
  it("returns defined values", () => {
    expect(requireSetting("gpt-4o-mini", "Model deployment name")).toBe("gpt-4o-mini");
  });

  it("names the missing setting", () => {
    expect(() => requireSetting(undefined, "PROJECT_ENDPOINT")).toThrow("PROJECT_ENDPOINT is required");
  });
});
