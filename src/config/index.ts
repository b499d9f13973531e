/**
 * Config Module
 *
 * Runner configuration schema and loading.
 */

export {
  AgentRunnerConfigSchema,
  McpConfigSchema,
  ApprovalConfigSchema,
  PollingConfigSchema,
  CONFIG_FILE_NAMES,
  DEFAULT_MCP_SERVER_URL,
  DEFAULT_MCP_SERVER_LABEL,
  DEFAULT_INSTRUCTIONS,
  type AgentRunnerConfig,
  type AgentRunnerConfigInput,
  type LoadConfigOptions,
  type LoadedConfig,
  loadConfig,
  loadConfigFile,
  findConfigFile,
  configFromEnv,
  mergeConfigLayers,
  requireSetting,
} from "./settings.js";
