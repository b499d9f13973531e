/**
 * Tools Module
 *
 * MCP tool registration and the runtime allow-list.
 */

export {
  AllowedToolRegistry,
  type AllowedToolRegistryOptions,
  type McpToolDefinition,
  type ToolRegistration,
} from "./registry.js";
