export {
  FileAgentStore,
  DEFAULT_AGENT_STORE_FILE,
  type AgentStore,
  type AgentMap,
} from "./agent-store.js";
