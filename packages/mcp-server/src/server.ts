import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  createBrokerAgent,
  loadBrokerConfig,
  type BrokerAgent,
  type BrokerSettings,
} from "../../agents/index.js";
import { registerBrokerTools, type BrokerToolHandlers } from "./tools/broker.js";

export interface BrokerServerOptions {
  /** Use this broker instead of building one from settings. */
  broker?: BrokerAgent;
  settings?: BrokerSettings;
}

export function createBrokerServer(options: BrokerServerOptions = {}): {
  server: McpServer;
  broker: BrokerAgent;
  handlers: BrokerToolHandlers;
} {
  const broker = options.broker ?? createBrokerAgent(options.settings ?? loadBrokerConfig());
  const server = new McpServer({
    name: "broker-sim-mcp",
    version: "0.1.0",
  });
  const handlers = registerBrokerTools(server, broker);
  return { server, broker, handlers };
}

export { createBrokerToolHandlers, registerBrokerTools } from "./tools/broker.js";
export type { BrokerToolHandlers } from "./tools/broker.js";
export { wrapResponse, coerceNumbers } from "./formatters/response.js";
export type { ToolResponse } from "./formatters/response.js";
