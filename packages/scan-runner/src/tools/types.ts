import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { TaskScheduler } from "../core/TaskScheduler.js";

export interface Services {
  scheduler: TaskScheduler;
}

export interface ToolRegistrar {
  (server: McpServer, scheduler: TaskScheduler): void;
}
