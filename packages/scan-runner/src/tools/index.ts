/**
 * MCP tool registration for scan-runner.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Services, ToolRegistrar } from "./types.js";

import { registerScanCreate } from "./create.js";
import { registerScanGet } from "./get.js";
import { registerScanResults } from "./results.js";
import { registerScanStop } from "./stop.js";
import { registerScanList } from "./list.js";
import { registerScanRemove } from "./remove.js";
import { registerScanClear } from "./clear.js";

export type { Services } from "./types.js";

const allTools: ToolRegistrar[] = [
  registerScanCreate,
  registerScanGet,
  registerScanResults,
  registerScanStop,
  registerScanList,
  registerScanRemove,
  registerScanClear,
];

export function registerAllTools(server: McpServer, services: Services): void {
  for (const register of allTools) {
    register(server, services.scheduler);
  }
}
