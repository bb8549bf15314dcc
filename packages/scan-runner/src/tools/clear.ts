/**
 * scan_clear - Remove every finished scan.
 */

import { successResponse, type ToolResponse } from "@scanwarden/core";
import type { ToolRegistrar } from "./types.js";

export const registerScanClear: ToolRegistrar = (server, scheduler) => {
  server.registerTool(
    "scan_clear",
    {
      title: "Clear finished scans",
      description: `Remove all completed, failed and stopped scans. Running scans are kept.`,
      inputSchema: {},
    },
    async (): Promise<ToolResponse> => {
      const removed = scheduler.clearFinished();
      return successResponse(`Removed ${removed} finished scan(s)`, { removed });
    }
  );
};
