/**
 * scan_remove - Forget a finished scan.
 */

import { resultToResponse, successResponse, type ToolResponse } from "@scanwarden/core";
import type { ToolRegistrar } from "./types.js";
import { TaskIdSchema } from "./schemas.js";

interface ScanRemoveInput {
  id: string;
}

export const registerScanRemove: ToolRegistrar = (server, scheduler) => {
  server.registerTool(
    "scan_remove",
    {
      title: "Remove scan",
      description: `Remove a finished scan and its results. Running scans must be stopped first.`,
      inputSchema: {
        id: TaskIdSchema,
      },
    },
    async (input: ScanRemoveInput): Promise<ToolResponse> => {
      const result = scheduler.remove(input.id);
      return resultToResponse(result, (task) => successResponse(`Removed: ${task.name} (${task.id})`, { task }));
    }
  );
};
