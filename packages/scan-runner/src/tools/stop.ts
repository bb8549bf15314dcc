/**
 * scan_stop - Cancel a scan.
 */

import { resultToResponse, successResponse, type ToolResponse } from "@scanwarden/core";
import type { ToolRegistrar } from "./types.js";
import { TaskIdSchema } from "./schemas.js";
import { formatTask } from "./format.js";

interface ScanStopInput {
  id: string;
}

export const registerScanStop: ToolRegistrar = (server, scheduler) => {
  server.registerTool(
    "scan_stop",
    {
      title: "Stop scan",
      description: `Cancel a scan. The scanner gets SIGTERM, then SIGKILL after the grace period.

Returns once the process is gone. Stopping a finished scan does nothing.
Findings received before the stop are kept.`,
      inputSchema: {
        id: TaskIdSchema,
      },
    },
    async (input: ScanStopInput): Promise<ToolResponse> => {
      const result = await scheduler.stop(input.id);
      return resultToResponse(result, (task) => successResponse(formatTask(task), { task }));
    }
  );
};
