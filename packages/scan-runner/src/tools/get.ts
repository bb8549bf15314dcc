/**
 * scan_get - Task status and progress.
 */

import * as z from "zod/v4";
import { resultToResponse, successResponse, type ToolResponse } from "@scanwarden/core";
import type { ToolRegistrar } from "./types.js";
import { TaskIdSchema, WaitTimeoutSchema } from "./schemas.js";
import { formatTask } from "./format.js";

interface ScanGetInput {
  id: string;
  wait?: boolean;
  wait_timeout?: number;
}

export const registerScanGet: ToolRegistrar = (server, scheduler) => {
  server.registerTool(
    "scan_get",
    {
      title: "Get scan",
      description: `Get a scan's status and progress: lines processed, results found, elapsed time.

Set wait=true to block until the scan finishes or wait_timeout passes.`,
      inputSchema: {
        id: TaskIdSchema,
        wait: z.boolean().optional().describe("Wait for the scan to finish"),
        wait_timeout: WaitTimeoutSchema,
      },
    },
    async (input: ScanGetInput): Promise<ToolResponse> => {
      const result = input.wait ? await scheduler.wait(input.id, input.wait_timeout) : scheduler.get(input.id);

      return resultToResponse(result, (task) => {
        let text = formatTask(task);
        if (input.wait && (task.state === "pending" || task.state === "running")) {
          text += `\n\n**Timeout waiting for scan** (still ${task.state})`;
        }
        return successResponse(text, { task });
      });
    }
  );
};
