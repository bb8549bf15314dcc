/**
 * scan_list - All tracked scans.
 */

import * as z from "zod/v4";
import { successResponse, type ToolResponse } from "@scanwarden/core";
import type { ToolRegistrar } from "./types.js";
import { formatTaskLine } from "./format.js";

interface ScanListInput {
  active_only?: boolean;
}

export const registerScanList: ToolRegistrar = (server, scheduler) => {
  server.registerTool(
    "scan_list",
    {
      title: "List scans",
      description: `List scans in creation order. Finished scans stay listed until removed.`,
      inputSchema: {
        active_only: z.boolean().optional().describe("Only pending and running scans"),
      },
    },
    async (input: ScanListInput): Promise<ToolResponse> => {
      const all = scheduler.list();
      const tasks = input.active_only
        ? all.filter((task) => task.state === "pending" || task.state === "running")
        : all;

      const text = tasks.length === 0 ? "No scans" : tasks.map(formatTaskLine).join("\n");
      return successResponse(text, { tasks });
    }
  );
};
