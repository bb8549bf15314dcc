/**
 * scan_results - Findings of a scan.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse, type ToolResponse } from "@scanwarden/core";
import type { ToolRegistrar } from "./types.js";
import { TaskIdSchema } from "./schemas.js";
import { formatResults, formatSummary } from "./format.js";

const DEFAULT_LIMIT = 50;

interface ScanResultsInput {
  id: string;
  limit?: number;
  include_raw?: boolean;
}

export const registerScanResults: ToolRegistrar = (server, scheduler) => {
  server.registerTool(
    "scan_results",
    {
      title: "Scan results",
      description: `Get the findings of a scan so far, with counts per severity.

Works while the scan is running and after it failed or was stopped:
findings already received are kept.`,
      inputSchema: {
        id: TaskIdSchema,
        limit: z.number().int().positive().optional().describe(`Max rows in the table (default: ${DEFAULT_LIMIT})`),
        include_raw: z.boolean().optional().describe("Include the scanner's JSON line for each finding"),
      },
    },
    async (input: ScanResultsInput): Promise<ToolResponse> => {
      const records = scheduler.results(input.id);
      if (!records.ok) {
        return errorResponse(records.error);
      }
      const summary = scheduler.summarize(input.id);
      if (!summary.ok) {
        return errorResponse(summary.error);
      }

      const text = `**Summary:** ${formatSummary(summary.value)}\n\n${formatResults(records.value, input.limit ?? DEFAULT_LIMIT)}`;
      const results = records.value.map(({ raw, ...record }) => (input.include_raw ? { ...record, raw } : record));

      return successResponse(text, { summary: summary.value, results });
    }
  );
};
