/**
 * scan_create - Start a scan.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse, type ToolResponse } from "@scanwarden/core";
import type { CreateTaskRequest, Severity } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";
import { SeverityFilterSchema } from "./schemas.js";
import { formatTask } from "./format.js";

interface ScanCreateInput {
  targets: string[];
  templates: string[];
  name?: string;
  rate_limit?: number;
  concurrency?: number;
  proxy?: string;
  dns_callback?: string;
  severity?: Severity[];
  output_path?: string;
}

export const registerScanCreate: ToolRegistrar = (server, scheduler) => {
  server.registerTool(
    "scan_create",
    {
      title: "Start scan",
      description: `Start a scan of targets with the given templates and return immediately.

The scanner runs in the background. Use \`scan_get\` to follow progress,
\`scan_results\` for findings and \`scan_stop\` to cancel.

Templates are template ids or paths to template files.
Unset options fall back to the configured defaults.`,
      inputSchema: {
        targets: z.array(z.string()).describe("Target URLs or hosts"),
        templates: z.array(z.string()).describe("Template ids or template file paths"),
        name: z.string().optional().describe("Label for the scan (default: Scan-<n>)"),
        rate_limit: z.number().optional().describe("Max requests per second"),
        concurrency: z.number().optional().describe("Templates executed in parallel"),
        proxy: z.string().optional().describe("Proxy URL (http://, https:// or socks5://)"),
        dns_callback: z.string().optional().describe("Interaction (DNS callback) server"),
        severity: SeverityFilterSchema,
        output_path: z.string().optional().describe("Also write findings to this file"),
      },
    },
    async (input: ScanCreateInput): Promise<ToolResponse> => {
      const request: CreateTaskRequest = {
        name: input.name,
        targets: input.targets,
        templates: input.templates,
        options: {
          rateLimit: input.rate_limit,
          concurrency: input.concurrency,
          proxy: input.proxy,
          dnsCallback: input.dns_callback,
          severity: input.severity,
          outputPath: input.output_path,
        },
      };

      const created = await scheduler.createTask(request);
      if (!created.ok) {
        return errorResponse(created.error);
      }

      const task = scheduler.get(created.value);
      if (!task.ok) {
        return errorResponse(task.error);
      }

      let text = formatTask(task.value);
      text += `\n\nUse \`scan_get ${created.value}\` to check progress.`;
      text += `\nUse \`scan_stop ${created.value}\` to cancel.`;

      return successResponse(text, { task: task.value });
    }
  );
};
