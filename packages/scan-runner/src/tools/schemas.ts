import * as z from "zod/v4";
import { SeveritySchema } from "../core/validation.js";

export const TaskIdSchema = z.string().min(1).describe("Task ID");

export const WaitTimeoutSchema = z
  .number()
  .int()
  .positive()
  .max(600_000)
  .optional()
  .describe("How long to wait in milliseconds (default: 30000)");

export const SeverityFilterSchema = z
  .array(SeveritySchema)
  .optional()
  .describe("Only run templates with these severities");
