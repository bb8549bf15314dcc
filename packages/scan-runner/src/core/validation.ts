/**
 * Input validation for task creation.
 */

import * as z from "zod/v4";
import { Ok, Err, type Result } from "@scanwarden/core";
import { ValidationError } from "./errors.js";
import { SEVERITIES, type ScanOptions } from "./model.js";

export const SeveritySchema = z.enum(SEVERITIES);

const PROXY_PROTOCOLS = new Set(["http:", "https:", "socks5:"]);

export function isProxyUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return PROXY_PROTOCOLS.has(url.protocol) && url.hostname !== "";
  } catch {
    return false;
  }
}

export const ProxyUrlSchema = z
  .string()
  .trim()
  .refine(isProxyUrl, { message: "Proxy must be an http://, https:// or socks5:// URL" });

export const ScanOptionsSchema = z.strictObject({
  rateLimit: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
  proxy: ProxyUrlSchema.optional(),
  dnsCallback: z.string().trim().min(1).optional(),
  severity: z.array(SeveritySchema).min(1).optional(),
  outputPath: z
    .string()
    .trim()
    .min(1)
    .refine((value) => !value.startsWith("-"), { message: "Output path must not start with '-'" })
    .optional(),
});

const ListEntrySchema = z.string().refine((value) => !value.trim().startsWith("-"), {
  message: "Entries must not start with '-'",
});

export const CreateTaskSchema = z.strictObject({
  name: z.string().trim().min(1).optional(),
  targets: z.array(ListEntrySchema),
  templates: z.array(ListEntrySchema),
  options: ScanOptionsSchema.optional(),
});

export interface ValidatedRequest {
  name: string | null;
  targets: string[];
  templates: string[];
  options: ScanOptions;
}

/**
 * Trim, drop blanks and duplicates, keep first-seen order.
 */
export function normalizeList(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed !== "" && !seen.has(trimmed)) {
      seen.add(trimmed);
      result.push(trimmed);
    }
  }
  return result;
}

/**
 * One `path: message` line per issue.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message
  );
}

export function validateCreateRequest(input: unknown): Result<ValidatedRequest, ValidationError> {
  const parsed = CreateTaskSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return Err(new ValidationError(`Invalid scan request: ${issues.join("; ")}`, issues));
  }

  const targets = normalizeList(parsed.data.targets);
  if (targets.length === 0) {
    return Err(new ValidationError("At least one target is required"));
  }

  const templates = normalizeList(parsed.data.templates);
  if (templates.length === 0) {
    return Err(new ValidationError("At least one template is required"));
  }

  return Ok({
    name: parsed.data.name ?? null,
    targets,
    templates,
    options: parsed.data.options ?? {},
  });
}
