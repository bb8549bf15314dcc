/**
 * Scanner configuration: JSON file plus environment overrides.
 *
 * The file is optional; every field has a default. The result is frozen and
 * handed to the scheduler, which reads it once per created task.
 */

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import * as z from "zod/v4";
import { Ok, Err, type Result } from "@scanwarden/core";
import { ValidationError } from "./core/errors.js";
import { DEFAULT_GRACE_PERIOD, type ScanConfig } from "./core/model.js";
import { formatIssues, isProxyUrl } from "./core/validation.js";

export const CONFIG_ENV = "SCANWARDEN_CONFIG";
export const SCANNER_PATH_ENV = "SCANWARDEN_SCANNER_PATH";
export const TEMPLATES_DIR_ENV = "SCANWARDEN_TEMPLATES_DIR";

export function defaultConfigDir(): string {
  return join(homedir(), ".scanwarden");
}

const ProxyEntrySchema = z
  .string()
  .trim()
  .refine((value) => value === "" || isProxyUrl(value), {
    message: "Proxy must be an http://, https:// or socks5:// URL",
  })
  .optional();

const ConfigFileSchema = z.strictObject({
  scannerPath: z.string().trim().min(1).optional(),
  templatesDir: z.string().trim().min(1).optional(),
  workDir: z.string().trim().min(1).optional(),
  rateLimit: z.number().int().nonnegative().optional(),
  concurrency: z.number().int().positive().optional(),
  dnsCallback: z.string().trim().optional(),
  proxy: z
    .strictObject({
      http: ProxyEntrySchema,
      https: ProxyEntrySchema,
      socks5: ProxyEntrySchema,
    })
    .optional(),
  gracePeriodMs: z.number().int().nonnegative().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function defaultConfig(): ScanConfig {
  return Object.freeze({
    scannerPath: "nuclei",
    templatesDir: join(defaultConfigDir(), "templates"),
    workDir: process.cwd(),
    rateLimit: 50,
    concurrency: 25,
    dnsCallback: "",
    proxy: Object.freeze({}),
    gracePeriodMs: DEFAULT_GRACE_PERIOD,
  });
}

export interface LoadConfigOptions {
  /** Config file. Default: $SCANWARDEN_CONFIG, else ~/.scanwarden/config.json */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate the configuration.
 * A missing file yields the defaults; an unreadable or invalid one is an error.
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<ScanConfig, ValidationError> {
  const env = options.env ?? process.env;
  const path = options.path ?? env[CONFIG_ENV] ?? join(defaultConfigDir(), "config.json");

  const file = readConfigFile(path);
  if (!file.ok) {
    return file;
  }

  const defaults = defaultConfig();
  const values = file.value;

  return Ok(
    Object.freeze({
      scannerPath: nonBlank(env[SCANNER_PATH_ENV]) ?? values.scannerPath ?? defaults.scannerPath,
      templatesDir: nonBlank(env[TEMPLATES_DIR_ENV]) ?? values.templatesDir ?? defaults.templatesDir,
      workDir: values.workDir ?? defaults.workDir,
      rateLimit: values.rateLimit ?? defaults.rateLimit,
      concurrency: values.concurrency ?? defaults.concurrency,
      dnsCallback: values.dnsCallback ?? defaults.dnsCallback,
      proxy: Object.freeze({ ...values.proxy }),
      gracePeriodMs: values.gracePeriodMs ?? defaults.gracePeriodMs,
    })
  );
}

function readConfigFile(path: string): Result<ConfigFile, ValidationError> {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return Ok({});
    }
    const message = error instanceof Error ? error.message : String(error);
    return Err(new ValidationError(`Cannot read config ${path}: ${message}`, [message], { cause: error }));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Err(new ValidationError(`Config ${path} is not valid JSON: ${message}`, [message], { cause: error }));
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return Err(new ValidationError(`Invalid config ${path}: ${issues.join("; ")}`, issues));
  }
  return Ok(parsed.data);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
