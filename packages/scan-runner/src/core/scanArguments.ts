/**
 * Scanner command line (nuclei CLI contract).
 *
 * Output is always JSON lines without the banner; every advanced option maps
 * to exactly one flag and is omitted when unset.
 */

import type { TaskDefinition } from "./model.js";

export const BASE_FLAGS = ["-jsonl", "-silent"] as const;

export function buildScanArguments(definition: TaskDefinition): string[] {
  const { options } = definition;
  const args: string[] = [...BASE_FLAGS];

  if (options.rateLimit !== null) {
    args.push("-rl", String(options.rateLimit));
  }
  args.push("-c", String(options.concurrency));
  if (options.severity !== null && options.severity.length > 0) {
    args.push("-severity", options.severity.join(","));
  }
  if (options.proxy !== null) {
    args.push("-proxy", options.proxy);
  }
  if (options.dnsCallback !== null) {
    args.push("-interactsh-url", options.dnsCallback);
  }
  if (options.outputPath !== null) {
    args.push("-o", options.outputPath);
  }

  for (const path of definition.templatePaths) {
    args.push("-t", path);
  }
  for (const target of definition.targets) {
    args.push("-target", target);
  }

  return args;
}
