/**
 * Incremental parser from scanner output lines to result records.
 *
 * The scanner interleaves JSON result lines with log and banner text, so
 * anything that is not a result is counted and skipped, never fatal.
 */

import { cleanLine } from "../cleanOutput.js";
import type { ResultRecord } from "./model.js";

/**
 * Receiver of parsed output. Implemented by the task that owns the stream.
 */
export interface ResultSink {
  appendResult(record: ResultRecord): void;
  countMalformed(): void;
}

export interface ResultAccumulatorOptions {
  /** Clock for arrival timestamps. */
  now?: () => Date;
}

type JsonObject = { [key: string]: unknown };

const TEMPLATE_ID_KEYS = ["template-id", "templateID", "template_id"] as const;
const TARGET_KEYS = ["matched-at", "host", "url"] as const;

export class ResultAccumulator {
  private readonly now: () => Date;

  constructor(options: ResultAccumulatorOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Parse one line. Appends and returns the record, or returns null.
   * Blank lines are ignored; other non-result lines are counted as malformed.
   */
  feed(sink: ResultSink, line: string): ResultRecord | null {
    const text = cleanLine(line);
    if (text === "") return null;

    const payload = parseObject(text);
    const templateId = payload ? firstString(payload, TEMPLATE_ID_KEYS) : null;

    if (!payload || !templateId) {
      sink.countMalformed();
      return null;
    }

    const info: JsonObject = isObject(payload.info) ? payload.info : {};

    const record: ResultRecord = Object.freeze({
      target: firstString(payload, TARGET_KEYS) ?? "",
      templateId,
      templateName: firstString(info, ["name"]) ?? templateId,
      severity: (firstString(info, ["severity"]) ?? "unknown").toLowerCase(),
      raw: line,
      receivedAt: this.now().toISOString(),
    });

    sink.appendResult(record);
    return record;
  }
}

function parseObject(text: string): JsonObject | null {
  if (!text.startsWith("{")) return null;
  try {
    const value: unknown = JSON.parse(text);
    return isObject(value) ? value : null;
  } catch {
    return null;
  }
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstString(source: JsonObject, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim() !== "") {
      return value.trim();
    }
  }
  return null;
}
