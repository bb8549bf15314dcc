import { describe, it, expect } from "vitest";
import { summarizeBySeverity } from "../src/core/summary.js";
import type { ResultRecord } from "../src/core/model.js";

function record(severity: string): ResultRecord {
  return { target: "http://a", templateId: "t", templateName: "t", severity, raw: "{}", receivedAt: "" };
}

describe("summarizeBySeverity", () => {
  it("orders severities from critical down, then others alphabetically", () => {
    const summary = summarizeBySeverity(
      ["low", "unknown", "critical", "info", "low", "custom", "medium", "high"].map(record)
    );

    expect(Object.entries(summary)).toEqual([
      ["critical", 1],
      ["high", 1],
      ["medium", 1],
      ["low", 2],
      ["info", 1],
      ["custom", 1],
      ["unknown", 1],
    ]);
  });

  it("is empty without records", () => {
    expect(summarizeBySeverity([])).toEqual({});
  });
});
