import { describe, it, expect } from "vitest";
import { RequestStatistics } from "../../src/usage/statistics.js";
import { summarizeSnapshot } from "../../src/usage/summary.js";

function sample() {
  const stats = new RequestStatistics();
  stats.record({ api: "openai", model: "gpt-4o", timestamp: new Date("2026-03-01T10:00:00Z"), tokens: { total_tokens: 100 } });
  stats.record({ api: "openai", model: "o3", timestamp: new Date("2026-03-02T10:00:00Z"), tokens: { total_tokens: 50 } });
  stats.record({ api: "claude", model: "sonnet", timestamp: new Date("2026-03-02T11:00:00Z"), failed: true, tokens: { total_tokens: 7 } });
  return stats.snapshot();
}

describe("summarizeSnapshot", () => {
  it("summarizes all-time totals sorted by api", () => {
    expect(summarizeSnapshot(sample())).toEqual({
      period: "all",
      requests: { total: 3, success: 2, failure: 1 },
      tokens: 157,
      apis: [
        { api: "claude", requests: 1, tokens: 7, models: ["sonnet"] },
        { api: "openai", requests: 2, tokens: 150, models: ["gpt-4o", "o3"] },
      ],
    });
  });

  it("filters details by UTC day", () => {
    expect(summarizeSnapshot(sample(), "2026-03-02")).toEqual({
      period: "2026-03-02",
      requests: { total: 2, success: 1, failure: 1 },
      tokens: 57,
      apis: [
        { api: "claude", requests: 1, tokens: 7, models: ["sonnet"] },
        { api: "openai", requests: 1, tokens: 50, models: ["o3"] },
      ],
    });
  });

  it("returns zero totals for a day without requests", () => {
    expect(summarizeSnapshot(sample(), "2025-01-01")).toEqual({
      period: "2025-01-01",
      requests: { total: 0, success: 0, failure: 0 },
      tokens: 0,
      apis: [],
    });
  });
});
