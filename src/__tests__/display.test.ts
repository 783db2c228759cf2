import { describe, it, expect } from "vitest";
import { formatHistory, formatResult, formatSystemInfo } from "../cli/display.js";
import type { ResearchResult, SystemInfo } from "../shared/types.js";

function result(report: string): ResearchResult {
  return {
    sessionId: "s1",
    query: "Tides?",
    subtasks: ["Alpha", "Beta"],
    findings: [
      { index: 0, subtask: "Alpha", findings: "notes", status: "completed", model: "sonnet", elapsedMs: 1, costUsd: 0 },
      { index: 1, subtask: "Beta", findings: "Research failed: x", status: "failed", model: "sonnet", elapsedMs: 1, costUsd: 0 },
    ],
    report,
    totalSubtasks: 2,
    failedSubtasks: 1,
    modelUsed: "opus",
    researchModel: "sonnet",
    usedFallback: false,
    citations: [],
    elapsedMs: 10,
    costUsd: 0,
  };
}

describe("formatResult", () => {
  it("prints a short report whole", () => {
    expect(formatResult(result("Short report"))).toBe(
      [
        "📊 Research Results:",
        "Query: Tides?",
        "Subtasks completed: 1/2",
        "Model used: opus",
        "",
        "📋 Final Report:",
        "Short report",
      ].join("\n")
    );
  });

  it("truncates long reports unless asked for the full text", () => {
    const long = "x".repeat(900);

    const preview = formatResult(result(long));
    expect(preview).toContain(`${"x".repeat(800)}...`);
    expect(preview).toContain("[Report truncated - Full report contains 900 characters]");

    expect(formatResult(result(long), { full: true })).not.toContain("[Report truncated");
  });

  it("lists subtasks and marks failures in detail mode", () => {
    const text = formatResult(result("r"), { showDetails: true });
    expect(text).toContain("📝 Subtasks Researched:\n  1. Alpha\n  2. Beta ❌");
  });
});

describe("formatSystemInfo", () => {
  const info: SystemInfo = {
    orchestratorModel: "opus",
    researchModel: "sonnet",
    maxSubtasks: 4,
    parallel: true,
    mock: false,
    version: "1.0.0",
  };

  it("shows both models when they differ", () => {
    const text = formatSystemInfo(info);
    expect(text).toContain("Orchestrator Model: opus\nResearch Model: sonnet");
    expect(text).toContain("Max Subtasks: 4");
    expect(text).not.toContain("Mode: mock");
  });

  it("collapses a shared model into one line", () => {
    const text = formatSystemInfo({ ...info, orchestratorModel: "sonnet", mock: true });
    expect(text).toContain("Model: sonnet\nMax Subtasks: 4");
    expect(text).toContain("Mode: mock (no API calls)");
  });
});

describe("formatHistory", () => {
  it("says so when nothing is recorded", () => {
    expect(formatHistory([])).toBe("No research sessions recorded.");
  });

  it("lists sessions against the recorded total", () => {
    const row = {
      id: "s1",
      query: "How do tides work?",
      report: "# Report",
      total_subtasks: 3,
      failed_subtasks: 0,
      model: "sonnet",
      research_model: "sonnet",
      used_fallback: 0,
      cost_usd: 0,
      elapsed_ms: 10,
      created_at: "2026-01-01 10:00:00",
    };

    expect(formatHistory([row], 5)).toBe(
      "📈 Recent research sessions (1 of 5):\n" +
        "  1. [2026-01-01 10:00:00] How do tides work? (3 subtasks)"
    );
  });
});
