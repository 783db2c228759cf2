import { describe, it, expect, vi } from "vitest";
import { Readable } from "node:stream";

vi.mock("../shared/logger.js", async () => (await import("./helpers.js")).silentLogger);

import { runInteractive } from "../cli/interactive.js";
import { HistoryStore } from "../db/queries.js";
import { MockLlmClient } from "../llm/mock.js";
import { ResearchSystem } from "../research/system.js";
import { makeConfig, sink } from "./helpers.js";

function session(
  lines: string[],
  client = new MockLlmClient(),
  store?: HistoryStore
) {
  const system = new ResearchSystem({ client, config: makeConfig(), store });
  const out = sink();
  const input = Readable.from(lines.map((l) => `${l}\n`));
  return {
    client,
    out,
    run: () => runInteractive(system, { input, output: out.output }),
  };
}

describe("runInteractive", () => {
  it("stops on the exit keyword without calling the model", async () => {
    const { run, out, client } = session(["quit", "Never researched"]);

    await expect(run()).resolves.toBe(0);
    expect(out.text()).toContain("📈 Session ended. No queries processed.");
    expect(client.calls).toHaveLength(0);
  });

  it("accepts exit keywords in any case", async () => {
    const { run, client } = session(["EXIT", "Never researched"]);
    await expect(run()).resolves.toBe(0);
    expect(client.calls).toHaveLength(0);

    const short = session(["Q", "Never researched"]);
    await expect(short.run()).resolves.toBe(0);
  });

  it("researches queries until told to quit", async () => {
    const { run, out } = session(["", "How do tides work?", "q"]);

    await expect(run()).resolves.toBe(1);
    const text = out.text();
    expect(text).toContain("Query: How do tides work?");
    expect(text).toContain("# Research Report: How do tides work?");
    expect(text).toContain("📈 Session completed! Processed 1 research queries.");
  });

  it("ends cleanly at end of input", async () => {
    const { run, out } = session(["help"]);

    await expect(run()).resolves.toBe(0);
    expect(out.text()).toContain("📚 Available Commands:");
  });

  it("answers info and history commands", async () => {
    const { run, out } = session(["info", "history", "quit"]);

    await run();
    const text = out.text();
    expect(text).toContain("Max Subtasks: 4");
    expect(text).toContain("No research sessions recorded.");
  });

  it("reports research errors and keeps going", async () => {
    const { run, out } = session(
      ["How do tides work?", "quit"],
      new MockLlmClient().failOn("research")
    );

    await expect(run()).resolves.toBe(0);
    expect(out.text()).toContain(
      "❌ Research Error: No successful research results to synthesize."
    );
  });

  it("runs follow-up questions against the last report", async () => {
    const { run, out, client } = session([
      "How do tides work?",
      "followup What about tidal power?",
      "q",
    ]);

    await expect(run()).resolves.toBe(2);
    expect(out.text()).toContain("Query: What about tidal power?");
    expect(client.calls[5].prompt).toContain("Previous research context:");
  });

  it("prints usage for a follow-up without a question", async () => {
    const { run, out, client } = session(["followup", "q"]);

    await expect(run()).resolves.toBe(0);
    expect(out.text()).toContain("Usage: followup <question>");
    expect(client.calls).toHaveLength(0);
  });

  it("exports the last session as JSON", async () => {
    const store = HistoryStore.open(":memory:");
    const { run, out } = session(
      ["export", "How do tides work?", "export", "q"],
      new MockLlmClient(),
      store
    );

    await expect(run()).resolves.toBe(1);
    const text = out.text();
    expect(text).toContain("❌ No recorded session to export yet.");
    expect(text).toContain('"query": "How do tides work?"');
    expect(text).toContain('"status": "completed"');
    expect(text).toContain("📈 Session completed! Processed 1 research queries.");
    store.close();
  });

  it("reports an unknown export id", async () => {
    const store = HistoryStore.open(":memory:");
    const { run, out } = session(
      ["export 01ARZ3NDEKTSV4RRFFQ69G5FAV", "q"],
      new MockLlmClient(),
      store
    );

    await expect(run()).resolves.toBe(0);
    expect(out.text()).toContain(
      "❌ No recorded session with id 01ARZ3NDEKTSV4RRFFQ69G5FAV"
    );
    store.close();
  });

  it("researches queries that only start with the word export", async () => {
    const { run, out } = session(["export controls on chips", "q"]);

    await expect(run()).resolves.toBe(1);
    expect(out.text()).toContain("Query: export controls on chips");
  });
});
