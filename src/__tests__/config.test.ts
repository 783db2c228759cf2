import { describe, it, expect } from "vitest";
import { loadConfig } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";

describe("loadConfig", () => {
  it("fails fast without an API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ ANTHROPIC_API_KEY: "   " })).toThrow(
      "Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable."
    );
  });

  it("does not need a key in mock mode", () => {
    expect(loadConfig({ RESEARCH_MOCK: "1" }).mock).toBe(true);
    expect(loadConfig({}, { mock: true }).apiKey).toBe("");
  });

  it("applies defaults", () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: "test-key" })).toEqual({
      apiKey: "test-key",
      model: "sonnet",
      orchestratorModel: "sonnet",
      researchModel: "sonnet",
      maxSubtasks: 4,
      callTimeoutMs: 120000,
      parallel: true,
      mock: false,
      dbPath: ":memory:",
      logLevel: "warn",
      logDir: undefined,
    });
  });

  it("reads model settings with the legacy name as a fallback", () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: "k", MODEL_NAME: "opus" }).model).toBe("opus");

    const config = loadConfig({
      ANTHROPIC_API_KEY: "k",
      RESEARCH_MODEL: "sonnet",
      MODEL_NAME: "opus",
      RESEARCH_ORCHESTRATOR_MODEL: "opus",
    });
    expect(config.model).toBe("sonnet");
    expect(config.orchestratorModel).toBe("opus");
    expect(config.researchModel).toBe("sonnet");
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig(
      { ANTHROPIC_API_KEY: "k", RESEARCH_MODEL: "sonnet" },
      { model: "haiku", researchModel: "opus", parallel: false }
    );
    expect(config.orchestratorModel).toBe("haiku");
    expect(config.researchModel).toBe("opus");
    expect(config.parallel).toBe(false);
  });

  it("reads sequential dispatch and a zero timeout", () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: "k",
      RESEARCH_SEQUENTIAL: "true",
      RESEARCH_CALL_TIMEOUT_MS: "0",
    });
    expect(config.parallel).toBe(false);
    expect(config.callTimeoutMs).toBe(0);
  });

  it("rejects invalid numbers and log levels", () => {
    expect(() =>
      loadConfig({ ANTHROPIC_API_KEY: "k", RESEARCH_MAX_SUBTASKS: "0" })
    ).toThrow('Invalid value for RESEARCH_MAX_SUBTASKS: "0" (expected integer >= 1)');
    expect(() =>
      loadConfig({ ANTHROPIC_API_KEY: "k", RESEARCH_MAX_SUBTASKS: "two" })
    ).toThrow(ConfigError);
    expect(() =>
      loadConfig({ ANTHROPIC_API_KEY: "k", RESEARCH_LOG_LEVEL: "loud" })
    ).toThrow(ConfigError);
  });

  it("accepts only plain decimal digits for numbers", () => {
    for (const raw of ["1e3", "0x10", "-1", "2.5"]) {
      expect(() =>
        loadConfig({ ANTHROPIC_API_KEY: "k", RESEARCH_CALL_TIMEOUT_MS: raw })
      ).toThrow(ConfigError);
    }
    expect(() =>
      loadConfig({ ANTHROPIC_API_KEY: "k", RESEARCH_CALL_TIMEOUT_MS: "1e3" })
    ).toThrow('Invalid value for RESEARCH_CALL_TIMEOUT_MS: "1e3" (expected integer >= 0)');
    expect(() =>
      loadConfig({ ANTHROPIC_API_KEY: "k", RESEARCH_MAX_SUBTASKS: "0x10" })
    ).toThrow(ConfigError);
    expect(
      loadConfig({ ANTHROPIC_API_KEY: "k", RESEARCH_MAX_SUBTASKS: "007" }).maxSubtasks
    ).toBe(7);
  });
});
