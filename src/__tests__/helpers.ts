import { Writable } from "node:stream";
import type {
  Completion,
  CompletionRequest,
  LlmClient,
} from "../llm/client.js";
import type { ResearchConfig } from "../shared/config.js";

export function makeConfig(overrides: Partial<ResearchConfig> = {}): ResearchConfig {
  return {
    apiKey: "test-key",
    model: "sonnet",
    orchestratorModel: "sonnet",
    researchModel: "sonnet",
    maxSubtasks: 4,
    callTimeoutMs: 0,
    parallel: true,
    mock: true,
    dbPath: ":memory:",
    logLevel: "error",
    logDir: undefined,
    ...overrides,
  };
}

/** LlmClient whose answers come from a handler; records every request. */
export class ScriptedClient implements LlmClient {
  readonly name = "scripted";
  readonly calls: CompletionRequest[] = [];
  private readonly handler: (request: CompletionRequest) => Promise<string> | string;

  constructor(handler: (request: CompletionRequest) => Promise<string> | string) {
    this.handler = handler;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    this.calls.push(request);
    const text = await this.handler(request);
    return { text, costUsd: 0.01 };
  }
}

export function sink(): { output: Writable; text: () => string } {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { output, text: () => chunks.join("") };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const silentLogger = {
  createLogger: () => ({
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  }),
  isLogLevel: (value: string) => ["debug", "info", "warn", "error"].includes(value),
  setLogLevel: () => {},
  setLogDir: () => {},
};
