import { query } from "@anthropic-ai/claude-agent-sdk";
import type { ResearchConfig } from "../shared/config.js";
import { classifyModelFailure, errorText } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { MockLlmClient } from "./mock.js";

const log = createLogger("llm");

/** Tools a research answer might reach for; calls are text-only */
const DISALLOWED_TOOLS = ["WebSearch", "WebFetch", "Bash", "Task"];

export interface CompletionRequest {
  prompt: string;
  model: string;
  /** 0 or undefined = no timeout */
  timeoutMs?: number;
  /** Short tag for log lines, e.g. "decompose" or "research#2" */
  label?: string;
}

export interface Completion {
  text: string;
  costUsd: number;
}

export interface LlmClient {
  readonly name: string;
  complete(request: CompletionRequest): Promise<Completion>;
}

export class ModelCallError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean) {
    super(message);
    this.name = "ModelCallError";
    this.timedOut = timedOut;
  }
}

function stringEnv(apiKey: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (typeof value === "string") out[key] = value;
  }
  out.ANTHROPIC_API_KEY = apiKey;
  return out;
}

/**
 * Single-turn, tool-less calls through the Claude Agent SDK. Each call is
 * one prompt in, one text result out.
 */
export class AgentSdkClient implements LlmClient {
  readonly name = "claude-agent-sdk";
  private readonly apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const abortController = new AbortController();
    let timedOut = false;
    const timeout =
      request.timeoutMs && request.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            abortController.abort();
          }, request.timeoutMs)
        : undefined;

    const startedAt = Date.now();
    let text: string | null = null;
    let costUsd = 0;
    try {
      for await (const message of query({
        prompt: request.prompt,
        options: {
          model: request.model,
          allowedTools: [],
          disallowedTools: DISALLOWED_TOOLS,
          maxTurns: 1,
          permissionMode: "bypassPermissions",
          abortController,
          env: stringEnv(this.apiKey),
        },
      })) {
        if (message.type !== "result") continue;
        costUsd += message.total_cost_usd;
        if (message.subtype === "success") {
          text = message.result;
        } else {
          throw new Error(`Model call ended with ${message.subtype}`);
        }
      }
    } catch (err) {
      const code = classifyModelFailure(err, timedOut);
      log.warn("Model call failed", {
        label: request.label,
        model: request.model,
        code,
        elapsedMs: Date.now() - startedAt,
        error: errorText(err),
      });
      throw new ModelCallError(
        timedOut
          ? `Model call timed out after ${request.timeoutMs}ms`
          : errorText(err),
        timedOut
      );
    } finally {
      clearTimeout(timeout);
    }

    if (text === null) {
      throw new ModelCallError("Model call returned no result", false);
    }

    log.debug("Model call completed", {
      label: request.label,
      model: request.model,
      elapsedMs: Date.now() - startedAt,
      chars: text.length,
      costUsd,
    });
    return { text, costUsd };
  }
}

export function createLlmClient(config: ResearchConfig): LlmClient {
  if (config.mock) return new MockLlmClient();
  return new AgentSdkClient(config.apiKey);
}
