import { ModelCallError, type LlmClient } from "../llm/client.js";
import {
  ResearchError,
  classifyModelFailure,
  errorText,
} from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { Finding } from "../shared/types.js";
import { buildSynthesisPrompt } from "./prompts.js";

const log = createLogger("synthesizer");

export function formatFindings(findings: readonly Finding[]): string {
  return findings
    .map(
      (f) =>
        `Research Area ${f.index + 1}: ${f.subtask}\n${"=".repeat(50)}\n${f.findings}`
    )
    .join("\n\n");
}

export interface SynthesizeOptions {
  model: string;
  timeoutMs?: number;
}

export async function synthesize(
  query: string,
  findings: readonly Finding[],
  client: LlmClient,
  options: SynthesizeOptions
): Promise<{ report: string; costUsd: number }> {
  const completed = findings.filter((f) => f.status === "completed");
  if (completed.length === 0) {
    throw new ResearchError({
      code: "no_findings",
      technicalMessage: `All ${findings.length} subtask research calls failed`,
      userMessage: "No successful research results to synthesize.",
    });
  }

  if (completed.length < findings.length) {
    log.warn("Synthesizing with partial findings", {
      completed: completed.length,
      total: findings.length,
    });
  }

  const startedAt = Date.now();
  try {
    const { text, costUsd } = await client.complete({
      prompt: buildSynthesisPrompt(query, formatFindings(completed)),
      model: options.model,
      timeoutMs: options.timeoutMs,
      label: "synthesize",
    });
    log.info("Synthesized report", {
      chars: text.length,
      elapsedMs: Date.now() - startedAt,
    });
    return { report: text, costUsd };
  } catch (err) {
    const timedOut = err instanceof ModelCallError && err.timedOut;
    throw new ResearchError({
      code: "synthesis_failed",
      technicalMessage: `Result synthesis failed (${classifyModelFailure(
        err,
        timedOut
      )}): ${errorText(err)}`,
      userMessage: "Result synthesis failed. The findings could not be merged into a report.",
      elapsedMs: Date.now() - startedAt,
    });
  }
}
