import type { LlmClient } from "../llm/client.js";
import { errorText } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { Finding } from "../shared/types.js";
import { buildResearchPrompt } from "./prompts.js";

const log = createLogger("researcher");

export interface ResearchOptions {
  model: string;
  timeoutMs?: number;
  /** Run all subtasks concurrently (default) or one after another */
  parallel?: boolean;
}

/**
 * Research one subtask. A failed call becomes a "failed" finding carrying
 * the error text instead of a rejection.
 */
export async function researchSubtask(
  subtask: string,
  index: number,
  client: LlmClient,
  options: ResearchOptions
): Promise<Finding> {
  const startedAt = Date.now();
  try {
    const { text, costUsd } = await client.complete({
      prompt: buildResearchPrompt(subtask),
      model: options.model,
      timeoutMs: options.timeoutMs,
      label: `research#${index + 1}`,
    });
    return {
      index,
      subtask,
      findings: text,
      status: "completed",
      model: options.model,
      elapsedMs: Date.now() - startedAt,
      costUsd,
    };
  } catch (err) {
    log.error("Subtask research failed", {
      index,
      subtask: subtask.slice(0, 100),
      error: errorText(err),
    });
    return {
      index,
      subtask,
      findings: `Research failed: ${errorText(err)}`,
      status: "failed",
      model: options.model,
      elapsedMs: Date.now() - startedAt,
      costUsd: 0,
    };
  }
}

/**
 * Research every subtask. Findings come back in subtask order whatever the
 * completion order, one per subtask.
 */
export async function researchAll(
  subtasks: readonly string[],
  client: LlmClient,
  options: ResearchOptions
): Promise<Finding[]> {
  const parallel = options.parallel ?? true;
  log.info("Researching subtasks", { count: subtasks.length, parallel });

  if (parallel) {
    return Promise.all(
      subtasks.map((subtask, i) => researchSubtask(subtask, i, client, options))
    );
  }

  const findings: Finding[] = [];
  for (const [i, subtask] of subtasks.entries()) {
    log.debug(`Researching subtask ${i + 1}/${subtasks.length}`);
    findings.push(await researchSubtask(subtask, i, client, options));
  }
  return findings;
}
