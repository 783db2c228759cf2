import { ModelCallError, type LlmClient } from "../llm/client.js";
import { classifyModelFailure, errorText } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { Decomposition } from "../shared/types.js";
import { buildDecompositionPrompt } from "./prompts.js";

const log = createLogger("decomposer");

const NUMBERED_LINE = /^\s*\d+[.):](?!\d)\s*(.+)$/;
const BULLET_LINE = /^\s*[-*•]\s+(.+)$/;

function cleanItem(raw: string): string {
  let item = raw.replace(/\*\*/g, "").trim();
  if (item.startsWith("[") && item.endsWith("]")) {
    item = item.slice(1, -1).trim();
  }
  return item;
}

function collect(lines: string[], pattern: RegExp): string[] {
  const items: string[] = [];
  for (const line of lines) {
    const match = pattern.exec(line);
    if (!match) continue;
    const item = cleanItem(match[1]);
    if (item) items.push(item);
  }
  return items;
}

/**
 * Pull subtasks out of a free-text model answer. Numbered lines win; bullet
 * lines are only used when there are no numbered ones. Returns an empty
 * list when neither is present.
 */
export function parseSubtasks(text: string, maxSubtasks: number): string[] {
  const lines = text.split(/\r?\n/);
  const numbered = collect(lines, NUMBERED_LINE);
  const items = numbered.length > 0 ? numbered : collect(lines, BULLET_LINE);
  return items.slice(0, maxSubtasks);
}

export interface DecomposeOptions {
  model: string;
  maxSubtasks: number;
  timeoutMs?: number;
}

/**
 * Ask the model to split a query into subtasks. Never throws: a failed call
 * or an unparseable answer degrades to a single subtask.
 */
export async function decompose(
  query: string,
  client: LlmClient,
  options: DecomposeOptions
): Promise<Decomposition> {
  const startedAt = Date.now();
  log.info("Decomposing query", { query: query.slice(0, 100) });

  const prompt = buildDecompositionPrompt(query, options.maxSubtasks);

  let text: string;
  let costUsd = 0;
  try {
    const completion = await client.complete({
      prompt,
      model: options.model,
      timeoutMs: options.timeoutMs,
      label: "decompose",
    });
    text = completion.text;
    costUsd = completion.costUsd;
  } catch (err) {
    const timedOut = err instanceof ModelCallError && err.timedOut;
    log.error("Decomposition call failed, using single-subtask fallback", {
      code: classifyModelFailure(err, timedOut),
      elapsedMs: Date.now() - startedAt,
      error: errorText(err),
    });
    return { subtasks: [query], usedFallback: true, costUsd };
  }

  const subtasks = parseSubtasks(text, options.maxSubtasks);
  if (subtasks.length > 0) {
    log.info("Decomposed into subtasks", {
      count: subtasks.length,
      elapsedMs: Date.now() - startedAt,
    });
    return { subtasks, usedFallback: false, costUsd };
  }

  const whole = text.trim();
  log.warn("No numbered subtasks in decomposition output", {
    resultChars: text.length,
    excerpt: whole.slice(0, 200),
  });
  return { subtasks: [whole || query], usedFallback: true, costUsd };
}
