import type { LlmClient } from "../llm/client.js";
import { errorText } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { Citation } from "../shared/types.js";
import { buildAttributionPrompt, buildCitationNeedsPrompt } from "./prompts.js";

const log = createLogger("citations");

function afterColon(line: string): string {
  return line.slice(line.lastIndexOf(":") + 1).trim();
}

/**
 * Parse a numbered list of claims. Indented follow-up lines mentioning a
 * source type or a reliability level fill those fields on the last claim.
 */
export function parseCitationNeeds(text: string): Citation[] {
  const citations: Citation[] = [];
  let current: Citation | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const numbered = /^\d+[.)]\s*(.+)$/.exec(line);
    if (numbered) {
      current = {
        id: citations.length + 1,
        claim: numbered[1].trim(),
        sourceType: "unknown",
        reliability: "medium",
      };
      citations.push(current);
      continue;
    }

    if (!current) continue;
    const lower = line.toLowerCase();
    if (lower.includes("reliability") || lower.includes("level")) {
      current.reliability = afterColon(line);
    } else if (lower.includes("source") || lower.includes("type")) {
      current.sourceType = afterColon(line);
    }
  }

  return citations;
}

export interface CitationCheck {
  totalCitations: number;
  citationNumbers: number[];
  properlyFormatted: boolean;
  /** Distinct markers form 1..n with no gaps */
  sequential: boolean;
}

export function validateCitations(content: string): CitationCheck {
  const numbers = [...content.matchAll(/\[(\d+)\]/g)].map((m) => Number(m[1]));
  const distinct = [...new Set(numbers)].sort((a, b) => a - b);
  return {
    totalCitations: numbers.length,
    citationNumbers: numbers,
    properlyFormatted: numbers.length > 0,
    sequential: distinct.every((n, i) => n === i + 1),
  };
}

export interface AnnotateOptions {
  model: string;
  timeoutMs?: number;
}

/**
 * Two-call citation pass over a finished report. Any failure leaves the
 * report as it was.
 */
export async function annotateReport(
  report: string,
  client: LlmClient,
  options: AnnotateOptions
): Promise<{ content: string; citations: Citation[]; costUsd: number }> {
  let costUsd = 0;
  try {
    const needs = await client.complete({
      prompt: buildCitationNeedsPrompt(report),
      model: options.model,
      timeoutMs: options.timeoutMs,
      label: "citation-needs",
    });
    costUsd += needs.costUsd;

    const citations = parseCitationNeeds(needs.text);
    if (citations.length === 0) {
      log.info("No claims need citations");
      return { content: report, citations, costUsd };
    }

    const attributed = await client.complete({
      prompt: buildAttributionPrompt(
        report,
        citations.map((c) => c.claim)
      ),
      model: options.model,
      timeoutMs: options.timeoutMs,
      label: "attribution",
    });
    costUsd += attributed.costUsd;

    const check = validateCitations(attributed.text);
    log.info("Added citations", {
      claims: citations.length,
      markers: check.totalCitations,
      sequential: check.sequential,
    });
    return { content: attributed.text, citations, costUsd };
  } catch (err) {
    log.warn("Citation pass failed, keeping report unchanged", {
      error: errorText(err),
    });
    return { content: report, citations: [], costUsd };
  }
}
