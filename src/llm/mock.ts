import { detectPromptKind, type PromptKind } from "../research/prompts.js";
import type { Completion, CompletionRequest, LlmClient } from "./client.js";

function capture(prompt: string, pattern: RegExp): string {
  return pattern.exec(prompt)?.[1]?.trim() ?? "";
}

function topicOf(query: string): string {
  return query.split("\n", 1)[0].trim().replace(/[?.!]+$/, "");
}

function decompositionText(prompt: string): string {
  const topic = topicOf(
    capture(prompt, /^Query: ([\s\S]*?)\n\nRequirements:/m)
  );
  return `Here is a breakdown of the research query:

1. Background and current state of ${topic}
2. Key drivers, benefits and challenges of ${topic}
3. Future outlook and open questions for ${topic}`;
}

function researchText(prompt: string): string {
  const topic = capture(prompt, /^Topic: (.*)$/m);
  return `**Key Findings**
- ${topic} has seen steady attention from practitioners and researchers.
- Adoption varies widely between regions and sectors.

**Supporting Evidence**
- Published surveys and case studies on ${topic} point in the same direction.

**Important Considerations**
- Most available data covers developed markets; other contexts may differ.

**Analysis**
The evidence on ${topic} suggests gradual progress, with open questions about scale and cost.`;
}

function synthesisText(prompt: string): string {
  const query = capture(
    prompt,
    /^Query: "([\s\S]*?)"\n\nResearch Findings:/m
  );
  const areas = [...prompt.matchAll(/^Research Area (\d+): (.*)$/gm)].map(
    (m) => `- Research Area ${m[1]} (${m[2]}): findings are consistent and point to gradual progress.`
  );
  return `# Research Report: ${query}

## Executive Summary
This report synthesizes ${areas.length} research areas on "${query}". The findings agree on the main trends and highlight a few open questions.

## Key Findings
${areas.join("\n")}

## Detailed Analysis
The research areas connect through shared drivers and constraints. Progress in one area tends to enable the others, while cost and scale remain the common limits.

## Conclusions
"${query}" shows steady development with several viable paths forward. Further work should focus on regional differences and long-term effects.`;
}

function citationNeedsText(prompt: string): string {
  const claims = [...prompt.matchAll(/^- (.+)$/gm)].slice(0, 3);
  if (claims.length === 0) return "No claims require citations.";
  return claims
    .map(
      (m, i) =>
        `${i + 1}. ${m[1]}\n   Source type: academic\n   Reliability: peer-reviewed`
    )
    .join("\n");
}

function attributionText(prompt: string): string {
  const content = capture(
    prompt,
    /^Original Content:\n([\s\S]*?)\n\nClaims needing citations:/m
  );
  const claimCount = [...prompt.matchAll(/^\d+\. /gm)].length;
  let marker = 0;
  const annotated = content
    .split("\n")
    .map((line) => {
      if (marker < claimCount && line.startsWith("- ")) {
        marker++;
        return `${line} [${marker}]`;
      }
      return line;
    })
    .join("\n");
  const bibliography = Array.from(
    { length: marker },
    (_, i) => `[${i + 1}] Placeholder source ${i + 1}`
  ).join("\n");
  return `${annotated}\n\n## Bibliography\n${bibliography}`;
}

const RESPONDERS: Record<PromptKind, (prompt: string) => string> = {
  decompose: decompositionText,
  research: researchText,
  synthesize: synthesisText,
  citationNeeds: citationNeedsText,
  attribution: attributionText,
};

/**
 * Offline stand-in for the model. Answers every prompt kind with
 * deterministic, templated text and never touches the network.
 */
export class MockLlmClient implements LlmClient {
  readonly name = "mock";
  readonly calls: CompletionRequest[] = [];
  private readonly failing = new Set<PromptKind>();

  /** Make every subsequent call of this kind throw. */
  failOn(kind: PromptKind): this {
    this.failing.add(kind);
    return this;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    this.calls.push(request);
    const kind = detectPromptKind(request.prompt);

    if (kind && this.failing.has(kind)) {
      throw new Error(`Mock ${kind} failure`);
    }

    const text = kind
      ? RESPONDERS[kind](request.prompt)
      : `Mock response for: ${request.prompt.slice(0, 100)}`;
    return { text, costUsd: 0 };
  }
}
