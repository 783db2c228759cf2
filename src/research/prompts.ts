/**
 * Prompt builders for each round trip. The first line of every prompt is a
 * fixed marker so the mock client (and log readers) can tell them apart.
 */
export const PROMPT_MARKERS = {
  decompose: "Break down this research query into specific subtasks.",
  research: "Research this specific topic comprehensively.",
  synthesize: "Synthesize these research findings into a comprehensive report.",
  citationNeeds: "Identify the claims in this research content that need citations.",
  attribution: "Add citation markers to this content.",
} as const;

export type PromptKind = keyof typeof PROMPT_MARKERS;

export function detectPromptKind(prompt: string): PromptKind | null {
  const firstLine = prompt.trimStart().split("\n", 1)[0] ?? "";
  for (const [kind, marker] of Object.entries(PROMPT_MARKERS)) {
    if (firstLine === marker && isPromptKind(kind)) return kind;
  }
  return null;
}

function isPromptKind(value: string): value is PromptKind {
  return value in PROMPT_MARKERS;
}

export function buildDecompositionPrompt(
  query: string,
  maxSubtasks: number
): string {
  const range = maxSubtasks > 3 ? `3-${maxSubtasks}` : String(maxSubtasks);
  return `${PROMPT_MARKERS.decompose}

Query: ${query}

Requirements:
- Provide ${range} subtasks as a numbered list
- Each subtask should focus on a different aspect
- Make each subtask specific and actionable for research
- Ensure comprehensive coverage of the topic

Format your response as:
1. [First subtask]
2. [Second subtask]
3. [Third subtask]`;
}

export function buildResearchPrompt(subtask: string): string {
  return `${PROMPT_MARKERS.research}

Topic: ${subtask}

Please provide:

1. **Key Findings**: The most important discoveries or information
2. **Supporting Evidence**: Data, statistics, or credible sources that support the findings
3. **Important Considerations**: Limitations, caveats, or important context
4. **Analysis**: Your interpretation and insights about the findings

Be comprehensive but concise, and keep to factual, well-supported information.`;
}

export function buildSynthesisPrompt(
  query: string,
  formattedFindings: string
): string {
  return `${PROMPT_MARKERS.synthesize}

Query: "${query}"

Research Findings:
${formattedFindings}

Create a well-structured report with the following sections:

1. **Executive Summary** (2-3 paragraphs): scope of the research and the main conclusions
2. **Key Findings** (bullet points): the most important discoveries, tied to the research areas
3. **Detailed Analysis** (several paragraphs): connections between research areas and their implications
4. **Conclusions** (1-2 paragraphs): final synthesis and recommendations

Keep the report objective and reference findings from the different research areas.`;
}

export function buildCitationNeedsPrompt(content: string): string {
  return `${PROMPT_MARKERS.citationNeeds}

${content}

For each factual claim, statistic, or research finding, give:
1. The claim itself, as a numbered item
   Source type: the kind of source that would support it
   Reliability: the reliability level needed (peer-reviewed, government, news, ...)`;
}

export function buildAttributionPrompt(
  content: string,
  claims: string[]
): string {
  const claimList = claims.map((c, i) => `${i + 1}. ${c}`).join("\n");
  return `${PROMPT_MARKERS.attribution}

Original Content:
${content}

Claims needing citations:
${claimList}

Add [1], [2], etc. markers after the claims listed above, then append a "Bibliography" section.`;
}
