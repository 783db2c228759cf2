// --- Research pipeline types ---

export type FindingStatus = "completed" | "failed";

export interface Finding {
  index: number;
  subtask: string;
  findings: string;
  status: FindingStatus;
  model: string;
  elapsedMs: number;
  costUsd: number;
}

export interface Decomposition {
  subtasks: string[];
  /** True when the numbered-list parse failed or the call errored */
  usedFallback: boolean;
  costUsd: number;
}

export interface Citation {
  id: number;
  claim: string;
  sourceType: string;
  reliability: string;
}

export interface ResearchResult {
  sessionId: string;
  query: string;
  subtasks: string[];
  findings: Finding[];
  report: string;
  totalSubtasks: number;
  failedSubtasks: number;
  /** Model that planned and synthesized */
  modelUsed: string;
  /** Model that researched the subtasks */
  researchModel: string;
  usedFallback: boolean;
  citations: Citation[];
  elapsedMs: number;
  costUsd: number;
}

export interface SystemInfo {
  orchestratorModel: string;
  researchModel: string;
  maxSubtasks: number;
  parallel: boolean;
  mock: boolean;
  version: string;
}

// --- History rows ---

export interface SessionRow {
  id: string;
  query: string;
  report: string;
  total_subtasks: number;
  failed_subtasks: number;
  model: string;
  research_model: string;
  used_fallback: number;
  cost_usd: number;
  elapsed_ms: number;
  created_at: string;
}

export interface FindingRow {
  session_id: string;
  idx: number;
  subtask: string;
  findings: string;
  status: FindingStatus;
  model: string;
  elapsed_ms: number;
}
