import { ulid } from "ulid";
import type { LlmClient } from "../llm/client.js";
import type { HistoryStore, SessionDetail } from "../db/queries.js";
import type { ResearchConfig } from "../shared/config.js";
import { ResearchError, errorText } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { ResearchResult, SessionRow, SystemInfo } from "../shared/types.js";
import { annotateReport } from "./citations.js";
import { decompose } from "./decomposer.js";
import { researchAll } from "./researcher.js";
import { synthesize } from "./synthesizer.js";

const log = createLogger("research");

export const VERSION = "1.0.0";

/** How much of the previous report a follow-up carries as context */
const FOLLOW_UP_CONTEXT_CHARS = 1500;

export interface ResearchSystemOptions {
  client: LlmClient;
  config: ResearchConfig;
  store?: HistoryStore;
}

export interface ConductOptions {
  citations?: boolean;
}

/**
 * Query → decompose → research each subtask → synthesize. Holds no state
 * across queries apart from a session counter and the last result, which
 * follow-up questions build on.
 */
export class ResearchSystem {
  private readonly client: LlmClient;
  private readonly config: ResearchConfig;
  private readonly store: HistoryStore | undefined;
  private last: ResearchResult | null = null;
  private sessions = 0;

  constructor(options: ResearchSystemOptions) {
    this.client = options.client;
    this.config = options.config;
    this.store = options.store;
    log.info("Initialized research system", {
      client: this.client.name,
      orchestratorModel: this.config.orchestratorModel,
      researchModel: this.config.researchModel,
    });
  }

  get sessionCount(): number {
    return this.sessions;
  }

  get lastResult(): ResearchResult | null {
    return this.last;
  }

  async conductResearch(
    query: string,
    options: ConductOptions = {}
  ): Promise<ResearchResult> {
    return this.execute(query, undefined, options);
  }

  /**
   * Research a question in light of the most recent session. Without a
   * previous session this is a plain research run.
   */
  async followUp(
    question: string,
    options: ConductOptions = {}
  ): Promise<ResearchResult> {
    const context = this.last
      ? `Query: ${this.last.query}\n${this.last.report.slice(0, FOLLOW_UP_CONTEXT_CHARS)}`
      : undefined;
    return this.execute(question, context, options);
  }

  getSystemInfo(): SystemInfo {
    return {
      orchestratorModel: this.config.orchestratorModel,
      researchModel: this.config.researchModel,
      maxSubtasks: this.config.maxSubtasks,
      parallel: this.config.parallel,
      mock: this.config.mock,
      version: VERSION,
    };
  }

  getHistory(limit = 10): SessionRow[] {
    return this.store?.listSessions(limit) ?? [];
  }

  recordedSessions(): number {
    return this.store?.countSessions() ?? 0;
  }

  /**
   * One recorded session with its findings, for dumping as JSON. Defaults to
   * the most recent session of this process. Undefined when there is no
   * store or no such session.
   */
  exportSession(id = this.last?.sessionId): SessionDetail | undefined {
    if (!id || !this.store) return undefined;
    return this.store.getSession(id);
  }

  private async execute(
    rawQuery: string,
    context: string | undefined,
    options: ConductOptions
  ): Promise<ResearchResult> {
    const query = rawQuery.trim();
    if (!query) {
      throw new ResearchError({
        code: "empty_query",
        technicalMessage: "Query cannot be empty",
        userMessage: "Query cannot be empty.",
      });
    }

    const startedAt = Date.now();
    const sessionId = ulid();
    const timeoutMs = this.config.callTimeoutMs;
    log.info("Starting research", {
      sessionId,
      query: query.slice(0, 100),
      followUp: context !== undefined,
    });

    const planningQuery = context
      ? `${query}\n\nPrevious research context:\n${context}`
      : query;
    const decomposition = await decompose(planningQuery, this.client, {
      model: this.config.orchestratorModel,
      maxSubtasks: this.config.maxSubtasks,
      timeoutMs,
    });

    const findings = await researchAll(decomposition.subtasks, this.client, {
      model: this.config.researchModel,
      timeoutMs,
      parallel: this.config.parallel,
    });

    const synthesis = await synthesize(query, findings, this.client, {
      model: this.config.orchestratorModel,
      timeoutMs,
    });

    let report = synthesis.report;
    let citations: ResearchResult["citations"] = [];
    let citationCost = 0;
    if (options.citations) {
      const annotated = await annotateReport(report, this.client, {
        model: this.config.orchestratorModel,
        timeoutMs,
      });
      report = annotated.content;
      citations = annotated.citations;
      citationCost = annotated.costUsd;
    }

    const result: ResearchResult = {
      sessionId,
      query,
      subtasks: decomposition.subtasks,
      findings,
      report,
      totalSubtasks: decomposition.subtasks.length,
      failedSubtasks: findings.filter((f) => f.status === "failed").length,
      modelUsed: this.config.orchestratorModel,
      researchModel: this.config.researchModel,
      usedFallback: decomposition.usedFallback,
      citations,
      elapsedMs: Date.now() - startedAt,
      costUsd:
        decomposition.costUsd +
        findings.reduce((sum, f) => sum + f.costUsd, 0) +
        synthesis.costUsd +
        citationCost,
    };

    this.sessions++;
    this.last = result;
    this.record(result);

    log.info("Research completed", {
      sessionId,
      subtasks: result.totalSubtasks,
      failed: result.failedSubtasks,
      elapsedMs: result.elapsedMs,
    });
    return result;
  }

  private record(result: ResearchResult): void {
    if (!this.store) return;
    try {
      this.store.recordSession(result);
    } catch (err) {
      log.warn("Failed to record session history", {
        sessionId: result.sessionId,
        error: errorText(err),
      });
    }
  }
}
