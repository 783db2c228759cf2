import type { SessionDetail } from "../db/queries.js";
import type { ResearchResult, SessionRow, SystemInfo } from "../shared/types.js";

/** Reports longer than this are cut unless --full is given */
export const REPORT_PREVIEW_CHARS = 800;
const SUBTASK_PREVIEW_CHARS = 80;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function formatSystemInfo(info: SystemInfo): string {
  const models =
    info.orchestratorModel === info.researchModel
      ? [`Model: ${info.orchestratorModel}`]
      : [
          `Orchestrator Model: ${info.orchestratorModel}`,
          `Research Model: ${info.researchModel}`,
        ];
  return [
    "🔬 Multi-Agent Research System",
    "=".repeat(50),
    ...models,
    `Max Subtasks: ${info.maxSubtasks}`,
    `Dispatch: ${info.parallel ? "parallel" : "sequential"}`,
    ...(info.mock ? ["Mode: mock (no API calls)"] : []),
    `Version: ${info.version}`,
    "✅ System initialized successfully",
  ].join("\n");
}

export function formatResult(
  result: ResearchResult,
  opts: { showDetails?: boolean; full?: boolean } = {}
): string {
  const lines = [
    "📊 Research Results:",
    `Query: ${result.query}`,
    `Subtasks completed: ${result.totalSubtasks - result.failedSubtasks}/${result.totalSubtasks}`,
    `Model used: ${result.modelUsed}`,
  ];

  if (opts.showDetails) {
    lines.push("", "📝 Subtasks Researched:");
    for (const f of result.findings) {
      const mark = f.status === "failed" ? " ❌" : "";
      lines.push(
        `  ${f.index + 1}. ${truncate(f.subtask, SUBTASK_PREVIEW_CHARS)}${mark}`
      );
    }
  }

  lines.push("", "📋 Final Report:");
  if (!opts.full && result.report.length > REPORT_PREVIEW_CHARS) {
    lines.push(
      `${result.report.slice(0, REPORT_PREVIEW_CHARS)}...`,
      "",
      `[Report truncated - Full report contains ${result.report.length} characters]`
    );
  } else {
    lines.push(result.report);
  }

  if (result.citations.length > 0) {
    lines.push("", `📚 Citations found: ${result.citations.length}`);
  }

  return lines.join("\n");
}

export function formatHistory(
  rows: readonly SessionRow[],
  total = rows.length
): string {
  if (rows.length === 0) return "No research sessions recorded.";
  return [
    `📈 Recent research sessions (${rows.length} of ${total}):`,
    ...rows.map(
      (r, i) =>
        `  ${i + 1}. [${r.created_at}] ${truncate(r.query, SUBTASK_PREVIEW_CHARS)} (${r.total_subtasks} subtasks)`
    ),
  ].join("\n");
}

export const INTERACTIVE_HELP = `📚 Available Commands:
  help                 - Show this help message
  info                 - Show system information
  history              - List recent research sessions
  export [id]          - Print a recorded session as JSON (default: the last one)
  followup <question>  - Research a question using the last report as context
  quit                 - Exit the program (also: exit, q)

Simply type your research question to start researching!`;

export const USAGE = `Usage: fanout-research [options] [query...]

With a query, research it once and print the report.
With no query, run three preset demo queries.

Options:
  -i, --interactive            Prompt for queries until quit/exit/q
  -v, --verbose                Debug logging and subtask details
  -m, --model <id>             Model for every call
      --orchestrator-model <id>  Model for planning and synthesis
      --research-model <id>    Model for subtask research
      --mock                   Offline mode, no API calls
      --citations              Add citation markers to the report
      --sequential             Research subtasks one at a time
      --full                   Print the full report without truncation
      --history                List recent research sessions and exit
      --export <id>            Print a recorded session as JSON and exit
  -h, --help                   Show this help`;

export function formatExport(detail: SessionDetail): string {
  return JSON.stringify(detail, null, 2);
}
