export { ResearchSystem, VERSION } from "./research/system.js";
export type { ConductOptions, ResearchSystemOptions } from "./research/system.js";
export { decompose, parseSubtasks } from "./research/decomposer.js";
export { researchAll, researchSubtask } from "./research/researcher.js";
export { synthesize, formatFindings } from "./research/synthesizer.js";
export {
  annotateReport,
  parseCitationNeeds,
  validateCitations,
} from "./research/citations.js";
export {
  AgentSdkClient,
  ModelCallError,
  createLlmClient,
} from "./llm/client.js";
export type { Completion, CompletionRequest, LlmClient } from "./llm/client.js";
export { MockLlmClient } from "./llm/mock.js";
export { HistoryStore } from "./db/queries.js";
export type { SessionDetail } from "./db/queries.js";
export { loadConfig } from "./shared/config.js";
export type { ConfigOverrides, ResearchConfig } from "./shared/config.js";
export { ConfigError, ResearchError } from "./shared/errors.js";
export type * from "./shared/types.js";
