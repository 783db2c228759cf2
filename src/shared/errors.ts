export type ConfigErrorCode = "missing_api_key" | "invalid_value";

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
  }
}

export type ModelFailureCode = "timeout" | "aborted" | "provider" | "unknown";

export type ResearchErrorCode =
  | "empty_query"
  | "no_findings"
  | "synthesis_failed"
  | ModelFailureCode;

export class ResearchError extends Error {
  readonly code: ResearchErrorCode;
  readonly technicalMessage: string;
  readonly userMessage: string;
  readonly elapsedMs: number;

  constructor(params: {
    code: ResearchErrorCode;
    technicalMessage: string;
    userMessage: string;
    elapsedMs?: number;
  }) {
    super(params.technicalMessage);
    this.name = "ResearchError";
    this.code = params.code;
    this.technicalMessage = params.technicalMessage;
    this.userMessage = params.userMessage;
    this.elapsedMs = params.elapsedMs ?? 0;
  }
}

export function errorText(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  return String(err);
}

/**
 * Map a failed model call to a coarse failure code. `timedOut` wins over the
 * error text because an aborted timeout surfaces as a generic abort error.
 */
export function classifyModelFailure(
  err: unknown,
  timedOut: boolean
): ModelFailureCode {
  if (timedOut) return "timeout";

  const normalized = errorText(err).toLowerCase();

  if (
    normalized.includes("aborted by user") ||
    normalized.includes("aborterror") ||
    normalized.includes("aborted")
  ) {
    return "aborted";
  }

  if (
    normalized.includes("rate limit") ||
    normalized.includes("overloaded") ||
    normalized.includes("timeout") ||
    normalized.includes("503") ||
    normalized.includes("502") ||
    normalized.includes("429")
  ) {
    return "provider";
  }

  return "unknown";
}
