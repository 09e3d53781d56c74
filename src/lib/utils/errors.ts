/**
 * Error helpers shared by the engine
 *
 * Engine errors are plain Errors tagged with a `code` so callers can branch on
 * the failure kind without depending on class identity.
 */

/**
 * Error info structure for turn-fault logging
 */
export interface ErrorInfo {
  exceptionType: string;
  message: string;
  traceback: string;
}

/**
 * Raised at startup when no corpus artifact level can be found
 */
export interface CorpusUnavailableError extends Error {
  code: "CORPUS_UNAVAILABLE";
  searched: string[];
}

/**
 * Raised when a corpus, policy or lexicon file fails schema validation
 */
export interface PolicyValidationError extends Error {
  code: "POLICY_INVALID";
  source: string;
  issues: string[];
}

export function createCorpusUnavailableError(searched: string[]): CorpusUnavailableError {
  return Object.assign(new Error(`No corpus files found. Looked for: ${searched.join(", ")}`), {
    name: "CorpusUnavailableError",
    code: "CORPUS_UNAVAILABLE" as const,
    searched,
  });
}

export function createPolicyValidationError(source: string, issues: string[]): PolicyValidationError {
  return Object.assign(new Error(`Invalid data in ${source}: ${issues.slice(0, 5).join("; ")}`), {
    name: "PolicyValidationError",
    code: "POLICY_INVALID" as const,
    source,
    issues,
  });
}

export function isCorpusUnavailableError(error: unknown): error is CorpusUnavailableError {
  return error instanceof Error && "code" in error && error.code === "CORPUS_UNAVAILABLE";
}

export function isPolicyValidationError(error: unknown): error is PolicyValidationError {
  return error instanceof Error && "code" in error && error.code === "POLICY_INVALID";
}

/**
 * Build error info object from any error type
 */
export function buildErrorInfo(error: unknown): ErrorInfo {
  const errorMessage = error instanceof Error ? error.message : String(error);
  return {
    exceptionType: error instanceof Error ? error.name : "Error",
    message: errorMessage,
    traceback: error instanceof Error ? (error.stack ?? errorMessage) : errorMessage,
  };
}
