/**
 * Underwriting Pipeline: Error Taxonomy
 *
 * One thrown error (structurally invalid input, before any stage runs).
 * Everything else is a diagnostic on the result.
 */

export class InvalidStatementInputError extends Error {
  constructor(public readonly issues: Record<string, string[] | undefined>) {
    const fields = Object.keys(issues);
    super(`[underwritingPipeline] invalid statement input${fields.length > 0 ? `: ${fields.join(", ")}` : ""}`);
    this.name = "InvalidStatementInputError";
  }
}

export type PipelineStage = "detect" | "extract" | "validate" | "re_extract";

export type PipelineDiagnosticCode =
  | "MALFORMED_INPUT"
  | "AMBIGUOUS_FORMAT"
  | "INCOMPLETE_RECONCILIATION"
  | "NO_TRANSACTIONS_FOUND"
  | "RE_EXTRACTION_FAILED";

export type PipelineDiagnostic = {
  code: PipelineDiagnosticCode;
  stage: PipelineStage;
  detail: string;
};

export type CollaboratorErrorCode = "TIMEOUT" | "COLLABORATOR_ERROR";

/** A collaborator call that outlived its deadline. */
export class CollaboratorTimeoutError extends Error {
  constructor(
    public readonly stage: string,
    public readonly ms: number,
  ) {
    super(`${stage}_timeout_${ms}ms`);
    this.name = "CollaboratorTimeoutError";
  }
}

/**
 * Classify an error thrown by an external collaborator (re-extractor).
 */
export function classifyCollaboratorError(err: unknown): CollaboratorErrorCode {
  if (err instanceof CollaboratorTimeoutError) return "TIMEOUT";
  if (!(err instanceof Error)) return "COLLABORATOR_ERROR";
  const msg = err.message.toLowerCase();
  if (msg.includes("timeout") || msg.includes("timed out")) return "TIMEOUT";
  return "COLLABORATOR_ERROR";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
