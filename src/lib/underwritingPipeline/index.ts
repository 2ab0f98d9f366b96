export type {
  PipelineOptions,
  ReExtractionOutcome,
  ReExtractionRequest,
  ReExtractionSuggestion,
  ReExtractor,
  UnderwritingResult,
} from "./types";
export type {
  CollaboratorErrorCode,
  PipelineDiagnostic,
  PipelineDiagnosticCode,
  PipelineStage,
} from "./errors";
export type { BatchItemResult, BatchOptions } from "./batch";
export type { RawStatementInput } from "./schema";

export { runUnderwritingPipeline, parseStatementInput } from "./runUnderwritingPipeline";
export { runUnderwritingBatch, DEFAULT_BATCH_CONCURRENCY } from "./batch";
export { attemptReExtraction, DEFAULT_RE_EXTRACTION_TIMEOUT_MS } from "./reExtraction";
export { buildReExtractionPrompt, createAnthropicReExtractor, parseReExtractionResponse } from "./anthropicReExtractor";
export { CollaboratorTimeoutError, InvalidStatementInputError, classifyCollaboratorError } from "./errors";
export { withTimeout } from "./withTimeout";
