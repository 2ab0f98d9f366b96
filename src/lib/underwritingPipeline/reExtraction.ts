/**
 * Underwriting Pipeline: Re-extraction
 *
 * A POOR extraction is handed to the re-extractor once. When it suggests a
 * format, extraction and validation re-run with that format and the higher
 * score wins; a tie keeps the first run. A slow or failing collaborator
 * never fails the pipeline: the first run stands.
 */

import type { UnderwritingConfig } from "@/lib/config/types";
import type { RawStatement } from "@/lib/statementModel/types";
import { classifyCollaboratorError, errorMessage } from "./errors";
import { runExtractionPass, type ExtractionPass } from "./extractionPass";
import { ReExtractionSuggestionSchema } from "./schema";
import type { ReExtractionOutcome, ReExtractor } from "./types";
import { withTimeout } from "./withTimeout";

export const DEFAULT_RE_EXTRACTION_TIMEOUT_MS = 20_000;

export type ReExtractionAttempt = {
  outcome: ReExtractionOutcome;
  /** The pass to continue with */
  pass: ExtractionPass;
};

export async function attemptReExtraction(args: {
  statement: RawStatement;
  first: ExtractionPass;
  reExtractor: ReExtractor;
  timeoutMs: number;
  config: UnderwritingConfig;
  now: Date;
}): Promise<ReExtractionAttempt> {
  const { statement, first } = args;

  let answer: unknown;
  try {
    answer = await withTimeout(
      (signal) =>
        args.reExtractor(
          {
            text: statement.text,
            sourceIdentifier: statement.sourceIdentifier,
            quality: first.quality,
            currentFormat: first.format.id,
          },
          signal,
        ),
      args.timeoutMs,
      "re_extraction",
    );
  } catch (err) {
    const code = classifyCollaboratorError(err);
    console.warn(`[reExtraction] ${statement.sourceIdentifier}: ${code} (${errorMessage(err)}); keeping first extraction`);
    return { outcome: { suggestion: null, rerunScore: null, adopted: false, error: code }, pass: first };
  }

  if (answer === null) {
    return { outcome: { suggestion: null, rerunScore: null, adopted: false, error: null }, pass: first };
  }

  const parsed = ReExtractionSuggestionSchema.safeParse(answer);
  if (!parsed.success) {
    console.warn(`[reExtraction] ${statement.sourceIdentifier}: unusable suggestion`, parsed.error.flatten().fieldErrors);
    return { outcome: { suggestion: null, rerunScore: null, adopted: false, error: "COLLABORATOR_ERROR" }, pass: first };
  }

  const suggestion = parsed.data;
  const rerun = runExtractionPass(statement, { id: suggestion.format, matchedPatterns: [] }, args.config, args.now);
  const adopted = rerun.quality.score > first.quality.score;
  return {
    outcome: { suggestion, rerunScore: rerun.quality.score, adopted, error: null },
    pass: adopted ? rerun : first,
  };
}
