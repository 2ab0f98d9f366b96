/**
 * Underwriting Pipeline: Batch Orchestrator
 *
 * Runs many statements through the pipeline with bounded concurrency. Runs
 * share only the frozen config; one statement's failure is reported in its
 * slot and never stops the others.
 */

import pLimit from "p-limit";
import { errorMessage } from "./errors";
import { runUnderwritingPipeline } from "./runUnderwritingPipeline";
import type { PipelineOptions, UnderwritingResult } from "./types";

export const DEFAULT_BATCH_CONCURRENCY = 4;

export type BatchItemResult =
  | { index: number; ok: true; result: UnderwritingResult }
  | { index: number; ok: false; error: string };

export type BatchOptions = PipelineOptions & {
  concurrency?: number;
};

export async function runUnderwritingBatch(
  statements: readonly unknown[],
  options: BatchOptions,
): Promise<BatchItemResult[]> {
  const limit = pLimit(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);

  const settled = await Promise.allSettled(
    statements.map((statement) => limit(() => runUnderwritingPipeline(statement, options))),
  );

  const results = settled.map((s, index): BatchItemResult =>
    s.status === "fulfilled" ? { index, ok: true, result: s.value } : { index, ok: false, error: errorMessage(s.reason) },
  );

  const failed = results.filter((r) => !r.ok).length;
  console.error(`[runUnderwritingBatch] ${results.length} statement(s): ${results.length - failed} ok, ${failed} failed`);
  return results;
}
