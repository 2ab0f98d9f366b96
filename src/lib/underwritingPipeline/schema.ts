/**
 * Underwriting Pipeline: Zod Schemas
 *
 * Structural input validation and the re-extractor's answer. Statement
 * content is never judged here; that is what the quality report is for.
 */
import { z } from "zod";
import { BANK_FORMAT_IDS } from "@/lib/statementModel/types";

export const RawStatementSchema = z.object({
  text: z.string(),
  tables: z.array(z.array(z.array(z.string()))).default([]),
  sourceIdentifier: z.string().min(1).default("statement"),
});

export type RawStatementInput = z.input<typeof RawStatementSchema>;

export const ReExtractionSuggestionSchema = z.object({
  format: z.enum(BANK_FORMAT_IDS),
  confidence: z.number().min(0).max(1),
});
