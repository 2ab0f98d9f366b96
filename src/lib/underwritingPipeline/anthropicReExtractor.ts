/**
 * Re-extractor backed by Anthropic Messages.
 *
 * Asks the model which bank layout the statement text really is, given the
 * quality report of the first attempt. The model only names a format; the
 * deterministic extractors do the parsing.
 *
 * Model and key come from serverEnv() (RE_EXTRACTION_MODEL,
 * ANTHROPIC_API_KEY) unless passed in.
 */

import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import { serverEnv } from "@/lib/env/server";
import { BANK_FORMAT_IDS } from "@/lib/statementModel/types";
import type { ReExtractionRequest, ReExtractionSuggestion, ReExtractor } from "./types";

/** Head+tail truncation limits for the statement text. */
const HEAD_CHARS = 8_000;
const TAIL_CHARS = 4_000;
const MAX_TOKENS = 256;

const ResponseSchema = z.object({
  format: z.enum(BANK_FORMAT_IDS).nullable(),
  confidence: z.number().min(0).max(1),
});

const SYSTEM_PROMPT = `You identify the issuing bank layout of a business bank statement.
Return ONLY a JSON object: {"format": <id or null>, "confidence": <0..1>}.
Valid ids: ${BANK_FORMAT_IDS.join(", ")}.
Use "generic" for a plain dated ledger with no recognizable bank layout.
Use null when the text is not a bank statement or is unreadable.`;

function truncateText(text: string): string {
  if (text.length <= HEAD_CHARS + TAIL_CHARS) return text;
  return `${text.slice(0, HEAD_CHARS)}\n\n[... truncated ...]\n\n${text.slice(-TAIL_CHARS)}`;
}

export function buildReExtractionPrompt(request: ReExtractionRequest): { system: string; user: string } {
  const failed = request.quality.checks.filter((c) => !c.passed).map((c) => `- ${c.name}: ${c.detail}`);
  const user = [
    `The ${request.currentFormat} extractor scored ${request.quality.score}/100 (${request.quality.status}) on "${request.sourceIdentifier}".`,
    failed.length > 0 ? `Failed checks:\n${failed.join("\n")}` : "No individual check failed.",
    "",
    "Statement text:",
    "---",
    truncateText(request.text),
    "---",
    "Respond with JSON only.",
  ].join("\n");
  return { system: SYSTEM_PROMPT, user };
}

/** Parse the model's reply. A null format means "no suggestion". */
export function parseReExtractionResponse(text: string): ReExtractionSuggestion | null {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error("No JSON found in re-extraction response");
  }
  const raw: unknown = JSON.parse(jsonMatch[0]);
  const parsed = ResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid re-extraction response: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`);
  }
  const { format, confidence } = parsed.data;
  return format === null ? null : { format, confidence };
}

export function createAnthropicReExtractor(opts: { apiKey?: string; model?: string } = {}): ReExtractor {
  const env = serverEnv();
  const anthropic = new Anthropic({ apiKey: opts.apiKey ?? env.ANTHROPIC_API_KEY });
  const model = opts.model ?? env.RE_EXTRACTION_MODEL;

  return async (request, signal) => {
    const prompt = buildReExtractionPrompt(request);
    const response = await anthropic.messages.create(
      {
        model,
        max_tokens: MAX_TOKENS,
        system: prompt.system,
        messages: [{ role: "user", content: prompt.user }],
      },
      { signal },
    );

    const textBlock = response.content.find((c) => c.type === "text");
    if (!textBlock || textBlock.type !== "text") {
      throw new Error("No text response from re-extraction model");
    }
    return parseReExtractionResponse(textBlock.text);
  };
}
