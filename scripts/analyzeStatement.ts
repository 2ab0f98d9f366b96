/**
 * Statement Underwriting CLI
 *
 * Runs one or more plain-text bank statements through the underwriting
 * pipeline and prints the results as JSON.
 *
 * Exit codes:
 *   0  every statement was analyzed
 *   1  bad arguments, unreadable file, or a statement failed
 *
 * Usage:
 *   npx tsx scripts/analyzeStatement.ts statement.txt
 *   npx tsx scripts/analyzeStatement.ts jan.txt feb.txt --as-of 2024-03-01
 *   npx tsx scripts/analyzeStatement.ts statement.txt --format chase --re-extract
 *
 * Env vars:
 *   UNDERWRITING_CONFIG_DIR   override for the config/ tables
 *   ANTHROPIC_API_KEY         required with --re-extract
 *   RE_EXTRACTION_TIMEOUT_MS, BATCH_CONCURRENCY
 */

import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadUnderwritingConfig } from "@/lib/config";
import { serverEnv } from "@/lib/env/server";
import { BANK_FORMAT_IDS, type BankFormatId } from "@/lib/statementModel/types";
import { createAnthropicReExtractor, runUnderwritingBatch, type PipelineOptions } from "@/lib/underwritingPipeline";

// ── CLI arg parsing ─────────────────────────────────────────────────────────

interface CliArgs {
  files: string[];
  format: BankFormatId | null;
  asOf: string | null;
  reExtract: boolean;
  help: boolean;
}

function fail(message: string): never {
  console.error(`[analyzeStatement] ${message}`);
  process.exit(1);
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { files: [], format: null, asOf: null, reExtract: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--re-extract") {
      args.reExtract = true;
    } else if (arg === "--format") {
      const value = argv[++i] ?? "";
      const id = BANK_FORMAT_IDS.find((f) => f === value);
      if (!id) fail(`Invalid --format value: ${value} (expected one of ${BANK_FORMAT_IDS.join(", ")})`);
      args.format = id;
    } else if (arg === "--as-of") {
      const value = argv[++i] ?? "";
      if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) fail(`Invalid --as-of value: ${value} (expected YYYY-MM-DD)`);
      args.asOf = value;
    } else if (arg.startsWith("-")) {
      fail(`Unknown option: ${arg}`);
    } else {
      args.files.push(arg);
    }
  }
  return args;
}

function printHelp(): void {
  console.log(`
Statement Underwriting
======================
Detects the bank layout, extracts transactions, validates the extraction,
reconstructs existing MCA positions and scores risk.

Usage:
  npx tsx scripts/analyzeStatement.ts <statement.txt>... [options]

Options:
  --format <id>        Skip detection (${BANK_FORMAT_IDS.join(", ")})
  --as-of <YYYY-MM-DD> Reference date for stopped payments and funding recency
  --re-extract         Ask Anthropic for a better format when extraction is POOR
  --help, -h           Show this help
`);
}

// ── Main ────────────────────────────────────────────────────────────────────

/** Runs the CLI and returns its exit code. JSON is the only thing written to stdout. */
export async function analyzeStatements(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.help || args.files.length === 0) {
    printHelp();
    return args.help ? 0 : 1;
  }

  const env = serverEnv();
  const config = loadUnderwritingConfig(env.UNDERWRITING_CONFIG_DIR);
  const options: PipelineOptions = {
    config,
    reExtractionTimeoutMs: env.RE_EXTRACTION_TIMEOUT_MS,
  };
  if (args.format) options.formatOverride = args.format;
  if (args.asOf) options.asOf = args.asOf;
  if (args.reExtract) options.reExtractor = createAnthropicReExtractor();

  const statements = args.files.map((file) => ({
    text: readFileSync(file, "utf8"),
    sourceIdentifier: path.basename(file),
  }));

  const results = await runUnderwritingBatch(statements, { ...options, concurrency: env.BATCH_CONCURRENCY });
  console.log(JSON.stringify(results.length === 1 ? results[0] : results, null, 2));
  return results.some((r) => !r.ok) ? 1 : 0;
}

const entry = process.argv[1];
if (entry !== undefined && path.resolve(entry) === fileURLToPath(import.meta.url)) {
  analyzeStatements(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error("[analyzeStatement] failed:", err);
      process.exit(1);
    },
  );
}
