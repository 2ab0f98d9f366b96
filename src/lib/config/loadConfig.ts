/**
 * Underwriting Config: Loader
 *
 * Reads the versioned JSON tables, validates them with zod and compiles
 * every pattern once. The returned object is frozen; nothing here caches
 * at module level, callers hold on to the config and pass it down.
 */
import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";
import { compactDescription, normalizeDescription, stripCorporateSuffixes } from "@/lib/lenders/normalize";
import { UnderwritingConfigError } from "./errors";
import {
  BankFormatsFileSchema,
  CategoriesFileSchema,
  LendersFileSchema,
  PolicyFileSchema,
  RiskKeywordsFileSchema,
  type BankFormatsFile,
  type CategoriesFile,
  type LendersFile,
  type PolicyFile,
  type RiskKeywordsFile,
} from "./schema";
import type { CompiledPattern, LenderAlias, UnderwritingConfig } from "./types";

export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../../../config/", import.meta.url));

const FILES = {
  bankFormats: "bank-formats.json",
  lenders: "lenders.json",
  categories: "categories.json",
  riskKeywords: "risk-keywords.json",
  policy: "policy.json",
} as const;

export interface UnderwritingConfigFiles {
  bankFormats: BankFormatsFile;
  lenders: LendersFile;
  categories: CategoriesFile;
  riskKeywords: RiskKeywordsFile;
  policy: PolicyFile;
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

function readJsonFile<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path.join(dir, file), "utf8"));
  } catch (err) {
    throw new UnderwritingConfigError(file, err instanceof Error ? err.message : String(err));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new UnderwritingConfigError(file, JSON.stringify(parsed.error.flatten().fieldErrors));
  }
  return parsed.data;
}

export function readUnderwritingConfigFiles(dir: string = DEFAULT_CONFIG_DIR): UnderwritingConfigFiles {
  return {
    bankFormats: readJsonFile(dir, FILES.bankFormats, BankFormatsFileSchema),
    lenders: readJsonFile(dir, FILES.lenders, LendersFileSchema),
    categories: readJsonFile(dir, FILES.categories, CategoriesFileSchema),
    riskKeywords: readJsonFile(dir, FILES.riskKeywords, RiskKeywordsFileSchema),
    policy: readJsonFile(dir, FILES.policy, PolicyFileSchema),
  };
}

// ---------------------------------------------------------------------------
// Compiling
// ---------------------------------------------------------------------------

function compile(file: string, source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new UnderwritingConfigError(file, `invalid pattern /${source}/: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function compileAll(file: string, sources: string[]): RegExp[] {
  // Keyword tables are matched case-insensitively.
  return sources.map((s) => compile(file, s, "i"));
}

function compilePatterns(file: string, patterns: { source: string; flags: string }[]): CompiledPattern[] {
  return patterns.map((p) => ({ source: p.source, regex: compile(file, p.source, p.flags) }));
}

export function compileUnderwritingConfig(files: UnderwritingConfigFiles): UnderwritingConfig {
  const { bankFormats, lenders, categories, riskKeywords, policy } = files;

  const seenFormats = new Set<string>();
  for (const f of bankFormats.formats) {
    if (seenFormats.has(f.id)) throw new UnderwritingConfigError(FILES.bankFormats, `duplicate format "${f.id}"`);
    seenFormats.add(f.id);
  }

  const suffixes = lenders.corporateSuffixes.map((s) => s.toUpperCase());
  const aliases: LenderAlias[] = [];
  const factorRates = new Map<string, number>();
  for (const lender of lenders.lenders) {
    if (lender.factorRate !== undefined) factorRates.set(lender.name, lender.factorRate);
    const names = new Set<string>();
    for (const alias of [lender.name, ...lender.aliases]) {
      const normalized = stripCorporateSuffixes(normalizeDescription(alias), suffixes);
      if (normalized.length === 0 || names.has(normalized)) continue;
      names.add(normalized);
      aliases.push({ lender: lender.name, normalized, compact: normalized.replace(/ /g, "") });
    }
  }
  aliases.sort((a, b) => b.normalized.length - a.normalized.length || a.normalized.localeCompare(b.normalized));

  if (policy.quality.reviewThreshold > policy.quality.goodThreshold) {
    throw new UnderwritingConfigError(FILES.policy, "quality.reviewThreshold must not exceed goodThreshold");
  }
  const tiers = [...policy.risk.tiers].sort((a, b) => b.min - a.min);
  if (tiers[tiers.length - 1]?.min !== 0) {
    throw new UnderwritingConfigError(FILES.policy, "risk.tiers must include a band starting at 0");
  }
  const { version: _version, ...policyBody } = policy;

  const config: UnderwritingConfig = {
    bankFormats: bankFormats.formats.map((f) => ({
      id: f.id,
      patterns: compilePatterns(FILES.bankFormats, f.patterns),
    })),
    lenders: {
      identifiers: lenders.identifiers.map((i) => ({
        identifier: i.identifier,
        compact: compactDescription(i.identifier),
        lender: i.lender,
      })),
      aliases,
      factorRates,
      corporateSuffixes: suffixes,
      structuralPatterns: compilePatterns(FILES.lenders, lenders.structuralPatterns),
    },
    categories: {
      transferVocabulary: compileAll(FILES.categories, categories.transferVocabulary),
      revenueKeywords: compileAll(FILES.categories, categories.revenueKeywords),
      revenueBearing: new Set(categories.revenueBearing),
      debtService: new Set(categories.debtService),
      rules: categories.rules.map((r) => ({
        category: r.category,
        direction: r.direction,
        patterns: compileAll(FILES.categories, r.patterns),
        includeRevenueKeywords: r.includeRevenueKeywords ?? false,
        includeLenderPatterns: r.includeLenderPatterns ?? false,
      })),
    },
    riskKeywords: {
      nsf: compileAll(FILES.riskKeywords, riskKeywords.nsf),
      nsfWaivers: compileAll(FILES.riskKeywords, riskKeywords.nsfWaivers),
      funding: compileAll(FILES.riskKeywords, riskKeywords.funding),
      legal: riskKeywords.legal.map((l) => ({ code: l.code, patterns: compileAll(FILES.riskKeywords, l.patterns) })),
    },
    policy: { ...policyBody, risk: { ...policyBody.risk, tiers } },
  };

  return Object.freeze(config);
}

export function loadUnderwritingConfig(dir: string = DEFAULT_CONFIG_DIR): UnderwritingConfig {
  return compileUnderwritingConfig(readUnderwritingConfigFiles(dir));
}
