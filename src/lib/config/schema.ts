/**
 * Underwriting Config: Zod Schemas
 *
 * Shape of the JSON tables under config/. Validated once at load; the
 * compiled form lives in ./types.
 */
import { z } from "zod";
import { BANK_FORMAT_IDS, TRANSACTION_CATEGORIES } from "@/lib/statementModel/types";

export const BankFormatIdEnum = z.enum(BANK_FORMAT_IDS);
export const TransactionCategoryEnum = z.enum(TRANSACTION_CATEGORIES);

export const PatternSchema = z.object({
  source: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).default(""),
});

export const BankFormatsFileSchema = z.object({
  version: z.number().int(),
  formats: z
    .array(
      z.object({
        id: BankFormatIdEnum.exclude(["generic"]),
        patterns: z.array(PatternSchema).min(1),
      }),
    )
    .min(1),
});

export const LendersFileSchema = z.object({
  version: z.number().int(),
  identifiers: z.array(z.object({ identifier: z.string().min(3), lender: z.string().min(1) })),
  lenders: z.array(
    z.object({
      name: z.string().min(1),
      aliases: z.array(z.string().min(2)).default([]),
      factorRate: z.number().min(1).max(2).optional(),
    }),
  ),
  corporateSuffixes: z.array(z.string().min(1)),
  structuralPatterns: z.array(PatternSchema),
});

const CategoryRuleSchema = z.object({
  category: TransactionCategoryEnum,
  direction: z.enum(["credit", "debit", "any"]),
  patterns: z.array(z.string().min(1)),
  includeRevenueKeywords: z.boolean().optional(),
  includeLenderPatterns: z.boolean().optional(),
});

export const CategoriesFileSchema = z.object({
  version: z.number().int(),
  transferVocabulary: z.array(z.string().min(1)),
  revenueKeywords: z.array(z.string().min(1)),
  revenueBearing: z.array(TransactionCategoryEnum),
  debtService: z.array(TransactionCategoryEnum),
  rules: z.array(CategoryRuleSchema),
});

export const RiskKeywordsFileSchema = z.object({
  version: z.number().int(),
  nsf: z.array(z.string().min(1)),
  nsfWaivers: z.array(z.string().min(1)),
  funding: z.array(z.string().min(1)),
  legal: z.array(
    z.object({
      code: z.enum(["GARNISHMENT", "TAX_LEVY", "LIEN", "JUDGMENT", "BANKRUPTCY"]),
      patterns: z.array(z.string().min(1)).min(1),
    }),
  ),
});

const FrequencyNumbers = z.object({
  daily: z.number().positive(),
  weekly: z.number().positive(),
  biweekly: z.number().positive(),
  monthly: z.number().positive(),
});

export const PolicyFileSchema = z.object({
  version: z.number().int(),
  quality: z.object({
    weights: z.object({
      balance_reconciliation: z.number().min(0),
      transaction_count: z.number().min(0),
      credit_debit_sanity: z.number().min(0),
      description_quality: z.number().min(0),
      duplicates: z.number().min(0),
      date_sanity: z.number().min(0),
    }),
    goodThreshold: z.number().int().min(0).max(100),
    reviewThreshold: z.number().int().min(0).max(100),
    balanceTolerance: z.number().min(0),
    statedBalanceTolerancePct: z.number().min(0),
    statedBalanceToleranceAbs: z.number().min(0),
    daysPerExpectedTransaction: z.number().positive(),
    oneSidedMinCount: z.number().int().positive(),
    oneSidedMinTotal: z.number().min(0),
    minDescriptionLength: z.number().int().min(0),
    maxBadDescriptionShare: z.number().min(0).max(1),
    allowedDuplicateSurplus: z.number().int().min(0),
    earliestPlausibleYear: z.number().int(),
  }),
  positions: z.object({
    defaultFactorRate: z.number().min(1),
    assumedTermMonths: z.number().positive(),
    paymentsPerMonth: FrequencyNumbers,
    intervalDays: FrequencyNumbers,
    frequencyBands: z.object({
      daily: z.number().positive(),
      weekly: z.number().positive(),
      biweekly: z.number().positive(),
    }),
    minCoveredDaysPerMonth: z.number().int().min(1),
    structuralMinOccurrences: z.number().int().min(1),
    recurringMinOccurrences: z.number().int().min(2),
    recurringMaxGapCv: z.number().min(0),
    recurringAmountToleranceAbs: z.number().min(0),
    recurringAmountTolerancePct: z.number().min(0),
    stoppedIntervalMultiple: z.number().positive(),
    stoppedMinimumDays: z.number().min(0),
    trendChangeThreshold: z.number().min(0),
    fundingLookbackDays: z.number().int().min(0),
    fundingMinimumAmount: z.number().min(0),
    fundingPaymentMultiple: z.number().min(0),
    tierFourEligibleCategories: z.array(TransactionCategoryEnum),
    tierThreeExcludedCategories: z.array(TransactionCategoryEnum),
  }),
  risk: z.object({
    nsfPerItem: z.number().min(0),
    nsfCap: z.number().min(0),
    negativeDayPctMultiplier: z.number().min(0),
    negativeDayCap: z.number().min(0),
    negativeDayFloorCount: z.number().int().min(1),
    negativeDayFloor: z.number().min(0),
    dtiBands: z.array(z.object({ min: z.number().min(0), deduction: z.number().min(0) })),
    gambling: z.number().min(0),
    singlePosition: z.number().min(0),
    stackingPerPosition: z.number().min(0),
    stackingCap: z.number().min(0),
    veryRecentFundingDays: z.number().int().min(0),
    veryRecentFunding: z.number().min(0),
    recentFundingDays: z.number().int().min(0),
    recentFunding: z.number().min(0),
    legalPerHit: z.number().min(0),
    legalCap: z.number().min(0),
    acceleratingDecline: z.number().min(0),
    declining: z.number().min(0),
    lowRevenueThreshold: z.number().min(0),
    lowRevenue: z.number().min(0),
    cashShareThreshold: z.number().min(0).max(1),
    cashHeavy: z.number().min(0),
    qualityNeedsReview: z.number().min(0),
    qualityPoor: z.number().min(0),
    velocityDeclinePct: z.number(),
    velocityGrowthPct: z.number(),
    velocityAccelerationPct: z.number(),
    fundingEventMinimum: z.number().min(0),
    noTransactionsScore: z.number().min(0).max(100),
    tiers: z
      .array(z.object({ tier: z.enum(["A", "B", "C", "D", "Decline"]), min: z.number().min(0).max(100) }))
      .min(1),
  }),
});

export type BankFormatsFile = z.infer<typeof BankFormatsFileSchema>;
export type LendersFile = z.infer<typeof LendersFileSchema>;
export type CategoriesFile = z.infer<typeof CategoriesFileSchema>;
export type RiskKeywordsFile = z.infer<typeof RiskKeywordsFileSchema>;
export type PolicyFile = z.infer<typeof PolicyFileSchema>;
export type UnderwritingPolicy = Omit<PolicyFile, "version">;
