/**
 * Position Reconstructor
 *
 * Tiered matching over non-transfer debits, first match wins:
 *   1. exact identifier
 *   2. lender name / alias
 *   3. structural payment pattern (needs a minimum number of occurrences;
 *      skipped for operating-expense categories)
 *   4. recurring debit clusters among what is left
 *
 * Each group becomes one position. Stacking counts positions that have not
 * stopped paying.
 *
 * Pure function: deterministic, no side effects.
 */

import type { UnderwritingConfig } from "@/lib/config/types";
import { maxDate } from "@/lib/dates/isoDate";
import { matchLender } from "@/lib/lenders/matchLender";
import { sumCents } from "@/lib/statementModel/money";
import type { ScrubbedTransaction } from "@/lib/statementModel/types";
import { clusterLabel, findRecurringClusters } from "./clustering";
import { reconstructPosition, type PositionContext } from "./reconstruct";
import type { MCAPosition, MatchedTier, PositionInput, PositionReport, ReconstructOptions } from "./types";

interface LenderGroup {
  tier: MatchedTier;
  members: ScrubbedTransaction[];
}

function groupByLender(debits: readonly ScrubbedTransaction[], config: UnderwritingConfig) {
  const excluded = new Set(config.policy.positions.tierThreeExcludedCategories);
  const groups = new Map<string, LenderGroup>();
  const unmatched: ScrubbedTransaction[] = [];

  for (const txn of debits) {
    const match = matchLender(txn.description, config.lenders, { structural: !excluded.has(txn.category) });
    if (!match) {
      unmatched.push(txn);
      continue;
    }
    const group = groups.get(match.lender);
    if (group) {
      group.members.push(txn);
      if (match.tier < group.tier) group.tier = match.tier;
    } else {
      groups.set(match.lender, { tier: match.tier, members: [txn] });
    }
  }

  // Structural groups that do not repeat enough go back to the pool.
  const min = config.policy.positions.structuralMinOccurrences;
  for (const [label, group] of groups) {
    if (group.tier === 3 && group.members.length < min) {
      unmatched.push(...group.members);
      groups.delete(label);
    }
  }
  return { groups, unmatched };
}

export function reconstructPositions(
  input: PositionInput,
  config: UnderwritingConfig,
  options: ReconstructOptions = {},
): PositionReport {
  const debits = input.transactions.filter((t) => t.amount < 0 && !t.isInternalTransfer);
  const asOf =
    options.asOf ?? input.coverage?.end ?? maxDate(input.transactions.map((t) => t.date)) ?? "1970-01-01";
  const ctx: PositionContext = { transactions: input.transactions, coverage: input.coverage, asOf, config };

  const { groups, unmatched } = groupByLender(debits, config);
  const positions: MCAPosition[] = [];
  for (const [label, group] of groups) {
    const position = reconstructPosition(label, group.tier, group.members, ctx);
    if (position) positions.push(position);
  }

  const eligible = new Set(config.policy.positions.tierFourEligibleCategories);
  const pool = unmatched.filter((t) => eligible.has(t.category));
  for (const cluster of findRecurringClusters(pool, config.policy.positions)) {
    const position = reconstructPosition(clusterLabel(cluster), 4, cluster, ctx);
    if (position) positions.push(position);
  }

  positions.sort((a, b) => b.monthlyCost - a.monthlyCost || a.lenderLabel.localeCompare(b.lenderLabel));
  const active = positions.filter((p) => p.paymentTrend !== "stopped");

  return {
    positions,
    stackingCount: active.length,
    totalMonthlyCost: sumCents(active.map((p) => p.monthlyCost)),
    totalRemainingBalance: sumCents(positions.map((p) => p.estimatedRemainingBalance)),
  };
}
