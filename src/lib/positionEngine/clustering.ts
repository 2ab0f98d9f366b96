/**
 * Position Engine: Recurring Debit Clusters (tier 4)
 *
 * Debits no lender matcher recognized, grouped by amount (within
 * max($1, 1%) of the cluster's first amount), kept when they repeat often
 * enough on a regular schedule (gap CV at or under the policy limit).
 */

import type { UnderwritingConfig } from "@/lib/config/types";
import { sourceKey } from "@/lib/lenders/normalize";
import type { ScrubbedTransaction } from "@/lib/statementModel/types";
import { gapStats } from "./frequency";

type PositionPolicy = UnderwritingConfig["policy"]["positions"];

const FALLBACK_LABEL = "Recurring debit";

function byDate(a: ScrubbedTransaction, b: ScrubbedTransaction): number {
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}

export function findRecurringClusters(
  debits: readonly ScrubbedTransaction[],
  policy: PositionPolicy,
): ScrubbedTransaction[][] {
  const sorted = [...debits].sort((a, b) => Math.abs(a.amount) - Math.abs(b.amount) || byDate(a, b));
  const clusters: ScrubbedTransaction[][] = [];
  let current: ScrubbedTransaction[] = [];
  let anchor = 0;

  for (const txn of sorted) {
    const magnitude = Math.abs(txn.amount);
    const tolerance = Math.max(policy.recurringAmountToleranceAbs, anchor * policy.recurringAmountTolerancePct);
    if (current.length > 0 && magnitude - anchor <= tolerance) {
      current.push(txn);
      continue;
    }
    if (current.length > 0) clusters.push(current);
    current = [txn];
    anchor = magnitude;
  }
  if (current.length > 0) clusters.push(current);

  return clusters
    .filter((c) => c.length >= policy.recurringMinOccurrences)
    .map((c) => [...c].sort(byDate))
    .filter((c) => {
      const stats = gapStats(c.map((t) => t.date));
      return stats.mean > 0 && stats.cv <= policy.recurringMaxGapCv;
    });
}

/** Most common counterparty key among the members; first seen wins ties. */
export function clusterLabel(members: readonly ScrubbedTransaction[]): string {
  const counts = new Map<string, number>();
  for (const m of members) {
    const key = sourceKey(m.description);
    if (key.length > 0) counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  let best: string | null = null;
  let bestCount = 0;
  for (const [key, n] of counts) {
    if (n > bestCount) {
      best = key;
      bestCount = n;
    }
  }
  return best ?? FALLBACK_LABEL;
}
