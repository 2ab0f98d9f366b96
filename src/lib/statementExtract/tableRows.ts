/**
 * Statement Extract: Table Rows
 *
 * Structured table grids from the PDF collaborator. A header row fixes the
 * column roles; separate debit and credit columns give the sign by
 * position. Without a header each row is read heuristically.
 */

import { BalanceTracker, cleanDescription, resolveSignedAmount } from "./lineHelpers";
import { parseAmount, parseDateToken, type ParsedAmount } from "./tokens";
import type { StrategyContext, TransactionDraft } from "./types";

interface ColumnMap {
  date: number;
  description: number | null;
  debit: number | null;
  credit: number | null;
  amount: number | null;
  balance: number | null;
}

function findColumns(row: string[]): ColumnMap | null {
  const map: ColumnMap = { date: -1, description: null, debit: null, credit: null, amount: null, balance: null };
  row.forEach((raw, i) => {
    const cell = raw.trim();
    if (/balance/i.test(cell)) map.balance ??= i;
    else if (/debit|withdraw|payments?\b|charges?/i.test(cell)) map.debit ??= i;
    else if (/credit|deposit/i.test(cell)) map.credit ??= i;
    else if (/^amount$/i.test(cell)) map.amount ??= i;
    else if (/date/i.test(cell) && map.date === -1) map.date = i;
    else if (/description|details|transaction|memo|payee/i.test(cell)) map.description ??= i;
  });
  if (map.date === -1) return null;
  if (map.debit === null && map.credit === null && map.amount === null) return null;
  return map;
}

function cellAt(row: string[], index: number | null): string {
  return index === null ? "" : (row[index] ?? "").trim();
}

function signedValue(parsed: ParsedAmount | null): number | null {
  return parsed ? (parsed.sign ?? 1) * parsed.magnitude : null;
}

function parseWithColumns(
  rows: string[][],
  columns: ColumnMap,
  tableIndex: number,
  startRow: number,
  ctx: StrategyContext,
  balance: BalanceTracker,
  out: TransactionDraft[],
): void {
  for (let r = startRow; r < rows.length; r++) {
    const row = rows[r] ?? [];
    const date = parseDateToken(cellAt(row, columns.date), ctx);
    if (!date) continue;

    const debit = parseAmount(cellAt(row, columns.debit));
    const credit = parseAmount(cellAt(row, columns.credit));
    const single = parseAmount(cellAt(row, columns.amount));
    const runningBalance = signedValue(parseAmount(cellAt(row, columns.balance)));
    const description = cleanDescription(
      columns.description !== null
        ? cellAt(row, columns.description)
        : row.filter((_, i) => i !== columns.date && parseAmount(row[i] ?? "") === null).join(" "),
    );

    let amount: number | null = null;
    if (debit && debit.magnitude > 0) amount = -debit.magnitude;
    else if (credit && credit.magnitude > 0) amount = credit.magnitude;
    else if (single) {
      amount = resolveSignedAmount({
        amount: single,
        description,
        priorBalance: balance.current,
        balance: runningBalance,
      });
    }
    if (amount === null) {
      ctx.diagnostics.push({
        code: "MALFORMED_LINE",
        ref: { kind: "table", table: tableIndex, row: r },
        detail: "dated row without an amount",
      });
      continue;
    }

    balance.advance(amount, runningBalance);
    out.push({ date, description, amount, runningBalance, sourceLineRef: { kind: "table", table: tableIndex, row: r } });
  }
}

function parseHeuristically(
  rows: string[][],
  tableIndex: number,
  ctx: StrategyContext,
  balance: BalanceTracker,
  out: TransactionDraft[],
): void {
  rows.forEach((row, r) => {
    const dateIndex = row.findIndex((cell) => parseDateToken(cell, ctx) !== null);
    if (dateIndex === -1) return;
    const date = parseDateToken(row[dateIndex] ?? "", ctx);
    if (!date) return;

    const amounts: ParsedAmount[] = [];
    const words: string[] = [];
    row.forEach((cell, i) => {
      if (i === dateIndex) return;
      const parsed = parseAmount(cell);
      if (parsed) amounts.push(parsed);
      else if (cell.trim().length > 0) words.push(cell.trim());
    });
    const first = amounts.length >= 2 ? amounts[amounts.length - 2] : amounts[0];
    if (!first) return;

    const runningBalance = amounts.length >= 2 ? signedValue(amounts[amounts.length - 1] ?? null) : null;
    const description = cleanDescription(words.join(" "));
    const amount = resolveSignedAmount({
      amount: first,
      description,
      priorBalance: balance.current,
      balance: runningBalance,
    });
    balance.advance(amount, runningBalance);
    out.push({ date, description, amount, runningBalance, sourceLineRef: { kind: "table", table: tableIndex, row: r } });
  });
}

export function parseTableTransactions(ctx: StrategyContext): TransactionDraft[] {
  const out: TransactionDraft[] = [];
  const balance = new BalanceTracker(ctx.openingBalance);

  ctx.tables.forEach((rows, t) => {
    const headerIndex = rows.findIndex((row) => findColumns(row) !== null);
    const columns = headerIndex === -1 ? null : findColumns(rows[headerIndex] ?? []);
    if (columns) parseWithColumns(rows, columns, t, headerIndex + 1, ctx, balance, out);
    else parseHeuristically(rows, t, ctx, balance, out);
  });
  return out;
}
