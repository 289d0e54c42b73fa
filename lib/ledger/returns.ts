import { differenceInCalendarDays, parseISO, isValid } from 'date-fns';
import { PortfolioEntry, PortfolioSummary } from '../types/ledger';

/** Round half to even, so an exact tie such as 0.125 goes to 0.12. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const rounded = scaled - floor === 0.5 ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  return rounded === 0 ? 0 : rounded / factor;
}

/**
 * Period return with the investor's own cash movement taken out:
 *   (total − prev − netFlow) / prev × 100, rounded to 2 decimals.
 * No previous value, or a zero one, gives 0.
 */
export function flowAdjustedReturn(prevTotal: number | null, totalValue: number, netFlow: number): number {
  if (prevTotal === null || !Number.isFinite(prevTotal) || prevTotal === 0) return 0;
  return roundTo(((totalValue - prevTotal - netFlow) / prevTotal) * 100, 2);
}

function daysBetween(from: string, to: string): number {
  const a = parseISO(from);
  const b = parseISO(to);
  if (!isValid(a) || !isValid(b)) return 0;
  return differenceInCalendarDays(b, a);
}

/**
 * Whole-ledger view: latest value against net money put in.
 */
export function summarizeEntries(entries: readonly PortfolioEntry[]): PortfolioSummary | null {
  if (entries.length === 0) return null;

  const first = entries[0];
  const latest = entries[entries.length - 1];
  const totalDeposits = entries.reduce((sum, e) => sum + e.deposit, 0);
  const totalWithdrawals = entries.reduce((sum, e) => sum + e.withdrawal, 0);
  const netInvested = totalDeposits - totalWithdrawals;
  const totalReturn = latest.total_value - netInvested;

  return {
    current_value: latest.total_value,
    net_invested: netInvested,
    total_return: totalReturn,
    total_return_rate: netInvested > 0 ? (totalReturn / netInvested) * 100 : 0,
    period_days: daysBetween(first.date, latest.date),
  };
}
