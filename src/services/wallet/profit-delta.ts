export const PROFIT_WINDOW = 5;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Plain decimal notation only: no hex, octal or binary literals
const DECIMAL_AMOUNT = /^\s*[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?\s*$/i;

/**
 * Finite numbers, booleans (1 and 0) and decimal strings count as amounts;
 * anything else gives `null`.
 */
export function coerceAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string' && DECIMAL_AMOUNT.test(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Sums the `amount` field of the most recent transactions. Entries that are
 * not records, lack an amount, or carry a non-numeric one are skipped.
 */
export function computeProfitDelta(transactions: readonly unknown[], window: number = PROFIT_WINDOW): number {
  let delta = 0;
  for (const tx of transactions.slice(0, window)) {
    if (!isRecord(tx) || !('amount' in tx)) {
      continue;
    }
    const amount = coerceAmount(tx.amount);
    if (amount !== null) {
      delta += amount;
    }
  }
  return delta;
}
