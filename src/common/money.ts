export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Whole cents; amounts are summed in cents so totals equal the sum of their lines. */
export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function formatAmount(amount: number): string {
  return round2(amount).toFixed(2);
}

/** Percentages are stored with two decimals; drop trailing zeros for display. */
export function formatPercent(percent: number): string {
  return String(round2(percent));
}
