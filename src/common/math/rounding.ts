// Number#toFixed accepts at most 100 fraction digits and prints the exact binary value up to 1e21.
const EXACT_DIGITS = 100;
const FIXED_LIMIT = 1e21;

/**
 * Round the exact stored value to a fixed number of decimals, sending exact
 * halves to the even digit. 625.005 is stored as 625.00499... and rounds to
 * 625; 720.125 is stored exactly and rounds to 720.12. Never returns -0.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= FIXED_LIMIT) return value;

  const [whole, fraction = ''] = Math.abs(value).toFixed(EXACT_DIGITS).split('.');
  const kept = whole + fraction.slice(0, decimals);
  const rest = fraction.slice(decimals);

  const lastKeptOdd = Number(kept[kept.length - 1]) % 2 === 1;
  const roundUp = rest[0] > '5' || (rest[0] === '5' && (/[1-9]/.test(rest.slice(1)) || lastKeptOdd));

  const digits = (BigInt(kept) + (roundUp ? 1n : 0n)).toString().padStart(decimals + 1, '0');
  const cut = digits.length - decimals;
  const magnitude = Number(decimals > 0 ? `${digits.slice(0, cut)}.${digits.slice(cut)}` : digits);

  return (value < 0 ? -magnitude : magnitude) || 0;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Thousands-separated amount, e.g. formatAmount(1234.5, 2) -> "1,234.50". Rounds like roundTo. */
export function formatAmount(value: number, decimals: number): string {
  return roundTo(value, decimals).toLocaleString('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
}
