// Amounts are decimal numbers with at most eight fractional digits. Totals,
// comparisons and change are computed in integer base units so that a
// transaction built here always passes value conservation.

export const AMOUNT_DECIMALS = 8;

const UNITS_PER_COIN = 10 ** AMOUNT_DECIMALS;

// Below 2^51 base units, scaling a parsed amount and rounding recovers its
// exact unit count
const MAX_UNITS = 2 ** 50;

export const MAX_AMOUNT = MAX_UNITS / UNITS_PER_COIN;

export function toBaseUnits(amount: number): bigint {
  return BigInt(Math.round(amount * UNITS_PER_COIN));
}

export function fromBaseUnits(units: bigint): number {
  return Number(units) / UNITS_PER_COIN;
}

/** A positive amount of at most `MAX_AMOUNT` with no more than eight decimals. */
export function isValidAmount(amount: unknown): amount is number {
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
    return false;
  }
  const units = Math.round(amount * UNITS_PER_COIN);
  return units <= MAX_UNITS && units / UNITS_PER_COIN === amount;
}

export function sumAmounts(entries: readonly { amount: number }[]): bigint {
  return entries.reduce((total, entry) => total + toBaseUnits(entry.amount), 0n);
}

export interface Covering<T> {
  taken: T[];
  total: number;
  covered: boolean;
}

/**
 * Take entries in order until their amounts cover `amount`. `covered` is
 * false when all of them together fall short.
 */
export function takeCovering<T>(entries: Iterable<T>, amount: number, amountOf: (entry: T) => number): Covering<T> {
  const target = toBaseUnits(amount);
  const taken: T[] = [];
  let total = 0n;
  for (const entry of entries) {
    if (total >= target) {
      break;
    }
    taken.push(entry);
    total += toBaseUnits(amountOf(entry));
  }
  return { taken, total: fromBaseUnits(total), covered: total >= target };
}
