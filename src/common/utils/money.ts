import { InternalServerErrorException } from '@nestjs/common';

export const BASIS_POINTS = 10_000;

/**
 * Guards an intermediate money figure before integer arithmetic on it.
 *
 * Invariant: monetary values must be representable as exact integers in JS.
 * Past Number.MAX_SAFE_INTEGER the arithmetic below silently loses precision,
 * so throw instead.
 */
export function safeMoney(value: number): number {
  if (!Number.isSafeInteger(value)) {
    throw new InternalServerErrorException('Monetary value exceeds safe precision range');
  }
  return value;
}

/** Exact floor(numerator / denominator) for non-negative integers. */
export function floorDiv(numerator: number, denominator: number): number {
  let quotient = Math.floor(numerator / denominator);
  if (quotient * denominator > numerator) quotient -= 1;
  if ((quotient + 1) * denominator <= numerator) quotient += 1;
  return quotient;
}

/**
 * numerator / denominator rounded to an integer, ties to the even neighbour
 * (banker's rounding).
 */
export function roundHalfEven(numerator: number, denominator: number): number {
  const quotient = floorDiv(safeMoney(numerator), denominator);
  const twiceRemainder = 2 * (numerator - quotient * denominator);
  if (twiceRemainder > denominator) return quotient + 1;
  if (twiceRemainder < denominator) return quotient;
  return quotient % 2 === 0 ? quotient : quotient + 1;
}

export type PricedLine = {
  quantity: number;
  unitPrice: number;
  taxRateBps: number;
};

export type DocumentTotals = {
  subtotal: number;
  tax: number;
  grandTotal: number;
};

/**
 * grandTotal = round_half_even(Σ qty × unitPrice × (1 + taxRate)) in minor units.
 * Rounding happens once, on the tax-inclusive sum; tax is whatever remains
 * above the exact subtotal.
 */
export function calculateDocumentTotals(lines: PricedLine[]): DocumentTotals {
  let subtotal = 0;
  let grossNumerator = 0;
  for (const line of lines) {
    const net = safeMoney(line.quantity * line.unitPrice);
    subtotal = safeMoney(subtotal + net);
    grossNumerator = safeMoney(grossNumerator + net * (BASIS_POINTS + line.taxRateBps));
  }
  const grandTotal = roundHalfEven(grossNumerator, BASIS_POINTS);
  return { subtotal, tax: grandTotal - subtotal, grandTotal };
}

/** floor(grandTotal × loyaltyRate), with grandTotal in minor units and the rate in basis points per major unit. */
export function calculateLoyaltyPoints(
  grandTotal: number,
  loyaltyRateBps: number,
  minorDigits: number,
): number {
  const numerator = safeMoney(grandTotal * loyaltyRateBps);
  return floorDiv(numerator, BASIS_POINTS * 10 ** minorDigits);
}
