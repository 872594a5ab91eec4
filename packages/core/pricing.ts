// Pricing engine

import { NoHallsError, fail, ok, type Result } from './errors';
import type { EquipmentItem, Hall } from './types';

/**
 * Cost of holding a hall plus add-ons for a number of hours, after the
 * client's percentage discount.
 *
 * No rounding happens here; the same inputs always give the same number.
 * `subtotal * (100 - discount) / 100` keeps integer-rate totals exact
 * (1000 at 7% is 930, not 929.9999999999999).
 */
export function computeCost(
  hall: Hall,
  equipment: readonly EquipmentItem[],
  durationHours: number,
  discountPercent: number
): number {
  const hallCost = hall.rate * durationHours;
  const equipmentCost = equipment.reduce((sum, item) => sum + item.rate * durationHours, 0);
  const subtotal = hallCost + equipmentCost;
  return (subtotal * (100 - discountPercent)) / 100;
}

export function combineRates(a: Hall, b: Hall): number {
  return a.rate + b.rate;
}

export function sameHallIdentity(a: Hall, b: Hall): boolean {
  return a.number === b.number;
}

/**
 * Highest hourly rate in catalog order. On a tie the hall seen first wins.
 */
export function findMostExpensiveHall(halls: readonly Hall[]): Result<Hall, NoHallsError> {
  if (halls.length === 0) {
    return fail(new NoHallsError());
  }

  let best = halls[0];
  for (const hall of halls) {
    if (hall.rate > best.rate) {
      best = hall;
    }
  }
  return ok(best);
}

// Presentation boundary only.
export function roundCurrency(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

export function formatCost(amount: number): string {
  return roundCurrency(amount).toFixed(2);
}
