// Availability index

import { buildSlotKey } from './slot_keys';
import { intervalsOverlap, slotInterval } from './slot_time';
import type { Booking, ConflictPolicy, Hall } from './types';

export interface SlotQuery {
  hall: Hall;
  date: string; // normalized YYYY-MM-DD
  time: string; // normalized HH:mm
  durationHours: number;
}

/**
 * Bookings that block the queried slot.
 *
 * - `overlap`: same hall and the [start, start + duration) intervals intersect.
 *   Intervals live on one minute axis, so a booking running past midnight
 *   blocks the start of the next date.
 * - `exact`: same hall, date and start time.
 */
export function findConflicts(
  existing: readonly Booking[],
  query: SlotQuery,
  policy: ConflictPolicy = 'overlap'
): Booking[] {
  if (policy === 'exact') {
    const key = buildSlotKey(query.hall.number, query.date, query.time);
    return existing.filter(
      (booking) => buildSlotKey(booking.hall.number, booking.date, booking.time) === key
    );
  }

  const candidate = slotInterval(query.date, query.time, query.durationHours);
  return existing.filter((booking) => {
    if (booking.hall.number !== query.hall.number) {
      return false;
    }
    return intervalsOverlap(
      slotInterval(booking.date, booking.time, booking.durationHours),
      candidate
    );
  });
}

export function isAvailable(
  existing: readonly Booking[],
  hall: Hall,
  date: string,
  time: string,
  durationHours: number,
  policy: ConflictPolicy = 'overlap'
): boolean {
  return findConflicts(existing, { hall, date, time, durationHours }, policy).length === 0;
}
