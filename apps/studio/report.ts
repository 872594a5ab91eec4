// Report aggregation

import type { Booking } from '../../packages/core';

export interface HallReportLine {
  hallNumber: number;
  bookingCount: number;
  totalCost: number;
  hours: number;
}

export interface BookingReport {
  bookingCount: number;
  totalCost: number;
  hours: number;
  byHall: HallReportLine[];
}

/**
 * Totals over the given bookings. Halls appear in the order their first
 * booking does. Costs are summed unrounded.
 */
export function summarizeBookings(bookings: readonly Booking[]): BookingReport {
  const lines = new Map<number, HallReportLine>();
  let totalCost = 0;
  let hours = 0;

  for (const booking of bookings) {
    totalCost += booking.cost;
    hours += booking.durationHours;

    const line = lines.get(booking.hall.number) ?? {
      hallNumber: booking.hall.number,
      bookingCount: 0,
      totalCost: 0,
      hours: 0,
    };
    line.bookingCount += 1;
    line.totalCost += booking.cost;
    line.hours += booking.durationHours;
    lines.set(booking.hall.number, line);
  }

  return {
    bookingCount: bookings.length,
    totalCost,
    hours,
    byHall: [...lines.values()],
  };
}
