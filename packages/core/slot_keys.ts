// Slot key utilities for exact-match lookups and admission lock keys

import { parseTimeLabel } from './slot_time';

/**
 * Builds a slot key from hall number, date, and time.
 * Format: hallNumber|YYYY-MM-DD|HH:MM
 *
 * Two bookings with the same slot key start at the same moment in the same hall.
 * A time that is not a valid label is kept as written.
 */
export function buildSlotKey(hallNumber: number, slotDate: string, slotTime: string): string {
  return `${hallNumber}|${slotDate}|${parseTimeLabel(slotTime) ?? slotTime}`;
}

/**
 * Admissions are serialized per hall, so the lock key carries no date or time.
 */
export function buildHallLockKey(hallNumber: number): string {
  return `hall|${hallNumber}`;
}
