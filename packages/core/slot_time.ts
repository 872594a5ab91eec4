// Date and time label parsing
// Dates and times are wall-clock labels; nothing here knows about timezones.

const MINUTES_PER_DAY = 1440;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DOTTED_DATE = /^(\d{2})\.(\d{2})\.(\d{4})$/;
const TIME_LABEL = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

export interface SlotInterval {
  start: number; // minutes since epoch day 0
  end: number; // exclusive
}

/**
 * Normalizes a calendar date to YYYY-MM-DD.
 * Accepts YYYY-MM-DD and DD.MM.YYYY; returns null for anything else,
 * including dates that do not exist (2025-02-30).
 */
export function parseDateLabel(value: string): string | null {
  const trimmed = value.trim();
  let year: number;
  let month: number;
  let day: number;

  const iso = ISO_DATE.exec(trimmed);
  const dotted = DOTTED_DATE.exec(trimmed);
  if (iso) {
    year = Number(iso[1]);
    month = Number(iso[2]);
    day = Number(iso[3]);
  } else if (dotted) {
    day = Number(dotted[1]);
    month = Number(dotted[2]);
    year = Number(dotted[3]);
  } else {
    return null;
  }

  if (month < 1 || month > 12 || day < 1) {
    return null;
  }

  const calendarDate = utcDate(year, month, day);
  if (calendarDate.getUTCMonth() !== month - 1 || calendarDate.getUTCDate() !== day) {
    return null;
  }

  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Normalizes a wall-clock time to HH:mm. Seconds are accepted only when zero,
 * since bookings have minute precision.
 */
export function parseTimeLabel(value: string): string | null {
  const match = TIME_LABEL.exec(value.trim());
  if (!match) return null;

  const hours = Number.parseInt(match[1], 10);
  const minutes = Number.parseInt(match[2], 10);
  const seconds = match[3] === undefined ? 0 : Number.parseInt(match[3], 10);
  if (hours > 23 || minutes > 59 || seconds !== 0) {
    return null;
  }

  return `${pad2(hours)}:${pad2(minutes)}`;
}

export function toDayNumber(date: string): number {
  const [year, month, day] = date.split('-').map((part) => Number.parseInt(part, 10));
  return Math.floor(utcDate(year, month, day).getTime() / 86400000);
}

export function toMinutes(time: string): number {
  const [hours, minutes] = time.split(':').map((part) => Number.parseInt(part, 10));
  return hours * 60 + minutes;
}

// Expects normalized labels.
export function slotInterval(date: string, time: string, durationHours: number): SlotInterval {
  const start = toDayNumber(date) * MINUTES_PER_DAY + toMinutes(time);
  return { start, end: start + durationHours * 60 };
}

export function intervalsOverlap(a: SlotInterval, b: SlotInterval): boolean {
  return a.start < b.end && a.end > b.start;
}

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear keeps them literal.
function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}
