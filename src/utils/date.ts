import { format, getISOWeek, isValid, parse } from "date-fns";

const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Today's calendar date in the given IANA time zone, as YYYY-MM-DD.
 * Meals are dated by the user's wall clock, not UTC.
 */
export function todayDateOnly(timeZone: string = "UTC", now: Date = new Date()): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(now);
}

/** Parses a strict YYYY-MM-DD string; anything else (or 2024-02-30) gives null. */
export function parseDateOnly(value: string): Date | null {
  if (!DATE_ONLY_RE.test(value)) return null;
  const parsed = parse(value, "yyyy-MM-dd", new Date(2000, 0, 1));
  return isValid(parsed) ? parsed : null;
}

export function isDateOnly(value: string): boolean {
  return parseDateOnly(value) !== null;
}

export function dayKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function monthKey(date: Date): string {
  return format(date, "yyyy-MM");
}

export function isoWeekNumber(date: Date): number {
  return getISOWeek(date);
}
