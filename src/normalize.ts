import { format, isValid } from "date-fns";
import { DateParseError } from "./errors.js";
import type { CalendarKey, DateInput } from "./types.js";
import { DaysInMonth, MonthNames } from "./types.js";

// ─── Patterns ─────────────────────────────────────────────────────────────────

// Tried in this order; the first one that matches decides the parse.
const NUMERIC = /^(\d{1,2})-(\d{1,2})$/;
const MONTH_FIRST = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?(?:\s+\d{4})?$/i;
const DAY_FIRST = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?(?:\s+\d{4})?$/i;

const CALENDAR_KEY = /^(\d{2})-(\d{2})$/;

// ─── Helpers ──────────────────────────────────────────────────────────────────

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Resolve an English month name or abbreviation to its number (1–12).
 * Any prefix of at least three letters counts: "Jan", "Janu", "Sept".
 */
function monthFromName(name: string): number | undefined {
  const lower = name.toLowerCase();
  if (lower.length < 3) return undefined;
  const index = MonthNames.findIndex((m) => m.startsWith(lower));
  return index === -1 ? undefined : index + 1;
}

function toKey(input: string, month: number, day: number): CalendarKey {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new DateParseError(input, `month ${month} is out of range`);
  }
  const max = DaysInMonth[month - 1];
  if (!Number.isInteger(day) || day < 1 || day > max) {
    throw new DateParseError(
      input,
      `day ${day} is out of range for ${MonthNames[month - 1]} (1-${max})`
    );
  }
  return `${pad(month)}-${pad(day)}`;
}

function parseNamed(input: string, monthToken: string, dayToken: string): CalendarKey {
  const month = monthFromName(monthToken);
  if (month === undefined) {
    throw new DateParseError(input, `unrecognized month name "${monthToken}"`);
  }
  return toKey(input, month, Number.parseInt(dayToken, 10));
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Normalise a date to its canonical `MM-DD` calendar key.
 *
 * Strings may be `MM-DD` (always month first), "Month Day [Year]" or
 * "Day Month [Year]", with an optional ordinal suffix on the day. A `Date`
 * contributes its local month and day; the year is ignored.
 *
 * @throws {DateParseError} when a string matches no format or names a day
 *   outside the non-leap calendar
 *
 * @example
 * normalizeDate("Jan 9");        // "01-09"
 * normalizeDate("9th Jan 2024"); // "01-09"
 */
export function normalizeDate(input: DateInput): CalendarKey {
  if (input instanceof Date) {
    if (!isValid(input)) throw new RangeError("Invalid Date");
    return format(input, "MM-dd");
  }
  if (typeof input !== "string") {
    throw new TypeError(`Expected a date string or Date, got ${typeof input}`);
  }

  const text = input.trim();

  const numeric = text.match(NUMERIC);
  if (numeric) {
    return toKey(input, Number.parseInt(numeric[1], 10), Number.parseInt(numeric[2], 10));
  }

  const monthFirst = text.match(MONTH_FIRST);
  if (monthFirst) return parseNamed(input, monthFirst[1], monthFirst[2]);

  const dayFirst = text.match(DAY_FIRST);
  if (dayFirst) return parseNamed(input, dayFirst[2], dayFirst[1]);

  throw new DateParseError(input, "unrecognized date format");
}

/**
 * Build a calendar key from a month (1–12) and day number.
 * @throws {DateParseError} when the pair isn't a day of the non-leap calendar
 */
export function calendarKeyOf(month: number, day: number): CalendarKey {
  return toKey(`${month}-${day}`, month, day);
}

/** Whether `value` is already a canonical, valid `MM-DD` key */
export function isCalendarKey(value: string): value is CalendarKey {
  const match = value.match(CALENDAR_KEY);
  if (!match) return false;
  const month = Number.parseInt(match[1], 10);
  const day = Number.parseInt(match[2], 10);
  return month >= 1 && month <= 12 && day >= 1 && day <= DaysInMonth[month - 1];
}
