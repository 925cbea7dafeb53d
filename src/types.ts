/**
 * Types for the feast calendar.
 * A dataset maps calendar days (`MM-DD`) to the feasts celebrated on them.
 */

// ─── Calendar keys ────────────────────────────────────────────────────────────

/** Canonical zero-padded `MM-DD` key, e.g. "01-09" or "12-25" */
export type CalendarKey = string;

/** English month names, indexed by month number - 1 */
export const MonthNames = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

export type MonthName = (typeof MonthNames)[number];

/**
 * Days per month, indexed by month number - 1.
 * The calendar is year-agnostic, so February always has 28 days.
 */
export const DaysInMonth: readonly number[] = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

// ─── Raw dataset shapes (as they appear in the JSON file) ────────────────────

export interface FeastRecord {
  /** Human-readable label, e.g. "January 9" */
  date: string;
  title: string;
  description: string;
  /** Liturgical colour, e.g. "White", "Red" */
  color: string;
  /** Liturgical rank, e.g. "Solemnity", "Memorial" */
  type: string;
  /** Single-letter class code (A–E in the bundled data) */
  classification: string;
  tags: string[];
}

/** Dataset keyed by calendar day */
export type KeyedFeastDocument = Record<string, FeastRecord[]>;

/** Either on-disk shape of the dataset */
export type FeastDocument = KeyedFeastDocument | FeastRecord[];

// ─── Resolved types ───────────────────────────────────────────────────────────

/**
 * A single liturgical celebration. Frozen on construction; compare with
 * `feastsEqual()`.
 */
export interface Feast {
  readonly date: string;
  readonly title: string;
  readonly description: string;
  readonly color: string;
  readonly type: string;
  readonly classification: string;
  readonly tags: readonly string[];
}

/** Anything `normalizeDate()` accepts */
export type DateInput = string | Date;
