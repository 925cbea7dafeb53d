/**
 * feast-calendar: Catholic feast days by date, title, tag and rank
 *
 * Look up the feasts celebrated on a calendar day from a static dataset,
 * or search the whole calendar. Dates may be given as `Date` objects or as
 * strings such as "01-09", "Jan 9" or "9th January 2024".
 */

import { normalizeDate } from "./normalize.js";
import { searchByTag, searchByTitle, searchByType } from "./search.js";
import { getFeastStore } from "./store.js";
import type { CalendarKey, DateInput, Feast } from "./types.js";

// ─── Queries ──────────────────────────────────────────────────────────────────

/**
 * Feasts celebrated on the given day, in dataset order.
 * An empty array means the day has no feast.
 *
 * @throws {DateParseError} when a date string can't be parsed
 * @throws {DataSourceError} when the dataset can't be loaded
 *
 * @example
 * getFeastForDate("Jan 9");
 * getFeastForDate(new Date(2025, 0, 9));
 */
export function getFeastForDate(input: DateInput): readonly Feast[] {
  const key = normalizeDate(input);
  return getFeastStore().get(key);
}

/** Feasts for the host's current local date */
export function getFeastForToday(): readonly Feast[] {
  return getFeastForDate(new Date());
}

export function searchFeastsByTitle(keyword: string, caseSensitive = false): Feast[] {
  return searchByTitle(getFeastStore().all(), keyword, caseSensitive);
}

export function searchFeastsByTag(tag: string, caseSensitive = false): Feast[] {
  return searchByTag(getFeastStore().all(), tag, caseSensitive);
}

export function searchFeastsByType(type: string, caseSensitive = false): Feast[] {
  return searchByType(getFeastStore().all(), type, caseSensitive);
}

/** Every feast in calendar order */
export function listAllFeasts(): readonly Feast[] {
  return getFeastStore().all();
}

/** `MM-DD` keys that have at least one feast, ascending */
export function getDatesWithFeasts(): readonly CalendarKey[] {
  return getFeastStore().keys();
}

/** Total number of feasts (a day with two feasts counts twice) */
export function getFeastCount(): number {
  return getFeastStore().count();
}

// ─── Building blocks ──────────────────────────────────────────────────────────

export { normalizeDate, calendarKeyOf, isCalendarKey } from "./normalize.js";
export { searchByTitle, searchByTag, searchByType } from "./search.js";
export { feastFromRecord, feastToRecord, feastsEqual } from "./feast.js";
export {
  FeastStore,
  fileSource,
  documentSource,
  getFeastStore,
  setFeastStore,
} from "./store.js";
export type { FeastSource, FeastStoreOptions } from "./store.js";
export { FeastRecordSchema, FeastDocumentSchema } from "./schema.js";
export { loadConfig, BUNDLED_DATA_PATH } from "./config.js";
export type { FeastConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";

// ─── Errors ───────────────────────────────────────────────────────────────────

export { DateParseError, DataSourceError } from "./errors.js";
export type { DataSourceErrorKind } from "./errors.js";

// ─── Types ────────────────────────────────────────────────────────────────────

export {
  MonthNames,
  DaysInMonth,
  type CalendarKey,
  type DateInput,
  type Feast,
  type FeastRecord,
  type FeastDocument,
  type KeyedFeastDocument,
  type MonthName,
} from "./types.js";
