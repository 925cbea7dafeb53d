import type { Feast } from "./types.js";

// ─── Helpers ──────────────────────────────────────────────────────────────────

type Matcher = (field: string) => boolean;

function requireString(value: unknown, name: string): string {
  if (typeof value !== "string") {
    throw new TypeError(`${name} must be a string, got ${typeof value}`);
  }
  return value;
}

// Locale-independent lowercasing
function fold(value: string, caseSensitive: boolean): string {
  return caseSensitive ? value : value.toLowerCase();
}

function substringOf(query: string, caseSensitive: boolean): Matcher {
  const needle = fold(query, caseSensitive);
  return (field) => fold(field, caseSensitive).includes(needle);
}

function equalTo(query: string, caseSensitive: boolean): Matcher {
  const needle = fold(query, caseSensitive);
  return (field) => fold(field, caseSensitive) === needle;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Feasts whose title contains `keyword`. Order is preserved; an empty
 * keyword matches every feast.
 */
export function searchByTitle(
  feasts: readonly Feast[],
  keyword: string,
  caseSensitive = false
): Feast[] {
  const matches = substringOf(requireString(keyword, "keyword"), caseSensitive);
  return feasts.filter((f) => matches(f.title));
}

/**
 * Feasts carrying `tag` exactly. "opus dei" matches a tag "Opus Dei" (when
 * case-insensitive) but not "opus dei founder".
 */
export function searchByTag(
  feasts: readonly Feast[],
  tag: string,
  caseSensitive = false
): Feast[] {
  const matches = equalTo(requireString(tag, "tag"), caseSensitive);
  return feasts.filter((f) => f.tags.some(matches));
}

/** Feasts whose liturgical rank equals `type`, e.g. "Solemnity" */
export function searchByType(
  feasts: readonly Feast[],
  type: string,
  caseSensitive = false
): Feast[] {
  const matches = equalTo(requireString(type, "type"), caseSensitive);
  return feasts.filter((f) => matches(f.type));
}
