import type { Feast, FeastRecord } from "./types.js";

/**
 * Build an immutable Feast from a dataset record.
 * The record is copied, so later changes to it don't reach the Feast.
 */
export function feastFromRecord(record: FeastRecord): Feast {
  return Object.freeze({
    date: record.date,
    title: record.title,
    description: record.description,
    color: record.color,
    type: record.type,
    classification: record.classification,
    tags: Object.freeze([...record.tags]),
  });
}

/**
 * Convert a Feast back to its dataset record.
 * `feastToRecord(feastFromRecord(r))` reproduces every field of `r`.
 */
export function feastToRecord(feast: Feast): FeastRecord {
  return {
    date: feast.date,
    title: feast.title,
    description: feast.description,
    color: feast.color,
    type: feast.type,
    classification: feast.classification,
    tags: [...feast.tags],
  };
}

/** Structural equality over every field, tags compared in order */
export function feastsEqual(a: Feast, b: Feast): boolean {
  return (
    a.date === b.date &&
    a.title === b.title &&
    a.description === b.description &&
    a.color === b.color &&
    a.type === b.type &&
    a.classification === b.classification &&
    a.tags.length === b.tags.length &&
    a.tags.every((tag, i) => tag === b.tags[i])
  );
}
