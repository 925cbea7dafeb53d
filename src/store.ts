import { readFileSync } from "node:fs";
import { TextDecoder } from "node:util";
import { loadConfig } from "./config.js";
import { DataSourceError, DateParseError } from "./errors.js";
import { feastFromRecord } from "./feast.js";
import { createLogger, type Logger } from "./logger.js";
import { isCalendarKey, normalizeDate } from "./normalize.js";
import { validateDocument } from "./schema.js";
import type { CalendarKey, Feast, FeastDocument } from "./types.js";

// ─── Sources ──────────────────────────────────────────────────────────────────

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Where a store reads its dataset from. `read()` returns the raw JSON text. */
export interface FeastSource {
  /** Label used in errors and logs, e.g. a file path */
  readonly location: string;
  read(): string;
}

/**
 * Read the dataset from a UTF-8 JSON file; a leading BOM is dropped.
 * A missing file becomes `DataSourceError("notFound")` and invalid UTF-8
 * `DataSourceError("malformed")`; other I/O errors propagate as thrown by `fs`.
 */
export function fileSource(path: string): FeastSource {
  return {
    location: path,
    read() {
      let bytes: Buffer;
      try {
        bytes = readFileSync(path);
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
          throw new DataSourceError("notFound", path, "no such file", { cause: error });
        }
        throw error;
      }
      try {
        return utf8.decode(bytes);
      } catch (error) {
        throw new DataSourceError("malformed", path, "invalid UTF-8", { cause: error });
      }
    },
  };
}

/** Serve an already-decoded document, e.g. one embedded by the host */
export function documentSource(document: FeastDocument, location = "<memory>"): FeastSource {
  const text = JSON.stringify(document);
  return { location, read: () => text };
}

// ─── Indexing ─────────────────────────────────────────────────────────────────

interface StoreIndex {
  byKey: Map<CalendarKey, readonly Feast[]>;
  keys: readonly CalendarKey[];
  all: readonly Feast[];
}

function decode(text: string, location: string): FeastDocument {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new DataSourceError("malformed", location, detail, { cause: error });
  }
  const result = validateDocument(value);
  if (!result.success) {
    throw new DataSourceError("malformed", location, result.message);
  }
  return result.data;
}

function groupByKey(document: FeastDocument, location: string): Map<CalendarKey, Feast[]> {
  const groups = new Map<CalendarKey, Feast[]>();
  const add = (key: CalendarKey, feast: Feast) => {
    const group = groups.get(key);
    if (group) group.push(feast);
    else groups.set(key, [feast]);
  };

  if (Array.isArray(document)) {
    document.forEach((record, i) => {
      let key: CalendarKey;
      try {
        key = normalizeDate(record.date);
      } catch (error) {
        if (!(error instanceof DateParseError)) throw error;
        throw new DataSourceError("malformed", location, `entry ${i}: ${error.message}`, { cause: error });
      }
      add(key, feastFromRecord(record));
    });
    return groups;
  }

  for (const [key, records] of Object.entries(document)) {
    if (!isCalendarKey(key)) {
      throw new DataSourceError("malformed", location, `"${key}" is not a valid MM-DD calendar key`);
    }
    for (const record of records) add(key, feastFromRecord(record));
  }
  return groups;
}

function buildIndex(document: FeastDocument, location: string): StoreIndex {
  const groups = groupByKey(document, location);
  const keys = [...groups.keys()].sort();
  const byKey = new Map<CalendarKey, readonly Feast[]>();
  const all: Feast[] = [];
  for (const key of keys) {
    const feasts = Object.freeze(groups.get(key) ?? []);
    byKey.set(key, feasts);
    all.push(...feasts);
  }
  return { byKey, keys: Object.freeze(keys), all: Object.freeze(all) };
}

// ─── Store ────────────────────────────────────────────────────────────────────

export interface FeastStoreOptions {
  logger?: Logger;
}

/**
 * In-memory, read-only feast dataset keyed by `MM-DD`.
 *
 * The source is read once, on the first `load()` or query. A load either
 * indexes the whole document or leaves the store empty and throws; a later
 * call then retries. Once loaded, the source is never read again.
 */
export class FeastStore {
  private index: StoreIndex | undefined;
  private readonly logger: Logger;

  constructor(
    readonly source: FeastSource,
    options: FeastStoreOptions = {}
  ) {
    this.logger = options.logger ?? createLogger("store");
  }

  get loaded(): boolean {
    return this.index !== undefined;
  }

  /**
   * Read and index the dataset, unless already done.
   * @throws {DataSourceError} when the dataset is missing or malformed
   */
  load(): this {
    this.indexed();
    return this;
  }

  /** Feasts on `key` in dataset order; empty when the day has none */
  get(key: CalendarKey): readonly Feast[] {
    return this.indexed().byKey.get(key) ?? [];
  }

  /** Every feast, by ascending key then dataset order */
  all(): readonly Feast[] {
    return this.indexed().all;
  }

  /** Keys with at least one feast, ascending */
  keys(): readonly CalendarKey[] {
    return this.indexed().keys;
  }

  /** Number of feasts (not days) */
  count(): number {
    return this.indexed().all.length;
  }

  private indexed(): StoreIndex {
    if (this.index) return this.index;
    const { location } = this.source;
    try {
      const index = buildIndex(decode(this.source.read(), location), location);
      this.index = index;
      this.logger.debug("Loaded feast dataset", {
        location,
        feasts: index.all.length,
        days: index.keys.length,
      });
      return index;
    } catch (error) {
      this.logger.error("Failed to load feast dataset", {
        location,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

// ─── Process-wide store ───────────────────────────────────────────────────────

let processStore: FeastStore | undefined;

/**
 * The store behind the query functions, created and loaded on first use from
 * `loadConfig()`. Nothing is cached when the load fails.
 */
export function getFeastStore(): FeastStore {
  if (processStore) return processStore;
  const config = loadConfig();
  const store = new FeastStore(fileSource(config.dataPath), {
    logger: createLogger("store", config.logLevel),
  }).load();
  processStore = store;
  return store;
}

/** Replace the process-wide store; `undefined` resets it to the configured dataset */
export function setFeastStore(store: FeastStore | undefined): void {
  processStore = store;
}
