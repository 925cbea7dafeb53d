/**
 * Raised when a date string matches no supported format or names a day
 * that doesn't exist in the (non-leap) calendar.
 */
export class DateParseError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Cannot parse date "${input}": ${reason}`);
    this.name = "DateParseError";
    this.input = input;
  }
}

export type DataSourceErrorKind = "notFound" | "malformed";

/**
 * Raised by the first load of a dataset. `notFound` means the document is
 * missing; `malformed` means it exists but isn't valid JSON or doesn't match
 * the dataset schema.
 */
export class DataSourceError extends Error {
  readonly kind: DataSourceErrorKind;
  readonly location: string;

  constructor(kind: DataSourceErrorKind, location: string, detail: string, options?: { cause?: unknown }) {
    super(
      kind === "notFound"
        ? `Feast dataset not found at ${location}: ${detail}`
        : `Feast dataset at ${location} is malformed: ${detail}`,
      options
    );
    this.name = "DataSourceError";
    this.kind = kind;
    this.location = location;
  }
}
