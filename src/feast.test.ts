import { describe, it, expect } from "vitest";
import { feastFromRecord, feastToRecord, feastsEqual } from "./feast.js";
import type { FeastRecord } from "./types.js";

const record: FeastRecord = {
  date: "January 9",
  title: "St. Basil the Great",
  description: "",
  color: "White",
  type: "Memorial",
  classification: "C",
  tags: ["doctors of the church", "bishops", "bishops"],
};

describe("feastFromRecord", () => {
  it("copies every field and keeps duplicate tags in order", () => {
    const feast = feastFromRecord(record);
    expect(feast.title).toBe("St. Basil the Great");
    expect(feast.classification).toBe("C");
    expect(feast.tags).toEqual(["doctors of the church", "bishops", "bishops"]);
  });

  it("freezes the feast and its tags", () => {
    const feast = feastFromRecord(record);
    expect(Object.isFrozen(feast)).toBe(true);
    expect(Object.isFrozen(feast.tags)).toBe(true);
  });

  it("is not affected by later changes to the record", () => {
    const source: FeastRecord = { ...record, tags: ["bishops"] };
    const feast = feastFromRecord(source);
    source.tags.push("monks");
    source.title = "Changed";
    expect(feast.tags).toEqual(["bishops"]);
    expect(feast.title).toBe("St. Basil the Great");
  });
});

describe("feastToRecord", () => {
  it("round-trips every field", () => {
    expect(feastToRecord(feastFromRecord(record))).toEqual(record);
  });

  it("returns a mutable copy of the tags", () => {
    const out = feastToRecord(feastFromRecord(record));
    out.tags.push("monks");
    expect(Object.isFrozen(out.tags)).toBe(false);
  });
});

describe("feastsEqual", () => {
  it("compares structurally", () => {
    expect(feastsEqual(feastFromRecord(record), feastFromRecord({ ...record }))).toBe(true);
  });

  it("treats tag order as significant", () => {
    const reordered = feastFromRecord({ ...record, tags: ["bishops", "doctors of the church", "bishops"] });
    expect(feastsEqual(feastFromRecord(record), reordered)).toBe(false);
  });

  it("detects a differing field", () => {
    const red = feastFromRecord({ ...record, color: "Red" });
    expect(feastsEqual(feastFromRecord(record), red)).toBe(false);
  });
});
