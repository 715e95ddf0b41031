import { describe, it, expect } from "vitest";
import {
  checkEntityName,
  cleanAmount,
  normalize,
  projectColumns,
  NAME_SENTINEL,
} from "../lib/salaries/normalize";
import type { ParsedTable } from "../lib/types";

function makeTable(rows: Record<string, string>[]): ParsedTable {
  return { header: ["player", "pos", "salary", "years"], rows };
}

// =============================================================================
// cleanAmount
// =============================================================================

describe("cleanAmount", () => {
  it('turns "$1,234.50" into "1234.50"', () => {
    expect(cleanAmount("$1,234.50")).toBe("1234.50");
  });

  it("strips currency sign and separators from whole amounts", () => {
    expect(cleanAmount("$1,000,000")).toBe("1000000");
  });

  it("removes whitespace", () => {
    expect(cleanAmount(" $ 500,000 ")).toBe("500000");
  });

  it("passes through a non-numeric amount unchanged", () => {
    expect(cleanAmount("n/a")).toBe("n/a");
  });

  it("leaves an empty amount empty", () => {
    expect(cleanAmount("")).toBe("");
  });
});

// =============================================================================
// checkEntityName
// =============================================================================

describe("checkEntityName", () => {
  it("accepts printable ASCII unchanged", () => {
    expect(checkEntityName("John O'Neil-Smith Jr.")).toEqual({
      status: "valid",
      name: "John O'Neil-Smith Jr.",
    });
  });

  it("accepts an empty name", () => {
    expect(checkEntityName("")).toEqual({ status: "valid", name: "" });
  });

  it("rejects accented characters and names the first offender", () => {
    expect(checkEntityName("José Pérez")).toEqual({
      status: "rejected",
      raw: "José Pérez",
      reason: "non-ASCII character U+00E9",
    });
  });

  it("rejects control characters", () => {
    expect(checkEntityName("Tab\tName").status).toBe("rejected");
  });
});

// =============================================================================
// projectColumns
// =============================================================================

describe("projectColumns", () => {
  it("keeps only the mapped columns", () => {
    expect(
      projectColumns({ player: "John Smith", pos: "1B", salary: "$500,000", years: "3" })
    ).toEqual({ entity_name: "John Smith", category: "1B", amount: "$500,000" });
  });

  it("reads a missing column as empty", () => {
    expect(projectColumns({ player: "John Smith" })).toEqual({
      entity_name: "John Smith",
      category: "",
      amount: "",
    });
  });

  it("follows a custom column map", () => {
    expect(
      projectColumns(
        { name: "Ann Lee", position: "C", pay_usd: "$1" },
        { entity_name: "name", category: "position", amount: "pay_usd" }
      )
    ).toEqual({ entity_name: "Ann Lee", category: "C", amount: "$1" });
  });
});

// =============================================================================
// normalize
// =============================================================================

describe("normalize", () => {
  it("projects, cleans and tags every row", () => {
    const table = makeTable([
      { player: "José Pérez", pos: "SS", salary: "$1,000,000", years: "5" },
      { player: "John Smith", pos: "1B", salary: "$500,000", years: "1" },
    ]);

    const result = normalize(table, "ABC");

    expect(result.records).toEqual([
      { entity_name: "ERROR", category: "SS", amount: "1000000", source_id: "ABC" },
      { entity_name: "John Smith", category: "1B", amount: "500000", source_id: "ABC" },
    ]);
    expect(result.rejections).toEqual([
      { sourceId: "ABC", row: 0, raw: "José Pérez", reason: "non-ASCII character U+00E9" },
    ]);
  });

  it("emits rows with an empty name", () => {
    const result = normalize(makeTable([{ player: "", pos: "", salary: "", years: "" }]), "XYZ");
    expect(result.records).toEqual([
      { entity_name: "", category: "", amount: "", source_id: "XYZ" },
    ]);
    expect(result.rejections).toEqual([]);
  });

  it("uses the sentinel for every name outside ASCII", () => {
    const names = ["Zoë", "Łukasz", "山田", "Renée"];
    const result = normalize(
      makeTable(names.map((player) => ({ player, pos: "P", salary: "$1", years: "1" }))),
      "ABC"
    );
    expect(result.records.map((r) => r.entity_name)).toEqual(names.map(() => NAME_SENTINEL));
    expect(result.rejections.map((r) => r.row)).toEqual([0, 1, 2, 3]);
  });

  it("keeps the row count of the table", () => {
    const rows = Array.from({ length: 7 }, (_, i) => ({
      player: `P${i}`,
      pos: "C",
      salary: "$1",
      years: "1",
    }));
    expect(normalize(makeTable(rows), "ABC").records).toHaveLength(7);
  });
});
