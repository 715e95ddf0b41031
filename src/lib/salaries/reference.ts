import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { fetchPage, type FetchOptions } from "../scraping/utils";
import type { ReferenceEntry, ReferenceResult } from "../types";

/** Codes are stored in a CHAR(3) column and matched against `team=XXX` links. */
export const MAX_CODE_LENGTH = 3;

/**
 * Rows of the headerless reference file: name, code, url. The url column is
 * read and discarded.
 */
export function parseReferenceCsv(csv: string): string[][] {
  const rows: unknown = parse(csv, { skip_empty_lines: true, relax_column_count: true });
  if (!Array.isArray(rows)) throw new Error("Expected CSV rows");
  return rows.map((row: unknown) =>
    Array.isArray(row) ? row.map((cell: unknown) => String(cell ?? "")) : []
  );
}

function checkCode(code: string): string | null {
  if (code.length === 0) return "empty code";
  if (code.length > MAX_CODE_LENGTH) {
    return `code "${code}" is longer than ${MAX_CODE_LENGTH} characters`;
  }
  return null;
}

export function buildReferenceEntries(rows: string[][]): ReferenceResult {
  const result: ReferenceResult = { entries: [], rejected: [] };
  rows.forEach((row, i) => {
    if (row.length < 2) return;
    const [name, rawCode] = row;
    const code = rawCode.trim().toUpperCase();
    const reason = checkCode(code);
    if (reason) {
      result.rejected.push({ row: i, raw: rawCode, reason });
      return;
    }
    result.entries.push({ display_name: name.trim(), code });
  });
  return result;
}

export function serializeReference(entries: ReferenceEntry[]): string {
  return stringify(entries, {
    header: true,
    columns: [
      { key: "display_name", header: "team_name" },
      { key: "code", header: "abbreviation" },
    ],
  });
}

export async function runReferencePipeline(
  url: string,
  fetchOptions: FetchOptions = {}
): Promise<ReferenceEntry[]> {
  console.log(`[reference] Fetching ${url}`);
  const csv = await fetchPage(url, fetchOptions);
  const { entries, rejected } = buildReferenceEntries(parseReferenceCsv(csv));
  for (const r of rejected) {
    console.warn(`[reference] Skipped row ${r.row}: ${r.reason}`);
  }
  console.log(`[reference] Parsed ${entries.length} teams`);
  return entries;
}
