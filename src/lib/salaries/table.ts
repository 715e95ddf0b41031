import type { CheerioAPI, Cheerio } from "cheerio";
import type { AnyNode } from "domhandler";
import { config, countOr } from "../config";
import { TableNotFoundError, TableParseError } from "../errors";
import type { Header, ParsedTable, RawRow, TableRecord, TableSelector } from "../types";

/**
 * Turn a header label into a column name: "Avg/Year" → "avg_per_year",
 * "Salary ($M)" → "salary_usd_millions". Applying it twice changes nothing.
 */
export function slugify(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/\$\s*m\b/g, "usd_millions")
    .replace(/\$/g, "usd")
    .replace(/\//g, "_per_")
    .replace(/\s+/g, "_")
    .replace(/[().]/g, "")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
}

export function toCssSelector(selector: TableSelector): string {
  const classes = selector.className.trim().split(/\s+/).filter(Boolean);
  return [selector.tag, ...classes].join(".");
}

/** First element matching the selector, in document order. */
export function selectTable($: CheerioAPI, selector: TableSelector): Cheerio<AnyNode> {
  const css = toCssSelector(selector);
  const table = $(css).first();
  if (table.length === 0) throw new TableNotFoundError(css);
  return table;
}

function cellText(text: string): string {
  return text.trim().replace(/\r?\n/g, "");
}

export function readHeader($: CheerioAPI, table: Cheerio<AnyNode>): Header {
  const header: Header = [];
  table.find("th").each((_, th) => {
    header.push(slugify($(th).text()));
  });

  const seen = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) throw new TableParseError(`Duplicate column "${name}" in table header`);
    seen.add(name);
  }
  return header;
}

/** Every `<tr>`, header row included (it has no `<td>` and yields an empty row). */
export function readRows($: CheerioAPI, table: Cheerio<AnyNode>): RawRow[] {
  const rows: RawRow[] = [];
  table.find("tr").each((_, tr) => {
    const row: RawRow = [];
    $(tr)
      .find("td")
      .each((__, td) => {
        row.push(cellText($(td).text()));
      });
    rows.push(row);
  });
  return rows;
}

export function alignRows(header: Header, rows: RawRow[], skipRows: number): TableRecord[] {
  return rows.slice(Math.max(0, skipRows)).map((row) => {
    const record: TableRecord = {};
    header.forEach((name, i) => {
      record[name] = row[i] ?? "";
    });
    return record;
  });
}

/**
 * Parse the first table matching `selector` into header + records.
 *
 * The source layout puts an empty row right after the header (the header
 * `<tr>` itself) and a placeholder row after that, so the first `skipRows`
 * captured rows (default 2) are always dropped. This is positional and
 * breaks if the page markup changes.
 */
export function parseTable(
  $: CheerioAPI,
  selector: TableSelector,
  options: { skipRows?: number } = {}
): ParsedTable {
  const skipRows = countOr(options.skipRows, config.skipRows, 0);
  const table = selectTable($, selector);
  const header = readHeader($, table);
  const rows = alignRows(header, readRows($, table), skipRows);
  return { header, rows };
}
