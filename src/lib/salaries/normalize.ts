import type {
  ColumnMap,
  NameCheck,
  NameRejection,
  NormalizeResult,
  NormalizedRecord,
  ParsedTable,
  TableRecord,
} from "../types";

export const NAME_SENTINEL = "ERROR";

export const DEFAULT_COLUMNS: ColumnMap = {
  entity_name: "player",
  category: "pos",
  amount: "salary",
};

// The salary table stores names in a single-byte column, so only printable ASCII is kept.
const PRINTABLE_ASCII = /^[\x20-\x7E]*$/;

export function projectColumns(
  row: TableRecord,
  columns: ColumnMap = DEFAULT_COLUMNS
): Omit<NormalizedRecord, "source_id"> {
  return {
    entity_name: row[columns.entity_name] ?? "",
    category: row[columns.category] ?? "",
    amount: row[columns.amount] ?? "",
  };
}

/** "$1,234.50" → "1234.50". Anything else is left for the database to reject. */
export function cleanAmount(raw: string): string {
  return raw.replace(/[₩$€£,\s]/g, "");
}

export function checkEntityName(raw: string): NameCheck {
  if (PRINTABLE_ASCII.test(raw)) return { status: "valid", name: raw };
  const offending = [...raw].find((ch) => !PRINTABLE_ASCII.test(ch)) ?? "";
  const codePoint = offending.codePointAt(0) ?? 0;
  return {
    status: "rejected",
    raw,
    reason: `non-ASCII character U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`,
  };
}

/**
 * Project, clean and tag every row of one source page. No row is dropped:
 * a rejected name becomes "ERROR" and is also reported in `rejections`.
 */
export function normalize(
  table: ParsedTable,
  sourceId: string,
  options: { columns?: ColumnMap } = {}
): NormalizeResult {
  const columns = options.columns ?? DEFAULT_COLUMNS;
  const records: NormalizedRecord[] = [];
  const rejections: NameRejection[] = [];

  table.rows.forEach((row, index) => {
    const projected = projectColumns(row, columns);
    const check = checkEntityName(projected.entity_name);

    if (check.status === "rejected") {
      rejections.push({ sourceId, row: index, raw: check.raw, reason: check.reason });
    }

    records.push({
      entity_name: check.status === "valid" ? check.name : NAME_SENTINEL,
      category: projected.category,
      amount: cleanAmount(projected.amount),
      source_id: sourceId,
    });
  });

  return { records, rejections };
}
