// ===== Scraped tables =====

/** Cell text of one `<tr>`, aligned by position with a Header */
export type RawRow = string[];

/** Slugified column names of one table */
export type Header = string[];

export type TableRecord = Record<string, string>;

export interface ParsedTable {
  header: Header;
  rows: TableRecord[];
}

/** Identifies a table by tag and class, e.g. `table.tablesorter` */
export interface TableSelector {
  tag: string;
  className: string;
}

/** One discoverable child page on the index page */
export interface LinkEntry {
  label: string;
  locator: string; // raw href
}

// ===== Normalized output =====

export interface NormalizedRecord {
  entity_name: string;
  category: string;
  amount: string;
  source_id: string;
}

export type Dataset = NormalizedRecord[];

/** Which table column feeds each projected field */
export interface ColumnMap {
  entity_name: string;
  category: string;
  amount: string;
}

export type NameCheck =
  | { status: "valid"; name: string }
  | { status: "rejected"; raw: string; reason: string };

export interface NameRejection {
  sourceId: string;
  row: number;
  raw: string;
  reason: string;
}

export interface NormalizeResult {
  records: NormalizedRecord[];
  rejections: NameRejection[];
}

// ===== Reference data =====

export interface ReferenceEntry {
  display_name: string;
  code: string; // 1-3 uppercase characters
}

export interface ReferenceRejection {
  row: number; // index in the parsed file
  raw: string;
  reason: string;
}

export interface ReferenceResult {
  entries: ReferenceEntry[];
  rejected: ReferenceRejection[];
}

// ===== Pipeline =====

export interface SourcePage {
  sourceId: string;
  label: string;
  url: string;
}

export interface SourceFailure {
  sourceId: string | null;
  url: string;
  error: string;
}

export interface PipelineResult {
  dataset: Dataset;
  sources: SourcePage[];
  failures: SourceFailure[];
  rejections: NameRejection[];
}
