import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { WriteError } from "../errors";
import type { Dataset, NormalizedRecord } from "../types";

/** CSV labels for each record field, matching the salaries table's columns. */
export const EXPORT_COLUMNS: { key: keyof NormalizedRecord; header: string }[] = [
  { key: "entity_name", header: "player_name" },
  { key: "category", header: "pos" },
  { key: "amount", header: "salary_usd" },
  { key: "source_id", header: "team" },
];

/** Concatenate per-source groups in the map's iteration order. */
export function aggregate(groups: ReadonlyMap<string, readonly NormalizedRecord[]>): Dataset {
  const dataset: Dataset = [];
  for (const records of groups.values()) {
    dataset.push(...records);
  }
  return dataset;
}

export function serializeDataset(dataset: Dataset): string {
  return stringify(dataset, { header: true, columns: EXPORT_COLUMNS });
}

function readField(row: object, header: string, line: number): string {
  const value: unknown = Reflect.get(row, header);
  if (typeof value !== "string") {
    throw new Error(`Row ${line} is missing column "${header}"`);
  }
  return value;
}

export function parseDataset(csv: string): Dataset {
  const rows: unknown = parse(csv, { columns: true, skip_empty_lines: true });
  if (!Array.isArray(rows)) throw new Error("Expected CSV rows");

  return rows.map((row: unknown, i) => {
    if (typeof row !== "object" || row === null) throw new Error(`Row ${i + 1} is not a record`);
    const record: NormalizedRecord = { entity_name: "", category: "", amount: "", source_id: "" };
    for (const { key, header } of EXPORT_COLUMNS) {
      record[key] = readField(row, header, i + 1);
    }
    return record;
  });
}

export interface Artifact {
  destination: string;
  content: string;
}

function stagingPath(destination: string): string {
  return `${destination}.tmp-${process.pid}`;
}

/**
 * Write every artifact or none of them. Each file is staged beside its
 * destination, and the staged files are renamed into place only once all of
 * them are written. On failure the staged files and any already renamed
 * destinations are removed.
 */
export function writeArtifacts(artifacts: readonly Artifact[]): void {
  const staged: string[] = [];
  const placed: string[] = [];
  let current = "";
  try {
    for (const { destination, content } of artifacts) {
      current = destination;
      if (fs.statSync(destination, { throwIfNoEntry: false })?.isDirectory()) {
        throw new Error("destination is a directory");
      }
      fs.mkdirSync(path.dirname(destination), { recursive: true });
      fs.writeFileSync(stagingPath(destination), content, "utf-8");
      staged.push(destination);
    }
    for (const destination of staged) {
      current = destination;
      fs.renameSync(stagingPath(destination), destination);
      placed.push(destination);
    }
  } catch (err) {
    for (const destination of staged) {
      fs.rmSync(placed.includes(destination) ? destination : stagingPath(destination), {
        force: true,
      });
    }
    throw new WriteError(current, { cause: err });
  }
}

export function exportDataset(dataset: Dataset, destination: string): void {
  writeArtifacts([{ destination, content: serializeDataset(dataset) }]);
  console.log(`[export] Wrote ${dataset.length} salary rows to ${destination}`);
}
