import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";
import type { Dataset, ReferenceEntry } from "./types";

let db: Database.Database | null = null;

export interface SalaryRow {
  player_name: string;
  pos: string;
  salary_usd: number | null;
  team: string;
}

export interface TeamRow {
  abbreviation: string;
  team_name: string;
}

export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(process.cwd(), dbPath)), { recursive: true });
  }

  const database = new Database(dbPath);
  database.pragma("journal_mode = WAL");
  initSchema(database);
  return database;
}

export function getDb(): Database.Database {
  if (db) return db;
  db = openDb(path.resolve(process.cwd(), config.dbPath));
  return db;
}

export function closeDb(): void {
  db?.close();
  db = null;
}

export function initSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS salaries (
      player_name TEXT,
      pos         CHAR(3),
      salary_usd  NUMERIC,
      team        CHAR(3)
    );

    CREATE INDEX IF NOT EXISTS idx_salaries_team ON salaries (team);

    CREATE TABLE IF NOT EXISTS teams (
      abbreviation CHAR(3) PRIMARY KEY,
      team_name    VARCHAR(45) NOT NULL
    );
  `);
}

/** Cleaned amounts that are not plain decimals are stored as NULL. */
export function toSalaryUsd(amount: string): number | null {
  if (!/^\d+(\.\d+)?$/.test(amount)) return null;
  return parseFloat(amount);
}

/**
 * Replace the salary rows of every team present in `dataset`.
 * Teams missing from this run keep their previous rows.
 */
export function loadSalaries(dataset: Dataset, database: Database.Database = getDb()): number {
  if (dataset.length === 0) return 0;

  const teams = new Set(dataset.map((r) => r.source_id));
  const remove = database.prepare("DELETE FROM salaries WHERE team = ?");
  const insert = database.prepare(
    "INSERT INTO salaries (player_name, pos, salary_usd, team) VALUES (?, ?, ?, ?)"
  );

  database.transaction(() => {
    for (const team of teams) remove.run(team);
    for (const r of dataset) {
      insert.run(r.entity_name, r.category, toSalaryUsd(r.amount), r.source_id);
    }
  })();

  console.log(`[db] Loaded ${dataset.length} salary rows for ${teams.size} teams`);
  return dataset.length;
}

export function loadTeams(entries: ReferenceEntry[], database: Database.Database = getDb()): number {
  if (entries.length === 0) return 0;

  const upsert = database.prepare(`
    INSERT INTO teams (abbreviation, team_name) VALUES (?, ?)
    ON CONFLICT(abbreviation) DO UPDATE SET team_name = excluded.team_name
  `);

  database.transaction(() => {
    for (const e of entries) upsert.run(e.code, e.display_name.slice(0, 45));
  })();

  console.log(`[db] Loaded ${entries.length} teams`);
  return entries.length;
}

export function getSalariesByTeam(team: string, database: Database.Database = getDb()): SalaryRow[] {
  return database
    .prepare<[string], SalaryRow>(
      "SELECT player_name, pos, salary_usd, team FROM salaries WHERE team = ? ORDER BY rowid"
    )
    .all(team);
}

export function getTeams(database: Database.Database = getDb()): TeamRow[] {
  return database
    .prepare<[], TeamRow>("SELECT abbreviation, team_name FROM teams ORDER BY abbreviation")
    .all();
}
