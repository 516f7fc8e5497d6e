/*
  Result table: sorting, filtering and CSV persistence.

  Columns: server_name, server_version, github_url, stars, days_since_commit,
  last_commit_date. Empty fields mean "no value"; stars, days_since_commit and
  last_commit_date are always all set or all empty.
*/

import * as fs from "fs";
import * as path from "path";
import csv from "csv-parser";
import { onShutdown } from "./common";

export interface ServerRecord {
  serverName: string;
  serverVersion: string;
  githubUrl: string | null;
  stars: number | null;
  daysSinceCommit: number | null;
  lastCommitDate: string | null;
}

export const TABLE_COLUMNS = [
  "server_name",
  "server_version",
  "github_url",
  "stars",
  "days_since_commit",
  "last_commit_date",
] as const;

type CsvRow = Record<(typeof TABLE_COLUMNS)[number], string>;

export type ValidServerRecord = ServerRecord & { stars: number; daysSinceCommit: number };

/**
 * Sort by stars descending, rows without stars last. Ties keep their input
 * order.
 */
export function createTable(records: readonly ServerRecord[]): ServerRecord[] {
  return [...records].sort((a, b) => {
    if (a.stars === null && b.stars === null) return 0;
    if (a.stars === null) return 1;
    if (b.stars === null) return -1;
    return b.stars - a.stars;
  });
}

export function hasStats(row: ServerRecord): row is ValidServerRecord {
  return row.stars !== null && row.daysSinceCommit !== null;
}

export function filterValidRows(rows: readonly ServerRecord[]): ValidServerRecord[] {
  return rows.filter(hasStats);
}

export function summarizeTable(rows: readonly ServerRecord[]): { total: number; withGitHub: number; withStats: number } {
  return {
    total: rows.length,
    withGitHub: rows.filter((row) => row.githubUrl !== null).length,
    withStats: filterValidRows(rows).length,
  };
}

function toCsvValue(val: string | number | null): string {
  if (val === null) return "";
  if (typeof val === "number") return String(val);
  const escaped = val.replace(/"/g, '""');
  return `"${escaped}"`;
}

export function formatTableCsv(rows: readonly ServerRecord[]): string {
  return [
    TABLE_COLUMNS.join(","),
    ...rows.map((r) =>
      [
        toCsvValue(r.serverName),
        toCsvValue(r.serverVersion),
        toCsvValue(r.githubUrl),
        toCsvValue(r.stars),
        toCsvValue(r.daysSinceCommit),
        toCsvValue(r.lastCommitDate),
      ].join(",")
    ),
  ].join("\n") + "\n";
}

/**
 * Write the table next to its destination and rename it into place, so the
 * destination is either the previous file or the complete new one. An
 * interrupt while the temporary file exists removes it.
 */
export async function writeTableCsv(filePath: string, rows: readonly ServerRecord[]): Promise<void> {
  const target = path.resolve(filePath);
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

  const unregister = onShutdown(() => fs.rmSync(tmp, { force: true }));
  try {
    await fs.promises.writeFile(tmp, formatTableCsv(rows), "utf8");
    await fs.promises.rename(tmp, target);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true });
    throw err;
  } finally {
    unregister();
  }
}

function parseNullableNumber(raw: string, column: string, line: number, integer: boolean): number | null {
  const trimmed = raw.trim();
  if (trimmed === "") return null;
  const value = Number(trimmed);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new Error(`Invalid ${column} value "${raw}" on line ${line}`);
  }
  return value;
}

function emptyToNull(raw: string): string | null {
  const trimmed = raw.trim();
  return trimmed === "" ? null : trimmed;
}

function fromCsvRow(row: CsvRow, line: number): ServerRecord {
  const stars = parseNullableNumber(row.stars, "stars", line, true);
  const daysSinceCommit = parseNullableNumber(row.days_since_commit, "days_since_commit", line, false);
  const lastCommitDate = emptyToNull(row.last_commit_date);
  const complete = stars !== null && daysSinceCommit !== null && lastCommitDate !== null;

  return {
    serverName: row.server_name,
    serverVersion: row.server_version,
    githubUrl: emptyToNull(row.github_url),
    stars: complete ? stars : null,
    daysSinceCommit: complete ? daysSinceCommit : null,
    lastCommitDate: complete ? lastCommitDate : null,
  };
}

async function parseCSV(filePath: string): Promise<Record<string, string>[]> {
  return new Promise((resolve, reject) => {
    const rows: Record<string, string>[] = [];
    let headerError: Error | null = null;

    fs.createReadStream(filePath)
      .on("error", reject)
      .pipe(csv())
      .on("headers", (headers: string[]) => {
        const missing = TABLE_COLUMNS.filter((column) => !headers.includes(column));
        if (missing.length > 0) {
          headerError = new Error(`CSV file ${filePath} is missing columns: ${missing.join(", ")}`);
        }
      })
      .on("data", (row: Record<string, string>) => {
        rows.push(row);
      })
      .on("end", () => {
        if (headerError) {
          reject(headerError);
        } else {
          resolve(rows);
        }
      })
      .on("error", (error: Error) => {
        reject(error);
      });
  });
}

function isCsvRow(row: Record<string, string>): row is CsvRow {
  return TABLE_COLUMNS.every((column) => typeof row[column] === "string");
}

export async function readTableCsv(filePath: string): Promise<ServerRecord[]> {
  const rows = await parseCSV(filePath);

  return rows.map((row, i) => {
    // header is line 1
    const line = i + 2;
    if (!isCsvRow(row)) {
      throw new Error(`Malformed row on line ${line} of ${filePath}`);
    }
    return fromCsvRow(row, line);
  });
}
