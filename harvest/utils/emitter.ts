import { mkdirSync, readFileSync } from "fs";
import { dirname } from "path";
import { createObjectCsvWriter } from "csv-writer";
import { parse } from "csv-parse/sync";
import { ParseError } from "../errors.js";
import type { FacultyColumn, FacultyRecord, FacultyRow } from "../adapter.types.js";

export const FACULTY_COLUMNS: readonly FacultyColumn[] = ["Name", "College", "Email", "Subjects", "Research", "Profile"];

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

// List cells are JSON arrays; a plain CSV reader sees them as strings.
export function toRows(records: readonly FacultyRecord[]): FacultyRow[] {
  return records.map(r => ({
    Name: r.Name,
    College: r.College,
    Email: r.Email,
    Subjects: JSON.stringify(r.Subjects),
    Research: JSON.stringify(r.Research),
    Profile: r.Profile,
  }));
}

export function parseListCell(cell: string): string[] {
  if (!cell.trim()) return [];
  let value: unknown;
  try {
    value = JSON.parse(cell);
  } catch (e) {
    throw new ParseError(`list cell is not JSON: ${cell}`, { cause: e });
  }
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new ParseError(`list cell is not an array of strings: ${cell}`);
  }
  return value;
}

export async function emitCsv(file: string, records: readonly FacultyRecord[]) {
  ensureDir(dirname(file));
  const writer = createObjectCsvWriter({
    path: file,
    header: FACULTY_COLUMNS.map(id => ({ id, title: id })),
  });
  await writer.writeRecords(toRows(records));
}

function isRow(value: unknown): value is FacultyRow {
  if (typeof value !== "object" || value === null) return false;
  const entries = new Map(Object.entries(value));
  return FACULTY_COLUMNS.every(c => typeof entries.get(c) === "string");
}

export function readFacultyCsv(file: string): FacultyRow[] {
  const parsed: unknown = parse(readFileSync(file, "utf8"), { columns: true, skip_empty_lines: true });
  if (!Array.isArray(parsed)) throw new ParseError(`${file}: expected CSV rows`);
  return parsed.map((row: unknown, i) => {
    if (!isRow(row)) throw new ParseError(`${file}: row ${i + 1} is missing faculty columns`);
    return row;
  });
}
