import { parseListCell } from "./emitter.js";
import type { FacultyRow } from "../adapter.types.js";

export type CoverageReport = {
  records: number;
  pctWithEmail: number;
  pctWithSubjects: number;
  pctWithResearch: number;
};

function pct(count: number, total: number) {
  return total ? Number(((count / total) * 100).toFixed(1)) : 0;
}

export function coverageReport(rows: readonly FacultyRow[]): CoverageReport {
  const withEmail = rows.filter(r => r.Email).length;
  const withSubjects = rows.filter(r => parseListCell(r.Subjects).length > 0).length;
  const withResearch = rows.filter(r => parseListCell(r.Research).length > 0).length;
  return {
    records: rows.length,
    pctWithEmail: pct(withEmail, rows.length),
    pctWithSubjects: pct(withSubjects, rows.length),
    pctWithResearch: pct(withResearch, rows.length),
  };
}
