import { ValidationError } from "../errors.js";
import type { Enrichment, FacultyDraft, FacultyRecord, FacultyStub } from "../adapter.types.js";

export const EMAIL_PATTERN = /^[\w.-]+@[\w.-]+\.\w+$/;

export function validateEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function assertEmail(email: string): string {
  if (!validateEmail(email)) throw new ValidationError(`malformed email "${email}"`, email);
  return email;
}

function checkedEmail(email: string): string {
  try {
    return assertEmail(email);
  } catch (e) {
    if (e instanceof ValidationError) return "";
    throw e;
  }
}

export function createDrafts(stubs: readonly FacultyStub[]): FacultyDraft[] {
  return stubs.map(s => ({
    Name: s.name,
    College: s.college,
    Email: s.email,
    Subjects: [],
    Research: [],
    Profile: s.profileUrl,
  }));
}

export function mergeEnrichment(
  drafts: readonly FacultyDraft[],
  enrichment: ReadonlyMap<number, Enrichment>,
): FacultyDraft[] {
  return drafts.map((d, i) => {
    const e = enrichment.get(i);
    return e ? { ...d, Subjects: e.subjects, Research: e.research } : { ...d };
  });
}

/**
 * 1. drop records without an email and later repeats of a seen email
 * 2. blank emails that fail EMAIL_PATTERN (record kept)
 * 3. nulls become "" or []
 *
 * An email that is already "" was blanked by an earlier pass; it is kept
 * and never deduplicated, so cleaning twice equals cleaning once.
 */
export function cleanRecords(drafts: readonly FacultyDraft[]): FacultyRecord[] {
  const seen = new Set<string>();
  const unique = drafts.filter(d => {
    if (d.Email === null) return false;
    if (d.Email === "") return true;
    if (seen.has(d.Email)) return false;
    seen.add(d.Email);
    return true;
  });

  return unique.map(d => ({
    Name: d.Name ?? "",
    College: d.College ?? "",
    Email: d.Email ? checkedEmail(d.Email) : "",
    Subjects: d.Subjects ?? [],
    Research: d.Research ?? [],
    Profile: d.Profile ?? "",
  }));
}
