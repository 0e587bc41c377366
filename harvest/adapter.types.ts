import type { ConsistencyError } from "./errors.js";

export type FacultyRecord = {
  Name: string;              // "Dr. " prefixed when the credential field holds a PhD
  College: string;
  Email: string;             // "" once an invalid address has been blanked
  Subjects: string[];
  Research: string[];
  Profile: string;           // absolute teaching-page URL
};

/** A record between assembly and cleaning; any field may still be missing. */
export type FacultyDraft = {
  [K in keyof FacultyRecord]: FacultyRecord[K] | null;
};

export type FacultyColumn = keyof FacultyRecord;

export type FacultyRow = Record<FacultyColumn, string>;

export type FacultyStub = {
  name: string;
  college: string;
  email: string | null;      // null when the block carries no mailto link
  profileUrl: string;
};

export type DirectoryListing = {
  stubs: FacultyStub[];
  emails: string[];          // every distinct mailto address on the page, first-seen order
  mismatch: ConsistencyError | null;
};

export type Enrichment = {
  subjects: string[] | null;
  research: string[] | null;
};

export type FacultySelectors = {
  person: string;            // card wrapping one faculty member
  name: string;              // within person: "Name, Credential, Affiliation"
  titleLink: string;         // within name: <a href="..."> to the profile page
  subjectsBlock: string;     // profile page: block holding the course <ul>
  interestBlock: string;     // profile page: "Research Topics ..." blocks
};

export type FacultyDirectoryConfig = {
  id: string;
  directoryUrl: string;
  profileBase: string;
  selectors: FacultySelectors;
  concurrency: number;
};

export interface SchoolAdapter {
  id: string;                                 // e.g. "buffalo-cse"
  ingest: (opts?: { outfile?: string }) => Promise<void>;
}
