import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";
import { ConsistencyError, ParseError } from "../errors.js";
import type { DirectoryListing, FacultySelectors, FacultyStub } from "../adapter.types.js";

const MAILTO = "mailto:";
const DOCTORAL_MARKER = "PhD";

// Directory anchors end in ".html"; only "html" is cut, so the dot stays
// and "a.html" becomes "a.teaching.html".
export const PROFILE_EXTENSION_LENGTH = 4;
export const TEACHING_SUFFIX = "teaching.html";

function stripMailto(href: string | undefined): string | null {
  if (!href?.startsWith(MAILTO)) return null;
  const addr = href.slice(MAILTO.length).trim();
  return addr || null;
}

export function findEmailAddresses($: CheerioAPI): string[] {
  const seen = new Set<string>();
  $(`a[href^='${MAILTO}']`).each((_i, a) => {
    const addr = stripMailto($(a).attr("href"));
    if (addr) seen.add(addr);
  });
  return Array.from(seen);
}

/** Splits "Name, Credential, Affiliation[, ...]" into display name and college. */
export function parseFacultyName(text: string): { name: string; college: string } {
  const parts = text.replace(/\s+/g, " ").split(",");
  if (parts.length < 3) {
    throw new ParseError(
      `faculty block "${text.trim()}" has ${parts.length} comma-separated part(s), expected at least 3`,
    );
  }
  const raw = parts[0].trim();
  return {
    name: parts[1].includes(DOCTORAL_MARKER) ? `Dr. ${raw}` : raw,
    college: parts[2].trim(),
  };
}

export function profileLink(href: string, profileBase: string): string {
  if (href.length <= PROFILE_EXTENSION_LENGTH) {
    throw new ParseError(`profile href "${href}" is too short to carry a file extension`);
  }
  return profileBase + href.slice(0, -PROFILE_EXTENSION_LENGTH) + TEACHING_SUFFIX;
}

/**
 * Reads every faculty block on the directory page. Name, college, email and
 * profile link all come from the same block, so a block without a mailto
 * link gets a null email instead of shifting later addresses.
 */
export function parseDirectory(html: string, selectors: FacultySelectors, profileBase: string): DirectoryListing {
  const $ = load(html);
  const nameEls = $(selectors.name).toArray();
  if (nameEls.length === 0) {
    throw new ParseError(`no faculty blocks matched "${selectors.name}"`);
  }

  const stubs: FacultyStub[] = nameEls.map(el => {
    const nameEl = $(el);
    const card = nameEl.closest(selectors.person);
    const block = card.length ? card : nameEl.parent();

    const { name, college } = parseFacultyName(nameEl.text());
    const href = nameEl.find(selectors.titleLink).first().attr("href");
    if (!href) throw new ParseError(`faculty block "${name}" has no "${selectors.titleLink}" link`);

    return {
      name,
      college,
      email: stripMailto(block.find(`a[href^='${MAILTO}']`).first().attr("href")),
      profileUrl: profileLink(href, profileBase),
    };
  });

  const emails = findEmailAddresses($);
  return {
    stubs,
    emails,
    mismatch: emails.length === stubs.length ? null : new ConsistencyError(emails.length, stubs.length),
  };
}
