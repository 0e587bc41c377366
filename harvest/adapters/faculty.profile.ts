import { load } from "cheerio";
import type { FacultySelectors } from "../adapter.types.js";

// Interest blocks open with the 15-character header "Research Topics".
export const INTEREST_HEADER_LENGTH = 15;
export const TOPIC_SEPARATOR = "; ";

type ProfileSelectors = Pick<FacultySelectors, "subjectsBlock" | "interestBlock">;

export function extractSubjects(html: string, selectors: ProfileSelectors): string[] {
  const $ = load(html);
  const list = $(selectors.subjectsBlock).first().find("ul").first();
  return list
    .find("li")
    .toArray()
    .map(li => $(li).text().trim())
    .filter(Boolean);
}

export function extractResearch(html: string, selectors: ProfileSelectors): string[] {
  const $ = load(html);
  return $(selectors.interestBlock)
    .toArray()
    .flatMap(div => $(div).text().slice(INTEREST_HEADER_LENGTH).trim().split(TOPIC_SEPARATOR))
    .filter(Boolean);
}
