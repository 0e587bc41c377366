import { describe, expect, it } from "vitest";
import { load } from "cheerio";
import {
  PROFILE_EXTENSION_LENGTH,
  findEmailAddresses,
  parseDirectory,
  parseFacultyName,
  profileLink,
} from "./faculty.directory.js";
import { BUFFALO_CSE_SELECTORS } from "./buffalo.cse.faculty.js";
import { ConsistencyError, ParseError } from "../errors.js";

const BASE = "https://faculty.test";

function card(text: string, href: string, email?: string) {
  const mail = email ? `<a href="mailto:${email}">${email}</a>` : "";
  const [name, ...rest] = text.split(",");
  return `<div class="profileinfo-teaser">
    <div class="profileinfo-teaser-name"><a class="title" href="${href}">${name}</a>,${rest.join(",")}</div>
    ${mail}
  </div>`;
}

describe("findEmailAddresses", () => {
  it("strips the mailto scheme", () => {
    const $ = load('<a href="mailto:a@b.edu">mail</a>');
    expect(findEmailAddresses($)).toEqual(["a@b.edu"]);
  });

  it("keeps a repeated address once", () => {
    const $ = load('<a href="mailto:a@b.edu">x</a><p><a href="mailto:a@b.edu">y</a></p>');
    expect(findEmailAddresses($)).toEqual(["a@b.edu"]);
  });

  it("preserves first-seen order and ignores other links", () => {
    const $ = load(
      '<a href="mailto:z@b.edu"></a><a href="/people.html"></a><a href="mailto:a@b.edu"></a><a href="mailto:z@b.edu"></a>',
    );
    expect(findEmailAddresses($)).toEqual(["z@b.edu", "a@b.edu"]);
  });
});

describe("parseFacultyName", () => {
  it("prefixes Dr. when the credential holds PhD", () => {
    expect(parseFacultyName("Jane Doe, PhD, Test University")).toEqual({
      name: "Dr. Jane Doe",
      college: "Test University",
    });
  });

  it("keeps the raw name otherwise", () => {
    expect(parseFacultyName("  John Roe , MS,  State College ")).toEqual({
      name: "John Roe",
      college: "State College",
    });
  });

  it("ignores parts past the affiliation", () => {
    expect(parseFacultyName("Ann Lee, PhD, Tech Institute, Visiting")).toEqual({
      name: "Dr. Ann Lee",
      college: "Tech Institute",
    });
  });

  it("rejects a block with two parts", () => {
    expect(() => parseFacultyName("Jane Doe, PhD")).toThrow(ParseError);
    expect(() => parseFacultyName("Jane Doe, PhD")).toThrow(
      'faculty block "Jane Doe, PhD" has 2 comma-separated part(s), expected at least 3',
    );
  });
});

describe("profileLink", () => {
  it("cuts the fixed extension length and appends the teaching suffix", () => {
    expect(PROFILE_EXTENSION_LENGTH).toBe(4);
    expect(profileLink("/people/doe.html", BASE)).toBe("https://faculty.test/people/doe.teaching.html");
  });

  it("rejects an href no longer than the extension", () => {
    expect(() => profileLink("html", BASE)).toThrow(ParseError);
  });
});

describe("parseDirectory", () => {
  it("reads name, college, email and profile link from each block", () => {
    const html = card("Jane Doe, PhD, Test University", "/jane.html", "jane@test.edu")
      + card("John Roe, MS, State College", "/john.html", "john@test.edu");

    const listing = parseDirectory(html, BUFFALO_CSE_SELECTORS, BASE);

    expect(listing.stubs).toEqual([
      { name: "Dr. Jane Doe", college: "Test University", email: "jane@test.edu", profileUrl: `${BASE}/jane.teaching.html` },
      { name: "John Roe", college: "State College", email: "john@test.edu", profileUrl: `${BASE}/john.teaching.html` },
    ]);
    expect(listing.emails).toEqual(["jane@test.edu", "john@test.edu"]);
    expect(listing.mismatch).toBeNull();
  });

  it("gives a block without mailto a null email and flags the count mismatch", () => {
    const html = card("Jane Doe, PhD, Test University", "/jane.html")
      + card("John Roe, MS, State College", "/john.html", "john@test.edu");

    const listing = parseDirectory(html, BUFFALO_CSE_SELECTORS, BASE);

    expect(listing.stubs.map(s => s.email)).toEqual([null, "john@test.edu"]);
    expect(listing.mismatch).toBeInstanceOf(ConsistencyError);
    expect(listing.mismatch?.emails).toBe(1);
    expect(listing.mismatch?.names).toBe(2);
  });

  it("falls back to the name element's parent when no card wraps it", () => {
    const html = `<section>
      <div class="profileinfo-teaser-name"><a class="title" href="/a.html">Ann Lee</a>, PhD, Tech Institute</div>
      <a href="mailto:ann@tech.edu">ann@tech.edu</a>
    </section>`;

    const listing = parseDirectory(html, BUFFALO_CSE_SELECTORS, BASE);

    expect(listing.stubs[0].email).toBe("ann@tech.edu");
  });

  it("fails on a malformed block", () => {
    const html = `<div class="profileinfo-teaser"><div class="profileinfo-teaser-name"><a class="title" href="/x.html">Jane Doe</a>, PhD</div></div>`;
    expect(() => parseDirectory(html, BUFFALO_CSE_SELECTORS, BASE)).toThrow(ParseError);
  });

  it("fails when a block has no title link", () => {
    const html = `<div class="profileinfo-teaser"><div class="profileinfo-teaser-name">Jane Doe, PhD, Test University</div></div>`;
    expect(() => parseDirectory(html, BUFFALO_CSE_SELECTORS, BASE)).toThrow(
      'faculty block "Dr. Jane Doe" has no "a.title" link',
    );
  });

  it("fails when the page has no faculty blocks", () => {
    expect(() => parseDirectory("<html><body><p>Moved</p></body></html>", BUFFALO_CSE_SELECTORS, BASE)).toThrow(
      ParseError,
    );
  });
});
