import { load } from "cheerio";
import { ParseError } from "../core/errors";
import { createCatalogIndex, CategoryListing } from "../sync/catalogIndex";
import { CatalogIndex, Course, RemoteFileEntry } from "../types";

const SIZE_UNITS: Record<string, number> = {
  b: 1,
  kb: 1024,
  mb: 1024 ** 2,
  gb: 1024 ** 3,
};

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function normalizeUrl(baseUrl: string, href: string): URL {
  return new URL(href, baseUrl);
}

export function parseSize(text: string): number {
  const match = sanitizeText(text).match(/^(\d+(?:[.,]\d+)?)\s*([kmg]?b)$/i);
  if (!match) {
    return 0;
  }
  const value = Number.parseFloat(match[1].replace(",", "."));
  return Math.round(value * SIZE_UNITS[match[2].toLowerCase()]);
}

/** Reads `YYYY-MM-DD HH:mm[:ss]` as UTC and returns it as ISO-8601. */
export function parseTimestamp(text: string): string | undefined {
  const match = sanitizeText(text).match(/^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = match;
  const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second ?? "00"}.000Z`);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

export function parseYears(html: string, pageUrl: string): Record<string, string> {
  const $ = load(html);
  const years: Record<string, string> = {};

  $("a[href*='year=']").each((_, element) => {
    const href = $(element).attr("href");
    const label = sanitizeText($(element).text());
    if (!href || !label) {
      return;
    }
    const yearKey = normalizeUrl(pageUrl, href).searchParams.get("year");
    if (yearKey) {
      years[label] = yearKey;
    }
  });

  return years;
}

export function parseCourses(html: string, pageUrl: string): Course[] {
  const $ = load(html);
  const courses: Course[] = [];
  const seen = new Set<string>();

  $("a[href*='unit=']").each((_, element) => {
    const href = $(element).attr("href");
    const name = sanitizeText($(element).text());
    if (!href || !name) {
      return;
    }

    const params = normalizeUrl(pageUrl, href).searchParams;
    const year = params.get("year");
    const semester = params.get("period");
    const semesterType = params.get("periodType");
    const id = params.get("unit");
    if (!year || !semester || !semesterType || !id) {
      return;
    }

    const key = `${year}/${semester}/${semesterType}/${id}`;
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    courses.push({ year, semester, semesterType, id, name });
  });

  return courses;
}

/** Category links read `<a href="...category=ID">Name</a> (count)`. */
export function parseCategoryIndex(html: string, pageUrl: string): CatalogIndex {
  const $ = load(html);
  const listings: CategoryListing[] = [];

  $("a[href*='category=']").each((_, element) => {
    const href = $(element).attr("href");
    const name = sanitizeText($(element).text());
    if (!href || !name) {
      return;
    }

    const id = normalizeUrl(pageUrl, href).searchParams.get("category");
    if (!id) {
      return;
    }

    const rest = sanitizeText($(element).parent().text()).replace(name, "");
    const countMatch = rest.match(/\((\d+)\)/);
    if (!countMatch) {
      throw new ParseError(`Missing document count for category "${name}" on ${pageUrl}`);
    }
    listings.push({ name, id, count: Number.parseInt(countMatch[1], 10) });
  });

  return createCatalogIndex(listings);
}

/** File rows hold the download link, the modification time and the size, in that order. */
export function parseCategoryFiles(html: string, pageUrl: string): RemoteFileEntry[] {
  const $ = load(html);
  const entries: RemoteFileEntry[] = [];

  $("tr").each((_, row) => {
    const cells = $(row).children("td");
    const link = cells.first().find("a[href*='download']").first();
    const href = link.attr("href");
    if (cells.length < 3 || !href) {
      return;
    }

    const name = sanitizeText(link.text());
    const modifiedAt = parseTimestamp(cells.eq(1).text());
    if (!name || !modifiedAt) {
      throw new ParseError(`Malformed file row "${sanitizeText($(row).text())}" on ${pageUrl}`);
    }

    entries.push({
      name,
      url: normalizeUrl(pageUrl, href).toString(),
      size: parseSize(cells.eq(2).text()),
      modifiedAt,
    });
  });

  return entries;
}
