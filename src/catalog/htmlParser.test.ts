import { describe, expect, it } from "vitest";
import { ParseError } from "../core/errors";
import { parseCategoryFiles, parseCategoryIndex, parseCourses, parseSize, parseTimestamp, parseYears } from "./htmlParser";

const BASE = "https://catalog.test/";

describe("parseSize", () => {
  it("converts sizes with units to bytes", () => {
    expect(parseSize("512 B")).toBe(512);
    expect(parseSize("2 KB")).toBe(2048);
    expect(parseSize("1,5 MB")).toBe(1572864);
    expect(parseSize(" 1.5 mb ")).toBe(1572864);
    expect(parseSize("1 GB")).toBe(1073741824);
  });

  it("returns zero for unknown formats", () => {
    expect(parseSize("")).toBe(0);
    expect(parseSize("large")).toBe(0);
  });
});

describe("parseTimestamp", () => {
  it("reads dates with and without seconds as UTC", () => {
    expect(parseTimestamp("2024-03-01 14:05")).toBe("2024-03-01T14:05:00.000Z");
    expect(parseTimestamp("2024-03-01 14:05:09")).toBe("2024-03-01T14:05:09.000Z");
  });

  it("rejects other formats", () => {
    expect(parseTimestamp("01/03/2024")).toBeUndefined();
    expect(parseTimestamp("2024-13-45 99:99")).toBeUndefined();
  });
});

describe("parseYears", () => {
  it("maps year labels to year keys", () => {
    const html = `
      <ul>
        <li><a href="courses?year=2023">2022/23</a></li>
        <li><a href="/courses?year=2024"> 2023/24 </a></li>
        <li><a href="help">Help</a></li>
      </ul>`;

    expect(parseYears(html, `${BASE}years`)).toEqual({ "2022/23": "2023", "2023/24": "2024" });
  });
});

describe("parseCourses", () => {
  it("reads courses from unit links and ignores duplicates and incomplete links", () => {
    const html = `
      <table>
        <tr><td><a href="documents?year=2024&period=1&periodType=s&unit=101">Algorithms</a></td></tr>
        <tr><td><a href="documents?year=2024&period=1&periodType=s&unit=101">Algorithms</a></td></tr>
        <tr><td><a href="documents?year=2024&period=2&periodType=t&unit=202">Data   Bases</a></td></tr>
        <tr><td><a href="documents?year=2024&unit=303">Broken</a></td></tr>
      </table>`;

    expect(parseCourses(html, `${BASE}courses?year=2024`)).toEqual([
      { year: "2024", semester: "1", semesterType: "s", id: "101", name: "Algorithms" },
      { year: "2024", semester: "2", semesterType: "t", id: "202", name: "Data Bases" },
    ]);
  });
});

describe("parseCategoryIndex", () => {
  it("reads counts and identifiers and drops empty categories", () => {
    const html = `
      <ul>
        <li><a href="documents?unit=101&category=0ac">Slides</a> (3)</li>
        <li><a href="documents?unit=101&category=1e">Exercises</a> (1)</li>
        <li><a href="documents?unit=101&category=2x">Exams</a> (0)</li>
      </ul>`;

    expect(parseCategoryIndex(html, `${BASE}documents?unit=101`)).toEqual({
      counts: { Slides: 3, Exercises: 1 },
      categoryIds: { Slides: "0ac", Exercises: "1e" },
    });
  });

  it("returns an empty index for a page without categories", () => {
    expect(parseCategoryIndex("<p>No documents</p>", BASE)).toEqual({ counts: {}, categoryIds: {} });
  });

  it("fails when a category has no count", () => {
    const html = `<p><a href="documents?category=0ac">Slides</a></p>`;
    expect(() => parseCategoryIndex(html, BASE)).toThrow(ParseError);
  });
});

describe("parseCategoryFiles", () => {
  it("reads file rows and skips header rows", () => {
    const html = `
      <table>
        <tr><th>Name</th><th>Date</th><th>Size</th></tr>
        <tr>
          <td><a href="/download?file=9">Lecture 1.pdf</a></td>
          <td>2024-03-01 14:05</td>
          <td>1,5 MB</td>
        </tr>
        <tr>
          <td><a href="download?file=10">notes.txt</a></td>
          <td>2024-03-02 09:00:30</td>
          <td>12 KB</td>
        </tr>
      </table>`;

    expect(parseCategoryFiles(html, `${BASE}documents?category=0ac`)).toEqual([
      {
        name: "Lecture 1.pdf",
        url: "https://catalog.test/download?file=9",
        size: 1572864,
        modifiedAt: "2024-03-01T14:05:00.000Z",
      },
      {
        name: "notes.txt",
        url: "https://catalog.test/download?file=10",
        size: 12288,
        modifiedAt: "2024-03-02T09:00:30.000Z",
      },
    ]);
  });

  it("fails on a row without a readable date", () => {
    const html = `<table><tr><td><a href="download?file=1">a.pdf</a></td><td>yesterday</td><td>1 KB</td></tr></table>`;
    expect(() => parseCategoryFiles(html, BASE)).toThrow(ParseError);
  });
});
