import { describe, expect, it } from "@jest/globals";
import {
  formatDate,
  parseDate,
  parseDocument,
  serializeDocument,
} from "../src/core/post/front-matter";
import { ParseError } from "../src/core/errors";

const POST = [
  "---",
  "title: Hello",
  "date: 2024-05-01 10:00:00",
  "tags:",
  "- a",
  "- b",
  "---",
  "Body",
  "",
].join("\n");

describe("parseDocument", () => {
  it("splits front matter from the body", () => {
    const doc = parseDocument(POST, "hello.md");

    expect(doc.frontMatter.keys()).toEqual(["title", "date", "tags"]);
    expect(doc.frontMatter.getString("title")).toBe("Hello");
    expect(doc.frontMatter.entries()[2]).toEqual({ key: "tags", value: "", block: ["- a", "- b"] });
    expect(doc.body).toBe("Body\n");
  });

  it("serializes an untouched document back to the same text", () => {
    expect(serializeDocument(parseDocument(POST))).toBe(POST);
  });

  it("normalizes CRLF line endings", () => {
    const doc = parseDocument("---\r\ntitle: Hi\r\n---\r\ntext\r\n");
    expect(doc.frontMatter.getString("title")).toBe("Hi");
    expect(doc.body).toBe("text\n");
  });

  it("unquotes quoted values", () => {
    const doc = parseDocument(`---\ntitle: "Hi: there"\nalt: 'it''s'\n---\n`);
    expect(doc.frontMatter.getString("title")).toBe("Hi: there");
    expect(doc.frontMatter.getString("alt")).toBe("it's");
  });

  it("requires an opening delimiter", () => {
    expect(() => parseDocument("title: Hi\n---\n", "post.md")).toThrow(
      "Could not parse post.md: front matter must start with a --- line"
    );
  });

  it("requires a closing delimiter", () => {
    expect(() => parseDocument("---\ntitle: Hi\n", "post.md")).toThrow(
      "Could not parse post.md: front matter is not closed by a --- line"
    );
  });

  it("rejects lines that are not key: value pairs", () => {
    expect(() => parseDocument("---\ntitle: Hi\nnot a pair\n---\n", "post.md")).toThrow(
      'Could not parse post.md: line 3 is not a "key: value" pair'
    );
  });

  it("rejects duplicate keys", () => {
    expect(() => parseDocument("---\ntitle: A\ntitle: B\n---\n")).toThrow(ParseError);
  });

  it("rejects an indented line before any key", () => {
    expect(() => parseDocument("---\n  stray\ntitle: A\n---\n", "post.md")).toThrow(
      "Could not parse post.md: line 2 is indented but no key precedes it"
    );
  });
});

describe("FrontMatter", () => {
  it("appends keys that are absent", () => {
    const doc = parseDocument("---\ntitle: Hi\n---\n");
    doc.frontMatter.set("draft", false);
    expect(serializeDocument(doc)).toBe("---\ntitle: Hi\ndraft: false\n---\n");
  });

  it("replaces a value in place and drops its block lines", () => {
    const doc = parseDocument(POST);
    doc.frontMatter.set("tags", "single");
    expect(serializeDocument(doc)).toBe(
      "---\ntitle: Hello\ndate: 2024-05-01 10:00:00\ntags: single\n---\nBody\n"
    );
  });

  it("keeps the original line when the value does not change", () => {
    const doc = parseDocument("---\ntitle:   Hello\n---\n");
    doc.frontMatter.set("title", "Hello");
    expect(doc.frontMatter.toLines()).toEqual(["title:   Hello"]);
  });

  it("quotes values that would not read back as strings", () => {
    const doc = parseDocument("---\ntitle: x\n---\n");
    doc.frontMatter.set("title", "Hello: World");
    doc.frontMatter.set("code", "404");
    expect(doc.frontMatter.toLines()).toEqual(['title: "Hello: World"', 'code: "404"']);
  });

  it("reads booleans and rejects anything else", () => {
    const doc = parseDocument("---\na: true\nb: no\nc: maybe\nd:\n---\n", "flags.md");
    expect(doc.frontMatter.getBoolean("a")).toBe(true);
    expect(doc.frontMatter.getBoolean("b")).toBe(false);
    expect(doc.frontMatter.getBoolean("d")).toBeUndefined();
    expect(doc.frontMatter.getBoolean("missing")).toBeUndefined();
    expect(() => doc.frontMatter.getBoolean("c")).toThrow(
      'Could not parse flags.md: "c" must be true or false, got "maybe"'
    );
  });

  it("rejects dates that do not exist", () => {
    const doc = parseDocument("---\ndate: 2024-02-31\n---\n", "post.md");
    expect(() => doc.frontMatter.getDate("date")).toThrow(
      'Could not parse post.md: "date" is not a date: "2024-02-31"'
    );
  });

  it("removes keys", () => {
    const doc = parseDocument("---\na: 1\nb: 2\n---\n");
    expect(doc.frontMatter.remove("a")).toBe(true);
    expect(doc.frontMatter.remove("a")).toBe(false);
    expect(doc.frontMatter.keys()).toEqual(["b"]);
  });
});

describe("dates", () => {
  it("formats local time as YYYY-MM-DD HH:mm:ss", () => {
    expect(formatDate(new Date(2024, 0, 5, 7, 8, 9))).toBe("2024-01-05 07:08:09");
  });

  it("parses dates with or without a time", () => {
    expect(parseDate("2024-05-01")).toEqual(new Date(2024, 4, 1, 0, 0, 0));
    expect(parseDate("2024-05-01T10:20")).toEqual(new Date(2024, 4, 1, 10, 20, 0));
    expect(parseDate("yesterday")).toBeNull();
  });

  it("reads ISO-8601 timestamps with a zone as that instant", () => {
    const instant = new Date(Date.UTC(2024, 4, 1, 10, 0, 0));
    expect(parseDate("2024-05-01T10:00:00Z")).toEqual(instant);
    expect(parseDate("2024-05-01T18:00:00+08:00")).toEqual(instant);
    expect(parseDate("2024-05-01T05:00:00.250-0500")).toEqual(instant);
  });

  it("still rejects rollovers when a zone is given", () => {
    expect(parseDate("2024-02-30T10:00:00Z")).toBeNull();
  });
});
