import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadContent, parseDocument, parseFrontMatter } from "./content.js";
import { IOError, ParseError } from "./errors.js";
import { makeSite, removeSite } from "./test-helpers.js";

const opts = { defaultLayout: "default", drafts: false };

describe("parseFrontMatter", () => {
  it("splits metadata from the body", () => {
    const { meta, body } = parseFrontMatter("---\nlayout: post\ntitle: X\n---\nhello", "a.md");
    expect(meta).toEqual({ layout: "post", title: "X" });
    expect(body).toBe("hello");
  });

  it("treats a file without a header as body only", () => {
    const { meta, body } = parseFrontMatter("# Heading\n\ntext", "a.md");
    expect(meta).toEqual({});
    expect(body).toBe("# Heading\n\ntext");
  });

  it("rejects an unterminated header block", () => {
    expect(() => parseFrontMatter("---\ntitle: X\nhello", "a.md")).toThrow(ParseError);
    expect(() => parseFrontMatter("---\ntitle: X\nhello", "a.md")).toThrow("unterminated front matter block");
  });

  it("rejects invalid YAML", () => {
    expect(() => parseFrontMatter("---\ntitle: [unclosed\n---\nbody", "a.md")).toThrow(ParseError);
  });

  it("rejects a header that is not a mapping", () => {
    expect(() => parseFrontMatter("---\n- a\n- b\n---\nbody", "a.md")).toThrow("front matter must be a mapping");
  });

  it("reads YAML dates as Date values", () => {
    const { meta } = parseFrontMatter("---\ndate: 2023-03-16\n---\n", "a.md");
    expect(meta.date).toEqual(new Date("2023-03-16T00:00:00Z"));
  });
});

describe("parseDocument", () => {
  it("derives slug, url, title and layout defaults", () => {
    const doc = parseDocument("guides/setup.md", "body", "/c/guides/setup.md", opts);
    expect(doc.id).toBe("guides/setup");
    expect(doc.slug).toBe("setup");
    expect(doc.urlPath).toBe("/guides/setup");
    expect(doc.title).toBe("setup");
    expect(doc.layout).toBe("default");
    expect(doc.date).toBeNull();
    expect(doc.body).toBe("body");
  });

  it("takes the date and slug from a dated file name", () => {
    const doc = parseDocument("posts/2023-03-16-android-architecture.md", "---\ntitle: Arch\n---\n", "/c/x.md", opts);
    expect(doc.slug).toBe("android-architecture");
    expect(doc.urlPath).toBe("/posts/android-architecture");
    expect(doc.date).toEqual(new Date("2023-03-16T00:00:00Z"));
  });

  it("prefers metadata date over the file name", () => {
    const doc = parseDocument("2023-03-16-post.md", "---\ndate: 2024-01-02\n---\n", "/c/x.md", opts);
    expect(doc.date).toEqual(new Date("2024-01-02T00:00:00Z"));
  });

  it("keeps the file name date when the metadata date is blank", () => {
    const quoted = parseDocument("2023-03-16-post.md", '---\ndate: ""\n---\n', "/c/x.md", opts);
    expect(quoted.date).toEqual(new Date("2023-03-16T00:00:00Z"));
    const empty = parseDocument("2023-03-16-post.md", "---\ndate:\n---\n", "/c/x.md", opts);
    expect(empty.date).toEqual(new Date("2023-03-16T00:00:00Z"));
    expect(parseDocument("post.md", '---\ndate: ""\n---\n', "/c/x.md", opts).date).toBeNull();
  });

  it("reads dates without a zone as UTC", () => {
    const doc = parseDocument("a.md", '---\ndate: "2023-03-16 10:00"\n---\n', "/c/a.md", opts);
    expect(doc.date?.toISOString()).toBe("2023-03-16T10:00:00.000Z");
    const withSeconds = parseDocument("a.md", '---\ndate: "2023-03-16T23:30:15"\n---\n', "/c/a.md", opts);
    expect(withSeconds.date?.toISOString()).toBe("2023-03-16T23:30:15.000Z");
    const zoned = parseDocument("a.md", '---\ndate: "2023-03-16T10:00:00+02:00"\n---\n', "/c/a.md", opts);
    expect(zoned.date?.toISOString()).toBe("2023-03-16T08:00:00.000Z");
  });

  it("rejects calendar dates that do not exist", () => {
    expect(() => parseDocument("a.md", '---\ndate: "2023-02-30"\n---\n', "/c/a.md", opts)).toThrow(
      '"date" is not a valid date: 2023-02-30'
    );
  });

  it("maps index documents to their directory", () => {
    expect(parseDocument("index.md", "", "/c/index.md", opts).urlPath).toBe("/");
    expect(parseDocument("guides/index.md", "", "/c/guides/index.md", opts).urlPath).toBe("/guides");
  });

  it("honours slug and permalink overrides", () => {
    expect(parseDocument("a/b.md", "---\nslug: custom\n---\n", "/c/a/b.md", opts).urlPath).toBe("/a/custom");
    expect(parseDocument("a/b.md", "---\npermalink: /about/\n---\n", "/c/a/b.md", opts).urlPath).toBe("/about");
  });

  it("rejects an unparseable date", () => {
    expect(() => parseDocument("a.md", "---\ndate: someday\n---\n", "/c/a.md", opts)).toThrow(ParseError);
  });

  it("rejects a non-string layout", () => {
    expect(() => parseDocument("a.md", "---\nlayout: [x]\n---\n", "/c/a.md", opts)).toThrow('"layout" must be a string');
  });
});

describe("loadContent", () => {
  let root: string | undefined;
  afterEach(() => {
    if (root) removeSite(root);
    root = undefined;
  });

  it("loads valid documents and reports broken ones", () => {
    root = makeSite({
      "content/good.md": "---\ntitle: Good\n---\nok",
      "content/bad.md": "---\ntitle: Bad\nno end",
      "content/notes.txt": "ignored",
      "content/.hidden/secret.md": "ignored",
    });
    const { documents, failures } = loadContent(path.join(root, "content"), opts);

    expect(documents.map(d => d.title)).toEqual(["Good"]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.filePath).toBe(path.join(root, "content", "bad.md"));
    expect(failures[0]?.error).toBeInstanceOf(ParseError);
  });

  it("skips unpublished documents unless drafts are enabled", () => {
    root = makeSite({ "content/draft.md": "---\npublished: false\n---\nwip" });
    const contentDir = path.join(root, "content");
    expect(loadContent(contentDir, opts).documents).toHaveLength(0);
    expect(loadContent(contentDir, { ...opts, drafts: true }).documents).toHaveLength(1);
  });

  it("fails with IOError when the content root is missing", () => {
    root = makeSite({});
    expect(() => loadContent(path.join(root ?? "", "content"), opts)).toThrow(IOError);
  });
});
