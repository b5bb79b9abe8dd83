import type { SiteError } from "./errors.js";

/** Parsed YAML metadata. Values are checked where they are read. */
export type FrontMatter = Record<string, unknown>;

export type Document = {
  /** Path relative to the content root, without extension, "/"-separated */
  id: string;
  sourcePath: string;
  slug: string;
  urlPath: string;
  title: string;
  date: Date | null;
  layout: string;
  order: number;
  published: boolean;
  meta: FrontMatter;
  body: string;
};

export type PageNode = {
  type: "page";
  title: string;
  slug: string;
  path: string;
  sourcePath: string;
  order: number;
};

export type SectionNode = {
  type: "section";
  title: string;
  slug: string;
  path: string;
  order: number;
  indexPage?: PageNode;
  children: Array<SectionNode | PageNode>;
};

export type IndexEntry = {
  id: string;
  title: string;
  urlPath: string;
  date: Date;
  description: string;
};

export type RenderedPage = {
  urlPath: string;
  outputPath: string;
  sourcePath: string;
  html: string;
};

export type OutputFile = {
  path: string;
  contentType: string;
  body: string;
};

export type Site = {
  files: ReadonlyMap<string, OutputFile>;
  index: readonly IndexEntry[];
  nav: SectionNode;
};

export type DocumentFailure = {
  filePath: string;
  error: SiteError;
};
