import { describe, expect, it } from "vitest";
import { buildNavTree, findBreadcrumbTitles, renderBreadcrumbs, renderNav } from "./nav.js";
import { makeDocument } from "./test-helpers.js";

const docs = [
  makeDocument({ id: "guides/setup", title: "Setup", urlPath: "/guides/setup" }),
  makeDocument({ id: "guides/index", title: "Guides", urlPath: "/guides", order: 2 }),
  makeDocument({ id: "about", title: "About", order: 1 }),
  makeDocument({ id: "index", title: "Home", urlPath: "/" }),
];

describe("buildNavTree", () => {
  it("groups documents by directory and sorts by order", () => {
    const tree = buildNavTree(docs);
    expect(tree.indexPage?.title).toBe("Home");
    expect(tree.children.map(c => `${c.type}:${c.title}`)).toEqual(["page:About", "section:Guides"]);
  });

  it("names sections without an index document after the directory", () => {
    const tree = buildNavTree([makeDocument({ id: "misc/a" })]);
    const section = tree.children[0];
    expect(section?.type).toBe("section");
    expect(section?.title).toBe("misc");
    expect(section?.type === "section" ? section.indexPage : "unexpected").toBeUndefined();
  });
});

describe("breadcrumbs", () => {
  const tree = buildNavTree(docs);

  it("lists section titles down to the page", () => {
    expect(findBreadcrumbTitles(tree, "/guides/setup")).toEqual(["Guides", "Setup"]);
    expect(findBreadcrumbTitles(tree, "/nowhere")).toEqual([]);
  });

  it("renders escaped crumbs", () => {
    expect(renderBreadcrumbs(tree, "/guides/setup")).toBe(
      '<nav class="breadcrumbs"><span class="crumb">Guides</span> / <span class="crumb">Setup</span></nav>'
    );
    expect(renderBreadcrumbs(tree, "/nowhere")).toBe("");
  });
});

describe("renderNav", () => {
  it("marks the active page and opens its section", () => {
    const html = renderNav(buildNavTree(docs), "/", "/guides/setup");
    expect(html).toBe(
      '<nav class="nav">' +
        '<a class="nav-link nav-home d-0" href="/"><span class="nav-text">Home</span></a>' +
        '<a class="nav-link nav-page d-0" href="/about/"><span class="nav-text">About</span></a>' +
        '<div class="nav-item is-open" data-nav-path="/guides">' +
        '<a class="nav-link nav-section d-0" href="/guides/"><span class="nav-text">Guides</span></a>' +
        '<div class="nav-children">' +
        '<a class="nav-link nav-page d-1" href="/guides/setup/" aria-current="page"><span class="nav-text">Setup</span></a>' +
        "</div></div></nav>"
    );
  });

  it("prefixes links with the base path", () => {
    const html = renderNav(buildNavTree([makeDocument({ id: "about", title: "About" })]), "/notes/");
    expect(html).toBe('<nav class="nav"><a class="nav-link nav-page d-0" href="/notes/about/"><span class="nav-text">About</span></a></nav>');
  });
});
