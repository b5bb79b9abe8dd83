import {
  Marked,
  type RendererThis,
  type Token,
  type Tokens,
  type TokenizerAndRendererExtension,
  type TokenizerThis,
} from "marked";
import { escapeHtml } from "./template.js";
import { applyBaseToHtml, prettyHref } from "./paths.js";

export type MarkdownRenderer = (markdown: string) => string;

const CALLOUT_TITLES = {
  note: "Note",
  tip: "Tip",
  warning: "Warning",
} as const;
type CalloutType = keyof typeof CALLOUT_TITLES;

function isCalloutType(v: unknown): v is CalloutType {
  return typeof v === "string" && Object.prototype.hasOwnProperty.call(CALLOUT_TITLES, v);
}

function str(v: unknown): string {
  return typeof v === "string" ? v : "";
}

/**
 * Site-internal link macro:
 *
 *   [[link:/guides/setup|Setting up]]
 *   [[link:about]]              // label defaults to the path
 *
 * Hrefs are root-relative here; the base path is applied with the rest of
 * the document.
 */
const internalLink: TokenizerAndRendererExtension = {
  name: "internalLink",
  level: "inline",
  start(src: string) {
    const i = src.indexOf("[[link:");
    return i >= 0 ? i : undefined;
  },
  tokenizer(src: string): Tokens.Generic | undefined {
    const m = /^\[\[link:([^\]|]+?)(?:\|([^\]]+))?\]\]/.exec(src);
    if (!m) return undefined;
    return { type: "internalLink", raw: m[0], target: (m[1] ?? "").trim(), label: (m[2] ?? "").trim() };
  },
  renderer(token: Tokens.Generic) {
    let target = str(token.target);
    if (!target) return "";
    if (!target.startsWith("/")) target = "/" + target;
    const text = str(token.label) || target.replace(/^\//, "");
    return `<a class="internal-link" href="${escapeHtml(prettyHref("/", target))}">${escapeHtml(text)}</a>`;
  },
};

/**
 * Callout block. Leading key/value lines set `type` (note|tip|warning) and
 * `title`; the rest is the Markdown body.
 *
 * ```callout
 * type: warning
 * title: Careful
 * Back up `_config.yml` first.
 * ```
 */
const callout: TokenizerAndRendererExtension = {
  name: "calloutFence",
  level: "block",
  start(src: string) {
    const m = src.match(/```callout/);
    return m ? m.index : undefined;
  },
  tokenizer(this: TokenizerThis, src: string): Tokens.Generic | undefined {
    const m = /^```callout[ \t]*\n([\s\S]*?)\n```[ \t]*(?:\n|$)/.exec(src);
    if (!m) return undefined;
    let calloutType: CalloutType = "note";
    let title = "";
    const bodyLines: string[] = [];
    let inHeader = true;
    for (const line of (m[1] ?? "").split("\n")) {
      const kv = inHeader ? /^(\w+)\s*:\s*(.+)$/.exec(line.trim()) : null;
      const key = kv?.[1]?.toLowerCase();
      const val = kv?.[2]?.trim() ?? "";
      if (key === "type" && isCalloutType(val)) calloutType = val;
      else if (key === "title") title = val;
      else {
        inHeader = false;
        bodyLines.push(line);
      }
    }
    const tokens: Token[] = [];
    this.lexer.blockTokens(bodyLines.join("\n").trim(), tokens);
    return { type: "calloutFence", raw: m[0], calloutType, title, tokens };
  },
  renderer(this: RendererThis, token: Tokens.Generic) {
    const kind: CalloutType = isCalloutType(token.calloutType) ? token.calloutType : "note";
    const title = str(token.title) || CALLOUT_TITLES[kind];
    const bodyHtml = this.parser.parse(token.tokens ?? []);
    return `<div class="callout ${kind}"><div class="callout-title">${escapeHtml(title)}</div><div class="callout-body">${bodyHtml}</div></div>\n`;
  },
};

/**
 * Markdown renderer bound to a base path. Root-relative links in the output
 * are rewritten under the base.
 */
export function createMarkdownRenderer(basePath: string): MarkdownRenderer {
  const marked = new Marked({ async: false, gfm: true });
  marked.use({ extensions: [internalLink, callout] });

  return (markdown: string) => {
    const html = marked.parse(markdown, { async: false });
    if (typeof html !== "string") throw new Error("markdown rendering must be synchronous");
    return applyBaseToHtml(basePath, html);
  };
}
