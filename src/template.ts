import { TemplateError } from "./errors.js";

type TemplatePart = { text: string } | { name: string };

export type Template = {
  source: string;
  parts: readonly TemplatePart[];
};

export type TemplateVars = Record<string, string>;

const NAME = /^[A-Za-z_][\w-]*(?:\.[A-Za-z_][\w-]*)*$/;

function lineAt(source: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) if (source.charCodeAt(i) === 10) line++;
  return line;
}

/**
 * Compile `{{ name }}` slots. Anything outside a slot is copied verbatim.
 * `lineOffset` shifts reported line numbers, for sources that followed a
 * front-matter block.
 */
export function compileTemplate(source: string, filePath?: string, lineOffset = 0): Template {
  const parts: TemplatePart[] = [];
  let pos = 0;

  while (pos < source.length) {
    const open = source.indexOf("{{", pos);
    if (open === -1) {
      parts.push({ text: source.slice(pos) });
      break;
    }
    if (open > pos) parts.push({ text: source.slice(pos, open) });

    const close = source.indexOf("}}", open + 2);
    const line = lineAt(source, open) + lineOffset;
    if (close === -1) throw new TemplateError("unclosed \"{{\"", filePath, line);

    const expr = source.slice(open + 2, close).trim();
    if (!expr) throw new TemplateError("empty template expression", filePath, line);
    if (!NAME.test(expr)) throw new TemplateError(`invalid template expression "${expr}"`, filePath, line);

    parts.push({ name: expr });
    pos = close + 2;
  }

  return { source, parts };
}

/** Substitute slots; names without a value render as "". Values are used as given. */
export function renderTemplate(template: Template, vars: TemplateVars): string {
  let out = "";
  for (const p of template.parts) {
    out += "text" in p ? p.text : vars[p.name] ?? "";
  }
  return out;
}

export function escapeHtml(s: string): string {
  return s.replace(/[&<"'>]/g, c => {
    switch (c) {
      case "&": return "&amp;";
      case "<": return "&lt;";
      case ">": return "&gt;";
      case '"': return "&quot;";
      default: return "&#39;";
    }
  });
}
