import { MarkdownGenerationError } from "../errors";
import type { ContentBlock, ParsedDocument, TableCell } from "./types";

export interface GenerateOptions {
  /** Raise headings that skip a level (h1 → h3 becomes h1 → h2) */
  normalizeHeadings?: boolean;
  /** Render paragraphs made only of `key: value` lines as bullet lists */
  detectLists?: boolean;
}

const MIN_HEADING_LEVEL = 1;
const MAX_HEADING_LEVEL = 6;
const KEY_VALUE_MAX_LENGTH = 100;
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

export function clampHeadingLevel(level: number): number {
  if (!Number.isFinite(level)) return MIN_HEADING_LEVEL;
  return Math.min(MAX_HEADING_LEVEL, Math.max(MIN_HEADING_LEVEL, Math.trunc(level)));
}

export function stripHeadingMarkers(text: string): string {
  return text.trim().replace(/^#+\s*/, "").trim();
}

// Escapes only characters that are not already preceded by a backslash.
export function escapeLinkText(text: string): string {
  return text.replace(/(?<!\\)([[\]])/g, "\\$1");
}

export function escapeLinkTarget(url: string): string {
  return url.replace(/(?<!\\)([()])/g, "\\$1");
}

export function formatTableCell(cell: TableCell): string {
  if (cell === null || cell === undefined) return "";
  if (cell instanceof Date) {
    return Number.isNaN(cell.getTime()) ? "" : cell.toISOString();
  }
  return String(cell);
}

export function escapeTableCell(cell: TableCell): string {
  return formatTableCell(cell)
    .replace(/\r\n|\r|\n/g, "<br>")
    .replace(/(?<!\\)\|/g, "\\|");
}

export function renderList(items: string[], ordered: boolean): string[] {
  const clean = items
    .map((item) => item.replace(/\s*\r?\n\s*/g, " ").trim())
    .filter((item) => item.length > 0);
  return clean.map((item, index) =>
    ordered ? `${index + 1}. ${item}` : `- ${item}`,
  );
}

export function renderTable(rows: TableCell[][]): string[] {
  const [header, ...body] = rows;
  if (!header || header.length === 0) return [];

  const width = header.length;
  const toLine = (cells: string[]) => `| ${cells.join(" | ")} |`;

  return [
    toLine(header.map(escapeTableCell)),
    toLine(Array.from({ length: width }, () => "---")),
    ...body.map((row) =>
      toLine(Array.from({ length: width }, (_, i) => escapeTableCell(row[i]))),
    ),
  ];
}

export function renderCodeBlock(code: string, language = ""): string[] {
  const body = code.trimEnd();
  if (!body.trim()) return [];

  const runs = body.match(/`+/g) ?? [];
  const longestRun = runs.reduce((max, run) => Math.max(max, run.length), 0);
  const fence = "`".repeat(Math.max(3, longestRun + 1));
  return [`${fence}${language.trim()}`, body, fence];
}

export function renderBlockquote(text: string): string[] {
  const body = text.trimEnd();
  if (!body.trim()) return [];
  return body
    .split(/\r?\n/)
    .map((line) => (line.trim() ? `> ${line}` : ">"));
}

function toKeyValueItem(line: string): string | null {
  if (line.length >= KEY_VALUE_MAX_LENGTH || URL_SCHEME.test(line)) return null;
  const idx = line.indexOf(":");
  if (idx < 0) return null;
  const key = line.slice(0, idx).trim();
  const value = line.slice(idx + 1).trim();
  if (!key || !value) return null;
  return `${key}: ${value}`;
}

export function renderParagraph(text: string, detectLists = true): string[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length === 0) return [];

  if (detectLists) {
    const items = lines.map(toKeyValueItem);
    if (items.every((item): item is string => item !== null)) {
      return items.map((item) => `- ${item}`);
    }
  }

  return [lines.join("  \n")];
}

/**
 * Tracks the last emitted heading level so headings never skip a level
 * on the way down.
 */
class HeadingLevels {
  private current = MIN_HEADING_LEVEL;

  constructor(private readonly normalize: boolean) {}

  next(level: number): number {
    let resolved = clampHeadingLevel(level);
    if (this.normalize && resolved > this.current + 1) {
      resolved = this.current + 1;
    }
    this.current = resolved;
    return resolved;
  }
}

function renderHeading(text: string, level: number, levels: HeadingLevels): string[] {
  const clean = stripHeadingMarkers(text);
  if (!clean) return [];
  return [`${"#".repeat(levels.next(level))} ${clean}`];
}

function renderBlock(
  block: ContentBlock,
  levels: HeadingLevels,
  detectLists: boolean,
): string[] {
  switch (block.type) {
    case "heading":
      return renderHeading(block.text, block.level, levels);
    case "text":
      return renderParagraph(block.text, detectLists);
    case "list":
      return renderList(block.items, block.ordered);
    case "table":
      return renderTable(block.rows);
    case "image": {
      if (!block.src) return [];
      const alt = block.alt || "Image";
      return [`![${escapeLinkText(alt)}](${escapeLinkTarget(block.src)})`];
    }
    case "code":
      return renderCodeBlock(block.code, block.language);
    case "link": {
      if (!block.url) return [];
      const text = block.text || block.url;
      return [`[${escapeLinkText(text)}](${escapeLinkTarget(block.url)})`];
    }
    case "blockquote":
      return renderBlockquote(block.text);
    case "horizontal_rule":
      return ["---"];
    default: {
      const exhaustive: never = block;
      throw new Error(`Unknown block: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function render(doc: ParsedDocument, options: GenerateOptions): string {
  const levels = new HeadingLevels(options.normalizeHeadings ?? true);
  const detectLists = options.detectLists ?? true;
  const lines: string[] = [];

  const push = (rendered: string[]) => {
    if (rendered.length === 0) return;
    lines.push(...rendered, "");
  };

  push(renderHeading(doc.title, doc.titleLevel ?? 1, levels));
  for (const block of doc.blocks) {
    push(renderBlock(block, levels, detectLists));
  }

  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}

/**
 * Render a parsed document as GitHub-flavored Markdown. Every block is
 * followed by one blank line and the result ends with a single newline.
 */
export function generateMarkdown(
  doc: ParsedDocument,
  options: GenerateOptions = {},
): string {
  try {
    return render(doc, options);
  } catch (error) {
    throw new MarkdownGenerationError(error);
  }
}
