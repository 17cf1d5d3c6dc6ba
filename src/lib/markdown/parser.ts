import type { ContentBlock, TableCell } from "./types";

export interface ParsedMarkdown {
  /** Text of a level-1 heading that opens the document, or "" */
  title: string;
  blocks: ContentBlock[];
}

const HEADING = /^ {0,3}(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;
const LIST_ITEM = /^\s*(?:([-*+])|(\d{1,9})[.)])\s+(.*)$/;
const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})\s*([^`\s]*)/;
const BLOCKQUOTE = /^ {0,3}>\s?(.*)$/;
const THEMATIC_BREAK = /^ {0,3}([-*_])(?:\s*\1){2,}\s*$/;
const TABLE_SEPARATOR = /^\s*\|?\s*:?-+:?\s*(?:\|\s*:?-+:?\s*)*\|?\s*$/;
const IMAGE_LINE = /^!\[((?:\\.|[^\]\\])*)\]\(((?:\\.|[^)\\])*)\)$/;
const LINK_LINE = /^\[((?:\\.|[^\]\\])*)\]\(((?:\\.|[^)\\])*)\)$/;
const ESCAPED = /\\([\\`*_{}[\]()#+\-.!|<>~])/g;

function unescapeMarkdown(text: string): string {
  return text.replace(ESCAPED, "$1");
}

// Drops an optional `"title"` after the link target.
function cleanTarget(raw: string): string {
  const [target = ""] = raw.trim().split(/\s+(?=["'])/);
  return unescapeMarkdown(target.replace(/^<(.*)>$/, "$1"));
}

function splitTableRow(line: string): TableCell[] {
  const trimmed = line.trim().replace(/^\|/, "").replace(/(?<!\\)\|$/, "");
  return trimmed
    .split(/(?<!\\)\|/)
    .map((cell) => cell.trim().replace(/\\\|/g, "|"));
}

function isTableStart(lines: string[], i: number): boolean {
  const next = lines[i + 1];
  return (
    lines[i].includes("|") &&
    next !== undefined &&
    next.includes("-") &&
    TABLE_SEPARATOR.test(next)
  );
}

function startsBlock(lines: string[], i: number): boolean {
  const line = lines[i];
  return (
    HEADING.test(line) ||
    FENCE_OPEN.test(line) ||
    BLOCKQUOTE.test(line) ||
    THEMATIC_BREAK.test(line) ||
    LIST_ITEM.test(line) ||
    isTableStart(lines, i)
  );
}

/**
 * Read Markdown text back into content blocks. Only the block structure is
 * recognized; inline markup stays in the text as written.
 */
export function parseMarkdown(markdown: string): ParsedMarkdown {
  const lines = markdown.replace(/^\uFEFF/, "").split(/\r?\n/);
  const blocks: ContentBlock[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];

    if (!line.trim()) {
      i++;
      continue;
    }

    const fence = FENCE_OPEN.exec(line);
    if (fence) {
      const marker = fence[1];
      const closing = new RegExp(`^ {0,3}${marker[0]}{${marker.length},}\\s*$`);
      const code: string[] = [];
      i++;
      while (i < lines.length && !closing.test(lines[i])) {
        code.push(lines[i]);
        i++;
      }
      i++; // closing fence, or past the end when unclosed
      blocks.push({ type: "code", code: code.join("\n"), language: fence[2] });
      continue;
    }

    if (THEMATIC_BREAK.test(line)) {
      blocks.push({ type: "horizontal_rule" });
      i++;
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      const text = heading[2].trim();
      if (text) {
        blocks.push({ type: "heading", level: heading[1].length, text });
      }
      i++;
      continue;
    }

    const listItem = LIST_ITEM.exec(line);
    if (listItem) {
      const ordered = listItem[2] !== undefined;
      const items: string[] = [];
      let match: RegExpExecArray | null = listItem;
      while (match) {
        items.push(match[3].trim());
        i++;
        match = i < lines.length ? LIST_ITEM.exec(lines[i]) : null;
      }
      blocks.push({ type: "list", items, ordered });
      continue;
    }

    if (BLOCKQUOTE.test(line)) {
      const quoted: string[] = [];
      let match = BLOCKQUOTE.exec(line);
      while (match) {
        quoted.push(match[1]);
        i++;
        match = i < lines.length ? BLOCKQUOTE.exec(lines[i]) : null;
      }
      blocks.push({ type: "blockquote", text: quoted.join("\n") });
      continue;
    }

    if (isTableStart(lines, i)) {
      const rows: TableCell[][] = [splitTableRow(line)];
      i += 2;
      while (i < lines.length && lines[i].trim() && lines[i].includes("|")) {
        rows.push(splitTableRow(lines[i]));
        i++;
      }
      blocks.push({ type: "table", rows });
      continue;
    }

    const trimmed = line.trim();
    const image = IMAGE_LINE.exec(trimmed);
    if (image) {
      blocks.push({
        type: "image",
        alt: unescapeMarkdown(image[1]),
        src: cleanTarget(image[2]),
      });
      i++;
      continue;
    }

    const link = LINK_LINE.exec(trimmed);
    if (link) {
      blocks.push({
        type: "link",
        text: unescapeMarkdown(link[1]),
        url: cleanTarget(link[2]),
      });
      i++;
      continue;
    }

    const paragraph: string[] = [trimmed];
    i++;
    while (i < lines.length && lines[i].trim() && !startsBlock(lines, i)) {
      paragraph.push(lines[i].trim());
      i++;
    }
    blocks.push({ type: "text", text: paragraph.join("\n") });
  }

  const [first] = blocks;
  if (first?.type === "heading" && first.level === 1) {
    return { title: first.text, blocks: blocks.slice(1) };
  }
  return { title: "", blocks };
}
