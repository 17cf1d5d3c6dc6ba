import type { ContentBlock } from "../markdown/types";

const HEADING_LINE = /^(#+)\s+(.+)$/;
const LIST_LINE = /^(?:[-*+]|(\d+)\.)\s+(.+)$/;

/**
 * Split loosely formatted plain text (a .txt file, OCR output) into blocks:
 * `#` lines become headings, runs of bullet or numbered lines become lists,
 * everything else is grouped into paragraphs separated by blank lines.
 */
export function structureText(text: string): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  let paragraph: string[] = [];
  let listItems: string[] = [];
  let listOrdered = false;

  const flushParagraph = () => {
    if (paragraph.length > 0) {
      blocks.push({ type: "text", text: paragraph.join("\n") });
      paragraph = [];
    }
  };
  const flushList = () => {
    if (listItems.length > 0) {
      blocks.push({ type: "list", items: listItems, ordered: listOrdered });
      listItems = [];
    }
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line) {
      flushParagraph();
      flushList();
      continue;
    }

    const heading = HEADING_LINE.exec(line);
    if (heading) {
      flushParagraph();
      flushList();
      blocks.push({ type: "heading", level: heading[1].length, text: heading[2].trim() });
      continue;
    }

    const item = LIST_LINE.exec(line);
    if (item) {
      flushParagraph();
      const ordered = item[1] !== undefined;
      if (listItems.length > 0 && ordered !== listOrdered) {
        flushList();
      }
      listOrdered = ordered;
      listItems.push(item[2].trim());
      continue;
    }

    flushList();
    paragraph.push(line);
  }

  flushParagraph();
  flushList();
  return blocks;
}
