import type { ContentBlock, TableCell } from "../markdown/types";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function dropImages(blocks: ContentBlock[]): ContentBlock[] {
  return blocks.filter((block) => block.type !== "image");
}

/**
 * Replace whole-word, case-insensitive occurrences of each term with its
 * canonical spelling (e.g. `ble` → `BLE`). Code blocks are left alone.
 */
export function applyTerminology(
  blocks: ContentBlock[],
  terms: Record<string, string>,
): ContentBlock[] {
  const rules = Object.entries(terms)
    .filter(([term]) => term.length > 0)
    .map(([term, canonical]) => ({
      pattern: new RegExp(`\\b${escapeRegExp(term)}\\b`, "gi"),
      canonical,
    }));
  if (rules.length === 0) return blocks;

  const fix = (text: string) =>
    rules.reduce((acc, { pattern, canonical }) => acc.replace(pattern, () => canonical), text);
  const fixCell = (cell: TableCell): TableCell =>
    typeof cell === "string" ? fix(cell) : cell;

  return blocks.map((block): ContentBlock => {
    switch (block.type) {
      case "heading":
      case "text":
      case "blockquote":
        return { ...block, text: fix(block.text) };
      case "list":
        return { ...block, items: block.items.map(fix) };
      case "table":
        return { ...block, rows: block.rows.map((row) => row.map(fixCell)) };
      case "link":
        return { ...block, text: fix(block.text) };
      default:
        return block;
    }
  });
}
