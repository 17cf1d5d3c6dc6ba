import { PDF_EXTENSIONS } from "../../config";
import type { ContentBlock } from "../markdown/types";
import { extractTitle } from "./base";
import type { DocumentParser } from "./types";

interface TextItem {
  str: string;
  transform: number[];
}

function isTextItem(item: unknown): item is TextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform)
  );
}

/**
 * Join pdf.js text items into lines: items sharing a baseline stay on one
 * line, a new baseline starts a new one.
 */
export function pageText(content: unknown): string {
  if (typeof content !== "object" || content === null || !("items" in content)) {
    return "";
  }
  const items = Array.isArray(content.items) ? content.items.filter(isTextItem) : [];

  let text = "";
  let lastY: number | undefined;
  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

function documentTitle(info: unknown): string | null {
  if (
    typeof info === "object" &&
    info !== null &&
    "Title" in info &&
    typeof info.Title === "string" &&
    info.Title.trim()
  ) {
    return info.Title.trim();
  }
  return null;
}

function paragraphs(text: string): ContentBlock[] {
  return text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0)
    .map((paragraph): ContentBlock => ({ type: "text", text: paragraph }));
}

export const pdfParser: DocumentParser = {
  name: "pdf",
  extensions: PDF_EXTENSIONS,
  async parse(filePath, buffer, { settings }) {
    // Loaded on demand: pdf-parse pulls in a full copy of pdf.js.
    const { default: pdfParse } = await import("pdf-parse");

    // pdf-parse renders pages one after another, so push order is page order.
    const pages: string[] = [];
    const result = await pdfParse(buffer, {
      // Awaited by pdf-parse even though its typings declare a string.
      pagerender: (pageData) =>
        pageData.getTextContent().then((content: unknown) => {
          const text = pageText(content);
          pages.push(text);
          return text;
        }),
    });

    const blocks: ContentBlock[] = [];
    if (pages.length === 0) {
      blocks.push(...paragraphs(result.text));
    }
    pages.forEach((page, index) => {
      if (settings.pageHeadings) {
        blocks.push({ type: "heading", level: 2, text: `Page ${index + 1}` });
      }
      blocks.push(...paragraphs(page));
    });

    return {
      title: documentTitle(result.info) ?? extractTitle(filePath),
      blocks,
    };
  },
};
