import mammoth from "mammoth";
import TurndownService from "turndown";
import { gfm } from "turndown-plugin-gfm";
import { WORD_EXTENSIONS } from "../../config";
import { parseMarkdown } from "../markdown/parser";
import { extractTitle } from "./base";
import type { DocumentParser } from "./types";

function createTurndown(): TurndownService {
  const service = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "-",
  });
  service.use(gfm);
  return service;
}

/**
 * The gfm plugin only renders tables whose first row holds header cells and
 * leaves the rest as raw HTML. Word tables rarely mark a header row, and
 * mammoth wraps every cell's text in <p>, which would split Markdown rows.
 */
export function prepareTablesForMarkdown(html: string): string {
  return html.replace(/<table>[\s\S]*?<\/table>/g, (table) => {
    const flattened = table.replace(/<\/p>\s*<p>/g, " ").replace(/<\/?p>/g, "");
    return flattened.replace(
      /<tr>([\s\S]*?)<\/tr>/,
      (_match, row: string) =>
        `<tr>${row.replace(/<td(\s[^>]*)?>/g, "<th$1>").replace(/<\/td>/g, "</th>")}</tr>`,
    );
  });
}

export const wordParser: DocumentParser = {
  name: "word",
  extensions: WORD_EXTENSIONS,
  async parse(filePath, buffer, { logger }) {
    const { value: html, messages } = await mammoth.convertToHtml({ buffer });
    for (const message of messages) {
      logger.warn({ file: filePath, type: message.type }, message.message);
    }

    const markdown = createTurndown().turndown(prepareTablesForMarkdown(html));
    const { title, blocks } = parseMarkdown(markdown);
    return { title: title || extractTitle(filePath), blocks };
  },
};
