import { MARKDOWN_EXTENSIONS } from "../../config";
import { parseMarkdown } from "../markdown/parser";
import { decodeText, extractTitle } from "./base";
import type { DocumentParser } from "./types";

export const markdownParser: DocumentParser = {
  name: "markdown",
  extensions: MARKDOWN_EXTENSIONS,
  async parse(filePath, buffer) {
    const { title, blocks } = parseMarkdown(decodeText(buffer));
    return { title: title || extractTitle(filePath), blocks };
  },
};
