import { TEXT_EXTENSIONS } from "../../config";
import { decodeText, extractTitle } from "./base";
import { structureText } from "./text-structure";
import type { DocumentParser } from "./types";

export const textParser: DocumentParser = {
  name: "text",
  extensions: TEXT_EXTENSIONS,
  async parse(filePath, buffer) {
    return {
      title: extractTitle(filePath),
      blocks: structureText(decodeText(buffer)),
    };
  },
};
