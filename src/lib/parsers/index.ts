import { UnsupportedFileTypeError } from "../errors";
import { isSupported } from "./base";
import { excelParser } from "./excel";
import { imageParser } from "./image";
import { markdownParser } from "./markdown";
import { pdfParser } from "./pdf";
import { textParser } from "./text";
import type { DocumentParser } from "./types";
import { wordParser } from "./word";

export const PARSERS: readonly DocumentParser[] = [
  textParser,
  markdownParser,
  wordParser,
  excelParser,
  pdfParser,
  imageParser,
];

export function getParserForFile(
  filePath: string,
  parsers: readonly DocumentParser[] = PARSERS,
): DocumentParser {
  const parser = parsers.find((candidate) => isSupported(candidate, filePath));
  if (!parser) {
    throw new UnsupportedFileTypeError(filePath);
  }
  return parser;
}

export function isSupportedFile(filePath: string): boolean {
  return PARSERS.some((parser) => isSupported(parser, filePath));
}

export function supportedExtensions(): string[] {
  return PARSERS.flatMap((parser) => [...parser.extensions]);
}

export { extractTitle, fileExtension, isSupported } from "./base";
export { structureText } from "./text-structure";
export type { DocumentParser, ParserContext } from "./types";
