import { basename, extname } from "node:path";
import type { DocumentParser } from "./types";

export function fileExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}

export function isSupported(parser: DocumentParser, filePath: string): boolean {
  return parser.extensions.has(fileExtension(filePath));
}

/**
 * Title fallback: the file name without its extension.
 */
export function extractTitle(filePath: string): string {
  return basename(filePath, extname(filePath));
}

export function decodeText(buffer: Buffer): string {
  return buffer.toString("utf-8").replace(/^\uFEFF/, "");
}
