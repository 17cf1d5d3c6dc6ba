import * as os from "node:os";
import * as path from "node:path";

/** Root of docmd's per-user state (config file, logs). */
export function getHomeDir(): string {
  return process.env.DOCMD_HOME || path.join(os.homedir(), ".docmd");
}

export const PATHS = {
  get root(): string {
    return getHomeDir();
  },
  get configFile(): string {
    return path.join(getHomeDir(), "config.json");
  },
  get logs(): string {
    return path.join(getHomeDir(), "logs");
  },
};

export const MAX_INPUT_SIZE_BYTES = 1024 * 1024 * 50; // 50MB

export const TEXT_EXTENSIONS: Set<string> = new Set([".txt", ".text"]);
export const MARKDOWN_EXTENSIONS: Set<string> = new Set([".md", ".markdown"]);
export const WORD_EXTENSIONS: Set<string> = new Set([".docx"]);
export const EXCEL_EXTENSIONS: Set<string> = new Set([".xlsx"]);
export const PDF_EXTENSIONS: Set<string> = new Set([".pdf"]);
export const IMAGE_EXTENSIONS: Set<string> = new Set([
  ".png",
  ".jpg",
  ".jpeg",
  ".bmp",
  ".tif",
  ".tiff",
  ".gif",
  ".webp",
]);

export const DEFAULT_OCR_LANGUAGE = "eng";

export const OUTPUT_EXTENSION = ".md";
