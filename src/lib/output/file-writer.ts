import * as fs from "node:fs/promises";
import * as path from "node:path";
import { OUTPUT_EXTENSION } from "../../config";
import { FileWritingError } from "../errors";

const MAX_FILENAME_LENGTH = 255;
const ILLEGAL_FILENAME_CHARS = /[\\/*?:"<>|]/g;
const CONVERTED_SUFFIX = `.converted${OUTPUT_EXTENSION}`;

function timestamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

// Length is counted in code points so surrogate pairs are never split.
export function sanitizeFilename(filename: string): string {
  const clean = filename.replace(ILLEGAL_FILENAME_CHARS, "_");
  const chars = Array.from(clean);
  if (chars.length <= MAX_FILENAME_LENGTH) return clean;

  const ext = path.extname(clean);
  const kept = MAX_FILENAME_LENGTH - Array.from(ext).length;
  return chars.slice(0, kept).join("") + ext;
}

function hasOutputExtension(filename: string): boolean {
  return path.extname(filename).toLowerCase() === OUTPUT_EXTENSION;
}

/**
 * `report.docx` → `report.md`
 */
export function outputFilenameFor(filePath: string): string {
  return `${path.basename(filePath, path.extname(filePath))}${OUTPUT_EXTENSION}`;
}

/**
 * Name used when the regular output name would replace the source itself,
 * e.g. `notes.md` → `notes.converted.md`.
 */
export function convertedFilenameFor(filePath: string): string {
  return `${path.basename(filePath, path.extname(filePath))}${CONVERTED_SUFFIX}`;
}

/**
 * `report.md` → `report-2.md`, `report-3.md`, ... until `isTaken` says no.
 */
export function uniqueFilename(
  filename: string,
  isTaken: (candidate: string) => boolean,
): string {
  const stem = hasOutputExtension(filename)
    ? filename.slice(0, -OUTPUT_EXTENSION.length)
    : filename;
  let candidate = filename;
  for (let n = 2; isTaken(candidate); n++) {
    candidate = `${stem}-${n}${OUTPUT_EXTENSION}`;
  }
  return candidate;
}

export class FileWriter {
  constructor(private readonly now: () => Date = () => new Date()) {}

  defaultFilename(): string {
    return `markdown_output_${timestamp(this.now())}${OUTPUT_EXTENSION}`;
  }

  /**
   * Absolute path `write` would use for these arguments.
   */
  resolveTarget(outputDir: string, filename?: string): string {
    let name = filename || this.defaultFilename();
    if (!hasOutputExtension(name)) {
      name += OUTPUT_EXTENSION;
    }
    return path.resolve(outputDir, sanitizeFilename(name));
  }

  /**
   * Write `content` into `outputDir`, creating it when needed.
   * Returns the absolute path of the written file.
   */
  async write(content: string, outputDir: string, filename?: string): Promise<string> {
    const target = this.resolveTarget(outputDir, filename);

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(target, content, "utf-8");
    } catch (error) {
      throw new FileWritingError(target, error);
    }
    return target;
  }
}
