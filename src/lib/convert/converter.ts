import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "pino";
import { MAX_INPUT_SIZE_BYTES } from "../../config";
import {
  type ConversionSettings,
  resolveConversionSettings,
} from "../config/user-config";
import { ConverterError, FileParsingError, describeError } from "../errors";
import { createLogger } from "../logger";
import { generateMarkdown } from "../markdown/generator";
import type { ContentBlock, ParsedDocument } from "../markdown/types";
import {
  FileWriter,
  convertedFilenameFor,
  outputFilenameFor,
  uniqueFilename,
} from "../output/file-writer";
import { PARSERS, fileExtension, getParserForFile } from "../parsers";
import type { DocumentParser } from "../parsers/types";
import { applyTerminology, dropImages } from "./post-process";
import type {
  BatchProgress,
  BatchResult,
  ConversionResult,
} from "./types";

export interface ConverterOptions {
  settings?: ConversionSettings;
  logger?: Logger;
  writer?: FileWriter;
  parsers?: readonly DocumentParser[];
}

// Case-folded so the check also holds on case-insensitive file systems.
function pathKey(filePath: string): string {
  return path.resolve(filePath).toLowerCase();
}

function samePath(a: string, b: string): boolean {
  return pathKey(a) === pathKey(b);
}

/**
 * Drives one file through parse → post-process → generate → write.
 */
export class Converter {
  private readonly settings: ConversionSettings;
  private readonly logger: Logger;
  private readonly writer: FileWriter;
  private readonly parsers: readonly DocumentParser[];

  constructor(options: ConverterOptions = {}) {
    this.settings = options.settings ?? resolveConversionSettings();
    this.logger = options.logger ?? createLogger("converter");
    this.writer = options.writer ?? new FileWriter();
    this.parsers = options.parsers ?? PARSERS;
  }

  async convertToMarkdown(filePath: string): Promise<ConversionResult> {
    const parser = getParserForFile(filePath, this.parsers);
    this.logger.info({ file: filePath, parser: parser.name }, "converting file");

    const buffer = await this.readInput(filePath);
    let parsed: ParsedDocument;
    try {
      parsed = await parser.parse(filePath, buffer, {
        settings: this.settings,
        logger: this.logger.child({ parser: parser.name }),
      });
    } catch (error) {
      if (error instanceof ConverterError) throw error;
      throw new FileParsingError(filePath, error);
    }

    const markdown = generateMarkdown(
      { ...parsed, blocks: this.postProcess(parsed.blocks) },
      {
        normalizeHeadings: this.settings.normalizeHeadings,
        detectLists: this.settings.detectLists,
      },
    );
    this.logger.debug({ file: filePath, length: markdown.length }, "markdown generated");

    return {
      markdown,
      metadata: {
        sourceFormat: fileExtension(filePath).slice(1),
        title: parsed.title,
        parser: parser.name,
      },
    };
  }

  /**
   * Convert `filePath` and write `<name>.md` (or `outputFilename`) into
   * `outputDir`. A name that would land on the source itself becomes
   * `<name>.converted.md`. Returns the written path; failures are logged and
   * rethrown.
   */
  async convertFile(
    filePath: string,
    outputDir: string,
    outputFilename?: string,
  ): Promise<string> {
    try {
      const { markdown } = await this.convertToMarkdown(filePath);
      let filename = outputFilename ?? outputFilenameFor(filePath);
      if (samePath(this.writer.resolveTarget(outputDir, filename), filePath)) {
        filename = convertedFilenameFor(filePath);
        this.logger.warn(
          { file: filePath, output: filename },
          "output would replace the source, writing under another name",
        );
      }
      const written = await this.writer.write(markdown, outputDir, filename);
      this.logger.info({ file: filePath, output: written }, "file saved");
      return written;
    } catch (error) {
      this.logger.error({ file: filePath, err: error }, describeError(error));
      throw error;
    }
  }

  /**
   * Convert files one after another. A failing file does not stop the batch.
   * Without `outputDir` each result lands next to its source. Two inputs that
   * map to the same output get `-2`, `-3`, ... suffixes instead of replacing
   * each other.
   */
  async convertFiles(
    filePaths: string[],
    outputDir?: string,
    onProgress?: (progress: BatchProgress) => void,
  ): Promise<BatchResult> {
    const result: BatchResult = { converted: new Map(), failed: [] };
    const written = new Set<string>();

    for (const [index, filePath] of filePaths.entries()) {
      const dir = outputDir ?? path.dirname(filePath);
      const filename = uniqueFilename(outputFilenameFor(filePath), (candidate) =>
        written.has(pathKey(this.writer.resolveTarget(dir, candidate))),
      );
      try {
        const target = await this.convertFile(filePath, dir, filename);
        written.add(pathKey(target));
        result.converted.set(filePath, target);
      } catch (error) {
        result.failed.push({
          filePath,
          error: error instanceof Error ? error : new Error(describeError(error)),
        });
      }
      onProgress?.({ processed: index + 1, total: filePaths.length, filePath });
    }

    this.logger.info(
      { converted: result.converted.size, failed: result.failed.length },
      "batch finished",
    );
    return result;
  }

  private postProcess(blocks: ContentBlock[]): ContentBlock[] {
    const kept = this.settings.preserveImages ? blocks : dropImages(blocks);
    return applyTerminology(kept, this.settings.terminology);
  }

  private async readInput(filePath: string): Promise<Buffer> {
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new Error("not a regular file");
      }
      if (stats.size > MAX_INPUT_SIZE_BYTES) {
        throw new Error(
          `file exceeds ${MAX_INPUT_SIZE_BYTES / (1024 * 1024)}MB limit`,
        );
      }
      return await fs.readFile(filePath);
    } catch (error) {
      throw new FileParsingError(filePath, error);
    }
  }
}
