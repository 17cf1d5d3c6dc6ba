import * as path from "node:path";
import { Command } from "commander";
import {
  type ConversionSettings,
  type UserConfig,
  loadUserConfig,
  resolveConversionSettings,
} from "../lib/config/user-config";
import { Converter } from "../lib/convert";
import { describeError } from "../lib/errors";
import { collectInputFiles } from "../lib/inputs/collect";
import { formatMarkdownForTerminal } from "../lib/utils/formatter";
import {
  createConversionSpinner,
  formatBatchSummary,
} from "../lib/utils/progress";

interface ConvertOptions {
  output?: string;
  name?: string;
  print: boolean;
  ignore?: string[];
  detectLists: boolean;
  normalizeHeadings: boolean;
  images: boolean;
  ocrLang?: string;
}

/**
 * Config file settings, overridden by flags the user actually passed
 * (negatable flags always carry a value, so their source is checked).
 */
export function resolveSettings(
  config: UserConfig,
  options: ConvertOptions,
  cmd: Command,
): ConversionSettings {
  const settings = resolveConversionSettings(config);
  const fromCli = (key: string) => cmd.getOptionValueSource(key) === "cli";

  if (fromCli("detectLists")) settings.detectLists = options.detectLists;
  if (fromCli("normalizeHeadings")) settings.normalizeHeadings = options.normalizeHeadings;
  if (fromCli("images")) settings.preserveImages = options.images;
  if (options.ocrLang) settings.ocr.language = options.ocrLang;
  return settings;
}

export const convert = new Command("convert")
  .description("Convert documents (docx, xlsx, pdf, txt, md, images) to Markdown")
  .argument("<inputs...>", "Files or directories to convert")
  .option("-o, --output <dir>", "Directory for the generated .md files")
  .option("-n, --name <file>", "Output file name (single input only)")
  .option("--print", "Print Markdown to stdout instead of writing files", false)
  .option("--ignore <patterns...>", "Extra ignore patterns for directory inputs")
  .option("--no-detect-lists", "Keep `key: value` paragraphs as plain text")
  .option("--no-normalize-headings", "Keep heading levels exactly as parsed")
  .option("--no-images", "Leave image references out of the output")
  .option("--ocr-lang <lang>", "OCR language(s) for images, e.g. eng+deu")
  .action(async (inputs: string[], _opts, cmd: Command) => {
    const options = cmd.opts<ConvertOptions>();
    const root = process.cwd();

    try {
      const config = loadUserConfig();
      const settings = resolveSettings(config, options, cmd);
      const { files, missing } = await collectInputFiles(inputs, {
        ignore: options.ignore,
      });

      for (const input of missing) {
        console.error(`Input not found: ${input}`);
      }
      if (files.length === 0) {
        console.error("No convertible files found.");
        process.exitCode = 1;
        return;
      }
      if (options.name && files.length > 1) {
        console.error("--name can only be used with a single input file.");
        process.exitCode = 1;
        return;
      }

      const converter = new Converter({ settings });

      if (options.print) {
        for (const file of files) {
          const { markdown } = await converter.convertToMarkdown(file);
          process.stdout.write(
            formatMarkdownForTerminal(markdown, Boolean(process.stdout.isTTY)),
          );
        }
        return;
      }

      const configured = options.output ?? config.output?.directory;
      const outputDir = configured ? path.resolve(configured) : undefined;

      if (options.name) {
        const written = await converter.convertFile(
          files[0],
          outputDir ?? path.dirname(files[0]),
          options.name,
        );
        console.log(`Saved ${written}`);
        return;
      }

      const { spinner, onProgress } = createConversionSpinner(root, files.length);
      const result = await converter.convertFiles(files, outputDir, onProgress);
      if (result.failed.length > 0) {
        spinner.fail(formatBatchSummary(root, result));
      } else {
        spinner.succeed(formatBatchSummary(root, result));
      }

      if (result.failed.length > 0 || missing.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      console.error("Failed to convert:", describeError(error));
      process.exitCode = 1;
    }
  });
