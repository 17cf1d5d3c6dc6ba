import * as path from "node:path";
import { IMAGE_EXTENSIONS } from "../../config";
import type { ConversionSettings } from "../config/user-config";
import type { ContentBlock } from "../markdown/types";
import { extractTitle } from "./base";
import { structureText } from "./text-structure";
import type { DocumentParser } from "./types";

export const NO_TEXT_MESSAGE = "No text was recognized in this image.";

const BUNDLED_LANGUAGE = "eng";

/**
 * English traineddata shipped by the @tesseract.js-data/eng package, in the
 * layout tesseract.js expects for its default LSTM engine.
 */
export function bundledLangPath(): string {
  const packageJson = require.resolve("@tesseract.js-data/eng/package.json");
  return path.join(path.dirname(packageJson), "4.0.0_best_int");
}

/**
 * Where tesseract.js loads language data from. `ocr.langPath` wins; without
 * it only the bundled English data is available.
 */
export function resolveLangPath(ocr: ConversionSettings["ocr"]): string {
  if (ocr.langPath) return ocr.langPath;

  const missing = ocr.language
    .split("+")
    .filter((lang) => lang && lang !== BUNDLED_LANGUAGE);
  if (missing.length > 0) {
    throw new Error(
      `No OCR data bundled for ${missing.join(", ")}; set ocr.langPath to a directory holding their traineddata files`,
    );
  }
  return bundledLangPath();
}

export const imageParser: DocumentParser = {
  name: "image",
  extensions: IMAGE_EXTENSIONS,
  async parse(filePath, buffer, { settings, logger }) {
    const { createWorker } = await import("tesseract.js");
    const { language } = settings.ocr;
    const langPath = resolveLangPath(settings.ocr);

    logger.debug({ file: filePath, language, langPath }, "starting OCR");
    // Local data only: no download and no traineddata cache in the cwd.
    const worker = await createWorker(language, undefined, {
      langPath,
      cacheMethod: "none",
    });

    let text: string;
    try {
      const { data } = await worker.recognize(buffer);
      text = data.text;
    } finally {
      await worker.terminate();
    }

    const blocks: ContentBlock[] = [];
    if (settings.preserveImages) {
      blocks.push({
        type: "image",
        alt: "Original image",
        src: filePath.replace(/\\/g, "/"),
      });
    }
    if (text.trim()) {
      blocks.push(...structureText(text));
    } else {
      blocks.push({ type: "text", text: NO_TEXT_MESSAGE });
    }

    return { title: extractTitle(filePath), blocks };
  },
};
