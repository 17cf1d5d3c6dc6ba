import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isSupportedFile } from "../parsers";
import { walk } from "./walker";

export interface CollectOptions {
  ignore?: string[];
}

export interface CollectedInputs {
  files: string[];
  /** Inputs that do not exist */
  missing: string[];
}

/**
 * Expand CLI inputs into a de-duplicated list of files. Explicit files are
 * kept whatever their extension (the converter reports unsupported ones);
 * directories contribute only files a parser accepts.
 */
export async function collectInputFiles(
  inputs: string[],
  options: CollectOptions = {},
): Promise<CollectedInputs> {
  const files = new Set<string>();
  const missing: string[] = [];

  for (const input of inputs) {
    const absolute = path.resolve(input);
    let stats: Stats;
    try {
      stats = await fs.stat(absolute);
    } catch {
      missing.push(input);
      continue;
    }

    if (stats.isDirectory()) {
      for await (const file of walk(absolute, { additionalPatterns: options.ignore })) {
        if (isSupportedFile(file)) files.add(file);
      }
    } else {
      files.add(absolute);
    }
  }

  return { files: [...files], missing };
}
