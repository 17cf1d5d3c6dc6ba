import * as fs from "node:fs";
import { z } from "zod";
import { DEFAULT_OCR_LANGUAGE, PATHS } from "../../config";
import { ConfigError } from "../errors";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const UserConfigSchema = z
  .object({
    output: z
      .object({
        /** Where converted files go when no --output is given */
        directory: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    conversion: z
      .object({
        detectLists: z.boolean().optional(),
        normalizeHeadings: z.boolean().optional(),
        preserveImages: z.boolean().optional(),
        pageHeadings: z.boolean().optional(),
        /** term → canonical spelling, matched as whole words */
        terminology: z.record(z.string()).optional(),
      })
      .strict()
      .optional(),
    ocr: z
      .object({
        language: z.string().min(1).optional(),
        langPath: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
        file: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type UserConfig = z.infer<typeof UserConfigSchema>;

/**
 * Fully resolved knobs consumed by parsers and the Markdown generator.
 */
export interface ConversionSettings {
  detectLists: boolean;
  normalizeHeadings: boolean;
  preserveImages: boolean;
  pageHeadings: boolean;
  terminology: Record<string, string>;
  ocr: {
    language: string;
    langPath?: string;
  };
}

function ensureConfigDir(): void {
  if (!fs.existsSync(PATHS.root)) {
    fs.mkdirSync(PATHS.root, { recursive: true });
  }
}

/**
 * Parse and validate raw config file contents.
 */
export function parseUserConfig(content: string, filePath: string): UserConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid JSON";
    throw new ConfigError(filePath, [message]);
  }

  const result = UserConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      filePath,
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }
  return result.data;
}

/**
 * Load user configuration from ~/.docmd/config.json.
 * A missing file is an empty config; a broken one is a ConfigError.
 */
export function loadUserConfig(): UserConfig {
  const configFile = PATHS.configFile;
  if (!fs.existsSync(configFile)) {
    return {};
  }
  const content = fs.readFileSync(configFile, "utf-8");
  return parseUserConfig(content, configFile);
}

export function saveUserConfig(config: UserConfig): void {
  ensureConfigDir();
  const content = JSON.stringify(config, null, 2);
  fs.writeFileSync(PATHS.configFile, `${content}\n`, "utf-8");
}

function mergeSection<T extends object>(
  current: T | undefined,
  update: T | undefined,
  present: boolean,
): T | undefined {
  if (!present) return current;
  if (update === undefined || current === undefined) return update;
  return { ...current, ...update };
}

/**
 * Merge `updates` into the stored config section by section.
 * Passing `undefined` for a section clears it.
 */
export function updateUserConfig(updates: Partial<UserConfig>): UserConfig {
  const current = loadUserConfig();
  const updated: UserConfig = {
    output: mergeSection(current.output, updates.output, "output" in updates),
    conversion: mergeSection(
      current.conversion,
      updates.conversion,
      "conversion" in updates,
    ),
    ocr: mergeSection(current.ocr, updates.ocr, "ocr" in updates),
    logging: mergeSection(current.logging, updates.logging, "logging" in updates),
  };
  saveUserConfig(updated);
  return updated;
}

export function resetUserConfig(): void {
  if (fs.existsSync(PATHS.configFile)) {
    fs.rmSync(PATHS.configFile);
  }
}

export function resolveConversionSettings(
  config: UserConfig = {},
): ConversionSettings {
  const conversion = config.conversion ?? {};
  return {
    detectLists: conversion.detectLists ?? true,
    normalizeHeadings: conversion.normalizeHeadings ?? true,
    preserveImages: conversion.preserveImages ?? true,
    pageHeadings: conversion.pageHeadings ?? true,
    terminology: { ...conversion.terminology },
    ocr: {
      language: config.ocr?.language ?? DEFAULT_OCR_LANGUAGE,
      langPath: config.ocr?.langPath,
    },
  };
}

export function getConfigFilePath(): string {
  return PATHS.configFile;
}
