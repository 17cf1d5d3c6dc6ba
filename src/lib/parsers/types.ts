import type { Logger } from "pino";
import type { ConversionSettings } from "../config/user-config";
import type { ParsedDocument } from "../markdown/types";

export interface ParserContext {
  settings: ConversionSettings;
  logger: Logger;
}

/**
 * A format-specific reader that turns a file's bytes into content blocks.
 */
export interface DocumentParser {
  readonly name: string;
  /** Lower-case extensions including the dot */
  readonly extensions: ReadonlySet<string>;
  parse(
    filePath: string,
    buffer: Buffer,
    context: ParserContext,
  ): Promise<ParsedDocument>;
}
