/**
 * docmd library exports
 *
 * Use these to embed document-to-Markdown conversion in other tools.
 */

// ============================================================================
// Conversion
// ============================================================================

export { Converter } from "./convert";
export type {
  BatchFailure,
  BatchProgress,
  BatchResult,
  ConversionResult,
  ConverterOptions,
} from "./convert";

// ============================================================================
// Markdown
// ============================================================================

export { generateMarkdown } from "./markdown/generator";
export type { GenerateOptions } from "./markdown/generator";
export { parseMarkdown } from "./markdown/parser";
export type * from "./markdown/types";

// ============================================================================
// Parsers
// ============================================================================

export {
  PARSERS,
  getParserForFile,
  isSupportedFile,
  supportedExtensions,
} from "./parsers";
export type { DocumentParser, ParserContext } from "./parsers";

// ============================================================================
// Output & configuration
// ============================================================================

export { FileWriter, sanitizeFilename } from "./output/file-writer";
export {
  loadUserConfig,
  resolveConversionSettings,
} from "./config/user-config";
export type { ConversionSettings, UserConfig } from "./config/user-config";

// ============================================================================
// Errors
// ============================================================================

export {
  ConfigError,
  ConverterError,
  FileParsingError,
  FileWritingError,
  MarkdownGenerationError,
  UnsupportedFileTypeError,
} from "./errors";
export type { ConverterErrorCode } from "./errors";
