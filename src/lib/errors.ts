export type ConverterErrorCode =
  | "UNSUPPORTED_FILE_TYPE"
  | "FILE_PARSING"
  | "MARKDOWN_GENERATION"
  | "FILE_WRITING"
  | "CONFIG";

/**
 * Base class for every failure the conversion pipeline reports.
 */
export class ConverterError extends Error {
  constructor(
    readonly code: ConverterErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedFileTypeError extends ConverterError {
  constructor(readonly filePath: string) {
    super("UNSUPPORTED_FILE_TYPE", `Unsupported file type: ${filePath}`);
  }
}

export class FileParsingError extends ConverterError {
  constructor(
    readonly filePath: string,
    cause?: unknown,
  ) {
    super(
      "FILE_PARSING",
      `Failed to parse ${filePath}${cause === undefined ? "" : `: ${describeError(cause)}`}`,
      { cause },
    );
  }
}

export class MarkdownGenerationError extends ConverterError {
  constructor(cause?: unknown) {
    super(
      "MARKDOWN_GENERATION",
      `Failed to generate Markdown${cause === undefined ? "" : `: ${describeError(cause)}`}`,
      { cause },
    );
  }
}

export class FileWritingError extends ConverterError {
  constructor(
    readonly filePath: string,
    cause?: unknown,
  ) {
    super(
      "FILE_WRITING",
      `Failed to write ${filePath}${cause === undefined ? "" : `: ${describeError(cause)}`}`,
      { cause },
    );
  }
}

export class ConfigError extends ConverterError {
  constructor(
    readonly filePath: string,
    readonly issues: string[],
  ) {
    super("CONFIG", `Invalid configuration in ${filePath}: ${issues.join("; ")}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}
