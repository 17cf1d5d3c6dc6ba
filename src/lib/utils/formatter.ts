import { highlight } from "cli-highlight";

/**
 * Markdown for stdout: syntax-highlighted on a terminal, untouched when piped.
 */
export function formatMarkdownForTerminal(markdown: string, colorize: boolean): string {
  if (!colorize) return markdown;
  return highlight(markdown, { language: "markdown", ignoreIllegals: true });
}
