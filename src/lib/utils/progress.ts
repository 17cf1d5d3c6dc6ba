import { relative } from "node:path";
import ora, { type Ora } from "ora";
import type { BatchProgress, BatchResult } from "../convert/types";

interface ConversionSpinner {
  spinner: Ora;
  onProgress: (info: BatchProgress) => void;
}

/**
 * Path relative to `root` when the file lives below it, absolute otherwise.
 */
export function formatRelativePath(root: string, filePath?: string): string {
  if (!filePath) {
    return "";
  }
  return filePath.startsWith(root) ? relative(root, filePath) : filePath;
}

export function formatTime(ms: number): string {
  const seconds = Math.ceil(ms / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (remainingSeconds === 0) {
    return `${minutes}m`;
  }

  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Spinner plus a progress callback for `Converter.convertFiles`.
 */
export function createConversionSpinner(
  root: string,
  total: number,
): ConversionSpinner {
  const spinner = ora({ text: `Converting ${total} file(s)...` }).start();
  const startTime = Date.now();

  return {
    spinner,
    onProgress(info) {
      const rel = formatRelativePath(root, info.filePath);

      let timeSuffix = "";
      if (info.processed > 0 && info.processed < info.total) {
        const rate = info.processed / (Date.now() - startTime); // files per ms
        const estimatedMs = (info.total - info.processed) / rate;
        if (estimatedMs > 0 && Number.isFinite(estimatedMs)) {
          timeSuffix = ` • ~${formatTime(estimatedMs)} remaining`;
        }
      }

      spinner.text = `Converting (${info.processed}/${info.total})${timeSuffix} • ${rel}`;
    },
  };
}

/**
 * One line per failure under a headline, e.g.
 * `Converted 2 of 3 files` / `  ✗ a.pdf: Failed to parse ...`.
 */
export function formatBatchSummary(root: string, result: BatchResult): string {
  const total = result.converted.size + result.failed.length;
  const lines = [`Converted ${result.converted.size} of ${total} files`];
  for (const failure of result.failed) {
    lines.push(`  ✗ ${formatRelativePath(root, failure.filePath)}: ${failure.error.message}`);
  }
  return lines.join("\n");
}
