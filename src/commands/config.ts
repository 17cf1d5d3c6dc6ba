import { Command } from "commander";
import * as p from "@clack/prompts";
import {
  getConfigFilePath,
  loadUserConfig,
  resetUserConfig,
  resolveConversionSettings,
  updateUserConfig,
} from "../lib/config/user-config";
import { describeError } from "../lib/errors";
import { getLogFilePath } from "../lib/logger";

export const config = new Command("config")
  .description("Configure docmd defaults (output directory, OCR, formatting)")
  .option("--show", "Show current configuration")
  .option("--reset", "Reset configuration to defaults")
  .action(async (options: { show?: boolean; reset?: boolean }) => {
    try {
      if (options.show) {
        showConfig();
        return;
      }
      if (options.reset) {
        await resetConfig();
        return;
      }
      await runConfigWizard();
    } catch (error) {
      console.error("Failed to configure:", describeError(error));
      process.exitCode = 1;
    }
  });

const onOff = (value: boolean) => (value ? "on" : "off");

function showConfig(): void {
  const current = loadUserConfig();
  const settings = resolveConversionSettings(current);

  console.log(`\nConfiguration file: ${getConfigFilePath()}\n`);

  console.log("Output:");
  console.log(
    `  Directory: ${current.output?.directory ?? "(next to each source file)"}`,
  );
  console.log();

  console.log("Conversion:");
  console.log(`  Detect key/value lists: ${onOff(settings.detectLists)}`);
  console.log(`  Normalize headings:     ${onOff(settings.normalizeHeadings)}`);
  console.log(`  Preserve images:        ${onOff(settings.preserveImages)}`);
  console.log(`  PDF page headings:      ${onOff(settings.pageHeadings)}`);
  const terms = Object.entries(settings.terminology);
  if (terms.length > 0) {
    console.log("  Terminology:");
    for (const [from, to] of terms) {
      console.log(`    ${from} → ${to}`);
    }
  }
  console.log();

  console.log("OCR:");
  console.log(`  Language:  ${settings.ocr.language}`);
  console.log(`  Data path: ${settings.ocr.langPath ?? "(bundled English data)"}`);
  console.log();

  console.log(`Log file: ${getLogFilePath()}`);
}

async function resetConfig(): Promise<void> {
  p.intro("Reset Configuration");

  const confirm = await p.confirm({
    message: "Are you sure you want to reset all configuration?",
    initialValue: false,
  });

  if (p.isCancel(confirm) || !confirm) {
    p.cancel("Reset cancelled.");
    return;
  }

  resetUserConfig();
  p.outro("Configuration reset to defaults.");
}

async function runConfigWizard(): Promise<void> {
  const current = loadUserConfig();
  const settings = resolveConversionSettings(current);

  p.intro("docmd Configuration");

  const directory = await p.text({
    message: "Default output directory (leave empty to write next to sources):",
    placeholder: "./markdown",
    initialValue: current.output?.directory ?? "",
  });
  if (p.isCancel(directory)) {
    p.cancel("Configuration cancelled.");
    return;
  }

  const language = await p.text({
    message: "OCR language for images (tesseract codes, e.g. eng or eng+deu):",
    initialValue: settings.ocr.language,
    validate: (value) => (value.trim() ? undefined : "Language is required"),
  });
  if (p.isCancel(language)) {
    p.cancel("Configuration cancelled.");
    return;
  }

  const detectLists = await p.confirm({
    message: "Turn `key: value` paragraphs into bullet lists?",
    initialValue: settings.detectLists,
  });
  if (p.isCancel(detectLists)) {
    p.cancel("Configuration cancelled.");
    return;
  }

  const preserveImages = await p.confirm({
    message: "Keep image references in the output?",
    initialValue: settings.preserveImages,
  });
  if (p.isCancel(preserveImages)) {
    p.cancel("Configuration cancelled.");
    return;
  }

  updateUserConfig({
    output: directory.trim() ? { directory: directory.trim() } : undefined,
    conversion: { ...current.conversion, detectLists, preserveImages },
    ocr: { ...current.ocr, language: language.trim() },
  });

  p.note(`Config saved to: ${getConfigFilePath()}`, "Configuration Saved");
  p.outro("docmd is configured.");
}
