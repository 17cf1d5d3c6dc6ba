import * as fs from "node:fs";
import * as os from "node:os";
import { Command } from "commander";
import { PATHS } from "../config";
import { getConfigFilePath, loadUserConfig } from "../lib/config/user-config";
import { describeError } from "../lib/errors";
import { getLogFilePath } from "../lib/logger";
import { supportedExtensions } from "../lib/parsers";

export const doctor = new Command("doctor")
  .description("Check docmd configuration and paths")
  .action(() => {
    console.log("🏥 docmd Doctor\n");

    const checkPath = (name: string, p: string) => {
      const symbol = fs.existsSync(p) ? "✅" : "➖";
      console.log(`${symbol} ${name}: ${p}`);
    };

    checkPath("Home", PATHS.root);
    checkPath("Config", getConfigFilePath());
    checkPath("Log file", getLogFilePath());

    try {
      loadUserConfig();
      console.log("✅ Configuration is valid");
    } catch (error) {
      console.log(`❌ ${describeError(error)}`);
      process.exitCode = 1;
    }

    console.log(`\nFormats: ${supportedExtensions().join(" ")}`);
    console.log(
      `\nSystem: ${os.platform()} ${os.arch()} | Node: ${process.version}`,
    );
  });
