#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { program } from "commander";
import { config } from "./commands/config";
import { convert } from "./commands/convert";
import { doctor } from "./commands/doctor";
import { formats } from "./commands/formats";

const pkg: unknown = JSON.parse(
  fs.readFileSync(path.join(__dirname, "../package.json"), {
    encoding: "utf-8",
  }),
);
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

program
  .name("docmd")
  .description("Convert Word, Excel, PDF, text and image files to Markdown")
  .version(version);

program.addCommand(convert, { isDefault: true });
program.addCommand(formats);
program.addCommand(config);
program.addCommand(doctor);

program.parse();
