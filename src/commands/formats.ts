import { Command } from "commander";
import { PARSERS } from "../lib/parsers";

export function describeFormats(): string[] {
  return PARSERS.map(
    (parser) => `${parser.name.padEnd(10)} ${[...parser.extensions].join(", ")}`,
  );
}

export const formats = new Command("formats")
  .description("List the file formats docmd can convert")
  .action(() => {
    for (const line of describeFormats()) {
      console.log(line);
    }
  });
