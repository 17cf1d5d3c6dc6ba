import pino from "pino";
import { resolveConversionSettings } from "../src/lib/config/user-config";
import type { ConversionSettings } from "../src/lib/config/user-config";
import type { ParserContext } from "../src/lib/parsers/types";

export const silentLogger = pino({ level: "silent" });

export function makeContext(overrides: Partial<ConversionSettings> = {}): ParserContext {
  return {
    settings: { ...resolveConversionSettings(), ...overrides },
    logger: silentLogger,
  };
}
