export { Converter } from "./converter";
export type { ConverterOptions } from "./converter";
export { applyTerminology, dropImages } from "./post-process";
export type {
  BatchFailure,
  BatchProgress,
  BatchResult,
  ConversionResult,
} from "./types";
