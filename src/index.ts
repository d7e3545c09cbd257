#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner and export the library surface.
// WHY: Importing the package must not parse process arguments.

import { runCli } from "./cli.js";
import { isEntryModule } from "./utils/entry.js";

if (isEntryModule(process.argv[1], import.meta.url)) {
  void runCli(process.argv);
}

export { runCli };
export { matchesGlob } from "./glob.js";
export {
  convertLineEndings,
  deriveVariant,
  detectLineEndings,
  isTerminatorVariant,
  terminatorFor,
  variantFromString,
  variantToString
} from "./line-endings.js";
export { checkFiles, convertFiles, firstMatchingPattern } from "./scanner.js";
export { AllocationError, FileTooLargeError, UnsupportedTargetError } from "./errors.js";
export type {
  CheckOptions,
  ConversionReport,
  ConvertOptions,
  FileFailure,
  FileReport,
  LineEndingInfo,
  LineEndingVariant,
  ScanOptions,
  ScanResult,
  TerminatorVariant
} from "./types.js";
