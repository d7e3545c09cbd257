// CHANGE: Expose check, not and convert commands over the scanner.
// WHY: CLI helpers are importable by tests without parsing process arguments.

import { Command, InvalidArgumentError } from "commander";
import { SCAN } from "./config.js";
import { variantFromString } from "./line-endings.js";
import { debug, error as logError, info, setLogLevel } from "./logger.js";
import { formatCheckSummary, formatConversionLine, formatReportLine } from "./report.js";
import { checkFiles, convertFiles } from "./scanner.js";
import type { FileFailure, TerminatorVariant } from "./types.js";

/**
 * Options shared by every command.
 */
export type GlobalOptions = {
  readonly root: string;
  readonly maxBytes: number;
  readonly concurrency: number;
  readonly verbose?: boolean;
};

const HELP_NOTES = `
Variants:
  win, crlf    Windows style (record separator: \\r\\n)
  unix, lf     Unix/Linux/macOS style (record separator: \\n)
  mac, cr      Classic Mac style (record separator: \\r)

Line endings:
  - LF (Line Feed, \\n, 0x0A): used by Unix, Linux and modern macOS.
  - CRLF (Carriage Return + Line Feed, \\r\\n, 0x0D 0x0A): used by Windows.
  - CR (Carriage Return, \\r, 0x0D): used by classic Mac OS (pre-OS X).

Mixed line endings occur when a file contains more than one kind of
record separator, which can cause issues with some compilers and editors.

Glob patterns:
  *   matches any number of characters within a directory.
  **  matches any number of characters across directories.
  Example: "*.ts", "src/**/*.ts", "test_*.txt"`;

/**
 * Parse a variant alias for commander arguments.
 *
 * @throws InvalidArgumentError for unknown aliases.
 */
export function parseVariantArgument(value: string): TerminatorVariant {
  const variant = variantFromString(value);
  if (variant === undefined) {
    throw new InvalidArgumentError(`Invalid variant: ${value}. Use win, unix, mac, crlf, lf, or cr.`);
  }
  return variant;
}

export function parsePositiveArgument(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got ${value}.`);
  }
  return parsed;
}

function reportFailures(failures: readonly FileFailure[], action: string): void {
  if (failures.length === 0) {
    return;
  }
  logError(`${failures.length} files could not be ${action}.`);
  process.exitCode = 1;
}

/**
 * Check mode: print one report line per selected file.
 *
 * @param exclude - When set (the `not` command), files already in this variant are not printed.
 */
export async function checkAction(
  patterns: readonly string[],
  options: GlobalOptions,
  exclude?: TerminatorVariant
): Promise<void> {
  debug(`Checking ${options.root} for ${patterns.join(", ")}`);
  const result = await checkFiles({
    root: options.root,
    patterns,
    exclude,
    maxFileBytes: options.maxBytes,
    concurrency: options.concurrency
  });
  for (const report of result.reports) {
    console.log(formatReportLine(report));
  }
  info(formatCheckSummary(result.reports, result.scanned));
  reportFailures(result.failures, "checked");
}

/**
 * Convert mode: rewrite selected files whose bytes change under the target variant.
 */
export async function convertAction(
  target: TerminatorVariant,
  patterns: readonly string[],
  options: GlobalOptions,
  dryRun: boolean
): Promise<void> {
  debug(`Converting ${patterns.join(", ")} under ${options.root} to ${target}${dryRun ? " (dry run)" : ""}`);
  const result = await convertFiles({
    root: options.root,
    patterns,
    target,
    dryRun,
    maxFileBytes: options.maxBytes,
    concurrency: options.concurrency
  });
  const changed = result.reports.filter(report => report.changed);
  for (const report of changed) {
    console.log(formatConversionLine(report, target, dryRun));
  }
  info(`${dryRun ? "Would convert" : "Converted"} ${changed.length} of ${result.scanned} files to ${target}.`);
  reportFailures(result.failures, "converted");
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("crlf")
    .description("Line ending utility: report and convert LF, CRLF and CR line endings")
    .version("1.0.0")
    .option("-C, --root <dir>", "directory to scan", SCAN.ROOT)
    .option("--max-bytes <n>", "skip files larger than this many bytes", parsePositiveArgument, SCAN.MAX_FILE_BYTES)
    .option("--concurrency <n>", "files processed in parallel", parsePositiveArgument, SCAN.CONCURRENCY)
    .option("--verbose", "enable debug logging")
    .configureOutput({
      outputError: (str: string) => logError(str.trimEnd())
    })
    .addHelpText("after", HELP_NOTES)
    .hook("preAction", command => {
      if (command.opts<GlobalOptions>().verbose) {
        setLogLevel("debug");
      }
    });

  program
    .command("check")
    .description("Analyze files and show their line ending variants")
    .argument("<patterns...>", "glob patterns selecting files")
    .action(async (patterns: string[], _options: unknown, command: Command) =>
      checkAction(patterns, command.optsWithGlobals<GlobalOptions>())
    );

  program
    .command("not")
    .description("Show files that do NOT match the specified variant")
    .argument("<variant>", "expected variant", parseVariantArgument)
    .argument("<patterns...>", "glob patterns selecting files")
    .action(async (variant: TerminatorVariant, patterns: string[], _options: unknown, command: Command) =>
      checkAction(patterns, command.optsWithGlobals<GlobalOptions>(), variant)
    );

  program
    .command("convert")
    .description("Convert line endings in files to a specific variant")
    .argument("<variant>", "target variant", parseVariantArgument)
    .argument("<patterns...>", "glob patterns selecting files")
    .option("--dry-run", "list files that would change without writing them")
    .action(
      async (variant: TerminatorVariant, patterns: string[], options: { dryRun?: boolean }, command: Command) =>
        convertAction(variant, patterns, command.optsWithGlobals<GlobalOptions>(), options.dryRun === true)
    );

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
