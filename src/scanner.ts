// CHANGE: Apply glob selection and line-ending detection/conversion to files under a root.
// WHY: One unreadable or oversized file is reported and skipped; the rest of the batch still runs.

import fs from "fs-extra";
import path from "path";
import pLimit from "p-limit";
import { WRITE } from "./config.js";
import { FileTooLargeError } from "./errors.js";
import { matchesGlob } from "./glob.js";
import { convertLineEndings, detectLineEndings } from "./line-endings.js";
import { debug, error as logError } from "./logger.js";
import type {
  CheckOptions,
  ConversionReport,
  ConvertOptions,
  FileFailure,
  FileReport,
  ScanOptions,
  ScanResult
} from "./types.js";
import { walkFiles } from "./utils/walk.js";

interface Candidate {
  readonly path: string;
  readonly pattern: string;
}

interface FileContent {
  readonly data: Buffer;
  readonly mode: number;
}

type Outcome<T> =
  | { readonly ok: true; readonly value: T | undefined }
  | { readonly ok: false; readonly failure: FileFailure };

/**
 * First pattern, in argument order, that selects the path.
 */
export function firstMatchingPattern(patterns: readonly string[], relativePath: string): string | undefined {
  return patterns.find(pattern => matchesGlob(pattern, relativePath));
}

async function collectCandidates(root: string, patterns: readonly string[]): Promise<Candidate[]> {
  const candidates: Candidate[] = [];
  for await (const relativePath of walkFiles(root)) {
    const pattern = firstMatchingPattern(patterns, relativePath);
    if (pattern !== undefined) {
      candidates.push({ path: relativePath, pattern });
    }
  }
  debug(`Matched ${candidates.length} files under ${root}`);
  return candidates;
}

async function readContent(absolutePath: string, relativePath: string, maxFileBytes: number): Promise<FileContent> {
  const stats = await fs.stat(absolutePath);
  if (stats.size > maxFileBytes) {
    throw new FileTooLargeError(relativePath, stats.size, maxFileBytes);
  }
  return { data: await fs.readFile(absolutePath), mode: stats.mode };
}

/**
 * Replace a file by writing a sibling temp file and moving it over the original.
 */
async function writeContent(absolutePath: string, data: Uint8Array, mode: number): Promise<void> {
  const tempPath = `${absolutePath}${WRITE.TEMP_SUFFIX}`;
  try {
    await fs.writeFile(tempPath, data);
    await fs.chmod(tempPath, mode);
    await fs.move(tempPath, absolutePath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

async function processCandidates<T>(
  options: ScanOptions,
  handle: (candidate: Candidate, absolutePath: string) => Promise<T | undefined>
): Promise<ScanResult<T>> {
  assertPositiveInteger("concurrency", options.concurrency);
  assertPositiveInteger("maxFileBytes", options.maxFileBytes);
  const candidates = await collectCandidates(options.root, options.patterns);
  const limit = pLimit(options.concurrency);

  const outcomes = await Promise.all(
    candidates.map(candidate =>
      limit(async (): Promise<Outcome<T>> => {
        try {
          return { ok: true, value: await handle(candidate, path.join(options.root, candidate.path)) };
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          logError(`${candidate.path}: ${reason}`);
          return { ok: false, failure: { path: candidate.path, reason } };
        }
      })
    )
  );

  const reports: T[] = [];
  const failures: FileFailure[] = [];
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push(outcome.failure);
    } else if (outcome.value !== undefined) {
      reports.push(outcome.value);
    }
  }
  return { reports, failures, scanned: candidates.length };
}

/**
 * Detect line endings of every file selected by the patterns.
 *
 * @param options - Scan settings; `exclude` drops files already in that variant.
 * @returns Reports in enumeration order plus files that could not be read.
 */
export async function checkFiles(options: CheckOptions): Promise<ScanResult<FileReport>> {
  return processCandidates(options, async (candidate, absolutePath) => {
    const { data } = await readContent(absolutePath, candidate.path, options.maxFileBytes);
    const info = detectLineEndings(data);
    if (options.exclude !== undefined && info.variant === options.exclude) {
      debug(`Skipping ${candidate.path}: already ${info.variant}`);
      return undefined;
    }
    return { path: candidate.path, pattern: candidate.pattern, info };
  });
}

/**
 * Convert every selected file to the target variant, writing only files whose bytes change.
 *
 * @param options - Scan settings; with `dryRun` nothing is written.
 * @returns One report per selected file plus files that could not be processed.
 */
export async function convertFiles(options: ConvertOptions): Promise<ScanResult<ConversionReport>> {
  return processCandidates(options, async (candidate, absolutePath) => {
    const { data, mode } = await readContent(absolutePath, candidate.path, options.maxFileBytes);
    const before = detectLineEndings(data);
    const converted = convertLineEndings(data, options.target);
    const changed = !data.equals(converted);

    if (!changed) {
      debug(`Skipping ${candidate.path}: already ${options.target}`);
    } else if (!options.dryRun) {
      await writeContent(absolutePath, converted, mode);
    }

    return {
      path: candidate.path,
      pattern: candidate.pattern,
      before,
      changed,
      written: changed && !options.dryRun
    };
  });
}
