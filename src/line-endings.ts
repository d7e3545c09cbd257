// CHANGE: Detect and convert line endings on raw byte buffers.
// WHY: Files are classified and rewritten byte-for-byte, independent of their text encoding.

import { AllocationError, UnsupportedTargetError } from "./errors.js";
import type { LineEndingInfo, LineEndingVariant, TerminatorVariant } from "./types.js";

const CR = 0x0d;
const LF = 0x0a;

const TERMINATORS: Readonly<Record<TerminatorVariant, Uint8Array>> = {
  lf: Uint8Array.of(LF),
  crlf: Uint8Array.of(CR, LF),
  cr: Uint8Array.of(CR)
};

const ALIASES: ReadonlyMap<string, TerminatorVariant> = new Map<string, TerminatorVariant>([
  ["lf", "lf"],
  ["unix", "lf"],
  ["crlf", "crlf"],
  ["win", "crlf"],
  ["cr", "cr"],
  ["mac", "cr"]
]);

type TerminatorVisitor = (kind: TerminatorVariant, offset: number, length: number) => void;

// A CR immediately followed by LF is one CRLF terminator, never a CR plus an LF.
function forEachTerminator(content: Uint8Array, visit: TerminatorVisitor): void {
  let i = 0;
  while (i < content.length) {
    const byte = content[i];
    if (byte === CR) {
      if (i + 1 < content.length && content[i + 1] === LF) {
        visit("crlf", i, 2);
        i += 2;
        continue;
      }
      visit("cr", i, 1);
    } else if (byte === LF) {
      visit("lf", i, 1);
    }
    i += 1;
  }
}

/**
 * Derive the variant from the three terminator counters.
 */
export function deriveVariant(lfCount: number, crlfCount: number, crCount: number): LineEndingVariant {
  const kindsPresent = [lfCount, crlfCount, crCount].filter(count => count > 0).length;
  if (kindsPresent > 1) {
    return "mixed";
  }
  if (lfCount > 0) {
    return "lf";
  }
  if (crlfCount > 0) {
    return "crlf";
  }
  if (crCount > 0) {
    return "cr";
  }
  return "none";
}

/**
 * Count LF, CRLF and lone CR terminators in one left-to-right pass.
 *
 * @param content - Raw file content.
 * @returns Counters and the variant derived from them.
 */
export function detectLineEndings(content: Uint8Array): LineEndingInfo {
  let lfCount = 0;
  let crlfCount = 0;
  let crCount = 0;

  forEachTerminator(content, kind => {
    if (kind === "lf") {
      lfCount += 1;
    } else if (kind === "crlf") {
      crlfCount += 1;
    } else {
      crCount += 1;
    }
  });

  return {
    variant: deriveVariant(lfCount, crlfCount, crCount),
    lfCount,
    crlfCount,
    crCount
  };
}

export function isTerminatorVariant(variant: LineEndingVariant): variant is TerminatorVariant {
  return variant === "lf" || variant === "crlf" || variant === "cr";
}

/**
 * Terminator byte sequence written for a target variant.
 */
export function terminatorFor(variant: TerminatorVariant): Uint8Array {
  return TERMINATORS[variant];
}

function allocate(size: number): Buffer {
  try {
    return Buffer.allocUnsafe(size);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new AllocationError(size, { cause: error });
    }
    throw error;
  }
}

/**
 * Replace every terminator with the target's sequence, copying all other bytes through.
 *
 * The input is never mutated. Converting content whose only terminator kind already is
 * `target` reproduces it byte for byte, so callers compare bytes to decide whether to write.
 *
 * @param content - Raw file content.
 * @param target - `lf`, `crlf` or `cr`.
 * @returns Newly allocated buffer with converted content.
 * @throws UnsupportedTargetError if `target` is `mixed` or `none`.
 * @throws AllocationError if the output buffer cannot be allocated.
 */
export function convertLineEndings(content: Uint8Array, target: LineEndingVariant): Buffer {
  if (!isTerminatorVariant(target)) {
    throw new UnsupportedTargetError(target);
  }
  const terminator = TERMINATORS[target];
  const { lfCount, crlfCount, crCount } = detectLineEndings(content);
  const terminatorCount = lfCount + crlfCount + crCount;
  const terminatorBytes = lfCount + 2 * crlfCount + crCount;
  const output = allocate(content.length - terminatorBytes + terminatorCount * terminator.length);

  let written = 0;
  let copied = 0;
  forEachTerminator(content, (_kind, offset, length) => {
    output.set(content.subarray(copied, offset), written);
    written += offset - copied;
    output.set(terminator, written);
    written += terminator.length;
    copied = offset + length;
  });
  output.set(content.subarray(copied), written);

  return output;
}

/**
 * Resolve a variant alias (`lf`/`unix`, `crlf`/`win`, `cr`/`mac`), case-sensitively.
 *
 * @returns The variant, or undefined when the alias is not recognised.
 */
export function variantFromString(text: string): TerminatorVariant | undefined {
  return ALIASES.get(text);
}

/**
 * Canonical lowercase tag of a variant.
 */
export function variantToString(variant: LineEndingVariant): string {
  return variant;
}
