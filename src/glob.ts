// CHANGE: Match root-relative paths against shell-style patterns with `*` and `**`.
// WHY: Patterns select which files are checked or converted; `**` must span directories.

const SEPARATOR = "/";
const MATCHING = 0;
const SKIPPING = 1;

function normaliseSeparators(value: string): string {
  return value.replace(/\\/g, SEPARATOR);
}

/**
 * Search (pattern index, candidate index, mode) states with an explicit stack.
 *
 * Every wildcard state advances by at most one candidate character, and each state is
 * queued once, so work is bounded by the (|pattern| + 1) * (|candidate| + 1) * 2 table.
 * `SKIPPING` marks a `**\/` that is moving to the character after the next `/`.
 */
function search(pattern: string, candidate: string): boolean {
  const width = candidate.length + 1;
  const queued = new Uint8Array((pattern.length + 1) * width * 2);
  const pending: number[] = [];

  const enqueue = (p: number, c: number, mode: number): void => {
    const key = (p * width + c) * 2 + mode;
    if (queued[key] === 0) {
      queued[key] = 1;
      pending.push(key);
    }
  };

  enqueue(0, 0, MATCHING);
  for (let key = pending.pop(); key !== undefined; key = pending.pop()) {
    const mode = key % 2;
    const cell = (key - mode) / 2;
    const p = Math.floor(cell / width);
    const c = cell - p * width;

    if (mode === SKIPPING) {
      const rest = p + 3;
      if (c < candidate.length) {
        if (candidate[c] === SEPARATOR) {
          enqueue(rest, c + 1, MATCHING);
        }
        enqueue(p, c + 1, SKIPPING);
      }
      continue;
    }

    if (p === pattern.length) {
      if (c === candidate.length) {
        return true;
      }
      continue;
    }

    if (pattern[p] === "*" && pattern[p + 1] === "*") {
      const rest = p + 2;
      if (rest === pattern.length) {
        return true;
      }
      if (pattern[rest] === SEPARATOR) {
        // `**/` consumes zero segments, or everything up to and including a later `/`.
        enqueue(rest + 1, c, MATCHING);
        enqueue(p, c, SKIPPING);
      } else {
        enqueue(rest, c, MATCHING);
        if (c < candidate.length) {
          enqueue(p, c + 1, MATCHING);
        }
      }
    } else if (pattern[p] === "*") {
      enqueue(p + 1, c, MATCHING);
      if (c < candidate.length && candidate[c] !== SEPARATOR) {
        enqueue(p, c + 1, MATCHING);
      }
    } else if (c < candidate.length && pattern[p] === candidate[c]) {
      enqueue(p + 1, c + 1, MATCHING);
    }
  }

  return false;
}

/**
 * Test whether a path satisfies a glob pattern.
 *
 * - `*` matches any characters within one segment.
 * - `**` matches any characters including `/`; a `/` right after it is part of the match,
 *   so `a/**\/b` also matches `a/b`.
 * - `\` is treated as `/` in both arguments.
 *
 * Never throws for string input: if the working buffers cannot be allocated the path is
 * reported as not matching.
 *
 * @param pattern - Glob pattern, e.g. `src/**\/*.ts`.
 * @param candidate - Root-relative path.
 *
 * @example
 * matchesGlob("src/*.ts", "src/index.ts")        // true
 * matchesGlob("src/*.ts", "src/sub/index.ts")    // false
 * matchesGlob("**\/*.ts", "index.ts")            // true
 */
export function matchesGlob(pattern: string, candidate: string): boolean {
  try {
    return search(normaliseSeparators(pattern), normaliseSeparators(candidate));
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}
