// CHANGE: Enumerate regular files below a scan root.
// WHY: Glob patterns are matched against root-relative paths with `/` separators.

import fs from "fs-extra";
import type { Dirent } from "fs-extra";
import path from "path";

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) {
    return -1;
  }
  return a.name > b.name ? 1 : 0;
}

/**
 * Yield root-relative paths of regular files, descending into directories in name order.
 *
 * Symbolic links and special files are skipped.
 *
 * @param root - Directory to scan.
 * @param prefix - Relative directory currently being listed.
 */
export async function* walkFiles(root: string, prefix = ""): AsyncGenerator<string> {
  const entries = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
  entries.sort(byName);
  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      yield* walkFiles(root, relative);
    } else if (entry.isFile()) {
      yield relative;
    }
  }
}
