// CHANGE: Decide whether a module was launched as the process entry point.
// WHY: npm installs the bin as a symlink, and importing the library must never throw.

import fs from "fs-extra";
import { pathToFileURL } from "url";

/**
 * Compare the resolved script path with a module URL.
 *
 * @param scriptPath - `process.argv[1]`; may be absent or name a path that does not exist.
 * @param moduleUrl - `import.meta.url` of the candidate entry module.
 */
export function isEntryModule(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !fs.pathExistsSync(scriptPath)) {
    return false;
  }
  return pathToFileURL(fs.realpathSync(scriptPath)).href === moduleUrl;
}
