// CHANGE: Verify entry-point detection for direct runs and library imports.
// WHY: The bin symlink must start the CLI; a missing script path must not break imports.

import fs from "fs-extra";
import os from "os";
import path from "path";
import { pathToFileURL } from "url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isEntryModule } from "../src/utils/entry.js";

describe("isEntryModule", () => {
  let dir: string;
  let script: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "crlf-entry-"));
    script = path.join(dir, "index.js");
    await fs.outputFile(script, "");
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("matches the module URL of the script", () => {
    expect(isEntryModule(script, pathToFileURL(fs.realpathSync(script)).href)).toBe(true);
  });

  it("follows a symlinked bin to its target", async () => {
    const link = path.join(dir, "crlf");
    await fs.symlink(script, link);
    expect(isEntryModule(link, pathToFileURL(fs.realpathSync(script)).href)).toBe(true);
  });

  it("returns false for another module", () => {
    expect(isEntryModule(script, "file:///elsewhere/index.js")).toBe(false);
  });

  it("returns false when the script path is absent or missing", () => {
    expect(isEntryModule(undefined, "file:///elsewhere/index.js")).toBe(false);
    expect(isEntryModule(path.join(dir, "missing.js"), "file:///elsewhere/missing.js")).toBe(false);
  });
});
