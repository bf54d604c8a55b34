/**
 * Startup checks for the three paths a build needs
 */

import { access, stat } from "fs/promises";
import { constants } from "node:fs";
import { resolve } from "node:path";
import type { BuildConfig } from "../types";
import { BuildError, type BuildErrorReason } from "./build-error";

async function checkPath(
  path: string,
  kind: "file" | "directory",
  mode: number,
  reason: BuildErrorReason,
): Promise<void> {
  const absolute = resolve(path);
  try {
    const stats = await stat(absolute);
    if (kind === "file" && !stats.isFile()) {
      throw new Error("not a file");
    }
    if (kind === "directory" && !stats.isDirectory()) {
      throw new Error("not a directory");
    }
    await access(absolute, mode);
  } catch (error) {
    throw new BuildError(reason, absolute, error);
  }
}

/**
 * Fails on the first missing or unusable path:
 * CSS file (readable), sources directory (readable), output directory (writable)
 */
export async function validatePaths(config: BuildConfig): Promise<void> {
  await checkPath(config.style.path, "file", constants.R_OK, "invalid-css-path");
  await checkPath(
    config.input.directory,
    "directory",
    constants.R_OK,
    "invalid-sources-path",
  );
  await checkPath(
    config.output.directory,
    "directory",
    constants.W_OK,
    "invalid-output-path",
  );
}
