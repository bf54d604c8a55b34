/**
 * Scanner Module
 * Discovers Markdown files and orders them by creation time
 */

import glob from "fast-glob";
import { stat } from "fs/promises";
import path from "node:path";
import { BuildError, compareDocuments } from "../utils";
import type { BuildContext, SourceDocument } from "../types";

/**
 * Scans the sources directory (non-recursive) and populates context
 *
 * Writes to context:
 * - documents: sorted by createdAt, ties by file name
 *
 * A file whose metadata cannot be read is dropped and tracked;
 * an unreadable directory aborts the run.
 */
export async function scan(ctx: BuildContext): Promise<void> {
  const { config, tracker, logger, ordering } = ctx;
  const inputDir = path.resolve(config.input.directory);

  let sourceFiles: string[];
  try {
    const dirStats = await stat(inputDir);
    if (!dirStats.isDirectory()) {
      throw new Error("not a directory");
    }

    sourceFiles = await glob(`*${config.input.extension}`, {
      cwd: inputDir,
      absolute: true,
      onlyFiles: true,
      deep: 1,
    });
  } catch (error) {
    throw new BuildError("invalid-sources-path", inputDir, error);
  }

  tracker.setTotalFiles(sourceFiles.length);

  const documents: SourceDocument[] = [];

  for (const sourcePath of sourceFiles) {
    const fileName = path.basename(sourcePath);

    try {
      const stats = await stat(sourcePath);
      const createdAt = ordering({ path: sourcePath, fileName, stats });
      documents.push({ fileName, sourcePath, createdAt });
    } catch (error) {
      tracker.trackError(sourcePath, error, "file", "metadata");
      tracker.incrementFailed();
      logger.warn(`Skipping ${fileName}: metadata unavailable`);
    }
  }

  documents.sort(compareDocuments);

  logger.debug(`Discovered ${documents.length} source file(s) in ${inputDir}`);
  ctx.documents = documents;
}
