/**
 * Indexer Module
 * Renders index.html listing every written page
 */

import { join, resolve } from "node:path";
import { writeFile } from "fs/promises";
import { loadIndexTemplate } from "../templates";
import { BuildError } from "../utils";
import type { BuildContext, PageLink } from "../types";

export const INDEX_FILENAME = "index.html";

/**
 * Run the indexer module
 *
 * links must already be in source order; they are listed as given.
 * Any failure here is fatal, since a partial index misrepresents the run.
 */
export async function indexer(
  ctx: BuildContext,
  links: PageLink[],
): Promise<string> {
  const { config, tracker, logger } = ctx;

  const template =
    ctx.templates?.index ?? (await loadIndexTemplate(config.templates));
  const html = template.render({ title: config.site.title, pages: links });

  const outputPath = join(resolve(config.output.directory), INDEX_FILENAME);
  try {
    await writeFile(outputPath, html, "utf-8");
  } catch (error) {
    throw new BuildError("index-write-error", outputPath, error);
  }

  tracker.incrementCreatedIndexes();
  logger.info(`Wrote ${outputPath} (${links.length} page(s))`);

  return outputPath;
}
